import { Module } from '@nestjs/common'
import { APP_FILTER } from '@nestjs/core'
import { AppController } from './app.controller'
import { BalanceExceptionFilter } from './balance/balance-exception.filter'
import { BalanceModule } from './balance/balance.module'
import { ClockModule } from './clock/clock.module'
import { ConfigModule } from './config/config.module'
import { ExercisesModule } from './exercises/exercises.module'
import { WorkoutSessionsModule } from './workout-sessions/workout-sessions.module'

@Module({
  imports: [ConfigModule, ClockModule, BalanceModule, ExercisesModule, WorkoutSessionsModule],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: BalanceExceptionFilter }],
})
export class AppModule {}
