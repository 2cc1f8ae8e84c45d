import { Module } from '@nestjs/common'
import { BalanceModule } from '../balance/balance.module'
import { ExercisesModule } from '../exercises/exercises.module'
import { WorkoutSessionsController } from './workout-sessions.controller'
import { WorkoutSessionsService } from './workout-sessions.service'

@Module({
  imports: [BalanceModule, ExercisesModule],
  providers: [WorkoutSessionsService],
  controllers: [WorkoutSessionsController],
  exports: [WorkoutSessionsService],
})
export class WorkoutSessionsModule {}
