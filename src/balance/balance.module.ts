import { Module } from '@nestjs/common'
import { BALANCE_CONFIG, type BalanceConfig } from '../config/balance.config'
import { BalanceController } from './balance.controller'
import { BALANCE_SAMPLE_GENERATOR, type SensorReader } from './sample-generator'
import { SENSOR_READER, createSampleGenerator } from './sample-generator.factory'

@Module({
  providers: [
    {
      provide: BALANCE_SAMPLE_GENERATOR,
      useFactory: (config: BalanceConfig, reader?: SensorReader) => createSampleGenerator(config, reader),
      inject: [BALANCE_CONFIG, { token: SENSOR_READER, optional: true }],
    },
  ],
  controllers: [BalanceController],
  exports: [BALANCE_SAMPLE_GENERATOR],
})
export class BalanceModule {}
