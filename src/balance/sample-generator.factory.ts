import type { BalanceConfig } from '../config/balance.config'
import {
  SeededSampleGenerator,
  SensorSampleGenerator,
  UniformSampleGenerator,
  type BalanceSampleGenerator,
  type SensorReader,
} from './sample-generator'

export const SENSOR_READER = Symbol('SENSOR_READER')

export function createSampleGenerator(
  config: Pick<BalanceConfig, 'sampleSource' | 'sampleSeed' | 'sampleRange' | 'sensorTimeoutMs'>,
  reader?: SensorReader | null,
): BalanceSampleGenerator {
  switch (config.sampleSource) {
    case 'seeded':
      return new SeededSampleGenerator(config.sampleSeed, config.sampleRange)
    case 'sensor':
      if (!reader) {
        throw new Error('BALANCE_SAMPLE_SOURCE=sensor requires a SENSOR_READER provider')
      }
      return new SensorSampleGenerator(reader, { timeoutMs: config.sensorTimeoutMs })
    case 'random':
      return new UniformSampleGenerator(config.sampleRange)
  }
}
