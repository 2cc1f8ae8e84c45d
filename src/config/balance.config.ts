import { validateThresholds } from '../balance/balance-evaluator'
import type { BalanceThresholds, SampleRange } from '../balance/balance.types'
import { validateRange } from '../balance/sample-generator'

export type SampleSource = 'random' | 'seeded' | 'sensor'

export type BalanceConfig = {
  port: number
  corsOrigin: string
  sampleSource: SampleSource
  sampleSeed: number
  sampleRange: SampleRange
  thresholds: BalanceThresholds
  historyMaxSamples: number | undefined
  tickIntervalMs: number
  sensorTimeoutMs: number
}

export const BALANCE_CONFIG = Symbol('BALANCE_CONFIG')

type Env = Record<string, string | undefined>

function readNumber(raw: string | undefined, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed)) return fallback
  if (opts.min !== undefined && parsed < opts.min) return fallback
  return opts.integer ? Math.floor(parsed) : parsed
}

function readSampleSource(raw: string | undefined): SampleSource {
  const value = (raw || '').trim().toLowerCase()
  if (value === 'seeded' || value === 'sensor') return value
  return 'random'
}

/**
 * Reads configuration from environment variables. Malformed numbers fall
 * back to defaults; inconsistent thresholds or ranges throw.
 */
export function loadBalanceConfig(env: Env = process.env): BalanceConfig {
  const maxSamples = readNumber(env.BALANCE_HISTORY_MAX_SAMPLES, 0, { min: 0, integer: true })

  return {
    port: readNumber(env.PORT, 3000, { min: 1, integer: true }),
    corsOrigin: env.CORS_ORIGIN?.trim() || 'http://localhost:5173',
    sampleSource: readSampleSource(env.BALANCE_SAMPLE_SOURCE),
    sampleSeed: readNumber(env.BALANCE_SAMPLE_SEED, 1, { integer: true }),
    sampleRange: validateRange({
      min: readNumber(env.BALANCE_SAMPLE_MIN, 40),
      max: readNumber(env.BALANCE_SAMPLE_MAX, 60),
    }),
    thresholds: validateThresholds({
      slight: readNumber(env.BALANCE_SLIGHT_THRESHOLD, 10),
      significant: readNumber(env.BALANCE_SIGNIFICANT_THRESHOLD, 20),
    }),
    historyMaxSamples: maxSamples > 0 ? maxSamples : undefined,
    tickIntervalMs: readNumber(env.BALANCE_TICK_INTERVAL_MS, 1000, { min: 1, integer: true }),
    sensorTimeoutMs: readNumber(env.BALANCE_SENSOR_TIMEOUT_MS, 2000, { min: 1, integer: true }),
  }
}
