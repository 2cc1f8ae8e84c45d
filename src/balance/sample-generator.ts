import { InvalidReadingError, SensorUnavailableError } from './balance.errors'
import { parseBalanceSample, sidePercentSchema } from './balance.schema'
import type { BalanceSample, SampleRange, SideReading } from './balance.types'

export const DEFAULT_SAMPLE_RANGE: Readonly<SampleRange> = Object.freeze({ min: 40, max: 60 })

export type GenerateOptions = {
  signal?: AbortSignal
}

/**
 * Produces one balance sample per call. The caller appends it to a history.
 */
export interface BalanceSampleGenerator {
  generateSample(exerciseLabel: string, now: Date, options?: GenerateOptions): Promise<BalanceSample>
}

export const BALANCE_SAMPLE_GENERATOR = Symbol('BALANCE_SAMPLE_GENERATOR')

export type RandomSource = () => number

export function validateRange(range: SampleRange): SampleRange {
  const { min, max } = range
  if (!sidePercentSchema.safeParse(min).success || !sidePercentSchema.safeParse(max).success || min > max) {
    throw new InvalidReadingError(`Sample range must satisfy 0 <= min <= max <= 100 (min=${min}, max=${max})`)
  }
  return { min, max }
}

/**
 * Simulated feed: each side drawn independently and uniformly from the range.
 */
export class UniformSampleGenerator implements BalanceSampleGenerator {
  private readonly range: SampleRange

  constructor(
    range: SampleRange = DEFAULT_SAMPLE_RANGE,
    private readonly random: RandomSource = Math.random,
  ) {
    this.range = validateRange(range)
  }

  async generateSample(exerciseLabel: string, now: Date): Promise<BalanceSample> {
    return parseBalanceSample({
      timestamp: now,
      leftSide: this.draw(),
      rightSide: this.draw(),
      exerciseLabel,
    })
  }

  private draw(): number {
    const { min, max } = this.range
    const value = min + this.random() * (max - min)
    // custom sources may return exactly 1
    return Math.min(max, Math.max(min, value))
  }
}

/**
 * mulberry32: small 32-bit PRNG, enough for reproducible simulated readings.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export class SeededSampleGenerator extends UniformSampleGenerator {
  constructor(
    readonly seed: number,
    range: SampleRange = DEFAULT_SAMPLE_RANGE,
  ) {
    super(range, createSeededRandom(seed))
  }
}

/**
 * Adapter to a physical force sensor. Implementations must reject (or stop)
 * when the signal aborts.
 */
export interface SensorReader {
  read(signal: AbortSignal): Promise<SideReading>
}

export type SensorSampleGeneratorOptions = {
  timeoutMs: number
}

export class SensorSampleGenerator implements BalanceSampleGenerator {
  constructor(
    private readonly reader: SensorReader,
    private readonly options: SensorSampleGeneratorOptions,
  ) {}

  async generateSample(exerciseLabel: string, now: Date, options?: GenerateOptions): Promise<BalanceSample> {
    const reading = await this.readWithin(this.options.timeoutMs, options?.signal)

    return parseBalanceSample({
      timestamp: now,
      leftSide: reading.leftSide,
      rightSide: reading.rightSide,
      exerciseLabel,
    })
  }

  private readWithin(timeoutMs: number, outer?: AbortSignal): Promise<SideReading> {
    if (outer?.aborted) {
      return Promise.reject(new SensorUnavailableError('Sensor read cancelled', 'aborted'))
    }

    const controller = new AbortController()

    return new Promise<SideReading>((resolve, reject) => {
      let settled = false

      const finish = (fn: () => void) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        outer?.removeEventListener('abort', onAbort)
        fn()
      }

      const timer = setTimeout(() => {
        controller.abort()
        finish(() => reject(new SensorUnavailableError(`No sensor reading within ${timeoutMs} ms`, 'timeout')))
      }, timeoutMs)

      const onAbort = () => {
        controller.abort()
        finish(() => reject(new SensorUnavailableError('Sensor read cancelled', 'aborted')))
      }
      outer?.addEventListener('abort', onAbort, { once: true })

      this.reader.read(controller.signal).then(
        (reading) => finish(() => resolve(reading)),
        (err: unknown) => {
          const detail = err instanceof Error ? err.message : String(err)
          finish(() => reject(new SensorUnavailableError(`Sensor read failed: ${detail}`, 'failed')))
        },
      )
    })
  }
}
