import { Logger } from '@nestjs/common'
import { CapacityExceededError, InvalidReadingError, OutOfOrderSampleError } from './balance.errors'
import { parseBalanceSample } from './balance.schema'
import type { BalanceSample } from './balance.types'

export type BalanceHistoryOptions = {
  maxSamples?: number
}

export type BalanceHistoryListener = (sample: Readonly<BalanceSample>, index: number) => void

type StoredSample = {
  readonly at: number
  readonly leftSide: number
  readonly rightSide: number
  readonly exerciseLabel: string
}

function store(sample: Readonly<BalanceSample>): StoredSample {
  return Object.freeze({
    at: sample.timestamp.getTime(),
    leftSide: sample.leftSide,
    rightSide: sample.rightSide,
    exerciseLabel: sample.exerciseLabel,
  })
}

// each read gets its own Date, stored entries keep their epoch time
function view(stored: StoredSample): Readonly<BalanceSample> {
  return Object.freeze({
    timestamp: new Date(stored.at),
    leftSide: stored.leftSide,
    rightSide: stored.rightSide,
    exerciseLabel: stored.exerciseLabel,
  })
}

/**
 * Append-only, in-memory sample sequence owned by one workout session.
 *
 * Samples are kept in non-decreasing timestamp order; stored entries are
 * frozen copies and are never removed or reordered.
 */
export class BalanceHistory {
  private readonly logger = new Logger(BalanceHistory.name)
  private readonly samples: StoredSample[] = []
  private readonly listeners = new Set<BalanceHistoryListener>()
  readonly maxSamples: number | null

  constructor(options: BalanceHistoryOptions = {}) {
    const max = options.maxSamples
    if (max !== undefined && (!Number.isInteger(max) || max <= 0)) {
      throw new InvalidReadingError(`maxSamples must be a positive integer, got ${max}`, 'maxSamples')
    }
    this.maxSamples = max ?? null
  }

  get size(): number {
    return this.samples.length
  }

  last(): Readonly<BalanceSample> | undefined {
    const stored = this.samples[this.samples.length - 1]
    return stored && view(stored)
  }

  append(sample: BalanceSample): void {
    const stored = store(parseBalanceSample(sample))
    this.ensureCapacity(1)
    this.ensureOrder(stored.at)

    this.samples.push(stored)
    this.notify(stored, this.samples.length - 1)
  }

  /**
   * Bulk insert of precomputed samples, sorted chronologically first.
   * Either the whole batch is stored or nothing is.
   */
  seed(samples: Iterable<BalanceSample>): void {
    const batch = Array.from(samples, (s) => store(parseBalanceSample(s)))
      // Array.prototype.sort is stable, equal timestamps keep input order
      .sort((a, b) => a.at - b.at)

    const first = batch[0]
    if (!first) return

    this.ensureCapacity(batch.length)
    this.ensureOrder(first.at)

    const start = this.samples.length
    this.samples.push(...batch)
    batch.forEach((s, i) => this.notify(s, start + i))
  }

  /**
   * Snapshot view as of this call. Iterating it again restarts from the first
   * sample; samples appended afterwards are not included.
   */
  all(): Iterable<Readonly<BalanceSample>> {
    const samples = this.samples
    const length = samples.length
    return {
      *[Symbol.iterator]() {
        for (let i = 0; i < length; i++) {
          const sample = samples[i]
          if (sample) yield view(sample)
        }
      },
    }
  }

  toArray(): Readonly<BalanceSample>[] {
    return this.samples.map(view)
  }

  subscribe(listener: BalanceHistoryListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private ensureCapacity(incoming: number) {
    if (this.maxSamples !== null && this.samples.length + incoming > this.maxSamples) {
      throw new CapacityExceededError(this.maxSamples)
    }
  }

  private ensureOrder(at: number) {
    const previous = this.samples[this.samples.length - 1]
    if (previous && at < previous.at) {
      throw new OutOfOrderSampleError(new Date(at).toISOString(), new Date(previous.at).toISOString())
    }
  }

  // listener failures are logged, the sample stays stored
  private notify(stored: StoredSample, index: number) {
    for (const listener of this.listeners) {
      try {
        listener(view(stored), index)
      } catch (err: unknown) {
        const detail = err instanceof Error ? err.message : String(err)
        this.logger.error(`History listener failed for sample #${index}: ${detail}`)
      }
    }
  }
}

export function append(history: BalanceHistory, sample: BalanceSample): void {
  history.append(sample)
}

export function all(history: BalanceHistory): Iterable<Readonly<BalanceSample>> {
  return history.all()
}

export function seed(history: BalanceHistory, samples: Iterable<BalanceSample>): void {
  history.seed(samples)
}
