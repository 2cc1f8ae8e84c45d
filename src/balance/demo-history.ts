import type { BalanceSample } from './balance.types'
import type { BalanceSampleGenerator } from './sample-generator'

export const DEMO_EXERCISE_LABEL = 'Barbell Bench Press'
export const DEMO_HISTORY_DAYS = 7

const DAY_MS = 24 * 60 * 60 * 1000

export type DemoHistoryOptions = {
  now: Date
  exerciseLabel?: string
  days?: number
}

/**
 * One synthetic sample per day for the last `days` days (today included),
 * oldest first, for pre-populating a fresh history.
 */
export async function buildDemoHistory(
  generator: BalanceSampleGenerator,
  options: DemoHistoryOptions,
): Promise<BalanceSample[]> {
  const days = options.days ?? DEMO_HISTORY_DAYS
  const exerciseLabel = options.exerciseLabel ?? DEMO_EXERCISE_LABEL
  const nowMs = options.now.getTime()

  const out: BalanceSample[] = []
  for (let i = days - 1; i >= 0; i--) {
    out.push(await generator.generateSample(exerciseLabel, new Date(nowMs - i * DAY_MS)))
  }
  return out
}
