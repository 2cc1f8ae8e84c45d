import { InvalidThresholdsError } from './balance.errors'
import { assertSidePercent } from './balance.schema'
import type {
  BalanceFeedback,
  BalanceSample,
  BalanceThresholds,
  FeedbackIndicator,
  FeedbackTier,
} from './balance.types'

export const DEFAULT_THRESHOLDS: Readonly<BalanceThresholds> = Object.freeze({ slight: 10, significant: 20 })

const TIERS: Record<FeedbackTier, { severity: number; message: string; indicator: FeedbackIndicator }> = {
  Balanced: {
    severity: 0,
    message: 'Great balance! Keep it up!',
    indicator: 'green',
  },
  SlightImbalance: {
    severity: 1,
    message: 'Slight imbalance detected. Try to maintain even force.',
    indicator: 'yellow',
  },
  SignificantImbalance: {
    severity: 2,
    message: 'Significant imbalance detected. Please adjust your form.',
    indicator: 'red',
  },
}

export function validateThresholds(thresholds: BalanceThresholds): BalanceThresholds {
  const { slight, significant } = thresholds
  if (!Number.isFinite(slight) || !Number.isFinite(significant) || slight < 0 || significant < 0) {
    throw new InvalidThresholdsError(`Thresholds must be finite and non-negative (slight=${slight}, significant=${significant})`)
  }
  if (slight >= significant) {
    throw new InvalidThresholdsError(`Slight threshold (${slight}) must be below significant threshold (${significant})`)
  }
  return { slight, significant }
}

export function classifyDifference(difference: number, thresholds: BalanceThresholds = DEFAULT_THRESHOLDS): FeedbackTier {
  // lower bound of each upper tier is inclusive
  if (difference < thresholds.slight) return 'Balanced'
  if (difference < thresholds.significant) return 'SlightImbalance'
  return 'SignificantImbalance'
}

/**
 * Classifies a left/right pair of force percentages.
 *
 * Pure and symmetric in its two readings. Throws InvalidReadingError for a
 * non-finite side or one outside 0..100.
 */
export function evaluate(
  leftSide: number,
  rightSide: number,
  thresholds: BalanceThresholds = DEFAULT_THRESHOLDS,
): BalanceFeedback {
  assertSidePercent(leftSide, 'leftSide')
  assertSidePercent(rightSide, 'rightSide')

  const difference = Math.abs(leftSide - rightSide)
  const tier = classifyDifference(difference, thresholds)

  return {
    tier,
    ...TIERS[tier],
    difference,
  }
}

export function evaluateSample(sample: BalanceSample, thresholds?: BalanceThresholds): BalanceFeedback {
  return evaluate(sample.leftSide, sample.rightSide, thresholds)
}

export function tierSeverity(tier: FeedbackTier): number {
  return TIERS[tier].severity
}

export function tierMessage(tier: FeedbackTier): string {
  return TIERS[tier].message
}

export function compareTiers(a: FeedbackTier, b: FeedbackTier): number {
  return tierSeverity(a) - tierSeverity(b)
}
