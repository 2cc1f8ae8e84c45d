import { evaluateSample } from './balance-evaluator'
import type {
  BalanceFeedback,
  BalanceFeedbackResponse,
  BalanceHistoryPoint,
  BalanceSample,
  BalanceSampleResponse,
  BalanceThresholds,
} from './balance.types'

export function presentSample(sample: BalanceSample): BalanceSampleResponse {
  return {
    timestamp: sample.timestamp.toISOString(),
    leftSide: sample.leftSide,
    rightSide: sample.rightSide,
    exerciseLabel: sample.exerciseLabel,
  }
}

export function presentFeedback(feedback: BalanceFeedback, evaluatedAt: Date | string): BalanceFeedbackResponse {
  const date = typeof evaluatedAt === 'string' ? new Date(evaluatedAt) : evaluatedAt
  return {
    ...feedback,
    evaluatedAtIso: date.toISOString(),
  }
}

// Tier is recomputed per point, never read from storage.
export function presentHistory(samples: Iterable<BalanceSample>, thresholds?: BalanceThresholds): BalanceHistoryPoint[] {
  const points: BalanceHistoryPoint[] = []
  for (const sample of samples) {
    const feedback = evaluateSample(sample, thresholds)
    points.push({
      ...presentSample(sample),
      tier: feedback.tier,
      severity: feedback.severity,
      difference: feedback.difference,
    })
  }
  return points
}
