export type BalanceSample = {
  timestamp: Date
  leftSide: number // % of total force, 0..100
  rightSide: number // % of total force, 0..100
  exerciseLabel: string
}

export type SideReading = {
  leftSide: number
  rightSide: number
}

export type FeedbackTier = 'Balanced' | 'SlightImbalance' | 'SignificantImbalance'

export type FeedbackIndicator = 'green' | 'yellow' | 'red'

export type BalanceFeedback = {
  tier: FeedbackTier
  severity: number
  message: string
  indicator: FeedbackIndicator
  difference: number
}

export type BalanceThresholds = {
  slight: number
  significant: number
}

export type SampleRange = {
  min: number
  max: number
}

export type BalanceSampleResponse = {
  timestamp: string // ISO
  leftSide: number
  rightSide: number
  exerciseLabel: string
}

export type BalanceFeedbackResponse = BalanceFeedback & {
  evaluatedAtIso: string
}

export type BalanceHistoryPoint = BalanceSampleResponse & {
  tier: FeedbackTier
  severity: number
  difference: number
}
