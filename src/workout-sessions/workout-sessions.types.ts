import type { BalanceHistory } from '../balance/balance-history'
import type { BalanceErrorCode } from '../balance/balance.errors'
import type {
  BalanceFeedback,
  BalanceFeedbackResponse,
  BalanceHistoryPoint,
  BalanceSample,
  BalanceSampleResponse,
} from '../balance/balance.types'
import type { Exercise } from '../exercises/exercises.types'

export type StartWorkoutSessionInput = {
  exerciseId: string
  seedDemoHistory?: boolean
}

export type TickFailure = {
  code: BalanceErrorCode | 'UNEXPECTED'
  message: string
  atIso: string
}

export type WorkoutSession = {
  id: string
  exercise: Exercise
  startedAt: Date
  history: BalanceHistory
  lastFeedback: BalanceFeedback | null
  lastFeedbackAt: Date | null
  lastError: TickFailure | null
  ticker: NodeJS.Timeout | null
  inFlight: AbortController | null
  // serialises ticks so appends land in tick order
  queue: Promise<void>
}

export type TickResult = {
  sample: BalanceSample
  feedback: BalanceFeedback
}

export type TickResponse = {
  sample: BalanceSampleResponse
  feedback: BalanceFeedbackResponse
}

export type WorkoutSessionResponse = {
  id: string
  exercise: { id: string; name: string }
  startedAtIso: string
  sampleCount: number
  tickerActive: boolean
  lastFeedback: BalanceFeedbackResponse | null
  lastError: TickFailure | null
}

export type WorkoutSessionHistoryResponse = {
  sessionId: string
  exerciseLabel: string
  points: BalanceHistoryPoint[]
}
