export type BalanceErrorCode =
  | 'INVALID_READING'
  | 'SENSOR_UNAVAILABLE'
  | 'CAPACITY_EXCEEDED'
  | 'OUT_OF_ORDER_SAMPLE'
  | 'INVALID_THRESHOLDS'
  | 'SESSION_NOT_FOUND'
  | 'EXERCISE_NOT_FOUND'

/**
 * Base for every recoverable condition raised by the balance core.
 * The HTTP layer turns these into status responses (see BalanceExceptionFilter).
 */
export abstract class BalanceError extends Error {
  abstract readonly code: BalanceErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class InvalidReadingError extends BalanceError {
  readonly code = 'INVALID_READING'

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message)
  }
}

export class SensorUnavailableError extends BalanceError {
  readonly code = 'SENSOR_UNAVAILABLE'

  constructor(
    message: string,
    readonly reason: 'timeout' | 'aborted' | 'failed',
  ) {
    super(message)
  }
}

export class CapacityExceededError extends BalanceError {
  readonly code = 'CAPACITY_EXCEEDED'

  constructor(readonly maxSamples: number) {
    super(`Balance history is full (max ${maxSamples} samples)`)
  }
}

export class OutOfOrderSampleError extends BalanceError {
  readonly code = 'OUT_OF_ORDER_SAMPLE'

  constructor(
    readonly timestampIso: string,
    readonly lastTimestampIso: string,
  ) {
    super(`Sample at ${timestampIso} precedes last stored sample at ${lastTimestampIso}`)
  }
}

export class InvalidThresholdsError extends BalanceError {
  readonly code = 'INVALID_THRESHOLDS'
}

export class SessionNotFoundError extends BalanceError {
  readonly code = 'SESSION_NOT_FOUND'

  constructor(readonly sessionId: string) {
    super(`Workout session ${sessionId} not found`)
  }
}

export class ExerciseNotFoundError extends BalanceError {
  readonly code = 'EXERCISE_NOT_FOUND'

  constructor(readonly exerciseId: string) {
    super(`Exercise ${exerciseId} not found`)
  }
}
