import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common'
import { randomUUID } from 'crypto'
import { evaluateSample } from '../balance/balance-evaluator'
import { BalanceHistory, type BalanceHistoryListener } from '../balance/balance-history'
import { presentFeedback, presentHistory } from '../balance/balance-presenter'
import { BalanceError, SessionNotFoundError } from '../balance/balance.errors'
import { buildDemoHistory } from '../balance/demo-history'
import { BALANCE_SAMPLE_GENERATOR, type BalanceSampleGenerator } from '../balance/sample-generator'
import { CLOCK, nowIso, type Clock } from '../clock/clock'
import { BALANCE_CONFIG, type BalanceConfig } from '../config/balance.config'
import { ExercisesService } from '../exercises/exercises.service'
import type {
  StartWorkoutSessionInput,
  TickFailure,
  TickResult,
  WorkoutSession,
  WorkoutSessionHistoryResponse,
  WorkoutSessionResponse,
} from './workout-sessions.types'

@Injectable()
export class WorkoutSessionsService implements OnModuleDestroy {
  private readonly logger = new Logger(WorkoutSessionsService.name)
  private readonly sessions = new Map<string, WorkoutSession>()

  constructor(
    private readonly exercises: ExercisesService,
    @Inject(BALANCE_SAMPLE_GENERATOR) private readonly generator: BalanceSampleGenerator,
    @Inject(BALANCE_CONFIG) private readonly config: BalanceConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async start(input: StartWorkoutSessionInput): Promise<WorkoutSession> {
    const exercise = this.exercises.get(input.exerciseId)
    const startedAt = this.clock.now()
    const history = new BalanceHistory({ maxSamples: this.config.historyMaxSamples })

    if (input.seedDemoHistory) {
      history.seed(await buildDemoHistory(this.generator, { now: startedAt, exerciseLabel: exercise.name }))
    }

    const session: WorkoutSession = {
      id: randomUUID(),
      exercise,
      startedAt,
      history,
      lastFeedback: null,
      lastFeedbackAt: null,
      lastError: null,
      ticker: null,
      inFlight: null,
      queue: Promise.resolve(),
    }
    this.sessions.set(session.id, session)

    this.logger.log(`Session ${session.id} started for "${exercise.name}" (${history.size} seeded samples)`)
    return session
  }

  get(sessionId: string): WorkoutSession {
    const session = this.sessions.get(sessionId)
    if (!session) {
      throw new SessionNotFoundError(sessionId)
    }
    return session
  }

  /**
   * Generates, evaluates and appends one sample. Ticks of the same session
   * run one after another; a failed tick leaves the history unchanged.
   */
  tick(sessionId: string): Promise<TickResult> {
    const session = this.get(sessionId)
    const run = session.queue.then(() => this.runTick(session))
    // next tick waits for this one whatever its outcome; callers see failures through `run`
    session.queue = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  startTicker(sessionId: string): WorkoutSession {
    const session = this.get(sessionId)
    if (session.ticker) return session

    session.ticker = setInterval(() => this.tickFromTimer(session), this.config.tickIntervalMs)
    this.logger.log(`Session ${session.id} ticker started (every ${this.config.tickIntervalMs} ms)`)
    return session
  }

  stopTicker(sessionId: string): WorkoutSession {
    const session = this.get(sessionId)
    this.clearTicker(session)
    return session
  }

  history(sessionId: string): WorkoutSessionHistoryResponse {
    const session = this.get(sessionId)
    return {
      sessionId: session.id,
      exerciseLabel: session.exercise.name,
      points: presentHistory(session.history.all(), this.config.thresholds),
    }
  }

  count(): number {
    return this.sessions.size
  }

  subscribe(sessionId: string, listener: BalanceHistoryListener): () => void {
    return this.get(sessionId).history.subscribe(listener)
  }

  end(sessionId: string): void {
    const session = this.get(sessionId)
    this.clearTicker(session)
    session.inFlight?.abort()
    this.sessions.delete(sessionId)
    this.logger.log(`Session ${sessionId} ended after ${session.history.size} samples`)
  }

  present(session: WorkoutSession): WorkoutSessionResponse {
    return {
      id: session.id,
      exercise: { id: session.exercise.id, name: session.exercise.name },
      startedAtIso: session.startedAt.toISOString(),
      sampleCount: session.history.size,
      tickerActive: session.ticker !== null,
      lastFeedback:
        session.lastFeedback && session.lastFeedbackAt
          ? presentFeedback(session.lastFeedback, session.lastFeedbackAt)
          : null,
      lastError: session.lastError,
    }
  }

  onModuleDestroy() {
    for (const session of this.sessions.values()) {
      this.clearTicker(session)
      session.inFlight?.abort()
    }
    this.sessions.clear()
  }

  private async runTick(session: WorkoutSession): Promise<TickResult> {
    if (!this.sessions.has(session.id)) {
      throw new SessionNotFoundError(session.id)
    }

    const controller = new AbortController()
    session.inFlight = controller
    try {
      const now = this.clock.now()
      const sample = await this.generator.generateSample(session.exercise.name, now, { signal: controller.signal })
      if (!this.sessions.has(session.id)) {
        throw new SessionNotFoundError(session.id)
      }
      const feedback = evaluateSample(sample, this.config.thresholds)

      session.history.append(sample)
      session.lastFeedback = feedback
      session.lastFeedbackAt = now
      session.lastError = null

      return { sample, feedback }
    } finally {
      session.inFlight = null
    }
  }

  private tickFromTimer(session: WorkoutSession) {
    if (session.inFlight) {
      this.logger.debug(`Session ${session.id} tick skipped, previous reading still pending`)
      return
    }
    this.tick(session.id).catch((err: unknown) => this.recordTickFailure(session, err))
  }

  private recordTickFailure(session: WorkoutSession, err: unknown) {
    const atIso = nowIso(this.clock)
    const failure: TickFailure =
      err instanceof BalanceError
        ? { code: err.code, message: err.message, atIso }
        : { code: 'UNEXPECTED', message: err instanceof Error ? err.message : String(err), atIso }

    session.lastError = failure
    if (failure.code === 'UNEXPECTED') {
      this.logger.error(`Session ${session.id} tick failed: ${failure.message}`)
    } else {
      this.logger.warn(`Session ${session.id} tick failed (${failure.code}): ${failure.message}`)
    }
  }

  private clearTicker(session: WorkoutSession) {
    if (!session.ticker) return
    clearInterval(session.ticker)
    session.ticker = null
    this.logger.log(`Session ${session.id} ticker stopped`)
  }
}
