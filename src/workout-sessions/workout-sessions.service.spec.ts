import { Test } from '@nestjs/testing'
import { ExerciseNotFoundError, SensorUnavailableError, SessionNotFoundError } from '../balance/balance.errors'
import type { BalanceSample, SideReading } from '../balance/balance.types'
import { BALANCE_SAMPLE_GENERATOR, type BalanceSampleGenerator, type GenerateOptions } from '../balance/sample-generator'
import { CLOCK, ManualClock } from '../clock/clock'
import { BALANCE_CONFIG, loadBalanceConfig, type BalanceConfig } from '../config/balance.config'
import { ExercisesService } from '../exercises/exercises.service'
import { WorkoutSessionsService } from './workout-sessions.service'

class ScriptedGenerator implements BalanceSampleGenerator {
  readings: Array<SideReading | Error> = []

  async generateSample(exerciseLabel: string, now: Date, _options?: GenerateOptions): Promise<BalanceSample> {
    const next = this.readings.shift() ?? { leftSide: 50, rightSide: 50 }
    if (next instanceof Error) throw next
    return { timestamp: now, ...next, exerciseLabel }
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve))

// setImmediate stays real under fake timers so each tick's promise chain can settle
async function advanceTicks(count: number, intervalMs = 1000) {
  for (let i = 0; i < count; i++) {
    jest.advanceTimersByTime(intervalMs)
    await flush()
  }
}

describe('WorkoutSessionsService', () => {
  let clock: ManualClock
  let generator: ScriptedGenerator
  let config: BalanceConfig
  let service: WorkoutSessionsService

  async function compile(overrides: Partial<BalanceConfig> = {}) {
    config = { ...loadBalanceConfig({}), ...overrides }
    const mod = await Test.createTestingModule({
      providers: [
        WorkoutSessionsService,
        ExercisesService,
        { provide: BALANCE_SAMPLE_GENERATOR, useValue: generator },
        { provide: BALANCE_CONFIG, useValue: config },
        { provide: CLOCK, useValue: clock },
      ],
    }).compile()
    service = mod.get(WorkoutSessionsService)
  }

  beforeEach(async () => {
    clock = new ManualClock('2025-03-11T10:00:00.000Z')
    generator = new ScriptedGenerator()
    await compile()
  })

  afterEach(() => {
    service.onModuleDestroy()
    jest.useRealTimers()
  })

  describe('start', () => {
    it('creates a session with an empty history', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })

      expect(service.present(session)).toEqual({
        id: session.id,
        exercise: { id: 'bicep-curls', name: 'Bicep Curls' },
        startedAtIso: '2025-03-11T10:00:00.000Z',
        sampleCount: 0,
        tickerActive: false,
        lastFeedback: null,
        lastError: null,
      })
      expect(service.count()).toBe(1)
    })

    it('throws ExerciseNotFoundError for an unknown exercise', async () => {
      await expect(service.start({ exerciseId: 'deadlift' })).rejects.toBeInstanceOf(ExerciseNotFoundError)
      expect(service.count()).toBe(0)
    })

    it('seeds seven days of demo history on request', async () => {
      const session = await service.start({ exerciseId: 'barbell-bench-press', seedDemoHistory: true })

      const stamps = [...session.history.all()].map((s) => s.timestamp.toISOString())
      expect(stamps).toEqual([
        '2025-03-05T10:00:00.000Z',
        '2025-03-06T10:00:00.000Z',
        '2025-03-07T10:00:00.000Z',
        '2025-03-08T10:00:00.000Z',
        '2025-03-09T10:00:00.000Z',
        '2025-03-10T10:00:00.000Z',
        '2025-03-11T10:00:00.000Z',
      ])
    })

    it('gives every session its own history', async () => {
      const a = await service.start({ exerciseId: 'bicep-curls' })
      const b = await service.start({ exerciseId: 'bicep-curls' })

      await service.tick(a.id)

      expect(a.history.size).toBe(1)
      expect(b.history.size).toBe(0)
      expect(a.id).not.toBe(b.id)
    })
  })

  describe('tick', () => {
    it('appends the sample and returns its feedback', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      generator.readings.push({ leftSide: 45, rightSide: 55 })
      clock.advance(1000)

      const result = await service.tick(session.id)

      expect(result).toEqual({
        sample: {
          timestamp: new Date('2025-03-11T10:00:01.000Z'),
          leftSide: 45,
          rightSide: 55,
          exerciseLabel: 'Bicep Curls',
        },
        feedback: {
          tier: 'SlightImbalance',
          severity: 1,
          message: 'Slight imbalance detected. Try to maintain even force.',
          indicator: 'yellow',
          difference: 10,
        },
      })
      expect(service.present(session).lastFeedback).toMatchObject({
        tier: 'SlightImbalance',
        evaluatedAtIso: '2025-03-11T10:00:01.000Z',
      })
    })

    it('keeps seeded entries ahead of appended ones', async () => {
      const session = await service.start({ exerciseId: 'barbell-bench-press', seedDemoHistory: true })
      generator.readings.push({ leftSide: 50, rightSide: 50 }, { leftSide: 45, rightSide: 55 }, { leftSide: 30, rightSide: 70 })

      for (let i = 0; i < 3; i++) {
        clock.advance(1000)
        await service.tick(session.id)
      }

      const { points } = service.history(session.id)
      expect(points).toHaveLength(10)
      expect(points.slice(7).map((p) => [p.timestamp, p.tier])).toEqual([
        ['2025-03-11T10:00:01.000Z', 'Balanced'],
        ['2025-03-11T10:00:02.000Z', 'SlightImbalance'],
        ['2025-03-11T10:00:03.000Z', 'SignificantImbalance'],
      ])
    })

    it('leaves the history unchanged when the generator fails', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      generator.readings.push(new SensorUnavailableError('No sensor reading within 2000 ms', 'timeout'))

      await expect(service.tick(session.id)).rejects.toBeInstanceOf(SensorUnavailableError)
      expect(session.history.size).toBe(0)

      await service.tick(session.id)
      expect(session.history.size).toBe(1)
    })

    it('runs ticks of one session one after another', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      const pending: Array<(reading: SideReading) => void> = []
      generator.generateSample = (exerciseLabel, now) =>
        new Promise<BalanceSample>((resolve) => {
          pending.push((reading) => resolve({ timestamp: now, ...reading, exerciseLabel }))
        })

      const first = service.tick(session.id)
      const second = service.tick(session.id)
      await flush()
      expect(pending).toHaveLength(1)

      pending[0]?.({ leftSide: 41, rightSide: 59 })
      await first
      await flush()
      expect(pending).toHaveLength(2)

      pending[1]?.({ leftSide: 42, rightSide: 58 })
      await second

      expect([...session.history.all()].map((s) => s.leftSide)).toEqual([41, 42])
    })

    it('throws SessionNotFoundError for unknown sessions', () => {
      expect(() => service.tick('missing')).toThrow(SessionNotFoundError)
    })
  })

  describe('ticker', () => {
    it('ticks once per interval until stopped', async () => {
      jest.useFakeTimers({ doNotFake: ['setImmediate'] })
      const session = await service.start({ exerciseId: 'bicep-curls' })

      service.startTicker(session.id)
      expect(service.present(session).tickerActive).toBe(true)

      await advanceTicks(3)
      expect(session.history.size).toBe(3)

      service.stopTicker(session.id)
      await advanceTicks(3)
      expect(session.history.size).toBe(3)
      expect(service.present(session).tickerActive).toBe(false)
    })

    it('does not start a second timer for the same session', async () => {
      jest.useFakeTimers({ doNotFake: ['setImmediate'] })
      const session = await service.start({ exerciseId: 'bicep-curls' })

      service.startTicker(session.id)
      service.startTicker(session.id)
      await advanceTicks(1)

      expect(session.history.size).toBe(1)
    })

    it('records tick failures without stopping the ticker', async () => {
      jest.useFakeTimers({ doNotFake: ['setImmediate'] })
      const session = await service.start({ exerciseId: 'bicep-curls' })
      generator.readings.push(new SensorUnavailableError('No sensor reading within 2000 ms', 'timeout'))

      service.startTicker(session.id)
      await advanceTicks(1)

      expect(service.present(session).lastError).toEqual({
        code: 'SENSOR_UNAVAILABLE',
        message: 'No sensor reading within 2000 ms',
        atIso: '2025-03-11T10:00:00.000Z',
      })
      expect(session.history.size).toBe(0)

      await advanceTicks(1)
      expect(session.history.size).toBe(1)
      expect(service.present(session).lastError).toBeNull()
    })

    it('records capacity overflow once the bound is reached', async () => {
      await compile({ historyMaxSamples: 2 })
      jest.useFakeTimers({ doNotFake: ['setImmediate'] })
      const session = await service.start({ exerciseId: 'bicep-curls' })

      service.startTicker(session.id)
      await advanceTicks(3)

      expect(session.history.size).toBe(2)
      expect(service.present(session).lastError).toMatchObject({ code: 'CAPACITY_EXCEEDED' })
    })
  })

  describe('end', () => {
    it('discards the session and its history', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      await service.tick(session.id)

      service.end(session.id)

      expect(() => service.get(session.id)).toThrow(SessionNotFoundError)
      expect(() => service.history(session.id)).toThrow(SessionNotFoundError)
      expect(service.count()).toBe(0)
    })

    it('cancels a pending reading', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      generator.generateSample = (_label, _now, options) =>
        new Promise<BalanceSample>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () =>
            reject(new SensorUnavailableError('Sensor read cancelled', 'aborted')),
          )
        })

      const pending = service.tick(session.id)
      await flush()
      service.end(session.id)

      await expect(pending).rejects.toMatchObject({ code: 'SENSOR_UNAVAILABLE', reason: 'aborted' })
    })

    it('drops a reading that arrives after the session ended', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      let deliver: (reading: SideReading) => void = () => undefined
      generator.generateSample = (exerciseLabel, now) =>
        new Promise<BalanceSample>((resolve) => {
          deliver = (reading) => resolve({ timestamp: now, ...reading, exerciseLabel })
        })

      const pending = service.tick(session.id)
      await flush()
      service.end(session.id)
      deliver({ leftSide: 50, rightSide: 50 })

      await expect(pending).rejects.toBeInstanceOf(SessionNotFoundError)
      expect(session.history.size).toBe(0)
    })
  })

  describe('subscribe', () => {
    it('notifies listeners of appended samples', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      const listener = jest.fn()
      service.subscribe(session.id, listener)

      await service.tick(session.id)

      expect(listener).toHaveBeenCalledWith(expect.objectContaining({ exerciseLabel: 'Bicep Curls' }), 0)
    })

    it('completes the tick when a listener throws', async () => {
      const session = await service.start({ exerciseId: 'bicep-curls' })
      generator.readings.push({ leftSide: 30, rightSide: 70 })
      service.subscribe(session.id, () => {
        throw new Error('listener down')
      })

      const result = await service.tick(session.id)

      expect(result.feedback.tier).toBe('SignificantImbalance')
      expect(session.history.size).toBe(1)
      expect(service.present(session).lastFeedback).toMatchObject({ tier: 'SignificantImbalance' })
    })
  })
})
