/**
 * Source of "now" for session timestamps and feedback times. Injected through
 * `CLOCK` so specs can drive time with `ManualClock`.
 */
export interface Clock {
  now(): Date
}

export const CLOCK = Symbol('BALANCE_CLOCK')

export class SystemClock implements Clock {
  now(): Date {
    return new Date(Date.now())
  }
}

export function nowIso(clock: Clock): string {
  return clock.now().toISOString()
}

/**
 * Manually driven clock for specs and demo seeding.
 */
export class ManualClock implements Clock {
  private current: number

  constructor(start: Date | string) {
    this.current = new Date(start).getTime()
  }

  now(): Date {
    return new Date(this.current)
  }

  set(at: Date | string): void {
    this.current = new Date(at).getTime()
  }

  advance(ms: number): Date {
    this.current += ms
    return this.now()
  }
}
