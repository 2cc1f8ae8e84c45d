import { z } from 'zod'
import { InvalidReadingError } from './balance.errors'
import type { BalanceSample } from './balance.types'

export const MIN_PERCENT = 0
export const MAX_PERCENT = 100

export const sidePercentSchema = z.number().finite().min(MIN_PERCENT).max(MAX_PERCENT)

export const balanceSampleSchema = z.object({
  timestamp: z.date().refine((d) => Number.isFinite(d.getTime()), { message: 'Invalid date' }),
  leftSide: sidePercentSchema,
  rightSide: sidePercentSchema,
  exerciseLabel: z.string().refine((s) => s.trim().length > 0, { message: 'Exercise label must not be blank' }),
})

export type BalanceSampleValidated = z.infer<typeof balanceSampleSchema>

/**
 * Validates a sample and returns a frozen copy of it.
 */
export function parseBalanceSample(input: BalanceSample): Readonly<BalanceSample> {
  const parsed = balanceSampleSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join('.') || undefined
    throw new InvalidReadingError(
      `Invalid balance sample${field ? ` (${field})` : ''}: ${issue?.message ?? 'unknown issue'}`,
      field,
    )
  }
  return Object.freeze({
    timestamp: new Date(parsed.data.timestamp.getTime()),
    leftSide: parsed.data.leftSide,
    rightSide: parsed.data.rightSide,
    exerciseLabel: parsed.data.exerciseLabel,
  })
}

export function assertSidePercent(value: number, field: 'leftSide' | 'rightSide'): void {
  if (!Number.isFinite(value)) {
    throw new InvalidReadingError(`${field} must be a finite number, got ${String(value)}`, field)
  }
  if (value < MIN_PERCENT || value > MAX_PERCENT) {
    throw new InvalidReadingError(`${field} must be within ${MIN_PERCENT}..${MAX_PERCENT}, got ${value}`, field)
  }
}
