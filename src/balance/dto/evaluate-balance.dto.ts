import { IsNumber, Max, Min } from 'class-validator'
import type { SideReading } from '../balance.types'

export class EvaluateBalanceDto implements SideReading {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  leftSide!: number

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(100)
  rightSide!: number
}
