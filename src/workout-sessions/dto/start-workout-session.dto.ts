import { IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator'
import type { StartWorkoutSessionInput } from '../workout-sessions.types'

export class StartWorkoutSessionDto implements StartWorkoutSessionInput {
  @IsString()
  @IsNotEmpty()
  exerciseId!: string

  @IsOptional()
  @IsBoolean()
  seedDemoHistory?: boolean
}
