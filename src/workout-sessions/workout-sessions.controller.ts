import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { presentFeedback, presentSample } from '../balance/balance-presenter'
import { StartWorkoutSessionDto } from './dto/start-workout-session.dto'
import { WorkoutSessionsService } from './workout-sessions.service'
import type { TickResponse, WorkoutSessionHistoryResponse, WorkoutSessionResponse } from './workout-sessions.types'

@Controller('workout-sessions')
export class WorkoutSessionsController {
  constructor(private readonly sessions: WorkoutSessionsService) {}

  @Post()
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  async start(@Body() dto: StartWorkoutSessionDto): Promise<WorkoutSessionResponse> {
    const session = await this.sessions.start(dto)
    return this.sessions.present(session)
  }

  @Get(':id')
  get(@Param('id', ParseUUIDPipe) id: string): WorkoutSessionResponse {
    return this.sessions.present(this.sessions.get(id))
  }

  @Post(':id/ticks')
  async tick(@Param('id', ParseUUIDPipe) id: string): Promise<TickResponse> {
    const { sample, feedback } = await this.sessions.tick(id)
    return {
      sample: presentSample(sample),
      feedback: presentFeedback(feedback, sample.timestamp),
    }
  }

  @Post(':id/ticker')
  @HttpCode(200)
  startTicker(@Param('id', ParseUUIDPipe) id: string): WorkoutSessionResponse {
    return this.sessions.present(this.sessions.startTicker(id))
  }

  @Delete(':id/ticker')
  stopTicker(@Param('id', ParseUUIDPipe) id: string): WorkoutSessionResponse {
    return this.sessions.present(this.sessions.stopTicker(id))
  }

  @Get(':id/history')
  history(@Param('id', ParseUUIDPipe) id: string): WorkoutSessionHistoryResponse {
    return this.sessions.history(id)
  }

  @Delete(':id')
  @HttpCode(204)
  end(@Param('id', ParseUUIDPipe) id: string): void {
    this.sessions.end(id)
  }
}
