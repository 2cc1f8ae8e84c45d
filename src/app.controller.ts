import { Controller, Get } from '@nestjs/common'
import { WorkoutSessionsService } from './workout-sessions/workout-sessions.service'

@Controller()
export class AppController {
  constructor(private readonly sessions: WorkoutSessionsService) {}

  @Get()
  getRoot() {
    return { status: 'ok', service: 'Balance Coach API' }
  }

  @Get('health')
  health() {
    return { status: 'ok', activeSessions: this.sessions.count() }
  }
}
