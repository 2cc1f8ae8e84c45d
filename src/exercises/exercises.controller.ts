import { Controller, Get, Param } from '@nestjs/common'
import { ExercisesService } from './exercises.service'

@Controller('exercises')
export class ExercisesController {
  constructor(private readonly exercises: ExercisesService) {}

  @Get()
  list() {
    return this.exercises.list()
  }

  @Get(':id')
  get(@Param('id') id: string) {
    return this.exercises.get(id)
  }
}
