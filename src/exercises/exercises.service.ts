import { Injectable } from '@nestjs/common'
import { ExerciseNotFoundError } from '../balance/balance.errors'
import catalog from './exercises.json'
import { exerciseCatalogSchema } from './exercises.schema'
import type { Exercise, ExerciseListItem } from './exercises.types'

@Injectable()
export class ExercisesService {
  private readonly exercises: Exercise[]

  constructor() {
    this.exercises = exerciseCatalogSchema.parse(catalog)
  }

  list(): ExerciseListItem[] {
    return this.exercises.map((e) => ({
      id: e.id,
      name: e.name,
      muscleGroupsLabel: e.muscleGroups.join(', '),
    }))
  }

  get(id: string): Exercise {
    const exercise = this.exercises.find((e) => e.id === id)
    if (!exercise) {
      throw new ExerciseNotFoundError(id)
    }
    return exercise
  }
}
