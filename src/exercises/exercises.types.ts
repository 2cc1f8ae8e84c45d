export type Exercise = {
  id: string
  name: string
  description: string
  muscleGroups: string[]
}

export type ExerciseListItem = {
  id: string
  name: string
  muscleGroupsLabel: string // "Chest, Shoulders, Triceps"
}
