export interface WorkoutTemplateInterface {
  id: number;
  name: string;
}

export interface TemplateExerciseInterface {
  id: number;
  name: string;
  orderIndex: number;
}
