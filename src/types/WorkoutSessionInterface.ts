export interface WorkoutSessionInterface {
  id: number;
  userId: number | null;
  templateId: number;
  workoutName: string;
  day: string;
  startedAt: string;
  endedAt: string | null;
}
