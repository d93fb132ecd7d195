export interface SetEntryInterface {
  id: number;
  userId: number | null;
  sessionId: number | null;
  day: string;
  workout: string;
  exercise: string;
  weight: number;
  reps: number;
  createdAt: string;
}

export type NewSetEntry = Omit<SetEntryInterface, "id">;

/** What the stat queries report per exercise. */
export interface SetStat {
  id: number;
  weight: number;
  reps: number;
  day: string;
}

export type SetStatsByExercise = Record<string, SetStat>;
