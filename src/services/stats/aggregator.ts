import { getDatabase, placeholders, Tables } from "../../lib/db";
import { SetStat, SetStatsByExercise } from "../../types/SetEntryInterface";

interface StatRow extends SetStat {
  exercise: string;
}

/**
 * Picks one set entry per exercise: the first row of each exercise's
 * partition under `orderBy`.
 */
function topEntryPerExercise(userId: number, exerciseNames: string[], orderBy: string): SetStatsByExercise {
  const names = [...new Set(exerciseNames)];
  if (names.length === 0) return {};

  const rows = getDatabase()
    .prepare<(number | string)[], StatRow>(
      `SELECT exercise, id, weight, reps, day FROM (
         SELECT exercise, id, weight, reps, day,
                ROW_NUMBER() OVER (PARTITION BY exercise ORDER BY ${orderBy}) AS rn
           FROM ${Tables.SET_ENTRIES}
          WHERE user_id = ? AND exercise IN (${placeholders(names.length)})
       ) ranked
       WHERE rn = 1`,
    )
    .all(userId, ...names);

  const result: SetStatsByExercise = {};
  for (const { exercise, ...stat } of rows) {
    result[exercise] = stat;
  }
  return result;
}

/** Most recently logged set (highest id) per exercise. */
export function fetchLastForExercises(userId: number, exerciseNames: string[]): SetStatsByExercise {
  return topEntryPerExercise(userId, exerciseNames, "id DESC");
}

/**
 * Personal record per exercise: heaviest weight, then most reps at that
 * weight, then the latest entry among exact ties.
 */
export function fetchPrForExercises(userId: number, exerciseNames: string[]): SetStatsByExercise {
  return topEntryPerExercise(userId, exerciseNames, "weight DESC, reps DESC, id DESC");
}
