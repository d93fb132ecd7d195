import { getDatabase, Tables, toId } from "../../lib/db";
import { WorkoutSessionInterface } from "../../types/WorkoutSessionInterface";

const COLUMNS = `id, user_id AS userId, template_id AS templateId, workout_name AS workoutName,
  day, started_at AS startedAt, ended_at AS endedAt`;

export const WorkoutSession = {
  findById(id: number): WorkoutSessionInterface | null {
    return (
      getDatabase()
        .prepare<[number], WorkoutSessionInterface>(`SELECT ${COLUMNS} FROM ${Tables.WORKOUT_SESSIONS} WHERE id = ?`)
        .get(id) ?? null
    );
  },

  findOpenId(userId: number, templateId: number, day: string): number | null {
    const row = getDatabase()
      .prepare<[number, number, string], { id: number }>(
        `SELECT id FROM ${Tables.WORKOUT_SESSIONS}
          WHERE user_id = ? AND template_id = ? AND day = ? AND ended_at IS NULL
          ORDER BY id DESC
          LIMIT 1`,
      )
      .get(userId, templateId, day);
    return row ? row.id : null;
  },

  create(input: { userId: number; templateId: number; workoutName: string; day: string; startedAt: string }): number {
    const { lastInsertRowid } = getDatabase()
      .prepare<[number, number, string, string, string]>(
        `INSERT INTO ${Tables.WORKOUT_SESSIONS} (user_id, template_id, workout_name, day, started_at, ended_at)
         VALUES (?, ?, ?, ?, ?, NULL)`,
      )
      .run(input.userId, input.templateId, input.workoutName, input.day, input.startedAt);
    return toId(lastInsertRowid);
  },

  end(id: number, endedAt: string): void {
    getDatabase()
      .prepare<[string, number]>(`UPDATE ${Tables.WORKOUT_SESSIONS} SET ended_at = ? WHERE id = ?`)
      .run(endedAt, id);
  },

  countOpen(userId: number, templateId: number, day: string): number {
    const row = getDatabase()
      .prepare<[number, number, string], { c: number }>(
        `SELECT COUNT(*) AS c FROM ${Tables.WORKOUT_SESSIONS}
          WHERE user_id = ? AND template_id = ? AND day = ? AND ended_at IS NULL`,
      )
      .get(userId, templateId, day);
    return row?.c ?? 0;
  },
};
