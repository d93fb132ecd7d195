import { getDatabase, Tables, toId } from "../../lib/db";
import {
  TemplateExerciseInterface,
  WorkoutTemplateInterface,
} from "../../types/WorkoutTemplateInterface";

export const WorkoutTemplate = {
  findAll(): WorkoutTemplateInterface[] {
    return getDatabase()
      .prepare<[], WorkoutTemplateInterface>(`SELECT id, name FROM ${Tables.WORKOUT_TEMPLATES} ORDER BY name`)
      .all();
  },

  findById(id: number): WorkoutTemplateInterface | null {
    return (
      getDatabase()
        .prepare<[number], WorkoutTemplateInterface>(`SELECT id, name FROM ${Tables.WORKOUT_TEMPLATES} WHERE id = ?`)
        .get(id) ?? null
    );
  },

  count(): number {
    const row = getDatabase()
      .prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${Tables.WORKOUT_TEMPLATES}`)
      .get();
    return row?.c ?? 0;
  },

  create(name: string): number {
    const { lastInsertRowid } = getDatabase()
      .prepare<[string]>(`INSERT INTO ${Tables.WORKOUT_TEMPLATES} (name) VALUES (?)`)
      .run(name);
    return toId(lastInsertRowid);
  },

  exercises(templateId: number): TemplateExerciseInterface[] {
    return getDatabase()
      .prepare<[number], TemplateExerciseInterface>(
        `SELECT e.id, e.name, te.order_index AS orderIndex
           FROM ${Tables.TEMPLATE_EXERCISES} te
           JOIN ${Tables.EXERCISES} e ON e.id = te.exercise_id
          WHERE te.template_id = ?
          ORDER BY te.order_index`,
      )
      .all(templateId);
  },

  nextOrderIndex(templateId: number): number {
    const row = getDatabase()
      .prepare<[number], { m: number }>(
        `SELECT COALESCE(MAX(order_index), -1) AS m FROM ${Tables.TEMPLATE_EXERCISES} WHERE template_id = ?`,
      )
      .get(templateId);
    return (row?.m ?? -1) + 1;
  },

  /** Returns false when the exercise is already part of the template. */
  linkExercise(templateId: number, exerciseId: number, orderIndex: number): boolean {
    const { changes } = getDatabase()
      .prepare<[number, number, number]>(
        `INSERT OR IGNORE INTO ${Tables.TEMPLATE_EXERCISES} (template_id, exercise_id, order_index) VALUES (?, ?, ?)`,
      )
      .run(templateId, exerciseId, orderIndex);
    return changes > 0;
  },

  unlinkExercise(templateId: number, exerciseId: number): boolean {
    const { changes } = getDatabase()
      .prepare<[number, number]>(
        `DELETE FROM ${Tables.TEMPLATE_EXERCISES} WHERE template_id = ? AND exercise_id = ?`,
      )
      .run(templateId, exerciseId);
    return changes > 0;
  },
};
