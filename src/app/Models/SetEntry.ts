import { getDatabase, Tables, toId } from "../../lib/db";
import { NewSetEntry, SetEntryInterface } from "../../types/SetEntryInterface";

const COLUMNS = `id, user_id AS userId, session_id AS sessionId, day, workout, exercise,
  weight, reps, created_at AS createdAt`;

export const SetEntry = {
  create(entry: NewSetEntry): number {
    const { lastInsertRowid } = getDatabase()
      .prepare<[number | null, number | null, string, string, string, number, number, string]>(
        `INSERT INTO ${Tables.SET_ENTRIES} (user_id, session_id, day, workout, exercise, weight, reps, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.userId,
        entry.sessionId,
        entry.day,
        entry.workout,
        entry.exercise,
        entry.weight,
        entry.reps,
        entry.createdAt,
      );
    return toId(lastInsertRowid);
  },

  findBySession(sessionId: number, limit = 200): SetEntryInterface[] {
    return getDatabase()
      .prepare<[number, number], SetEntryInterface>(
        `SELECT ${COLUMNS} FROM ${Tables.SET_ENTRIES} WHERE session_id = ? ORDER BY id DESC LIMIT ?`,
      )
      .all(sessionId, limit);
  },

  countForUser(userId: number): number {
    const row = getDatabase()
      .prepare<[number], { c: number }>(`SELECT COUNT(*) AS c FROM ${Tables.SET_ENTRIES} WHERE user_id = ?`)
      .get(userId);
    return row?.c ?? 0;
  },
};
