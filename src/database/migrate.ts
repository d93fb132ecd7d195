import type Database from "better-sqlite3";

import { logger } from "../observability/logging";
import { AuthSessionSchema } from "./schemas/AuthSessionSchema";
import { ExerciseSchema } from "./schemas/ExerciseSchema";
import { SetEntryIndexes, SetEntrySchema } from "./schemas/SetEntrySchema";
import { TemplateExerciseSchema } from "./schemas/TemplateExerciseSchema";
import { UserSchema } from "./schemas/UserSchema";
import { WorkoutSessionIndexes, WorkoutSessionSchema } from "./schemas/WorkoutSessionSchema";
import { WorkoutTemplateSchema } from "./schemas/WorkoutTemplateSchema";

const TABLES = [
  UserSchema,
  WorkoutTemplateSchema,
  ExerciseSchema,
  TemplateExerciseSchema,
  WorkoutSessionSchema,
  SetEntrySchema,
  AuthSessionSchema,
];

// Columns that databases from before accounts / sessions existed are missing.
const LATE_COLUMNS: { table: string; column: string; ddl: string }[] = [
  { table: "set_entries", column: "session_id", ddl: "session_id INTEGER REFERENCES workout_sessions(id)" },
  { table: "set_entries", column: "user_id", ddl: "user_id INTEGER REFERENCES users(id)" },
  { table: "workout_sessions", column: "user_id", ddl: "user_id INTEGER REFERENCES users(id)" },
];

export function columnNames(db: Database.Database, table: string): string[] {
  return db
    .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${table}')`)
    .all()
    .map((c) => c.name);
}

function addLateColumns(db: Database.Database) {
  for (const { table, column, ddl } of LATE_COLUMNS) {
    if (columnNames(db, table).includes(column)) continue;
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${ddl}`);
    logger.info({ table, column }, "[DB] added missing column");
  }
}

// Older versions could leave several open sessions for one key; only the
// newest may stay open once the unique index exists.
function closeDuplicateOpenSessions(db: Database.Database) {
  const { changes } = db
    .prepare(
      `UPDATE workout_sessions SET ended_at = started_at
        WHERE ended_at IS NULL
          AND id NOT IN (
            SELECT MAX(id) FROM workout_sessions
             WHERE ended_at IS NULL
             GROUP BY user_id, template_id, day
          )`,
    )
    .run();
  if (changes > 0) {
    logger.warn({ closed: changes }, "[DB] closed duplicate open workout sessions");
  }
}

/** Creates missing tables, columns and indexes. Safe to run on every start. */
export function initDatabase(db: Database.Database): void {
  db.transaction(() => {
    for (const ddl of TABLES) db.exec(ddl);
    addLateColumns(db);
    closeDuplicateOpenSessions(db);
    for (const ddl of [...WorkoutSessionIndexes, ...SetEntryIndexes]) db.exec(ddl);
  }).immediate();
}
