export const SetEntrySchema = `
  CREATE TABLE IF NOT EXISTS set_entries (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER REFERENCES users(id),
    session_id INTEGER REFERENCES workout_sessions(id),
    day TEXT NOT NULL,
    workout TEXT NOT NULL,
    exercise TEXT NOT NULL,
    weight REAL NOT NULL,
    reps INTEGER NOT NULL,
    created_at TEXT NOT NULL
  )
`;

export const SetEntryIndexes = [
  `CREATE INDEX IF NOT EXISTS set_entries_user_exercise ON set_entries (user_id, exercise)`,
  `CREATE INDEX IF NOT EXISTS set_entries_session ON set_entries (session_id)`,
];
