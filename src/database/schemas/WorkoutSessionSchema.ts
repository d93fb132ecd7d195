export const WorkoutSessionSchema = `
  CREATE TABLE IF NOT EXISTS workout_sessions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER REFERENCES users(id),
    day TEXT NOT NULL,
    template_id INTEGER NOT NULL,
    workout_name TEXT NOT NULL,
    started_at TEXT NOT NULL,
    ended_at TEXT,
    FOREIGN KEY (template_id) REFERENCES workout_templates(id)
  )
`;

// At most one open session per (user, template, day).
export const WorkoutSessionIndexes = [
  `CREATE UNIQUE INDEX IF NOT EXISTS workout_sessions_one_open
     ON workout_sessions (user_id, template_id, day)
     WHERE ended_at IS NULL`,
];
