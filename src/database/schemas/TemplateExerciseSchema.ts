export const TemplateExerciseSchema = `
  CREATE TABLE IF NOT EXISTS template_exercises (
    template_id INTEGER NOT NULL,
    exercise_id INTEGER NOT NULL,
    order_index INTEGER NOT NULL,
    PRIMARY KEY (template_id, exercise_id),
    FOREIGN KEY (template_id) REFERENCES workout_templates(id) ON DELETE CASCADE,
    FOREIGN KEY (exercise_id) REFERENCES exercises(id) ON DELETE CASCADE
  )
`;
