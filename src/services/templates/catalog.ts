import { Exercise } from "../../app/Models/Exercise";
import { WorkoutTemplate } from "../../app/Models/WorkoutTemplate";
import defaultTemplates from "../../database/seed/templates.json";
import { immediate } from "../../lib/db";
import { logger } from "../../observability/logging";
import {
  TemplateExerciseInterface,
  WorkoutTemplateInterface,
} from "../../types/WorkoutTemplateInterface";

export type TemplateSeed = Record<string, string[]>;

export function getTemplates(): WorkoutTemplateInterface[] {
  return WorkoutTemplate.findAll();
}

export function getTemplateById(templateId: number): WorkoutTemplateInterface | null {
  return WorkoutTemplate.findById(templateId);
}

export function getExercisesForTemplate(templateId: number): TemplateExerciseInterface[] {
  return WorkoutTemplate.exercises(templateId);
}

/**
 * Appends an exercise to a template, creating the catalog entry when the name
 * is new. Returns the exercise id, or null when nothing was done (blank name
 * or unknown template). An exercise already in the template keeps its place.
 */
export function addExerciseToTemplate(templateId: number, exerciseName: string): number | null {
  const name = exerciseName.trim();
  if (!name) return null;

  return immediate(() => {
    if (!WorkoutTemplate.findById(templateId)) return null;
    const exerciseId = Exercise.findOrCreate(name);
    WorkoutTemplate.linkExercise(templateId, exerciseId, WorkoutTemplate.nextOrderIndex(templateId));
    return exerciseId;
  });
}

export function removeExerciseFromTemplate(templateId: number, exerciseId: number): boolean {
  return WorkoutTemplate.unlinkExercise(templateId, exerciseId);
}

/** Fills an empty template table from `seed`. Returns the number of templates created. */
export function seedTemplatesIfEmpty(seed: TemplateSeed = defaultTemplates): number {
  return immediate(() => {
    if (WorkoutTemplate.count() > 0) return 0;

    const entries = Object.entries(seed);
    for (const [templateName, exercises] of entries) {
      const templateId = WorkoutTemplate.create(templateName);
      exercises.forEach((exerciseName, index) => {
        WorkoutTemplate.linkExercise(templateId, Exercise.findOrCreate(exerciseName), index);
      });
    }
    logger.info({ templates: entries.length }, "[DB] seeded default workout templates");
    return entries.length;
  });
}
