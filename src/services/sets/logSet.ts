import { SetEntry } from "../../app/Models/SetEntry";
import { WorkoutTemplate } from "../../app/Models/WorkoutTemplate";
import { calendarDay, timestamp } from "../../lib/db";
import { ensureActiveSession } from "../sessions/lifecycle";

export const WEIGHT_RANGE = { min: 0, max: 2000 } as const;
export const REPS_RANGE = { min: 1, max: 200 } as const;

export interface LogSetInput {
  templateId: number;
  exercise: string;
  weight: number;
  reps: number;
}

export type LogSetResult =
  | { status: "logged"; setId: number; sessionId: number }
  | { status: "discarded"; reason: "out_of_range" | "blank_exercise" | "unknown_template" };

export function isWithinLimits(weight: number, reps: number): boolean {
  return (
    Number.isFinite(weight) &&
    weight >= WEIGHT_RANGE.min &&
    weight <= WEIGHT_RANGE.max &&
    Number.isInteger(reps) &&
    reps >= REPS_RANGE.min &&
    reps <= REPS_RANGE.max
  );
}

/**
 * Records one set for `userId` in today's open session of the template,
 * opening that session when needed. Input that fails the limits is dropped
 * without writing anything.
 */
export function logSet(userId: number, input: LogSetInput, now: Date = new Date()): LogSetResult {
  if (!isWithinLimits(input.weight, input.reps)) {
    return { status: "discarded", reason: "out_of_range" };
  }
  const exercise = input.exercise.trim();
  if (!exercise) {
    return { status: "discarded", reason: "blank_exercise" };
  }
  const template = WorkoutTemplate.findById(input.templateId);
  if (!template) {
    return { status: "discarded", reason: "unknown_template" };
  }

  const day = calendarDay(now);
  const sessionId = ensureActiveSession(userId, template.id, template.name, day, now);
  const setId = SetEntry.create({
    userId,
    sessionId,
    day,
    workout: template.name,
    exercise,
    weight: input.weight,
    reps: input.reps,
    createdAt: timestamp(now),
  });
  return { status: "logged", setId, sessionId };
}
