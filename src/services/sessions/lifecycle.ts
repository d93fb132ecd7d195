import { WorkoutSession } from "../../app/Models/WorkoutSession";
import { SetEntry } from "../../app/Models/SetEntry";
import { immediate, timestamp } from "../../lib/db";
import { SetEntryInterface } from "../../types/SetEntryInterface";

/**
 * Workout session lifecycle. A session is keyed by (user, template, day) and
 * at most one per key is open (ended_at IS NULL) at any time.
 */

export function getActiveSession(userId: number, templateId: number, day: string): number | null {
  return WorkoutSession.findOpenId(userId, templateId, day);
}

/**
 * Returns the open session for the key, opening one if there is none. The
 * lookup and the insert share one write transaction, and the partial unique
 * index on workout_sessions rejects a second open row for the same key.
 */
export function ensureActiveSession(
  userId: number,
  templateId: number,
  workoutName: string,
  day: string,
  now: Date = new Date(),
): number {
  return immediate(() => {
    const existing = WorkoutSession.findOpenId(userId, templateId, day);
    if (existing !== null) return existing;
    return WorkoutSession.create({ userId, templateId, workoutName, day, startedAt: timestamp(now) });
  });
}

/** Ends the open session for the key. Returns its id, or null if none was open. */
export function closeActiveSession(
  userId: number,
  templateId: number,
  day: string,
  now: Date = new Date(),
): number | null {
  return immediate(() => {
    const sessionId = WorkoutSession.findOpenId(userId, templateId, day);
    if (sessionId === null) return null;
    WorkoutSession.end(sessionId, timestamp(now));
    return sessionId;
  });
}

export function fetchSetsForSession(sessionId: number | null, limit = 200): SetEntryInterface[] {
  if (sessionId === null) return [];
  return SetEntry.findBySession(sessionId, limit);
}
