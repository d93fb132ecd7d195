import { compare, hash } from "bcryptjs";

import { normalizeEmail, User } from "../../app/Models/User";
import { getDatabase, immediate, Tables, timestamp } from "../../lib/db";
import { logger } from "../../observability/logging";
import { UserWithPassword } from "../../types/UserInterface";

export const BCRYPT_ROUNDS = 10;

// Compared against when the email is unknown, so both failure paths cost one bcrypt round.
const DUMMY_HASH = "$2a$10$CwTycUXWue0Thq9StjUM0uJ8.tyvQ0hJ6oTqJ1vQx3kYbJ7mcQGrC";

export type RegisterResult =
  | { status: "created"; user: UserWithPassword }
  | { status: "exists" };

export interface ClaimedRows {
  sessions: number;
  sets: number;
}

/**
 * Creates an account. The first account ever created is the admin; the
 * count and the insert share one write transaction.
 */
export async function registerUser(email: string, password: string, now: Date = new Date()): Promise<RegisterResult> {
  const normalized = normalizeEmail(email);
  const passwordHash = await hash(password, BCRYPT_ROUNDS);

  const result = immediate((): RegisterResult => {
    if (User.findByEmail(normalized)) return { status: "exists" };
    const isAdmin = User.count() === 0;
    return { status: "created", user: User.create({ email: normalized, passwordHash, isAdmin }, now) };
  });

  if (result.status === "created") {
    logger.info({ userId: result.user.id, isAdmin: result.user.isAdmin }, "[auth] user registered");
  }
  return result;
}

/** The user for this email and password, or null. */
export async function verifyCredentials(email: string, password: string): Promise<UserWithPassword | null> {
  const user = User.findByEmail(email);
  const matches = await compare(password, user ? user.passwordHash : DUMMY_HASH);
  return user && matches ? user : null;
}

/**
 * Hands rows written before accounts existed (user_id IS NULL) to `userId`.
 * An orphan open session that would collide with one of the user's own open
 * sessions is closed first.
 */
export function claimLegacyRows(userId: number, now: Date = new Date()): ClaimedRows {
  const claimed = immediate((db): ClaimedRows => {
    db.prepare<[string, number]>(
      `UPDATE ${Tables.WORKOUT_SESSIONS} SET ended_at = ?
        WHERE user_id IS NULL AND ended_at IS NULL
          AND EXISTS (
            SELECT 1 FROM ${Tables.WORKOUT_SESSIONS} o
             WHERE o.user_id = ?
               AND o.template_id = ${Tables.WORKOUT_SESSIONS}.template_id
               AND o.day = ${Tables.WORKOUT_SESSIONS}.day
               AND o.ended_at IS NULL
          )`,
    ).run(timestamp(now), userId);

    const sessions = db
      .prepare<[number]>(`UPDATE ${Tables.WORKOUT_SESSIONS} SET user_id = ? WHERE user_id IS NULL`)
      .run(userId).changes;
    const sets = db
      .prepare<[number]>(`UPDATE ${Tables.SET_ENTRIES} SET user_id = ? WHERE user_id IS NULL`)
      .run(userId).changes;
    return { sessions, sets };
  });

  if (claimed.sessions > 0 || claimed.sets > 0) {
    logger.info({ userId, ...claimed }, "[auth] claimed legacy rows");
  }
  return claimed;
}

export function countUnclaimedRows(): number {
  const row = getDatabase()
    .prepare<[], { c: number }>(
      `SELECT (SELECT COUNT(*) FROM ${Tables.WORKOUT_SESSIONS} WHERE user_id IS NULL)
            + (SELECT COUNT(*) FROM ${Tables.SET_ENTRIES} WHERE user_id IS NULL) AS c`,
    )
    .get();
  return row?.c ?? 0;
}
