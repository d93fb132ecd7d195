/**
 * Database utility layer: table names, timestamps and transaction helpers
 * shared by the models and services.
 */
import { format } from "date-fns";
import type Database from "better-sqlite3";

import { getDatabase } from "../utils/dbConnection";

export { getDatabase };

// ── Table name constants ─────────────────────────────────────────────────────
export const Tables = {
  USERS: "users",
  WORKOUT_TEMPLATES: "workout_templates",
  EXERCISES: "exercises",
  TEMPLATE_EXERCISES: "template_exercises",
  WORKOUT_SESSIONS: "workout_sessions",
  SET_ENTRIES: "set_entries",
  AUTH_SESSIONS: "auth_sessions",
} as const;

export type TableName = (typeof Tables)[keyof typeof Tables];

// ── Time helpers ─────────────────────────────────────────────────────────────

/** Local wall-clock timestamp with second precision, e.g. 2024-05-01T18:30:05 */
export function timestamp(now: Date = new Date()): string {
  return format(now, "yyyy-MM-dd'T'HH:mm:ss");
}

/** Local calendar date used as the session key, e.g. 2024-05-01 */
export function calendarDay(now: Date = new Date()): string {
  return format(now, "yyyy-MM-dd");
}

// ── Query helpers ────────────────────────────────────────────────────────────

/**
 * Runs `fn` inside BEGIN IMMEDIATE so the write lock is taken before the
 * first read. Other connections wait (busy_timeout) instead of interleaving.
 */
export function immediate<T>(fn: (db: Database.Database) => T): T {
  const db = getDatabase();
  return db.transaction(() => fn(db)).immediate();
}

/** "?, ?, ?" for an IN (...) list of `n` values. */
export function placeholders(n: number): string {
  return new Array(n).fill("?").join(", ");
}

export function countRows(table: TableName): number {
  const row = getDatabase()
    .prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${table}`)
    .get();
  return row?.c ?? 0;
}

export function toId(value: number | bigint): number {
  return Number(value);
}
