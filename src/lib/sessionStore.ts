import { SessionData, Store } from "express-session";

import { getDatabase, Tables } from "./db";
import { logger } from "../observability/logging";

export const SESSION_COOKIE = "gymlog.sid";
export const SESSION_TTL_MS = 1000 * 60 * 60 * 24 * 30;

type Callback = (err?: unknown) => void;

/**
 * express-session store backed by the auth_sessions table, so a login
 * survives restarts and is shared by every process using the same file.
 */
export class SqliteSessionStore extends Store {
  constructor(private readonly ttlMs: number = SESSION_TTL_MS) {
    super();
  }

  private expiresAt(sess: SessionData, now: number): number {
    const expires = sess.cookie?.expires;
    if (expires) return new Date(expires).getTime();
    const maxAge = sess.cookie?.maxAge;
    return now + (typeof maxAge === "number" ? maxAge : this.ttlMs);
  }

  get(sid: string, callback: (err: unknown, session?: SessionData | null) => void): void {
    try {
      const row = getDatabase()
        .prepare<[string, number], { sess: string }>(
          `SELECT sess FROM ${Tables.AUTH_SESSIONS} WHERE sid = ? AND expires_at > ?`,
        )
        .get(sid, Date.now());
      if (!row) return callback(null, null);
      const session: SessionData = JSON.parse(row.sess);
      callback(null, session);
    } catch (err) {
      callback(err);
    }
  }

  set(sid: string, sess: SessionData, callback?: Callback): void {
    try {
      const now = Date.now();
      const db = getDatabase();
      db.prepare<[number]>(`DELETE FROM ${Tables.AUTH_SESSIONS} WHERE expires_at <= ?`).run(now);
      db.prepare<[string, string, number]>(
        `INSERT INTO ${Tables.AUTH_SESSIONS} (sid, sess, expires_at) VALUES (?, ?, ?)
         ON CONFLICT(sid) DO UPDATE SET sess = excluded.sess, expires_at = excluded.expires_at`,
      ).run(sid, JSON.stringify(sess), this.expiresAt(sess, now));
      callback?.();
    } catch (err) {
      callback?.(err);
    }
  }

  touch(sid: string, sess: SessionData, callback?: () => void): void {
    try {
      getDatabase()
        .prepare<[number, string]>(`UPDATE ${Tables.AUTH_SESSIONS} SET expires_at = ? WHERE sid = ?`)
        .run(this.expiresAt(sess, Date.now()), sid);
    } catch (err) {
      logger.error({ err }, "[session] failed to extend login session");
    }
    callback?.();
  }

  destroy(sid: string, callback?: Callback): void {
    try {
      getDatabase().prepare<[string]>(`DELETE FROM ${Tables.AUTH_SESSIONS} WHERE sid = ?`).run(sid);
      callback?.();
    } catch (err) {
      callback?.(err);
    }
  }

  length(callback: (err: unknown, length?: number) => void): void {
    try {
      const row = getDatabase()
        .prepare<[number], { c: number }>(`SELECT COUNT(*) AS c FROM ${Tables.AUTH_SESSIONS} WHERE expires_at > ?`)
        .get(Date.now());
      callback(null, row?.c ?? 0);
    } catch (err) {
      callback(err);
    }
  }
}
