import { getDatabase, Tables, timestamp, toId } from "../../lib/db";
import { UserInterface, UserWithPassword } from "../../types/UserInterface";

interface UserRow {
  id: number;
  email: string;
  passwordHash: string;
  isAdmin: number;
  createdAt: string;
}

const COLUMNS = "id, email, password_hash AS passwordHash, is_admin AS isAdmin, created_at AS createdAt";

function toUser(row: UserRow): UserWithPassword {
  return { ...row, isAdmin: row.isAdmin === 1 };
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Strips the password hash before a user is handed to request handlers. */
export function publicUser(user: UserWithPassword): UserInterface {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export const User = {
  findById(id: number): UserWithPassword | null {
    const row = getDatabase()
      .prepare<[number], UserRow>(`SELECT ${COLUMNS} FROM ${Tables.USERS} WHERE id = ?`)
      .get(id);
    return row ? toUser(row) : null;
  },

  findByEmail(email: string): UserWithPassword | null {
    const row = getDatabase()
      .prepare<[string], UserRow>(`SELECT ${COLUMNS} FROM ${Tables.USERS} WHERE email = ?`)
      .get(normalizeEmail(email));
    return row ? toUser(row) : null;
  },

  count(): number {
    const row = getDatabase()
      .prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${Tables.USERS}`)
      .get();
    return row?.c ?? 0;
  },

  create(input: { email: string; passwordHash: string; isAdmin: boolean }, now: Date = new Date()): UserWithPassword {
    const email = normalizeEmail(input.email);
    const createdAt = timestamp(now);
    const { lastInsertRowid } = getDatabase()
      .prepare<[string, string, number, string]>(
        `INSERT INTO ${Tables.USERS} (email, password_hash, is_admin, created_at) VALUES (?, ?, ?, ?)`,
      )
      .run(email, input.passwordHash, input.isAdmin ? 1 : 0, createdAt);
    return {
      id: toId(lastInsertRowid),
      email,
      passwordHash: input.passwordHash,
      isAdmin: input.isAdmin,
      createdAt,
    };
  },
};
