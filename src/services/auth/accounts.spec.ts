import { User } from "../../app/Models/User";
import { getDatabase } from "../../lib/db";
import { ensureActiveSession, getActiveSession } from "../sessions/lifecycle";
import { addSet, makeTemplate, useMemoryDatabase } from "../../tests/helpers";
import { claimLegacyRows, countUnclaimedRows, registerUser, verifyCredentials } from "./accounts";

function insertLegacySession(templateId: number, day: string, endedAt: string | null = null): number {
  const { lastInsertRowid } = getDatabase()
    .prepare<[number, string, string | null]>(
      `INSERT INTO workout_sessions (user_id, template_id, workout_name, day, started_at, ended_at)
       VALUES (NULL, ?, 'Push', ?, '2024-04-01T10:00:00', ?)`,
    )
    .run(templateId, day, endedAt);
  return Number(lastInsertRowid);
}

function ownerOfSet(id: number): number | null {
  const row = getDatabase().prepare<[number], { userId: number | null }>("SELECT user_id AS userId FROM set_entries WHERE id = ?").get(id);
  return row ? row.userId : null;
}

describe("accounts", () => {
  useMemoryDatabase();

  it("makes the first registered user the admin and nobody after", async () => {
    const first = await registerUser("first@example.com", "password-one");
    const second = await registerUser("second@example.com", "password-two");

    if (first.status !== "created" || second.status !== "created") throw new Error("registration failed");
    expect(first.user.isAdmin).toBe(true);
    expect(second.user.isAdmin).toBe(false);
    expect(User.findByEmail("second@example.com")?.isAdmin).toBe(false);
  });

  it("normalizes email and rejects duplicates regardless of case", async () => {
    const created = await registerUser("  Lifter@Example.COM ", "password-one");
    if (created.status !== "created") throw new Error("registration failed");
    expect(created.user.email).toBe("lifter@example.com");

    expect(await registerUser("LIFTER@example.com", "password-two")).toEqual({ status: "exists" });
    expect(User.count()).toBe(1);
  });

  it("stores a bcrypt hash, never the password", async () => {
    await registerUser("lifter@example.com", "password-one");
    const stored = User.findByEmail("lifter@example.com");

    expect(stored?.passwordHash).not.toBe("password-one");
    expect(stored?.passwordHash).toMatch(/^\$2[aby]\$10\$/);
  });

  it("verifies credentials", async () => {
    await registerUser("lifter@example.com", "password-one");

    expect((await verifyCredentials("Lifter@example.com", "password-one"))?.email).toBe("lifter@example.com");
    expect(await verifyCredentials("lifter@example.com", "password-two")).toBeNull();
    expect(await verifyCredentials("nobody@example.com", "password-one")).toBeNull();
  });

  describe("legacy rows", () => {
    it("are claimed once, by the first account", async () => {
      const templateId = makeTemplate("Push");
      insertLegacySession(templateId, "2024-04-01", "2024-04-01T11:00:00");
      insertLegacySession(templateId, "2024-04-02");
      const set = addSet(null, "Bench Press", 80, 5);
      expect(countUnclaimedRows()).toBe(3);

      const first = await registerUser("first@example.com", "password-one");
      const second = await registerUser("second@example.com", "password-two");
      if (first.status !== "created" || second.status !== "created") throw new Error("registration failed");

      expect(claimLegacyRows(first.user.id)).toEqual({ sessions: 2, sets: 1 });
      expect(claimLegacyRows(second.user.id)).toEqual({ sessions: 0, sets: 0 });
      expect(claimLegacyRows(first.user.id)).toEqual({ sessions: 0, sets: 0 });

      expect(countUnclaimedRows()).toBe(0);
      expect(ownerOfSet(set)).toBe(first.user.id);
      expect(getActiveSession(first.user.id, templateId, "2024-04-02")).not.toBeNull();
    });

    it("close an orphan open session that collides with the user's own", async () => {
      const templateId = makeTemplate("Push");
      const created = await registerUser("first@example.com", "password-one");
      if (created.status !== "created") throw new Error("registration failed");
      const userId = created.user.id;

      const own = ensureActiveSession(userId, templateId, "Push", "2024-05-01");
      insertLegacySession(templateId, "2024-05-01");

      expect(claimLegacyRows(userId, new Date(2024, 4, 1, 20, 0, 0))).toEqual({ sessions: 1, sets: 0 });
      expect(getActiveSession(userId, templateId, "2024-05-01")).toBe(own);
    });
  });
});
