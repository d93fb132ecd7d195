import request from "supertest";
import type { Application } from "express";

import { AppConfig } from "../config";
import { initDatabase } from "../database/migrate";
import { Server } from "../server";
import { SetEntry } from "../app/Models/SetEntry";
import { User } from "../app/Models/User";
import { WorkoutTemplate } from "../app/Models/WorkoutTemplate";
import { closeDatabase, connectDatabase, MEMORY_DB } from "../utils/dbConnection";

export const TEST_PASSWORD = "correct-horse";

/** Fresh in-memory database for every test in the calling file. */
export function useMemoryDatabase() {
  beforeEach(() => {
    initDatabase(connectDatabase(MEMORY_DB));
  });
  afterEach(() => {
    closeDatabase();
  });
}

export function makeUser(email = "lifter@example.com", isAdmin = false) {
  return User.create({ email, passwordHash: "not-a-real-hash", isAdmin });
}

export function makeTemplate(name = "Push") {
  return WorkoutTemplate.create(name);
}

export function addSet(
  userId: number | null,
  exercise: string,
  weight: number,
  reps: number,
  extra: { sessionId?: number | null; day?: string } = {},
) {
  return SetEntry.create({
    userId,
    sessionId: extra.sessionId ?? null,
    day: extra.day ?? "2024-05-01",
    workout: "Push",
    exercise,
    weight,
    reps,
    createdAt: "2024-05-01T18:00:00",
  });
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    env: "test",
    port: 0,
    dbPath: MEMORY_DB,
    sessionSecret: "test-secret",
    cookieSecure: false,
    trustProxy: false,
    logLevel: "silent",
    authRateLimit: 1000,
    ...overrides,
  };
}

/** Express app over a fresh, seeded in-memory database. */
export function createTestApp(overrides: Partial<AppConfig> = {}): Application {
  return new Server(testConfig(overrides)).app;
}

/** Registers `email` and returns an agent carrying its login cookie. */
export async function registeredAgent(app: Application, email: string) {
  const agent = request.agent(app);
  await agent.post("/register").type("form").send({ email, password: TEST_PASSWORD }).expect(303).expect("Location", "/");
  return agent;
}

export function templateIdByName(name: string): number {
  const template = WorkoutTemplate.findAll().find((t) => t.name === name);
  if (!template) throw new Error(`template ${name} not seeded`);
  return template.id;
}
