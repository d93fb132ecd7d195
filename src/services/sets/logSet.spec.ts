import { SetEntry } from "../../app/Models/SetEntry";
import { calendarDay } from "../../lib/db";
import { makeTemplate, makeUser, useMemoryDatabase } from "../../tests/helpers";
import { closeActiveSession, fetchSetsForSession, getActiveSession } from "../sessions/lifecycle";
import { isWithinLimits, logSet } from "./logSet";

const NOW = new Date(2024, 4, 1, 18, 30, 0);

describe("logSet", () => {
  useMemoryDatabase();

  let userId: number;
  let templateId: number;

  beforeEach(() => {
    userId = makeUser().id;
    templateId = makeTemplate("Push");
  });

  it.each([
    [2001, 5],
    [-1, 5],
    [Number.NaN, 5],
    [100, 0],
    [100, 201],
    [100, 2.5],
  ])("discards weight=%p reps=%p without writing", (weight, reps) => {
    const result = logSet(userId, { templateId, exercise: "Bench Press", weight, reps }, NOW);

    expect(result).toEqual({ status: "discarded", reason: "out_of_range" });
    expect(SetEntry.countForUser(userId)).toBe(0);
    expect(getActiveSession(userId, templateId, "2024-05-01")).toBeNull();
  });

  it("accepts the limits themselves", () => {
    expect(isWithinLimits(0, 1)).toBe(true);
    expect(isWithinLimits(2000, 200)).toBe(true);
    expect(isWithinLimits(102.5, 8)).toBe(true);
  });

  it("records the set in today's session under the template name", () => {
    const result = logSet(userId, { templateId, exercise: "  Bench Press ", weight: 102.5, reps: 5 }, NOW);
    if (result.status !== "logged") throw new Error(`expected a logged set, got ${result.reason}`);

    expect(getActiveSession(userId, templateId, "2024-05-01")).toBe(result.sessionId);
    expect(fetchSetsForSession(result.sessionId)).toEqual([
      {
        id: result.setId,
        userId,
        sessionId: result.sessionId,
        day: "2024-05-01",
        workout: "Push",
        exercise: "Bench Press",
        weight: 102.5,
        reps: 5,
        createdAt: "2024-05-01T18:30:00",
      },
    ]);
  });

  it("reuses the open session and starts a new one after it is closed", () => {
    const a = logSet(userId, { templateId, exercise: "Bench Press", weight: 80, reps: 5 }, NOW);
    const b = logSet(userId, { templateId, exercise: "Overhead Press", weight: 50, reps: 5 }, NOW);
    if (a.status !== "logged" || b.status !== "logged") throw new Error("sets were not logged");
    expect(b.sessionId).toBe(a.sessionId);

    closeActiveSession(userId, templateId, calendarDay(NOW), NOW);
    const c = logSet(userId, { templateId, exercise: "Bench Press", weight: 82.5, reps: 5 }, NOW);
    if (c.status !== "logged") throw new Error("set was not logged");
    expect(c.sessionId).not.toBe(a.sessionId);
    expect(fetchSetsForSession(a.sessionId)).toHaveLength(2);
  });

  it("ignores unknown templates and blank exercise names", () => {
    expect(logSet(userId, { templateId: 999, exercise: "Bench Press", weight: 80, reps: 5 }, NOW)).toEqual({
      status: "discarded",
      reason: "unknown_template",
    });
    expect(logSet(userId, { templateId, exercise: "   ", weight: 80, reps: 5 }, NOW)).toEqual({
      status: "discarded",
      reason: "blank_exercise",
    });
    expect(SetEntry.countForUser(userId)).toBe(0);
  });
});
