import request from "supertest";
import type { Application } from "express";

import { getExercisesForTemplate } from "../services/templates/catalog";
import { closeDatabase } from "../utils/dbConnection";
import { createTestApp, registeredAgent, templateIdByName } from "./helpers";

type Agent = Awaited<ReturnType<typeof registeredAgent>>;

const names = (templateId: number) => getExercisesForTemplate(templateId).map((ex) => ex.name);

describe("template routes", () => {
  let app: Application;
  let admin: Agent;
  let pushId: number;

  beforeEach(async () => {
    app = createTestApp();
    admin = await registeredAgent(app, "admin@example.com");
    pushId = templateIdByName("Push");
  });
  afterEach(() => closeDatabase());

  it("lets an admin append an exercise", async () => {
    await admin
      .post("/template/add_exercise")
      .type("form")
      .send({ template_id: String(pushId), exercise_name: "  Dips  " })
      .expect(303)
      .expect("Location", `/?t=${pushId}&edit=1`);

    expect(names(pushId)).toEqual(["Bench Press", "Incline DB Press", "Overhead Press", "Tricep Pushdown", "Dips"]);
  });

  it("leaves the template alone for a blank name", async () => {
    await admin
      .post("/template/add_exercise")
      .type("form")
      .send({ template_id: String(pushId), exercise_name: "   " })
      .expect(303);
    expect(names(pushId)).toHaveLength(4);
  });

  it("lets an admin remove an exercise", async () => {
    const row = getExercisesForTemplate(pushId).find((ex) => ex.name === "Overhead Press");
    if (!row) throw new Error("seed missing Overhead Press");

    await admin
      .post("/template/remove_exercise")
      .type("form")
      .send({ template_id: String(pushId), exercise_id: String(row.id) })
      .expect(303)
      .expect("Location", `/?t=${pushId}&edit=1`);

    expect(names(pushId)).toEqual(["Bench Press", "Incline DB Press", "Tricep Pushdown"]);
  });

  it("forbids regular users and keeps the template unchanged", async () => {
    const user = await registeredAgent(app, "lifter@example.com");

    await user
      .post("/template/add_exercise")
      .type("form")
      .send({ template_id: String(pushId), exercise_name: "Dips" })
      .expect(403);
    await user
      .post("/template/remove_exercise")
      .type("form")
      .send({ template_id: String(pushId), exercise_id: "1" })
      .expect(403);

    expect(names(pushId)).toEqual(["Bench Press", "Incline DB Press", "Overhead Press", "Tricep Pushdown"]);
  });

  it("rejects anonymous edits with 401", async () => {
    await request(app)
      .post("/template/add_exercise")
      .type("form")
      .send({ template_id: String(pushId), exercise_name: "Dips" })
      .expect(401);
    expect(names(pushId)).toHaveLength(4);
  });

  it("redirects home on a malformed template id", async () => {
    await admin
      .post("/template/add_exercise")
      .type("form")
      .send({ template_id: "abc", exercise_name: "Dips" })
      .expect(303)
      .expect("Location", "/");
    await admin
      .post("/template/remove_exercise")
      .type("form")
      .send({ template_id: String(pushId), exercise_id: "-3" })
      .expect(303)
      .expect("Location", `/?t=${pushId}&edit=1`);
    expect(names(pushId)).toHaveLength(4);
  });
});
