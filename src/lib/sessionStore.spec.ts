import { Cookie, SessionData } from "express-session";

import { closeDatabase } from "../utils/dbConnection";
import { useMemoryDatabase } from "../tests/helpers";
import { SqliteSessionStore } from "./sessionStore";
import "../types/session";

function sessionFor(userId: number, maxAge: number): SessionData {
  const cookie = new Cookie();
  cookie.maxAge = maxAge;
  return { cookie, user: { id: userId } };
}

function load(store: SqliteSessionStore, sid: string): Promise<SessionData | null | undefined> {
  return new Promise((resolve, reject) => {
    store.get(sid, (err, sess) => (err ? reject(err) : resolve(sess)));
  });
}

function save(store: SqliteSessionStore, sid: string, sess: SessionData): Promise<void> {
  return new Promise((resolve, reject) => {
    store.set(sid, sess, (err) => (err ? reject(err) : resolve()));
  });
}

function touch(store: SqliteSessionStore, sid: string, sess: SessionData): Promise<void> {
  return new Promise((resolve) => store.touch(sid, sess, () => resolve()));
}

function count(store: SqliteSessionStore): Promise<number | undefined> {
  return new Promise((resolve, reject) => {
    store.length((err, n) => (err ? reject(err) : resolve(n)));
  });
}

describe("SqliteSessionStore", () => {
  useMemoryDatabase();

  it("round-trips a login session", async () => {
    const store = new SqliteSessionStore();
    await save(store, "sid-1", sessionFor(7, 60_000));

    const loaded = await load(store, "sid-1");
    expect(loaded?.user).toEqual({ id: 7 });
    expect(await load(store, "missing")).toBeNull();
  });

  it("overwrites on save and forgets on destroy", async () => {
    const store = new SqliteSessionStore();
    await save(store, "sid-1", sessionFor(7, 60_000));
    await save(store, "sid-1", sessionFor(8, 60_000));
    expect((await load(store, "sid-1"))?.user).toEqual({ id: 8 });
    expect(await count(store)).toBe(1);

    await new Promise<void>((resolve, reject) => store.destroy("sid-1", (err) => (err ? reject(err) : resolve())));
    expect(await load(store, "sid-1")).toBeNull();
    expect(await count(store)).toBe(0);
  });

  it("does not return expired sessions", async () => {
    const store = new SqliteSessionStore();
    await save(store, "old", sessionFor(7, -1000));
    expect(await load(store, "old")).toBeNull();
    expect(await count(store)).toBe(0);
  });

  it("extends the expiry on touch", async () => {
    const store = new SqliteSessionStore();
    await save(store, "sid-1", sessionFor(7, -1000));
    expect(await load(store, "sid-1")).toBeNull();

    await touch(store, "sid-1", sessionFor(7, 60_000));
    expect((await load(store, "sid-1"))?.user).toEqual({ id: 7 });
  });

  it("still calls back when touch cannot reach the database", async () => {
    const store = new SqliteSessionStore();
    closeDatabase();

    await expect(touch(store, "sid-1", sessionFor(7, 60_000))).resolves.toBeUndefined();
  });
});
