import request from "supertest";

import { closeDatabase } from "../utils/dbConnection";
import { createTestApp } from "./helpers";

describe("security headers", () => {
  afterEach(() => closeDatabase());

  it("lets plain-HTTP deployments post forms over http", async () => {
    const app = createTestApp({ cookieSecure: false });

    const res = await request(app).get("/login").expect(200);
    expect(res.headers["content-security-policy"]).toContain("default-src 'self'");
    expect(res.headers["content-security-policy"]).not.toContain("upgrade-insecure-requests");
    expect(res.headers["strict-transport-security"]).toBeUndefined();
  });

  it("pins HTTPS when cookies are secure", async () => {
    const app = createTestApp({ cookieSecure: true });

    const res = await request(app).get("/login").expect(200);
    expect(res.headers["content-security-policy"]).toContain("upgrade-insecure-requests");
    expect(res.headers["strict-transport-security"]).toMatch(/^max-age=\d+/);
  });
});
