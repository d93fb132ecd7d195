import path from "path";
import { z } from "zod";

const DEV_SESSION_SECRET = "dev_session_secret_change_me";

const flag = z
  .string()
  .optional()
  .transform((v) => {
    const s = (v || "").trim().toLowerCase();
    return s !== "" && s !== "0" && s !== "false";
  });

const envSchema = z.object({
  NODE_ENV: z.string().trim().default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  GYMLOG_DB: z.string().trim().optional(),
  VERCEL: flag,
  SESSION_SECRET: z.string().optional(),
  LOG_LEVEL: z.string().trim().optional(),
  SENTRY_DSN: z.string().trim().optional(),
  AUTH_RATE_LIMIT: z.coerce.number().int().positive().default(20),
});

export interface AppConfig {
  env: string;
  port: number;
  dbPath: string;
  sessionSecret: string;
  cookieSecure: boolean;
  trustProxy: boolean;
  logLevel: string;
  sentryDsn?: string;
  /** POSTs per 15 minutes per IP on /login and /register. */
  authRateLimit: number;
}

export function resolveDbPath(env: { GYMLOG_DB?: string; VERCEL: boolean }): string {
  if (env.GYMLOG_DB) return env.GYMLOG_DB;
  if (env.VERCEL) return "/tmp/gymlog.db";
  return path.join(process.cwd(), "data", "gymlog.db");
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment configuration: ${fields}`);
  }
  const env = parsed.data;
  const isProd = env.NODE_ENV === "production";
  const secret = (env.SESSION_SECRET || "").trim();
  if (!secret && isProd) {
    throw new Error("SESSION_SECRET must be set in production");
  }
  // Vercel serves over TLS and only /tmp is writable there.
  const secure = isProd || env.VERCEL;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    dbPath: resolveDbPath(env),
    sessionSecret: secret || DEV_SESSION_SECRET,
    cookieSecure: secure,
    trustProxy: secure,
    logLevel: env.LOG_LEVEL || (env.NODE_ENV === "test" ? "silent" : "info"),
    sentryDsn: env.SENTRY_DSN || undefined,
    authRateLimit: env.AUTH_RATE_LIMIT,
  };
}
