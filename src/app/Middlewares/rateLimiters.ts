import rateLimit from "express-rate-limit";

/** Throttles credential POSTs per client IP. Other methods pass through. */
export function authLimiter(options: { max: number; windowMs?: number }) {
  return rateLimit({
    windowMs: options.windowMs ?? 15 * 60_000,
    limit: options.max,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    skip: (req) => req.method !== "POST",
    message: "Too many attempts, try again later.",
  });
}
