import type { Context, MiddlewareHandler } from "hono";
import { rateLimiter } from "hono-rate-limiter";

import { AppError, toErrorResponse } from "../lib/errors.js";
import type { AppEnv } from "../types/env.js";

const AUTH_FAILURE_WINDOW_MS = 15 * 60 * 1000;

function getIp(c: Context<AppEnv>) {
  const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  if (forwarded) return forwarded;
  const realIp = c.req.header("x-real-ip")?.trim();
  if (realIp) return realIp;
  return "unknown";
}

/**
 * Caps failed authentications per client IP. Only 401 responses count toward
 * the limit. Counters live in process memory.
 */
export function authFailureLimiter(opts: { limit: number; windowMs?: number }): MiddlewareHandler<AppEnv> {
  const windowMs = opts.windowMs ?? AUTH_FAILURE_WINDOW_MS;

  return rateLimiter<AppEnv>({
    windowMs,
    limit: opts.limit,
    standardHeaders: "draft-6",
    keyGenerator: (c) => `ip:${getIp(c)}`,
    skipSuccessfulRequests: true,
    requestWasSuccessful: (c) => c.res.status !== 401,
    handler: (c) =>
      toErrorResponse(
        c,
        new AppError({
          code: "RATE_LIMITED",
          status: 429,
          message: "Too many requests",
          details: { retryAfterSeconds: Math.ceil(windowMs / 1000) },
        })
      ),
  });
}
