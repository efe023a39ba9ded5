import { Hono } from "hono";
import { cors } from "hono/cors";
import { sql as dsql } from "drizzle-orm";
import { randomUUID } from "node:crypto";

import type { Db } from "./db/index.js";
import { toErrorResponse } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import { authFailureLimiter } from "./middleware/rate-limit.js";
import { gpgKeyRoutes } from "./routes/gpg-keys.js";
import type { GpgKeyDeps } from "./services/gpg-keys.js";
import type { AppEnv, User } from "./types/env.js";

export type AppDeps = GpgKeyDeps & {
  apiKeyPepper: string;
  corsOrigins?: string[];
  /** Failed authentications allowed per IP in a 15 minute window. */
  authFailureLimit?: number;
};

async function withTimeout<T>(p: Promise<T>, ms: number) {
  let t: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      p,
      new Promise<T>((_, reject) => {
        t = setTimeout(() => reject(new Error("timeout")), ms);
      }),
    ]);
  } finally {
    if (t) clearTimeout(t);
  }
}

async function checkDb(db: Db) {
  const started = Date.now();
  try {
    await withTimeout(db.execute(dsql`select 1`), 5000);
    return { status: "ok" as const, latencyMs: Date.now() - started };
  } catch (err) {
    return {
      status: "fail" as const,
      latencyMs: Date.now() - started,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export function createApp(deps: AppDeps) {
  const base = new Hono<AppEnv>();

  base.onError((err, c) => toErrorResponse(c, err));

  base.use(
    "/api/*",
    cors({
      origin: deps.corsOrigins ?? [],
      credentials: false,
      maxAge: 60 * 60 * 24,
    })
  );

  // RequestId + lightweight structured logging.
  base.use("/api/*", async (c, next) => {
    const requestId = randomUUID();
    c.set("requestId", requestId);
    c.header("x-request-id", requestId);

    const started = Date.now();
    try {
      await next();
    } finally {
      // Unset until the auth middleware has run.
      const user: User | undefined = c.get("user");
      logger.info(
        {
          requestId,
          userId: user?.id,
          method: c.req.method,
          url: c.req.url,
          statusCode: c.res.status,
          responseTime: Date.now() - started,
        },
        "request"
      );
    }
  });

  // Runs before auth so that failed attempts are counted.
  base.use("/api/*", authFailureLimiter({ limit: deps.authFailureLimit ?? 20 }));

  // Public routes
  const withHealth = base.get("/api/health", async (c) => {
    const dbRes = await checkDb(deps.db);
    if (dbRes.status !== "ok") return c.json({ status: "degraded", checks: { db: dbRes } }, 503);

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      checks: { db: dbRes },
    });
  });

  // Auth middleware applied to all other API routes.
  withHealth.use("/api/*", authMiddleware(deps));

  const withRoutes = withHealth
    .route("/api", gpgKeyRoutes(deps))
    .get("/", (c) => c.json({ status: "ok" }));

  withRoutes.notFound((c) =>
    c.json(
      {
        error: {
          code: "NOT_FOUND",
          message: "Not found",
          status: 404,
          requestId: c.get("requestId"),
        },
      },
      404
    )
  );

  return withRoutes;
}

export type AppType = ReturnType<typeof createApp>;
