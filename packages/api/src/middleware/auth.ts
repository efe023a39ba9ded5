import type { MiddlewareHandler } from "hono";

import type { Db } from "../db/index.js";
import { unauthorized } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { touchApiKey, validateApiKey } from "../services/auth.js";
import type { AppEnv } from "../types/env.js";

const PUBLIC_PATHS = new Set(["/api/health"]);

export function authMiddleware(deps: { db: Db; apiKeyPepper: string }): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (PUBLIC_PATHS.has(c.req.path)) {
      await next();
      return;
    }

    const auth = c.req.header("authorization");
    if (!auth) throw unauthorized("Missing Authorization header");

    const m = auth.match(/^Bearer\s+(.+)$/i);
    const plaintextKey = m?.[1]?.trim();
    if (!plaintextKey) throw unauthorized("Invalid Authorization header format");

    const found = await validateApiKey(deps.db, { plaintextKey, pepper: deps.apiKeyPepper });
    if (!found) throw unauthorized("Invalid API key");

    c.set("user", found.user);

    // Non-blocking last_used_at update (fire-and-forget).
    void touchApiKey(deps.db, found.apiKey.id).catch((err: unknown) =>
      logger.warn({ err }, "Failed to update api_keys.last_used_at")
    );

    await next();
  };
}
