import { expect } from "vitest";
import { errorResponseSchema } from "@keyring/shared";

import type { AppType } from "../src/app.js";

export async function authedRequest(
  app: AppType,
  opts: { method: "GET" | "POST" | "DELETE"; path: string; apiKey: string; json?: unknown }
) {
  const headers: Record<string, string> = {
    authorization: `Bearer ${opts.apiKey}`,
  };
  let body: string | undefined;
  if (opts.json !== undefined) {
    headers["content-type"] = "application/json";
    body = JSON.stringify(opts.json);
  }

  return app.request(opts.path, { method: opts.method, headers, body });
}

export async function expectError(res: Response, opts: { status: number; code?: string }) {
  expect(res.ok).toBe(false);
  expect(res.status).toBe(opts.status);
  const json = errorResponseSchema.parse(await res.json());
  if (opts.code) expect(json.error.code).toBe(opts.code);
  return json;
}
