import { randomBytes, webcrypto } from "node:crypto";
import { and, eq, isNull } from "drizzle-orm";

import type { Db } from "../db/index.js";
import { apiKeys } from "../db/schema/index.js";

const { subtle } = webcrypto;

export function generateApiKeyPlaintext() {
  const hex = randomBytes(16).toString("hex"); // 32 hex chars
  return `kr_live_${hex}`;
}

export async function sha256Hex(input: string) {
  const bytes = new TextEncoder().encode(input);
  const digest = await subtle.digest("SHA-256", bytes);
  return Buffer.from(digest).toString("hex");
}

export async function hashApiKey(plaintextKey: string, pepper: string) {
  return sha256Hex(`${pepper}:${plaintextKey}`);
}

export async function generateApiKey(pepper: string) {
  const plaintextKey = generateApiKeyPlaintext();
  const keyHash = await hashApiKey(plaintextKey, pepper);
  return { plaintextKey, keyHash };
}

export async function validateApiKey(db: Db, opts: { plaintextKey: string; pepper: string }) {
  const keyHash = await hashApiKey(opts.plaintextKey, opts.pepper);
  const apiKey = await db.query.apiKeys.findFirst({
    where: (t, { and, eq, isNull }) => and(eq(t.keyHash, keyHash), isNull(t.revokedAt)),
  });
  if (!apiKey) return null;

  const user = await db.query.users.findFirst({
    where: (t, { eq }) => eq(t.id, apiKey.userId),
  });
  if (!user) return null;

  return { apiKey, user };
}

export async function touchApiKey(db: Db, apiKeyId: string) {
  await db
    .update(apiKeys)
    .set({ lastUsedAt: new Date() })
    .where(and(eq(apiKeys.id, apiKeyId), isNull(apiKeys.revokedAt)));
}
