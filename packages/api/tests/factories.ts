import { randomUUID } from "node:crypto";

import { apiKeys, userEmails, users } from "../src/db/schema/index.js";
import { createDbAccountDirectory } from "../src/services/accounts.js";
import { generateApiKey } from "../src/services/auth.js";
import type { GpgKeyDeps } from "../src/services/gpg-keys.js";
import { db } from "./db.js";

export const TEST_PEPPER = "test-pepper";
export const FIXED_NOW = new Date("2025-06-01T12:00:00.000Z");

export function createTestDeps(overrides?: Partial<GpgKeyDeps>): GpgKeyDeps {
  return {
    db,
    accounts: createDbAccountDirectory(db),
    now: () => FIXED_NOW,
    ...overrides,
  };
}

export async function createTestUser(overrides?: Partial<typeof users.$inferInsert>) {
  const [row] = await db
    .insert(users)
    .values({
      name: "Test User",
      email: `test-${randomUUID()}@example.com`,
      ...overrides,
    })
    .returning();
  if (!row) throw new Error("failed to create test user");
  return row;
}

export async function addTestEmail(opts: { userId: string; email: string; isVerified?: boolean }) {
  const [row] = await db
    .insert(userEmails)
    .values({ userId: opts.userId, email: opts.email, isVerified: opts.isVerified ?? true })
    .returning();
  if (!row) throw new Error("failed to add test email");
  return row;
}

export async function createTestApiKey(opts: { userId: string; name?: string; revokedAt?: Date }) {
  const { plaintextKey, keyHash } = await generateApiKey(TEST_PEPPER);

  const [row] = await db
    .insert(apiKeys)
    .values({
      userId: opts.userId,
      name: opts.name ?? "test key",
      keyHash,
      revokedAt: opts.revokedAt ?? null,
    })
    .returning();
  if (!row) throw new Error("failed to create test api key");

  return { apiKey: row, plaintextKey };
}
