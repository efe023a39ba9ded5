import { createDb } from "../src/db/index.js";
import { apiKeys, userEmails, users } from "../src/db/schema/index.js";
import { userEmailInsertSchema } from "../src/db/validation.js";
import { loadConfig } from "../src/lib/config.js";
import { generateApiKey } from "../src/services/auth.js";

async function main() {
  const config = loadConfig();
  const { db, sql } = createDb({ url: config.databaseUrl, poolSize: 1 });

  try {
    const existing = await db.select({ id: users.id }).from(users).limit(1);
    if (existing.length > 0) {
      // Idempotent: don't create multiple seed users/keys.
      console.log("Seed skipped: users already exist.");
      return;
    }

    const email = process.env.SEED_ADMIN_EMAIL ?? "admin@example.com";
    const { plaintextKey, keyHash } = await generateApiKey(config.apiKeyHashPepper);

    await db.transaction(async (tx) => {
      const [user] = await tx
        .insert(users)
        .values({ name: "Admin", email, isAdmin: true })
        .returning();
      if (!user) throw new Error("Failed to create seed user");

      // The seed admin's address is trusted so it can register a key right away.
      await tx.insert(userEmails).values(userEmailInsertSchema.parse({ userId: user.id, email, isVerified: true }));
      await tx.insert(apiKeys).values({ userId: user.id, name: "seed", keyHash });
    });

    console.log("Seed complete.");
    console.log("User:", email);
    console.log("API key (plaintext, shown once):", plaintextKey);
  } finally {
    await sql.end({ timeout: 5 });
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
