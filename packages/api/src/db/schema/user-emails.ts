// src/db/schema/user-emails.ts

import { pgTable, uuid, text, boolean, timestamp, index, uniqueIndex } from "drizzle-orm/pg-core";
import { users } from "./users.js";

/**
 * Addresses an account has claimed. Verification happens elsewhere in the
 * platform; only rows with `is_verified` may back a GPG key identity.
 */
export const userEmails = pgTable(
  "user_emails",
  {
    id: uuid().primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    email: text().notNull(),
    isVerified: boolean("is_verified").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("user_emails_user_id_email_uq").on(table.userId, table.email),
    index("user_emails_email_idx").on(table.email),
  ]
);
