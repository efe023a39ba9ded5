// src/db/schema/gpg-keys.ts

import {
  pgTable,
  bigserial,
  bigint,
  uuid,
  text,
  jsonb,
  boolean,
  index,
  type AnyPgColumn,
} from "drizzle-orm/pg-core";
import { users } from "./users.js";

/**
 * One row per primary key or subkey. Subkeys point at their primary through
 * `primary_key_id`; primary keys leave it null.
 */
export const gpgKeys = pgTable(
  "gpg_keys",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    ownerId: uuid("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    keyId: text("key_id").notNull().unique("gpg_keys_key_id_uq"),
    primaryKeyId: text("primary_key_id").references((): AnyPgColumn => gpgKeys.keyId, {
      onDelete: "cascade",
    }),
    /** Base64 of the serialized public-key packet. Never updated after insert. */
    content: text().notNull(),
    emails: jsonb().$type<string[]>().notNull().default([]),
    createdUnix: bigint("created_unix", { mode: "number" }).notNull(),
    expiresUnix: bigint("expires_unix", { mode: "number" }),
    addedUnix: bigint("added_unix", { mode: "number" }).notNull(),
    canSign: boolean("can_sign").notNull().default(false),
    canEncryptComms: boolean("can_encrypt_comms").notNull().default(false),
    canEncryptStorage: boolean("can_encrypt_storage").notNull().default(false),
    canCertify: boolean("can_certify").notNull().default(false),
  },
  (table) => [
    index("gpg_keys_owner_id_idx").on(table.ownerId),
    index("gpg_keys_primary_key_id_idx").on(table.primaryKeyId),
  ]
);

export type GpgKeyRow = typeof gpgKeys.$inferSelect;
export type NewGpgKeyRow = typeof gpgKeys.$inferInsert;
