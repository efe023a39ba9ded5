// src/db/schema/relations.ts

import { relations } from "drizzle-orm";
import { users } from "./users.js";
import { userEmails } from "./user-emails.js";
import { apiKeys } from "./api-keys.js";
import { gpgKeys } from "./gpg-keys.js";

// -- Users --
export const usersRelations = relations(users, ({ many }) => ({
  emails: many(userEmails),
  apiKeys: many(apiKeys),
  gpgKeys: many(gpgKeys),
}));

// -- User Emails --
export const userEmailsRelations = relations(userEmails, ({ one }) => ({
  user: one(users, {
    fields: [userEmails.userId],
    references: [users.id],
  }),
}));

// -- API Keys --
export const apiKeysRelations = relations(apiKeys, ({ one }) => ({
  user: one(users, {
    fields: [apiKeys.userId],
    references: [users.id],
  }),
}));

// -- GPG Keys --
export const gpgKeysRelations = relations(gpgKeys, ({ one, many }) => ({
  owner: one(users, {
    fields: [gpgKeys.ownerId],
    references: [users.id],
  }),
  primaryKey: one(gpgKeys, {
    fields: [gpgKeys.primaryKeyId],
    references: [gpgKeys.keyId],
    relationName: "subkeys",
  }),
  subkeys: many(gpgKeys, { relationName: "subkeys" }),
}));
