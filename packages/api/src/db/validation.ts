// src/db/validation.ts

import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { IDENTITY_EMAIL_PATTERN, KEY_ID_PATTERN } from "@keyring/shared";
import { gpgKeys } from "./schema/gpg-keys.js";
import { userEmails } from "./schema/user-emails.js";

// -- GPG Keys --
export const gpgKeyInsertSchema = createInsertSchema(gpgKeys, {
  keyId: (schema) => schema.regex(KEY_ID_PATTERN, "Key ID must be 16 upper-case hex characters"),
  primaryKeyId: z.string().regex(KEY_ID_PATTERN).nullable().optional(),
  content: (schema) => schema.min(1).base64(),
  emails: z.array(z.string().regex(IDENTITY_EMAIL_PATTERN)),
});

// -- User Emails --
export const userEmailInsertSchema = createInsertSchema(userEmails, {
  email: (schema) => schema.trim().email(),
});
