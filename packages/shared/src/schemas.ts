import { z } from "zod";
import { IDENTITY_EMAIL_PATTERN, KEY_ID_PATTERN, MAX_ARMORED_KEY_LENGTH } from "./constants.js";

// ============================================================
// Add key request
// ============================================================

export const addGpgKeySchema = z.object({
  armoredKey: z
    .string()
    .trim()
    .min(1, "Armored key cannot be empty")
    .max(MAX_ARMORED_KEY_LENGTH, "Armored key is too large"),
});

// ============================================================
// GPG key wire shape
// ============================================================

export const gpgKeyEmailSchema = z.object({
  email: z.string().regex(IDENTITY_EMAIL_PATTERN),
  verified: z.boolean(),
});

export const gpgKeyIdSchema = z.string().regex(KEY_ID_PATTERN, "Key ID must be 16 upper-case hex characters");

const gpgKeyBaseSchema = z.object({
  id: z.number().int().positive(),
  // Empty string for a primary key.
  primaryKeyId: z.union([gpgKeyIdSchema, z.literal("")]),
  keyId: gpgKeyIdSchema,
  publicKey: z.string().min(1),
  emails: z.array(gpgKeyEmailSchema),
  canSign: z.boolean(),
  canEncryptComms: z.boolean(),
  canEncryptStorage: z.boolean(),
  canCertify: z.boolean(),
  created: z.string().datetime(),
  expires: z.string().datetime().nullable(),
  added: z.string().datetime(),
});

export type GpgKey = z.infer<typeof gpgKeyBaseSchema> & { subkeys: GpgKey[] };

export const gpgKeySchema: z.ZodType<GpgKey> = gpgKeyBaseSchema.extend({
  subkeys: z.lazy(() => z.array(gpgKeySchema)),
});

export const gpgKeyListSchema = z.object({
  items: z.array(gpgKeySchema),
});

export const gpgKeyResponseSchema = z.object({
  key: gpgKeySchema,
});

// ============================================================
// Error envelope
// ============================================================

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    status: z.number().int(),
    details: z.unknown().optional(),
    requestId: z.string().optional(),
  }),
});
