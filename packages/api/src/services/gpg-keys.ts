import { eq, inArray, or } from "drizzle-orm";
import type { Capabilities } from "@keyring/shared";

import type { Db } from "../db/index.js";
import { gpgKeys, type GpgKeyRow, type NewGpgKeyRow } from "../db/schema/index.js";
import { gpgKeyInsertSchema } from "../db/validation.js";
import { deriveCapabilities } from "../gpg/capabilities.js";
import { decodeArmoredKey, type DecodedPublicKey } from "../gpg/decode.js";
import { bindIdentities } from "../gpg/identities.js";
import {
  AccessDeniedError,
  AppError,
  KeyIdConflictError,
  KeyNotFoundError,
  StorageError,
  UnverifiedIdentityError,
  isUniqueViolation,
  uniqueViolationValue,
} from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { fromNullableUnixSeconds, fromUnixSeconds, toUnixSeconds } from "../lib/time.js";
import type { AccountDirectory } from "./accounts.js";

export type GpgKeyDeps = {
  db: Db;
  accounts: AccountDirectory;
  now?: () => Date;
};

export type Requestor = {
  id: string;
  isAdmin: boolean;
};

export type KeyRecord = Capabilities & {
  id: number;
  ownerId: string;
  keyId: string;
  /** Null for a primary key. */
  primaryKeyId: string | null;
  content: string;
  emails: string[];
  created: Date;
  expires: Date | null;
  added: Date;
  subkeys: KeyRecord[];
};

export function toKeyRecord(row: GpgKeyRow, subkeys: readonly GpgKeyRow[] = []): KeyRecord {
  return {
    id: row.id,
    ownerId: row.ownerId,
    keyId: row.keyId,
    primaryKeyId: row.primaryKeyId,
    content: row.content,
    emails: row.emails,
    created: fromUnixSeconds(row.createdUnix),
    expires: fromNullableUnixSeconds(row.expiresUnix),
    added: fromUnixSeconds(row.addedUnix),
    canSign: row.canSign,
    canEncryptComms: row.canEncryptComms,
    canEncryptStorage: row.canEncryptStorage,
    canCertify: row.canCertify,
    subkeys: subkeys.map((s) => toKeyRecord(s)),
  };
}

function toRow(
  key: DecodedPublicKey,
  opts: { ownerId: string; primaryKeyId: string | null; emails: string[]; addedUnix: number }
): NewGpgKeyRow {
  return {
    ownerId: opts.ownerId,
    keyId: key.keyId,
    primaryKeyId: opts.primaryKeyId,
    content: key.content,
    emails: opts.emails,
    createdUnix: toUnixSeconds(key.created),
    expiresUnix: key.expires ? toUnixSeconds(key.expires) : null,
    addedUnix: opts.addedUnix,
    ...deriveCapabilities(key),
  };
}

/** `fallbackKeyId` names the conflict when the database does not say which key ID collided. */
function toStoreError(err: unknown, fallbackKeyId?: string): AppError {
  if (err instanceof AppError) return err;
  if (fallbackKeyId && isUniqueViolation(err)) {
    return new KeyIdConflictError(uniqueViolationValue(err, "key_id") ?? fallbackKeyId);
  }
  return new StorageError(err);
}

/**
 * Decodes, binds and stores a key with its subkeys. Everything before the
 * transaction is pure apart from the account email lookup.
 */
export async function addGpgKey(deps: GpgKeyDeps, input: { ownerId: string; armoredKey: string }) {
  const decoded = await decodeArmoredKey(input.armoredKey);
  const accountEmails = await deps.accounts.listEmails(input.ownerId);
  let emails: string[];
  try {
    emails = bindIdentities(decoded.identities, accountEmails);
  } catch (err) {
    if (err instanceof UnverifiedIdentityError) {
      logger.info(
        { ownerId: input.ownerId, keyId: decoded.primary.keyId, details: err.details },
        "gpg key identity rejected"
      );
    }
    throw err;
  }

  const addedUnix = toUnixSeconds(deps.now ? deps.now() : new Date());
  const primaryRow = toRow(decoded.primary, { ownerId: input.ownerId, primaryKeyId: null, emails, addedUnix });
  const subkeyRows = decoded.subkeys.map((subkey) =>
    toRow(subkey, { ownerId: input.ownerId, primaryKeyId: primaryRow.keyId, emails: [], addedUnix })
  );
  for (const row of [primaryRow, ...subkeyRows]) gpgKeyInsertSchema.parse(row);

  try {
    const record = await deps.db.transaction(async (tx) => {
      // The unique constraint on key_id backs this check when two transactions race past it.
      const keyIds = [primaryRow.keyId, ...subkeyRows.map((r) => r.keyId)];
      const existing = await tx
        .select({ keyId: gpgKeys.keyId })
        .from(gpgKeys)
        .where(inArray(gpgKeys.keyId, keyIds));
      const taken = existing.find((r) => r.keyId === primaryRow.keyId) ?? existing[0];
      if (taken) throw new KeyIdConflictError(taken.keyId);

      const [primary] = await tx.insert(gpgKeys).values(primaryRow).returning();
      if (!primary) throw new StorageError(new Error("insert into gpg_keys returned no row"));
      const subkeys = subkeyRows.length > 0 ? await tx.insert(gpgKeys).values(subkeyRows).returning() : [];

      return toKeyRecord(primary, subkeys);
    });

    logger.info(
      { ownerId: input.ownerId, keyId: record.keyId, subkeys: record.subkeys.length },
      "gpg key added"
    );
    return record;
  } catch (err) {
    const e = toStoreError(err, primaryRow.keyId);
    if (e instanceof KeyIdConflictError) {
      logger.info({ ownerId: input.ownerId, keyId: e.keyId }, "gpg key id already registered");
    }
    throw e;
  }
}

export async function getGpgKey(deps: GpgKeyDeps, id: number) {
  const row = await deps.db.query.gpgKeys.findFirst({
    where: (t, { eq }) => eq(t.id, id),
    with: { subkeys: { orderBy: (t, { asc }) => [asc(t.id)] } },
  });
  if (!row) throw new KeyNotFoundError(id);
  return toKeyRecord(row, row.subkeys);
}

/** Primary keys of an owner, oldest first, each with its subkeys. */
export async function listGpgKeys(deps: GpgKeyDeps, ownerId: string) {
  const rows = await deps.db.query.gpgKeys.findMany({
    where: (t, { and, eq, isNull }) => and(eq(t.ownerId, ownerId), isNull(t.primaryKeyId)),
    with: { subkeys: { orderBy: (t, { asc }) => [asc(t.id)] } },
    orderBy: (t, { asc }) => [asc(t.id)],
  });
  return rows.map((row) => toKeyRecord(row, row.subkeys));
}

/**
 * Deletes a primary key with all of its subkeys, or a single subkey.
 * Deleting a key that does not exist succeeds without doing anything.
 */
export async function deleteGpgKey(deps: GpgKeyDeps, opts: { requestor: Requestor; id: number }) {
  try {
    await deps.db.transaction(async (tx) => {
      const [target] = await tx.select().from(gpgKeys).where(eq(gpgKeys.id, opts.id)).for("update");
      if (!target) return;

      if (target.ownerId !== opts.requestor.id && !opts.requestor.isAdmin) {
        throw new AccessDeniedError();
      }

      const removed = await tx
        .delete(gpgKeys)
        .where(
          target.primaryKeyId === null
            ? or(eq(gpgKeys.id, target.id), eq(gpgKeys.primaryKeyId, target.keyId))
            : eq(gpgKeys.id, target.id)
        )
        .returning({ id: gpgKeys.id });

      logger.info(
        { requestorId: opts.requestor.id, keyId: target.keyId, removed: removed.length },
        "gpg key deleted"
      );
    });
  } catch (err) {
    throw toStoreError(err);
  }
}
