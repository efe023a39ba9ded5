import { Hono, type Context } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { addGpgKeySchema, type GpgKey } from "@keyring/shared";

import { forbidden } from "../lib/errors.js";
import {
  addGpgKey,
  deleteGpgKey,
  getGpgKey,
  listGpgKeys,
  type GpgKeyDeps,
  type KeyRecord,
  type Requestor,
} from "../services/gpg-keys.js";
import type { AppEnv } from "../types/env.js";

const keyIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const userIdParamsSchema = z.object({
  userId: z.string().uuid(),
});

export function toApiGpgKey(record: KeyRecord): GpgKey {
  return {
    id: record.id,
    primaryKeyId: record.primaryKeyId ?? "",
    keyId: record.keyId,
    publicKey: record.content,
    // Only verified addresses are ever bound to a key.
    emails: record.emails.map((email) => ({ email, verified: true })),
    subkeys: record.subkeys.map(toApiGpgKey),
    canSign: record.canSign,
    canEncryptComms: record.canEncryptComms,
    canEncryptStorage: record.canEncryptStorage,
    canCertify: record.canCertify,
    created: record.created.toISOString(),
    expires: record.expires ? record.expires.toISOString() : null,
    added: record.added.toISOString(),
  };
}

export function gpgKeyRoutes(deps: GpgKeyDeps) {
  async function requestorFor(c: Context<AppEnv>): Promise<Requestor> {
    const user = c.get("user");
    return { id: user.id, isAdmin: await deps.accounts.isAdmin(user.id) };
  }

  return new Hono<AppEnv>()
    .get("/user/gpg_keys", async (c) => {
      const items = await listGpgKeys(deps, c.get("user").id);
      return c.json({ items: items.map(toApiGpgKey) });
    })
    .post(
      "/user/gpg_keys",
      zValidator("json", addGpgKeySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { armoredKey } = c.req.valid("json");
        const key = await addGpgKey(deps, { ownerId: c.get("user").id, armoredKey });
        return c.json({ key: toApiGpgKey(key) }, 201);
      }
    )
    .get(
      "/user/gpg_keys/:id",
      zValidator("param", keyIdParamsSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { id } = c.req.valid("param");
        const key = await getGpgKey(deps, id);
        return c.json({ key: toApiGpgKey(key) });
      }
    )
    .delete(
      "/user/gpg_keys/:id",
      zValidator("param", keyIdParamsSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { id } = c.req.valid("param");
        await deleteGpgKey(deps, { requestor: await requestorFor(c), id });
        return c.body(null, 204);
      }
    )
    .get(
      "/users/:userId/gpg_keys",
      zValidator("param", userIdParamsSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const { userId } = c.req.valid("param");
        const items = await listGpgKeys(deps, userId);
        return c.json({ items: items.map(toApiGpgKey) });
      }
    )
    .post(
      "/admin/users/:userId/gpg_keys",
      zValidator("param", userIdParamsSchema, (result) => {
        if (!result.success) throw result.error;
      }),
      zValidator("json", addGpgKeySchema, (result) => {
        if (!result.success) throw result.error;
      }),
      async (c) => {
        const requestor = await requestorFor(c);
        if (!requestor.isAdmin) throw forbidden("Admin privileges required");

        const { userId } = c.req.valid("param");
        const { armoredKey } = c.req.valid("json");
        const key = await addGpgKey(deps, { ownerId: userId, armoredKey });
        return c.json({ key: toApiGpgKey(key) }, 201);
      }
    );
}
