import {
  errorResponseSchema,
  gpgKeyListSchema,
  gpgKeyResponseSchema,
  type AddGpgKeyInput,
  type GpgKey,
} from "@keyring/shared";

import type { Config } from "./config.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class ApiError extends Error {
  status: number;
  code?: string;

  constructor(message: string, opts: { status: number; code?: string }) {
    super(message);
    this.name = "ApiError";
    this.status = opts.status;
    this.code = opts.code;
  }
}

export type KeyringClient = {
  listKeys(): Promise<GpgKey[]>;
  listUserKeys(userId: string): Promise<GpgKey[]>;
  getKey(id: number): Promise<GpgKey>;
  addKey(armoredKey: string, opts?: { userId?: string }): Promise<GpgKey>;
  deleteKey(id: number): Promise<void>;
};

export function createClient(cfg: Config, opts?: { fetch?: FetchLike }): KeyringClient {
  const doFetch = opts?.fetch ?? fetch;

  async function request(path: string, init?: { method?: string; body?: unknown }): Promise<unknown> {
    const res = await doFetch(new URL(path, cfg.apiUrl).toString(), {
      method: init?.method ?? "GET",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${cfg.apiKey}`,
      },
      body: init?.body === undefined ? undefined : JSON.stringify(init.body),
    });

    const text = await res.text();
    const json: unknown = text ? JSON.parse(text) : null;
    if (!res.ok) {
      const parsed = errorResponseSchema.safeParse(json);
      if (!parsed.success) throw new ApiError(`HTTP ${res.status}`, { status: res.status });
      const { code, message } = parsed.data.error;
      throw new ApiError(`${message} (${code})`, { status: res.status, code });
    }

    return json;
  }

  return {
    async listKeys() {
      return gpgKeyListSchema.parse(await request("/api/user/gpg_keys")).items;
    },

    async listUserKeys(userId) {
      return gpgKeyListSchema.parse(await request(`/api/users/${encodeURIComponent(userId)}/gpg_keys`)).items;
    },

    async getKey(id) {
      return gpgKeyResponseSchema.parse(await request(`/api/user/gpg_keys/${id}`)).key;
    },

    async addKey(armoredKey, addOpts) {
      const path = addOpts?.userId
        ? `/api/admin/users/${encodeURIComponent(addOpts.userId)}/gpg_keys`
        : "/api/user/gpg_keys";
      const body: AddGpgKeyInput = { armoredKey };
      return gpgKeyResponseSchema.parse(await request(path, { method: "POST", body })).key;
    },

    async deleteKey(id) {
      await request(`/api/user/gpg_keys/${id}`, { method: "DELETE" });
    },
  };
}
