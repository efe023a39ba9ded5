import type { GpgKey } from "@keyring/shared";

export const primaryKey: GpgKey = {
  id: 1,
  primaryKeyId: "",
  keyId: "3A1F5C9B2E7D4680",
  publicKey: "eFVzZWQ=",
  emails: [{ email: "a@example.com", verified: true }],
  canSign: true,
  canEncryptComms: false,
  canEncryptStorage: false,
  canCertify: true,
  created: "2024-01-01T00:00:00.000Z",
  expires: null,
  added: "2025-06-01T12:00:00.000Z",
  subkeys: [
    {
      id: 2,
      primaryKeyId: "3A1F5C9B2E7D4680",
      keyId: "00FF00FF00FF00FF",
      publicKey: "eFVzZWQ=",
      emails: [],
      canSign: false,
      canEncryptComms: true,
      canEncryptStorage: true,
      canCertify: false,
      created: "2024-01-01T00:00:00.000Z",
      expires: "2026-01-01T00:00:00.000Z",
      added: "2025-06-01T12:00:00.000Z",
      subkeys: [],
    },
  ],
};
