import { describe, expect, it } from "vitest";

import { PublicKeyAlgorithm } from "../src/gpg/capabilities.js";
import { decodeArmoredKey, readKeyIdFromContent } from "../src/gpg/decode.js";
import { MalformedKeyError } from "../src/lib/errors.js";
import { KEY_DATE, generatePrivateKey, generatePublicKey, keyIdsOf } from "./keys.js";

describe("decodeArmoredKey", () => {
  it("decodes the primary key, its subkey and identities", async () => {
    const armored = await generatePublicKey({ userIDs: [{ name: "Alice", email: "a@example.com" }] });
    const ids = await keyIdsOf(armored);

    const decoded = await decodeArmoredKey(armored);

    expect(decoded.primary).toMatchObject({
      keyId: ids.primary,
      algorithm: PublicKeyAlgorithm.EDDSA_LEGACY,
      keyFlags: 0x03,
      created: KEY_DATE,
      expires: null,
    });
    expect(decoded.subkeys).toHaveLength(1);
    expect(decoded.subkeys[0]).toMatchObject({
      keyId: ids.subkeys[0],
      algorithm: PublicKeyAlgorithm.ECDH,
      keyFlags: 0x0c,
      created: KEY_DATE,
      expires: null,
    });
    expect(decoded.identities).toEqual([
      { userId: "Alice <a@example.com>", name: "Alice", email: "a@example.com" },
    ]);
  });

  it("keeps every identity in order", async () => {
    const armored = await generatePublicKey({
      userIDs: [
        { name: "Alice", email: "a@example.com" },
        { name: "Alice Work", email: "alice@work.example.com" },
      ],
    });

    const decoded = await decodeArmoredKey(armored);

    expect(decoded.identities.map((i) => i.email)).toEqual(["a@example.com", "alice@work.example.com"]);
  });

  it("computes expiry from the self-signature", async () => {
    const armored = await generatePublicKey({
      userIDs: [{ name: "Alice", email: "a@example.com" }],
      keyExpirationTime: 3600,
    });

    const decoded = await decodeArmoredKey(armored);

    expect(decoded.primary.expires).toEqual(new Date("2024-01-01T01:00:00.000Z"));
    expect(decoded.subkeys[0]?.expires).toEqual(new Date("2024-01-01T01:00:00.000Z"));
  });

  it("stores content the key ID can be read back from", async () => {
    const armored = await generatePublicKey({
      userIDs: [{ name: "Alice", email: "a@example.com" }],
      subkeys: [{}, { sign: true }],
    });
    const ids = await keyIdsOf(armored);

    const decoded = await decodeArmoredKey(armored);

    expect(await readKeyIdFromContent(decoded.primary.content)).toBe(ids.primary);
    expect(await Promise.all(decoded.subkeys.map((s) => readKeyIdFromContent(s.content)))).toEqual(ids.subkeys);
  });

  it("reads signing flags on a signing subkey", async () => {
    const armored = await generatePublicKey({
      userIDs: [{ name: "Alice", email: "a@example.com" }],
      subkeys: [{ sign: true }],
    });

    const decoded = await decodeArmoredKey(armored);

    expect(decoded.subkeys[0]?.algorithm).toBe(PublicKeyAlgorithm.EDDSA_LEGACY);
    expect(decoded.subkeys[0]?.keyFlags).toBe(0x02);
  });

  it("rejects text that is not an armored key", async () => {
    await expect(decodeArmoredKey("not a key")).rejects.toBeInstanceOf(MalformedKeyError);
  });

  it("rejects private key material", async () => {
    const armored = await generatePrivateKey([{ name: "Alice", email: "a@example.com" }]);

    await expect(decodeArmoredKey(armored)).rejects.toThrow(
      "Private key material is not accepted; submit the public key"
    );
  });

  it("rejects unreadable stored content", async () => {
    await expect(readKeyIdFromContent("AAAA")).rejects.toBeInstanceOf(MalformedKeyError);
  });
});
