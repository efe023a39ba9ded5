import { PublicKeyPacket, readKeys, type Key, type SignaturePacket } from "openpgp";

import { MalformedKeyError } from "../lib/errors.js";
import { parseUserId, type IdentityClaim } from "./identities.js";

export type DecodedPublicKey = {
  keyId: string;
  algorithm: number;
  keyFlags: number | null;
  created: Date;
  expires: Date | null;
  /** Base64 of the public-key packet body. */
  content: string;
};

export type DecodedKey = {
  primary: DecodedPublicKey;
  subkeys: DecodedPublicKey[];
  identities: IdentityClaim[];
};

type KeyPacketLike = {
  algorithm: number;
  getKeyID(): { toHex(): string };
  getCreationTime(): Date;
  write(): Uint8Array;
};

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

function latest(signatures: readonly SignaturePacket[]): SignaturePacket | null {
  let best: SignaturePacket | null = null;
  for (const sig of signatures) {
    if (!best || (sig.created?.getTime() ?? 0) >= (best.created?.getTime() ?? 0)) best = sig;
  }
  return best;
}

function firstOctet(flags: ArrayLike<number> | null | undefined): number | null {
  if (!flags || flags.length === 0) return null;
  return flags[0] ?? null;
}

function formatKeyId(packet: KeyPacketLike) {
  return packet.getKeyID().toHex().toUpperCase();
}

function describe(packet: KeyPacketLike, signature: SignaturePacket | null): DecodedPublicKey {
  const created = packet.getCreationTime();
  const lifetime = signature?.keyExpirationTime ?? null;
  const expires =
    lifetime !== null && lifetime > 0 && !signature?.keyNeverExpires
      ? new Date(created.getTime() + lifetime * 1000)
      : null;

  return {
    keyId: formatKeyId(packet),
    algorithm: packet.algorithm,
    keyFlags: firstOctet(signature?.keyFlags),
    created,
    expires,
    content: Buffer.from(packet.write()).toString("base64"),
  };
}

/**
 * Parses an armored public key block. Only the first entity of the block is
 * used. Signatures are read for metadata, not verified.
 */
export async function decodeArmoredKey(armored: string): Promise<DecodedKey> {
  let keys: Key[];
  try {
    keys = await readKeys({ armoredKeys: armored });
  } catch (err) {
    throw new MalformedKeyError(`Could not read armored key: ${errorMessage(err)}`);
  }

  const key = keys[0];
  if (!key) throw new MalformedKeyError("Armored text contains no key");
  if (key.isPrivate()) {
    throw new MalformedKeyError("Private key material is not accepted; submit the public key");
  }

  const selfCertifications = key.users.flatMap((user) => user.selfCertifications);
  const primary = describe(key.keyPacket, latest(selfCertifications));

  const subkeys = key.subkeys.map((subkey) => describe(subkey.keyPacket, latest(subkey.bindingSignatures)));

  const identities = key.users.flatMap((user) => (user.userID ? [parseUserId(user.userID.userID)] : []));

  return { primary, subkeys, identities };
}

/** Reads the key ID back out of stored `content`. */
export async function readKeyIdFromContent(content: string): Promise<string> {
  const packet = new PublicKeyPacket();
  try {
    await packet.read(new Uint8Array(Buffer.from(content, "base64")));
  } catch (err) {
    throw new MalformedKeyError(`Stored key content is unreadable: ${errorMessage(err)}`);
  }
  return formatKeyId(packet);
}
