import type { Capabilities } from "@keyring/shared";

/** OpenPGP public-key algorithm IDs (RFC 4880 §9.1, RFC 9580 §9.1). */
export const PublicKeyAlgorithm = {
  RSA: 1,
  RSA_ENCRYPT_ONLY: 2,
  RSA_SIGN_ONLY: 3,
  ELGAMAL: 16,
  DSA: 17,
  ECDH: 18,
  ECDSA: 19,
  EDDSA_LEGACY: 22,
  X25519: 25,
  X448: 26,
  ED25519: 27,
  ED448: 28,
} as const;

/** Key flags octet (RFC 4880 §5.2.3.21). */
export const KeyFlag = {
  CERTIFY: 0x01,
  SIGN: 0x02,
  ENCRYPT_COMMS: 0x04,
  ENCRYPT_STORAGE: 0x08,
} as const;

const SIGNING_ALGORITHMS: ReadonlySet<number> = new Set([
  PublicKeyAlgorithm.RSA,
  PublicKeyAlgorithm.RSA_SIGN_ONLY,
  PublicKeyAlgorithm.DSA,
  PublicKeyAlgorithm.ECDSA,
  PublicKeyAlgorithm.EDDSA_LEGACY,
  PublicKeyAlgorithm.ED25519,
  PublicKeyAlgorithm.ED448,
]);

const ENCRYPTION_ALGORITHMS: ReadonlySet<number> = new Set([
  PublicKeyAlgorithm.RSA,
  PublicKeyAlgorithm.RSA_ENCRYPT_ONLY,
  PublicKeyAlgorithm.ELGAMAL,
  PublicKeyAlgorithm.ECDH,
  PublicKeyAlgorithm.X25519,
  PublicKeyAlgorithm.X448,
]);

export type CapabilityInput = {
  algorithm: number;
  /** First key-flags octet of the governing signature; null when none was declared. */
  keyFlags: number | null;
};

/**
 * What a key may be used for. The algorithm sets the upper bound; declared key
 * flags narrow it. Unknown algorithms get no capabilities.
 */
export function deriveCapabilities({ algorithm, keyFlags }: CapabilityInput): Capabilities {
  const signs = SIGNING_ALGORITHMS.has(algorithm);
  const encrypts = ENCRYPTION_ALGORITHMS.has(algorithm);
  const allows = (flag: number) => keyFlags === null || (keyFlags & flag) !== 0;

  return {
    canSign: signs && allows(KeyFlag.SIGN),
    canEncryptComms: encrypts && allows(KeyFlag.ENCRYPT_COMMS),
    canEncryptStorage: encrypts && allows(KeyFlag.ENCRYPT_STORAGE),
    canCertify: signs && allows(KeyFlag.CERTIFY),
  };
}
