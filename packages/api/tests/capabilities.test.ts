import { describe, expect, it } from "vitest";

import { KeyFlag, PublicKeyAlgorithm, deriveCapabilities } from "../src/gpg/capabilities.js";

describe("capability deriver", () => {
  it("lets an RSA key without declared flags do everything", () => {
    expect(deriveCapabilities({ algorithm: PublicKeyAlgorithm.RSA, keyFlags: null })).toEqual({
      canSign: true,
      canEncryptComms: true,
      canEncryptStorage: true,
      canCertify: true,
    });
  });

  it("keeps sign-only algorithms away from encryption", () => {
    expect(deriveCapabilities({ algorithm: PublicKeyAlgorithm.ED25519, keyFlags: null })).toEqual({
      canSign: true,
      canEncryptComms: false,
      canEncryptStorage: false,
      canCertify: true,
    });
  });

  it("keeps encryption-only algorithms away from signing", () => {
    expect(deriveCapabilities({ algorithm: PublicKeyAlgorithm.ECDH, keyFlags: null })).toEqual({
      canSign: false,
      canEncryptComms: true,
      canEncryptStorage: true,
      canCertify: false,
    });
  });

  it("narrows capabilities to the declared key flags", () => {
    expect(
      deriveCapabilities({ algorithm: PublicKeyAlgorithm.RSA, keyFlags: KeyFlag.ENCRYPT_STORAGE })
    ).toEqual({
      canSign: false,
      canEncryptComms: false,
      canEncryptStorage: true,
      canCertify: false,
    });
  });

  it("does not let flags grant what the algorithm cannot do", () => {
    const allFlags = KeyFlag.CERTIFY | KeyFlag.SIGN | KeyFlag.ENCRYPT_COMMS | KeyFlag.ENCRYPT_STORAGE;
    expect(deriveCapabilities({ algorithm: PublicKeyAlgorithm.EDDSA_LEGACY, keyFlags: allFlags })).toEqual({
      canSign: true,
      canEncryptComms: false,
      canEncryptStorage: false,
      canCertify: true,
    });
  });

  it("treats a zero flags octet as no capabilities", () => {
    expect(deriveCapabilities({ algorithm: PublicKeyAlgorithm.RSA, keyFlags: 0 })).toEqual({
      canSign: false,
      canEncryptComms: false,
      canEncryptStorage: false,
      canCertify: false,
    });
  });

  it("gives unknown algorithms no capabilities", () => {
    expect(deriveCapabilities({ algorithm: 99, keyFlags: null })).toEqual({
      canSign: false,
      canEncryptComms: false,
      canEncryptStorage: false,
      canCertify: false,
    });
  });
});
