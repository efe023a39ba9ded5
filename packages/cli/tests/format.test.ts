import { describe, expect, it } from "vitest";

import { formatCapabilities, formatKey } from "../src/format.js";
import { primaryKey } from "./fixtures.js";

describe("formatKey", () => {
  it("prints the primary key, its emails and its subkeys", () => {
    expect(formatKey(primaryKey)).toEqual([
      "pub 3A1F5C9B2E7D4680  #1  sign,certify  created 2024-01-01  expires never",
      "    a@example.com",
      "sub 00FF00FF00FF00FF  #2  encrypt-comms,encrypt-storage  created 2024-01-01  expires 2026-01-01",
    ]);
  });

  it("names a key without capabilities", () => {
    expect(
      formatCapabilities({ canSign: false, canEncryptComms: false, canEncryptStorage: false, canCertify: false })
    ).toBe("none");
  });
});
