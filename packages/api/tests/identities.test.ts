import { describe, expect, it } from "vitest";

import { bindIdentities, parseUserId } from "../src/gpg/identities.js";
import { UnverifiedIdentityError } from "../src/lib/errors.js";

describe("parseUserId", () => {
  it("extracts name and email from a full user ID", () => {
    expect(parseUserId("Alice Example <alice@example.com>")).toEqual({
      userId: "Alice Example <alice@example.com>",
      name: "Alice Example",
      email: "alice@example.com",
    });
  });

  it("accepts a percent sign in the local part", () => {
    expect(parseUserId("Alice <a%b@example.com>").email).toBe("a%b@example.com");
  });

  it("keeps a comment as part of the name", () => {
    expect(parseUserId("Alice (work) <alice@example.com>").name).toBe("Alice (work)");
  });

  it("yields no email for a bare name", () => {
    expect(parseUserId("Alice")).toEqual({ userId: "Alice", name: null, email: null });
  });

  it("yields no email when the name is missing", () => {
    expect(parseUserId("<alice@example.com>").email).toBeNull();
  });
});

describe("bindIdentities", () => {
  const accountEmails = [
    { email: "a@example.com", isVerified: true },
    { email: "b@example.com", isVerified: true },
    { email: "pending@example.com", isVerified: false },
  ];

  it("binds every claim to a verified address, without duplicates", () => {
    const claims = [
      parseUserId("Alice <a@example.com>"),
      parseUserId("Alice B <b@example.com>"),
      parseUserId("Alice Again <a@example.com>"),
    ];
    expect(bindIdentities(claims, accountEmails)).toEqual(["a@example.com", "b@example.com"]);
  });

  it("rejects the key when one email is not verified", () => {
    const claims = [parseUserId("Alice <a@example.com>"), parseUserId("Alice <pending@example.com>")];
    expect(() => bindIdentities(claims, accountEmails)).toThrow(UnverifiedIdentityError);
    try {
      bindIdentities(claims, accountEmails);
    } catch (err) {
      expect(err).toBeInstanceOf(UnverifiedIdentityError);
      if (err instanceof UnverifiedIdentityError) {
        expect(err.details).toEqual({ identity: "Alice <pending@example.com>", email: "pending@example.com" });
      }
    }
  });

  it("matches emails case-sensitively", () => {
    expect(() => bindIdentities([parseUserId("Alice <A@example.com>")], accountEmails)).toThrow(
      UnverifiedIdentityError
    );
  });

  it("rejects an identity without an email", () => {
    expect(() => bindIdentities([parseUserId("Alice")], accountEmails)).toThrow('Identity "Alice" has no email address');
  });

  it("rejects a key with no identities", () => {
    expect(() => bindIdentities([], accountEmails)).toThrow("Key has no identities to bind");
  });
});
