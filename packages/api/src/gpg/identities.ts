import { IDENTITY_EMAIL_SOURCE } from "@keyring/shared";

import { UnverifiedIdentityError } from "../lib/errors.js";

// "Full Name (comment) <email@example.com>"
const USER_ID_PATTERN = new RegExp(`^(.+) <(${IDENTITY_EMAIL_SOURCE})>$`);

export type IdentityClaim = {
  /** The user ID packet text as it appears in the key. */
  userId: string;
  name: string | null;
  email: string | null;
};

export type AccountEmail = {
  email: string;
  isVerified: boolean;
};

export function parseUserId(userId: string): IdentityClaim {
  const match = USER_ID_PATTERN.exec(userId);
  if (!match) return { userId, name: null, email: null };
  return { userId, name: match[1] ?? null, email: match[2] ?? null };
}

/**
 * Binds every identity claim to one of the owner's verified addresses.
 * All-or-nothing: the first claim that cannot be bound rejects the key.
 */
export function bindIdentities(claims: readonly IdentityClaim[], accountEmails: readonly AccountEmail[]): string[] {
  if (claims.length === 0) {
    throw new UnverifiedIdentityError("Key has no identities to bind", {});
  }

  const verified = new Set(accountEmails.filter((e) => e.isVerified).map((e) => e.email));
  const bound: string[] = [];

  for (const claim of claims) {
    if (claim.email === null) {
      throw new UnverifiedIdentityError(`Identity "${claim.userId}" has no email address`, {
        identity: claim.userId,
      });
    }
    if (!verified.has(claim.email)) {
      throw new UnverifiedIdentityError(`Email ${claim.email} is not verified for this account`, {
        identity: claim.userId,
        email: claim.email,
      });
    }
    if (!bound.includes(claim.email)) bound.push(claim.email);
  }

  return bound;
}
