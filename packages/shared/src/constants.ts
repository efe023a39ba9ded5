/** 64-bit OpenPGP key ID rendered as upper-case hex. */
export const KEY_ID_PATTERN = /^[0-9A-F]{16}$/;

// Address part of a key identity; bound emails are checked against the same pattern everywhere.
export const IDENTITY_EMAIL_SOURCE = "[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Za-z]{2,64}";
export const IDENTITY_EMAIL_PATTERN = new RegExp(`^${IDENTITY_EMAIL_SOURCE}$`);

export const ARMORED_PUBLIC_KEY_HEADER = "-----BEGIN PGP PUBLIC KEY BLOCK-----";

// Generous upper bound for a single armored key block (large RSA keys with many signatures).
export const MAX_ARMORED_KEY_LENGTH = 256 * 1024;
