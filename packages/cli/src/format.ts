import type { Capabilities, GpgKey } from "@keyring/shared";

export function formatCapabilities(key: Capabilities) {
  const names = [
    key.canSign ? "sign" : null,
    key.canCertify ? "certify" : null,
    key.canEncryptComms ? "encrypt-comms" : null,
    key.canEncryptStorage ? "encrypt-storage" : null,
  ].filter((n): n is string => n !== null);
  return names.length > 0 ? names.join(",") : "none";
}

function day(iso: string) {
  return iso.slice(0, 10);
}

/** gpg-style listing: a `pub` line, its emails, then one `sub` line per subkey. */
export function formatKey(key: GpgKey): string[] {
  const kind = key.primaryKeyId === "" ? "pub" : "sub";
  const lines = [
    `${kind} ${key.keyId}  #${key.id}  ${formatCapabilities(key)}  created ${day(key.created)}  expires ${
      key.expires ? day(key.expires) : "never"
    }`,
    ...key.emails.map((e) => `    ${e.email}`),
  ];
  for (const subkey of key.subkeys) lines.push(...formatKey(subkey));
  return lines;
}
