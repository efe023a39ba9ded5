// src/db/schema/index.ts

export * from "./users.js";
export * from "./user-emails.js";
export * from "./api-keys.js";
export * from "./gpg-keys.js";
export * from "./relations.js";
