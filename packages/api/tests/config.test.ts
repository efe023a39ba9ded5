import { describe, expect, it } from "vitest";
import { ZodError } from "zod";

import { loadConfig } from "../src/lib/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({
      DATABASE_URL: "postgresql://localhost:5432/keyring_test",
      API_KEY_HASH_PEPPER: "test-pepper",
    });
    expect(config).toEqual({
      databaseUrl: "postgresql://localhost:5432/keyring_test",
      databasePoolSize: 10,
      port: 3000,
      logLevel: "info",
      apiKeyHashPepper: "test-pepper",
      corsOrigins: [],
      authFailureLimit: 20,
    });
  });

  it("splits CORS origins", () => {
    const config = loadConfig({
      DATABASE_URL: "postgresql://localhost:5432/keyring_test",
      API_KEY_HASH_PEPPER: "test-pepper",
      CORS_ORIGINS: "https://keys.example.com, http://localhost:5173,",
    });
    expect(config.corsOrigins).toEqual(["https://keys.example.com", "http://localhost:5173"]);
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({
      DATABASE_URL: "postgresql://localhost:5432/keyring_test",
      DATABASE_POOL_SIZE: "4",
      PORT: "8080",
      LOG_LEVEL: "debug",
      API_KEY_HASH_PEPPER: "test-pepper",
    });
    expect(config.databasePoolSize).toBe(4);
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
  });

  it("rejects a missing database URL and pepper", () => {
    expect(() => loadConfig({})).toThrow(ZodError);
  });
});
