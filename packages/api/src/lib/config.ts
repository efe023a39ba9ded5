import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  API_KEY_HASH_PEPPER: z.string().min(1, "API_KEY_HASH_PEPPER is required"),
  // Comma-separated browser origins allowed to call the API.
  CORS_ORIGINS: z
    .string()
    .default("")
    .transform((raw) =>
      raw
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    ),
  AUTH_FAILURE_LIMIT: z.coerce.number().int().positive().default(20),
});

export type Config = {
  databaseUrl: string;
  databasePoolSize: number;
  port: number;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  apiKeyHashPepper: string;
  corsOrigins: string[];
  authFailureLimit: number;
};

/** Throws a ZodError listing every missing or invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);
  return {
    databaseUrl: parsed.DATABASE_URL,
    databasePoolSize: parsed.DATABASE_POOL_SIZE,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    apiKeyHashPepper: parsed.API_KEY_HASH_PEPPER,
    corsOrigins: parsed.CORS_ORIGINS,
    authFailureLimit: parsed.AUTH_FAILURE_LIMIT,
  };
}
