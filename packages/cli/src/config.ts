import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

const configSchema = z.object({
  apiUrl: z.string().url(),
  apiKey: z.string().min(1),
});

export type Config = z.infer<typeof configSchema>;

export function getDefaultConfigPath() {
  return path.join(os.homedir(), ".keyring", "config.json");
}

function isMissingFile(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Null when the file is absent or does not hold a complete config. */
export async function readConfig(opts?: { configPath?: string }): Promise<Config | null> {
  const configPath = opts?.configPath ?? getDefaultConfigPath();

  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = configSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export async function writeConfig(cfg: Config, opts?: { configPath?: string }) {
  const configPath = opts?.configPath ?? getDefaultConfigPath();
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(configSchema.parse(cfg), null, 2) + "\n", "utf8");
}
