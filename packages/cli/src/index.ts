#!/usr/bin/env node
import { Command } from "commander";
import fs from "node:fs/promises";
import process from "node:process";
import { z } from "zod";
import { ARMORED_PUBLIC_KEY_HEADER, type GpgKey } from "@keyring/shared";

import { createClient } from "./client.js";
import { readConfig, writeConfig } from "./config.js";
import { formatKey } from "./format.js";

function red(s: string) {
  return `\u001b[31m${s}\u001b[0m`;
}
function green(s: string) {
  return `\u001b[32m${s}\u001b[0m`;
}
function dim(s: string) {
  return `\u001b[2m${s}\u001b[0m`;
}

const keyIdArgSchema = z.coerce.number().int().positive();

async function requireClient() {
  const cfg = await readConfig();
  if (!cfg) {
    throw new Error(`Missing config. Run: keyring config --url http://localhost:3000 --key <API_KEY>`);
  }
  return createClient(cfg);
}

async function readStdin() {
  process.stdin.setEncoding("utf8");
  let text = "";
  for await (const chunk of process.stdin) text += String(chunk);
  return text;
}

async function readArmoredKey(file: string) {
  const text = file === "-" ? await readStdin() : await fs.readFile(file, "utf8");
  if (!text.includes(ARMORED_PUBLIC_KEY_HEADER)) {
    throw new Error(`${file === "-" ? "stdin" : file} does not contain an armored public key block`);
  }
  return text;
}

function printKeys(keys: GpgKey[], json: boolean | undefined) {
  if (json) {
    console.log(JSON.stringify(keys, null, 2));
    return;
  }
  if (keys.length === 0) {
    console.log(dim("No keys."));
    return;
  }
  for (const key of keys) console.log(formatKey(key).join("\n"));
}

const program = new Command();
program.name("keyring").description("Manage the OpenPGP public keys registered to your account").version("0.1.0");

program
  .command("config")
  .description("Set or show API configuration")
  .option("--url <url>", "API base URL, e.g. http://localhost:3000")
  .option("--key <key>", "API key (Bearer token)")
  .option("--show", "Print current config")
  .action(async (opts: { url?: string; key?: string; show?: boolean }) => {
    const current = await readConfig();
    if (opts.show) {
      if (!current) {
        console.log(dim("No config found."));
        return;
      }
      console.log(JSON.stringify({ apiUrl: current.apiUrl, apiKey: "********" }, null, 2));
      return;
    }

    const apiUrl = opts.url ?? current?.apiUrl;
    const apiKey = opts.key ?? current?.apiKey;
    if (!apiUrl || !apiKey) throw new Error("Provide --url and --key (or use --show).");

    await writeConfig({ apiUrl, apiKey });
    console.log(green("Config saved."));
  });

const keys = program.command("keys").description("List, add, show and delete GPG keys");

keys
  .command("list")
  .description("List your keys, or another user's with --user")
  .option("--user <userId>", "List the keys of this user")
  .option("--json", "Print JSON")
  .action(async (opts: { user?: string; json?: boolean }) => {
    const client = await requireClient();
    printKeys(opts.user ? await client.listUserKeys(opts.user) : await client.listKeys(), opts.json);
  });

keys
  .command("add")
  .description("Register an armored public key")
  .argument("<file>", "Armored key file, or - for stdin")
  .option("--user <userId>", "Add on behalf of this user (admin only)")
  .action(async (file: string, opts: { user?: string }) => {
    const client = await requireClient();
    const key = await client.addKey(await readArmoredKey(file), { userId: opts.user });
    console.log(green(`Added ${key.keyId} with ${key.subkeys.length} subkey(s).`));
    console.log(formatKey(key).join("\n"));
  });

keys
  .command("show")
  .description("Show one key by id")
  .argument("<id>", "Key id")
  .option("--json", "Print JSON")
  .action(async (id: string, opts: { json?: boolean }) => {
    const client = await requireClient();
    const key = await client.getKey(keyIdArgSchema.parse(id));
    if (opts.json) {
      console.log(JSON.stringify(key, null, 2));
      return;
    }
    console.log(formatKey(key).join("\n"));
  });

keys
  .command("delete")
  .description("Delete a key; deleting a primary key removes its subkeys")
  .argument("<id>", "Key id")
  .action(async (id: string) => {
    const client = await requireClient();
    await client.deleteKey(keyIdArgSchema.parse(id));
    console.log(green("Deleted."));
  });

program.configureOutput({
  outputError: (str, write) => write(red(str)),
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
