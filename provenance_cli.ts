#!/usr/bin/env node
// provenance_cli.ts
//
// Print (or write) a provenance report for this Node.js process.
//
// Usage examples:
//   node dist/provenance_cli.js
//   node dist/provenance_cli.js --full --asset model.ckpt --asset data/train.jsonl --out run/provenance.json
//
// Extra install roots come from the config file (--config, $PROVKIT_CONFIG or
// ~/.provkit.json) under provenance.roots.
//
// Components are read from the CommonJS module cache; packages this process
// loaded only through ESM import are not listed.

import { realpathSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { ConfigStore } from "./config.js";
import { nodeInstallRoots } from "./pathRoots.js";
import { gatherProvenance } from "./provenance.js";

type Args = {
  full: boolean;
  assets: string[];
  outFile?: string;
  configPath?: string;
};

export function parseArgs(argv: string[]): Args {
  const assets: string[] = [];
  let full = false;
  let outFile: string | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--full" || a === "-f") full = true;
    else if (a === "--asset" || a === "-a") assets.push(argv[++i] ?? "");
    else if (a === "--out" || a === "-o") outFile = argv[++i];
    else if (a === "--config") configPath = argv[++i];
  }

  return { full, assets: assets.filter((p) => p.length > 0), outFile, configPath };
}

async function writeJson(p: string, obj: unknown) {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, JSON.stringify(obj, null, 2) + "\n", "utf8");
}

export async function main(argv = process.argv.slice(2)) {
  const args = parseArgs(argv);
  const config = new ConfigStore(args.configPath);
  const extraRoots = await config.installRoots();

  process.stderr.write(`Gathering ${args.full ? "full" : "summary"} provenance (${args.assets.length} assets)\n`);

  const report = await gatherProvenance(
    { full: args.full, assets: args.assets },
    { roots: () => nodeInstallRoots(extraRoots) }
  );

  if (args.outFile) {
    await writeJson(args.outFile, report);
    process.stderr.write(`Wrote ${args.outFile}\n`);
  } else {
    process.stdout.write(JSON.stringify(report, null, 2) + "\n");
  }

  const repos = Object.keys(report.git_versions).length;
  process.stderr.write(`Summary: ${Object.keys(report.module_versions).length} components, ${repos} git checkouts\n`);
}

/**
 * True when `argv1` is this module, also when it is reached through a symlink
 * (npm links `bin` entries that way).
 */
export function isEntryPoint(argv1: string | undefined, moduleUrl: string): boolean {
  if (!argv1) return false;
  try {
    return realpathSync(argv1) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
