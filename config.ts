// config.ts
//
// Per-user settings file (JSON), read once per ConfigStore instance.
// Keys are addressed by dotted path: store.get("provenance.roots").
//
// provkit itself only reads `provenance.roots`, a name -> directory map of
// extra install roots, e.g. { "datasets": "/mnt/data" } turns
// "/mnt/data/era5.json" into "<datasets>/era5.json".

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { ConfigError, errorText } from "./errors.js";
import type { InstallRoot } from "./pathRoots.js";

export type ConfigTree = { [key: string]: unknown };

export function defaultConfigPath(): string {
  return process.env["PROVKIT_CONFIG"] || path.join(os.homedir(), ".provkit.json");
}

function isTree(v: unknown): v is ConfigTree {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function splitKey(keyPath: string): string[] {
  const parts = keyPath.split(".");
  if (parts.some((p) => p === "")) throw new Error(`Invalid config key: "${keyPath}"`);
  return parts;
}

export class ConfigStore {
  private cache: ConfigTree | undefined;

  constructor(readonly configPath: string = defaultConfigPath()) {}

  /** Read the file on first call; later calls return the cached tree. A missing file is an empty tree. */
  async load(): Promise<ConfigTree> {
    if (this.cache) return this.cache;

    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        this.cache = {};
        return this.cache;
      }
      throw new ConfigError(`Cannot read config: ${errorText(e)}`, this.configPath, { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new ConfigError(`Config is not valid JSON: ${errorText(e)}`, this.configPath, { cause: e });
    }
    if (!isTree(parsed)) throw new ConfigError("Config must be a JSON object", this.configPath);

    this.cache = parsed;
    return this.cache;
  }

  async get(keyPath: string): Promise<unknown> {
    let node: unknown = await this.load();
    for (const key of splitKey(keyPath)) {
      if (!isTree(node) || !(key in node)) return undefined;
      node = node[key];
    }
    return node;
  }

  /** Set a value in memory, creating intermediate objects. Call save() to persist. */
  async set(keyPath: string, value: unknown): Promise<void> {
    const keys = splitKey(keyPath);
    const last = keys.pop();
    if (last === undefined) return;

    let node = await this.load();
    for (const key of keys) {
      const next = node[key];
      if (isTree(next)) {
        node = next;
      } else {
        const created: ConfigTree = {};
        node[key] = created;
        node = created;
      }
    }
    node[last] = value;
  }

  async save(): Promise<void> {
    const tree = await this.load();
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(tree, null, 2) + "\n", "utf8");
  }

  /** Extra install roots from `provenance.roots`; non-string entries are ignored. */
  async installRoots(): Promise<InstallRoot[]> {
    const roots = await this.get("provenance.roots");
    if (!isTree(roots)) return [];
    const out: InstallRoot[] = [];
    for (const [name, dir] of Object.entries(roots)) {
      if (typeof dir === "string" && dir) out.push({ name, path: path.resolve(dir) });
    }
    return out;
  }
}
