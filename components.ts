// components.ts
//
// Discover the packages loaded into this process and decide what to report
// for each one: its version, a (tokenized) path, or nothing at all.
//
// Two passes over the registry, both in name order:
//   1. top-level names ("pino", "@types" scopes, runtime parts like "v8")
//   2. "family/part" names whose family came out namespace-only in pass 1
// Deeper names are never looked at.
//
// The Node registry only sees the CommonJS module cache (require.cache).
// Packages loaded purely through ESM `import`, provkit's own modules
// included, do not show up there and are not reported.

import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import * as path from "node:path";

import { PathRootResolver, isRawAbsolute, isTokenized } from "./pathRoots.js";

export type Classification = "versioned" | "stdlib" | "namespace-only" | "path-only" | "builtin" | "opaque";

/** What the enumerator may ask of a loaded component. Probes may throw; callers cope. */
export interface ComponentProbe {
  readonly builtin: boolean;
  tryVersion(): string | undefined;
  trySourcePath(): string | undefined;
  describe(): string;
}

export type ComponentRegistry = ReadonlyMap<string, ComponentProbe>;

export type CandidatePath = {
  name: string;
  path: string; // absolute, matched no install root
};

export type EnumerateOptions = {
  full?: boolean;
  separator?: string; // default "/"
  stdlibTokens?: readonly string[]; // default ["stdlib", "platstdlib"]
};

export type Enumeration = {
  versions: Record<string, string>;
  candidates: CandidatePath[];
  classes: Map<string, Classification>;
};

export const ELIDED_PREFIX = "…/";

type Classified = {
  classification: Classification;
  value?: string;
  candidate?: CandidatePath;
};

type Attempt<T> = { ok: true; value: T } | { ok: false };

function attempt<T>(fn: () => T): Attempt<T> {
  try {
    return { ok: true, value: fn() };
  } catch {
    return { ok: false };
  }
}

function describeSafe(name: string, probe: ComponentProbe): string {
  const d = attempt(() => probe.describe());
  return d.ok ? d.value : `<component ${name}>`;
}

export function classifyComponent(
  name: string,
  probe: ComponentProbe,
  resolver: PathRootResolver,
  opts: EnumerateOptions = {}
): Classified {
  const full = opts.full ?? false;
  const stdlibTokens = opts.stdlibTokens ?? ["stdlib", "platstdlib"];

  const version = attempt(() => probe.tryVersion());
  const source = attempt(() => probe.trySourcePath());
  if (!version.ok || !source.ok) {
    return { classification: "opaque", value: describeSafe(name, probe) };
  }

  let normalized: string | undefined;
  let candidate: CandidatePath | undefined;
  if (source.value) {
    normalized = resolver.normalize(source.value);
    // local checkouts usually carry a version too; they still get a git lookup
    if (isRawAbsolute(normalized)) candidate = { name, path: source.value };
  }

  if (version.value !== undefined) {
    return { classification: "versioned", value: version.value, candidate };
  }

  if (normalized === undefined) {
    return { classification: probe.builtin ? "builtin" : "namespace-only" };
  }

  const norm = normalized;
  if (stdlibTokens.some((t) => norm.startsWith(`<${t}>`))) {
    return { classification: "stdlib" };
  }

  if (full || isTokenized(norm)) {
    return { classification: "path-only", value: norm, candidate };
  }
  return { classification: "path-only", value: ELIDED_PREFIX + path.basename(norm), candidate };
}

export function enumerateComponents(
  registry: ComponentRegistry,
  resolver: PathRootResolver,
  opts: EnumerateOptions = {}
): Enumeration {
  const separator = opts.separator ?? "/";
  const names = [...registry.keys()].sort();

  const versions: Record<string, string> = {};
  const candidates: CandidatePath[] = [];
  const classes = new Map<string, Classification>();

  const visit = (name: string) => {
    const probe = registry.get(name);
    if (!probe) return;
    const c = classifyComponent(name, probe, resolver, opts);
    classes.set(name, c.classification);
    if (c.value !== undefined) versions[name] = c.value;
    if (c.candidate) candidates.push(c.candidate);
  };

  for (const name of names) {
    if (!name.includes(separator)) visit(name);
  }

  for (const name of names) {
    const bits = name.split(separator);
    const family = bits[0];
    if (bits.length === 2 && family !== undefined && classes.get(family) === "namespace-only") visit(name);
  }

  return { versions, candidates, classes };
}

// ---------------------------------------------------------------------------
// Node.js registry: process.versions + packages in the CommonJS module cache
// ---------------------------------------------------------------------------

type PackageJson = { name?: string; version?: string };

function readPackageJson(file: string): PackageJson | null {
  let obj: unknown;
  try {
    obj = JSON.parse(readFileSync(file, "utf8"));
  } catch {
    return null;
  }
  if (typeof obj !== "object" || obj === null) return null;
  const name = "name" in obj ? obj.name : undefined;
  const version = "version" in obj ? obj.version : undefined;
  return {
    name: typeof name === "string" ? name : undefined,
    version: typeof version === "string" ? version : undefined,
  };
}

type PackageGroup = {
  root?: string;
  files: string[];
};

const NODE_MODULES = "node_modules";

/**
 * Package that a loaded file belongs to. Files under node_modules take their
 * name from the path; anything else from the nearest package.json.
 */
function packageOf(
  file: string,
  findRoot: (dir: string) => string | undefined,
  manifest: (root: string) => PackageJson | null
): { name: string; root?: string } {
  const parts = file.split(/[\\/]/);
  const nm = parts.lastIndexOf(NODE_MODULES);
  if (nm >= 0 && nm + 1 < parts.length - 1) {
    const first = parts[nm + 1] ?? "";
    const scoped = first.startsWith("@");
    const take = scoped ? 2 : 1;
    const nameParts = parts.slice(nm + 1, nm + 1 + take);
    const root = parts.slice(0, nm + 1 + take).join(path.sep);
    return { name: nameParts.join("/"), root };
  }

  const root = findRoot(path.dirname(file));
  if (root) {
    return { name: manifest(root)?.name || path.basename(root), root };
  }
  return { name: path.basename(file, path.extname(file)) };
}

export type NodeRegistryOptions = {
  cache?: NodeJS.Dict<unknown>;
  versions?: Readonly<Record<string, string | undefined>>;
};

export function nodeComponentRegistry(opts: NodeRegistryOptions = {}): ComponentRegistry {
  const cache = opts.cache ?? createRequire(import.meta.url).cache;
  const runtime = opts.versions ?? process.versions;

  const manifests = new Map<string, PackageJson | null>();
  const manifest = (root: string) => {
    if (!manifests.has(root)) manifests.set(root, readPackageJson(path.join(root, "package.json")));
    return manifests.get(root) ?? null;
  };

  const roots = new Map<string, string | undefined>();
  const findRoot = (start: string): string | undefined => {
    const seen: string[] = [];
    let dir = start;
    let found: string | undefined;
    for (;;) {
      if (roots.has(dir)) {
        found = roots.get(dir);
        break;
      }
      seen.push(dir);
      // nested manifests like dist/cjs/package.json ({"type":"commonjs"}) carry no name
      if (manifest(dir)?.name) {
        found = dir;
        break;
      }
      const parent = path.dirname(dir);
      if (parent === dir) break;
      dir = parent;
    }
    for (const d of seen) roots.set(d, found);
    return found;
  };

  const registry = new Map<string, ComponentProbe>();

  for (const [name, version] of Object.entries(runtime)) {
    if (version === undefined) continue;
    registry.set(name, {
      builtin: true,
      tryVersion: () => version,
      trySourcePath: () => undefined,
      describe: () => `<runtime ${name}>`,
    });
  }

  const groups = new Map<string, PackageGroup>();
  for (const file of Object.keys(cache).sort()) {
    const pkg = packageOf(file, findRoot, manifest);
    const group = groups.get(pkg.name) ?? { root: pkg.root, files: [] };
    group.files.push(file);
    groups.set(pkg.name, group);
  }

  for (const [name, group] of groups) {
    if (registry.has(name)) continue;

    const scope = name.includes("/") ? name.split("/")[0] : undefined;
    if (scope && !registry.has(scope)) {
      registry.set(scope, {
        builtin: false,
        tryVersion: () => undefined,
        trySourcePath: () => undefined,
        describe: () => `<scope ${scope}>`,
      });
    }

    const entry = [...group.files].sort((a, b) => a.length - b.length || (a < b ? -1 : a > b ? 1 : 0))[0];
    registry.set(name, {
      builtin: false,
      tryVersion: () => (group.root ? manifest(group.root)?.version : undefined),
      trySourcePath: () => entry,
      describe: () => `<package ${name}${group.root ? ` from ${group.root}` : ""}>`,
    });
  }

  return registry;
}
