// pathRoots.ts
//
// Maps well-known install locations to symbolic tokens so reports say
// "<purelib>/pino/pino.js" instead of leaking a home directory.
//
// Roots (most specific wins when one contains another):
// - stdlib / platstdlib: npm and corepack as bundled with the runtime
// - globallib: global node_modules
// - purelib: nearest node_modules above the working directory
// - scripts: directory holding the node executable
// - anything extra the caller (usually ConfigStore) supplies

import { existsSync } from "node:fs";
import * as path from "node:path";

export type InstallRoot = {
  name: string;
  path: string;
};

function isWin() {
  return process.platform === "win32";
}

export function globalModulesDir(execPath = process.execPath): string {
  const binDir = path.dirname(execPath);
  return isWin() ? path.join(binDir, "node_modules") : path.join(binDir, "..", "lib", "node_modules");
}

/** node_modules lookup chain from `from` up to the filesystem root, deepest first. */
export function nodeModulesChain(from: string): string[] {
  const out: string[] = [];
  let dir = path.resolve(from);
  for (;;) {
    if (path.basename(dir) !== "node_modules") out.push(path.join(dir, "node_modules"));
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return out;
}

export function nodeInstallRoots(
  extra: ReadonlyArray<InstallRoot> = [],
  opts: { cwd?: string; execPath?: string } = {}
): InstallRoot[] {
  const execPath = opts.execPath ?? process.execPath;
  const globalDir = path.resolve(globalModulesDir(execPath));
  const chain = nodeModulesChain(opts.cwd ?? process.cwd());
  const purelib = chain.find((p) => existsSync(p)) ?? chain[0];

  const roots: InstallRoot[] = [
    { name: "stdlib", path: path.join(globalDir, "npm") },
    { name: "platstdlib", path: path.join(globalDir, "corepack") },
    { name: "globallib", path: globalDir },
  ];
  if (purelib) roots.push({ name: "purelib", path: purelib });
  roots.push({ name: "scripts", path: path.dirname(execPath) });

  return [...roots, ...extra];
}

function trimSep(p: string) {
  return p.length > 1 && (p.endsWith("/") || p.endsWith("\\")) ? p.slice(0, -1) : p;
}

export class PathRootResolver {
  private constructor(private readonly ordered: ReadonlyArray<readonly [string, string]>) {}

  /** Dedupe by path (first name wins), then order deepest root first. */
  static fromRoots(roots: Iterable<InstallRoot>): PathRootResolver {
    const byPath = new Map<string, string>();
    for (const r of roots) {
      const p = trimSep(r.path);
      if (!p || byPath.has(p)) continue;
      byPath.set(p, r.name);
    }
    // stable sort keeps insertion order for equal lengths
    const ordered = [...byPath.entries()].sort((a, b) => b[0].length - a[0].length);
    return new PathRootResolver(ordered);
  }

  entries(): ReadonlyArray<readonly [string, string]> {
    return this.ordered;
  }

  /** name -> path, first path seen per name in specificity order. */
  namedPaths(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [p, name] of this.ordered) {
      if (!(name in out)) out[name] = p;
    }
    return out;
  }

  normalize(filePath: string): string {
    for (const [rootPath, name] of this.ordered) {
      const at = indexAtBoundary(filePath, rootPath);
      if (at < 0) continue;
      return filePath.slice(0, at) + `<${name}>` + filePath.slice(at + rootPath.length);
    }
    return filePath;
  }
}

// A root only matches whole path segments: "/usr" must not match "/usr2/x".
function indexAtBoundary(haystack: string, needle: string): number {
  let from = 0;
  for (;;) {
    const at = haystack.indexOf(needle, from);
    if (at < 0) return -1;
    const next = haystack.charAt(at + needle.length);
    if (next === "" || next === "/" || next === "\\") return at;
    from = at + 1;
  }
}

/** True when a normalized path still starts with a root token. */
export function isTokenized(p: string): boolean {
  return p.startsWith("<");
}

/** True when a normalized path is still a raw absolute filesystem path. */
export function isRawAbsolute(p: string): boolean {
  return path.isAbsolute(p);
}
