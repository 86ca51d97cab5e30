// gitProbe.ts
//
// Git state for components loaded from local checkouts.
//
// - Ascent: from the file's directory upward until a directory holds ".git"
//   (a directory, or a file for worktrees/submodules). The filesystem root is
//   not tested.
// - State is read once per repository, however many components live in it.
// - A repository whose state cannot be read is logged and left out; the other
//   candidates carry on.

import * as fs from "node:fs/promises";
import * as path from "node:path";

import type { CandidatePath } from "./components.js";
import { errorText } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./log.js";
import { runCmd, type CmdRunner } from "./runCmd.js";

export type RepoRecordSummary = {
  git: {
    sha1: string;
    modified_files: number;
    untracked_files: number;
  };
};

export type RepoRecordFull = {
  path: string; // repository root
  git: {
    sha1: string;
    remotes: string[];
    modified_files: string[];
    untracked_files: string[];
  };
};

export type RepoRecord = RepoRecordSummary | RepoRecordFull;

export type GitProbeOptions = {
  full?: boolean;
  runner?: CmdRunner;
  timeoutMs?: number; // per git command, default 10000
  logger?: Pick<Logger, "error">;
};

type RepoState = {
  sha1: string;
  modified: string[];
  untracked: string[];
  remotes: string[];
};

async function hasGitEntry(dir: string) {
  try {
    await fs.stat(path.join(dir, ".git"));
    return true;
  } catch {
    return false;
  }
}

/** Nearest enclosing repository root of `filePath`, or null. */
export async function findRepoRoot(filePath: string): Promise<string | null> {
  let dir = path.dirname(path.resolve(filePath));
  while (path.dirname(dir) !== dir) {
    if (await hasGitEntry(dir)) return dir;
    dir = path.dirname(dir);
  }
  return null;
}

function lines(s: string): string[] {
  return s
    .split("\n")
    .map((l) => l.replace(/\r$/, ""))
    .filter((l) => l.length > 0);
}

async function git(runner: CmdRunner, root: string, args: string[], timeoutMs: number): Promise<string> {
  const res = await runner("git", ["-C", root, "-c", "core.quotePath=false", ...args], {
    env: { ...process.env, GIT_OPTIONAL_LOCKS: "0" },
    timeoutMs,
  });
  if (res.truncated) throw new Error(`git ${args[0]} output exceeded the capture limit`);
  if (res.ok) return res.stdout;
  if (res.timedOut) throw new Error(`git ${args[0]} timed out after ${timeoutMs}ms`);
  throw new Error(`git ${args.join(" ")} exited with ${res.exitCode}: ${res.stderr.trim()}`);
}

/** Unique fetch URLs in the order git lists them. */
export function parseRemotes(out: string): string[] {
  const urls: string[] = [];
  for (const l of lines(out)) {
    const [, url, kind] = l.split(/\s+/);
    if (!url || kind !== "(fetch)" || urls.includes(url)) continue;
    urls.push(url);
  }
  return urls;
}

async function readRepoState(root: string, runner: CmdRunner, timeoutMs: number, full: boolean): Promise<RepoState> {
  const sha1 = (await git(runner, root, ["rev-parse", "HEAD"], timeoutMs)).trim();
  if (!/^[0-9a-f]{7,64}$/.test(sha1)) throw new Error(`unexpected HEAD: ${JSON.stringify(sha1)}`);

  const modified = lines(await git(runner, root, ["diff", "--name-only"], timeoutMs));
  const untracked = lines(await git(runner, root, ["ls-files", "--others", "--exclude-standard"], timeoutMs));
  const remotes = full ? parseRemotes(await git(runner, root, ["remote", "-v"], timeoutMs)) : [];

  return { sha1, modified, untracked, remotes };
}

function toRecord(state: RepoState, root: string, full: boolean): RepoRecord {
  if (!full) {
    return {
      git: {
        sha1: state.sha1,
        modified_files: state.modified.length,
        untracked_files: state.untracked.length,
      },
    };
  }
  return {
    path: root,
    git: {
      sha1: state.sha1,
      remotes: state.remotes,
      modified_files: [...state.modified].sort(),
      untracked_files: [...state.untracked].sort(),
    },
  };
}

export async function probeRepos(
  candidates: Iterable<CandidatePath>,
  opts: GitProbeOptions = {}
): Promise<Record<string, RepoRecord>> {
  const full = opts.full ?? false;
  const runner = opts.runner ?? runCmd;
  const timeoutMs = opts.timeoutMs ?? 10000;
  const logger = opts.logger ?? defaultLogger;

  const namesByPath = new Map<string, string[]>();
  for (const c of candidates) {
    const names = namesByPath.get(c.path) ?? [];
    if (!names.includes(c.name)) names.push(c.name);
    namesByPath.set(c.path, names);
  }

  // null = repository found but unreadable
  const states = new Map<string, RepoState | null>();
  const found: Array<[string, RepoRecord]> = [];

  for (const [filePath, names] of namesByPath) {
    const root = await findRepoRoot(filePath);
    if (!root) continue;

    let state = states.get(root);
    if (state === undefined) {
      try {
        state = await readRepoState(root, runner, timeoutMs, full);
      } catch (e) {
        logger.error({ repo: root, components: names, err: errorText(e) }, "cannot read git state");
        state = null;
      }
      states.set(root, state);
    }
    if (!state) continue;

    for (const name of names) found.push([name, toRecord(state, root, full)]);
  }

  found.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  return Object.fromEntries(found);
}
