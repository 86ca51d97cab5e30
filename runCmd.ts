// runCmd.ts
//
// Subprocess plumbing for the git and nvidia-smi probes.
// - Bounded in time: SIGTERM at timeoutMs, SIGKILL if the child is still
//   around killGraceMs later.
// - Bounded in memory: each stream keeps at most maxOutputBytes; the rest is
//   drained and dropped, and the result says so (truncated). Untracked-file
//   listings of a large checkout are the usual offender.

import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

export type RunResult = {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated?: boolean;
};

export type RunOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  timeoutMs: number;
  killGraceMs?: number; // default 2000
  maxOutputBytes?: number; // per stream, default 16 MiB
};

export type CmdRunner = (cmd: string, args: string[], opts: RunOptions) => Promise<RunResult>;

export const DEFAULT_MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

type Capture = {
  chunks: Buffer[];
  bytes: number;
  truncated: boolean;
};

function capture(stream: Readable, limit: number): Capture {
  const c: Capture = { chunks: [], bytes: 0, truncated: false };
  stream.on("data", (d: Buffer) => {
    const room = limit - c.bytes;
    if (room <= 0) {
      c.truncated = true;
      return;
    }
    const kept = d.length > room ? d.subarray(0, room) : d;
    if (kept.length < d.length) c.truncated = true;
    c.chunks.push(kept);
    c.bytes += kept.length;
  });
  return c;
}

function text(c: Capture): string {
  return Buffer.concat(c.chunks).toString("utf8");
}

/**
 * Run a subprocess, capturing stdout/stderr.
 * Never rejects: spawn failures come back as `ok: false` with the error in stderr.
 * Truncated output is never `ok`.
 */
export async function runCmd(cmd: string, args: string[], opts: RunOptions): Promise<RunResult> {
  const limit = opts.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const killGraceMs = opts.killGraceMs ?? 2000;

  return new Promise((resolve) => {
    const child = spawn(cmd, args, {
      env: opts.env,
      cwd: opts.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    const out = capture(child.stdout, limit);
    const err = capture(child.stderr, limit);
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | undefined;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => child.kill("SIGKILL"), killGraceMs);
    }, opts.timeoutMs);

    const finish = (exitCode: number | null, extraStderr = "") => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      const truncated = out.truncated || err.truncated;
      resolve({
        ok: !timedOut && !truncated && exitCode === 0,
        exitCode,
        stdout: text(out),
        stderr: text(err) + extraStderr,
        timedOut,
        truncated,
      });
    };

    child.on("close", (code) => finish(code));
    child.on("error", (e) => finish(null, String(e)));
  });
}
