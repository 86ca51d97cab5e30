// gpuInfo.ts
//
// Accelerator facts via nvidia-smi. Three outcomes, never an exception:
// - gpus:   one record per device
// - error:  nvidia-smi exists but failed; its output as text
// - absent: nvidia-smi is not on PATH

import { constants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { runCmd, type CmdRunner } from "./runCmd.js";

export type GpuRecord = {
  id: number | null;
  uuid: string;
  gpu_util: number | null; // percent
  mem_total: number | null; // MiB
  mem_used: number | null;
  mem_free: number | null;
  driver: string;
  gpu_name: string;
  serial: string;
  display_mode: string;
  display_active: string;
  temperature: number | null; // Celsius
};

export type GpuProbeResult =
  | { kind: "gpus"; gpus: GpuRecord[] }
  | { kind: "error"; text: string }
  | { kind: "absent" };

export type GpuProbeOptions = {
  runner?: CmdRunner;
  which?: (cmd: string) => Promise<string | null>;
  timeoutMs?: number; // default 15000
};

export const NVIDIA_SMI = "nvidia-smi";
export const GPU_NOT_FOUND = "nvidia-smi not found";

const QUERY_FIELDS = [
  "index",
  "uuid",
  "utilization.gpu",
  "memory.total",
  "memory.used",
  "memory.free",
  "driver_version",
  "name",
  "serial",
  "display_mode",
  "display_active",
  "temperature.gpu",
] as const;

/** First executable named `cmd` on PATH. */
export async function whichOnPath(cmd: string, envPath = process.env["PATH"] ?? ""): Promise<string | null> {
  const exts = process.platform === "win32" ? [".exe", ".cmd", ""] : [""];
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    for (const ext of exts) {
      const candidate = path.join(dir, cmd + ext);
      try {
        await fs.access(candidate, constants.X_OK);
        return candidate;
      } catch {
        continue;
      }
    }
  }
  return null;
}

function num(s: string | undefined): number | null {
  if (s === undefined) return null;
  const n = Number(s.trim());
  return s.trim() !== "" && Number.isFinite(n) ? n : null;
}

function str(s: string | undefined): string {
  return (s ?? "").trim();
}

/** Parse `--format=csv,noheader,nounits` output for QUERY_FIELDS. */
export function parseGpuCsv(out: string): GpuRecord[] {
  const gpus: GpuRecord[] = [];
  for (const line of out.split("\n")) {
    if (!line.trim()) continue;
    const f = line.split(",");
    gpus.push({
      id: num(f[0]),
      uuid: str(f[1]),
      gpu_util: num(f[2]),
      mem_total: num(f[3]),
      mem_used: num(f[4]),
      mem_free: num(f[5]),
      driver: str(f[6]),
      gpu_name: str(f[7]),
      serial: str(f[8]),
      display_mode: str(f[9]),
      display_active: str(f[10]),
      temperature: num(f[11]),
    });
  }
  return gpus;
}

export async function probeGpus(opts: GpuProbeOptions = {}): Promise<GpuProbeResult> {
  const which = opts.which ?? whichOnPath;
  const runner = opts.runner ?? runCmd;
  const timeoutMs = opts.timeoutMs ?? 15000;

  const exe = await which(NVIDIA_SMI);
  if (!exe) return { kind: "absent" };

  const res = await runner(exe, [`--query-gpu=${QUERY_FIELDS.join(",")}`, "--format=csv,noheader,nounits"], {
    timeoutMs,
  });
  if (!res.ok) {
    if (res.timedOut) return { kind: "error", text: `${NVIDIA_SMI} timed out after ${timeoutMs}ms` };
    return { kind: "error", text: (res.stderr.trim() || res.stdout).trim() };
  }
  return { kind: "gpus", gpus: parseGpuCsv(res.stdout) };
}

/** Report form: records, error text, or the not-found sentinel. */
export async function gpuInfo(opts: GpuProbeOptions = {}): Promise<GpuRecord[] | string> {
  const r = await probeGpus(opts);
  switch (r.kind) {
    case "gpus":
      return r.gpus;
    case "error":
      return r.text;
    case "absent":
      return GPU_NOT_FOUND;
  }
}
