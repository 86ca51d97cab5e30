// platformInfo.ts
//
// Descriptive facts about the host. Each query takes no arguments; one that
// throws is dropped, and so is one that only produces empty strings.

import * as os from "node:os";

export type PlatformQueries = Readonly<Record<string, () => unknown>>;

export const PLATFORM_QUERIES: PlatformQueries = {
  arch: () => os.arch(),
  platform: () => os.platform(),
  type: () => os.type(),
  release: () => os.release(),
  version: () => os.version(),
  machine: () => os.machine(),
  endianness: () => os.endianness(),
  hostname: () => os.hostname(),
  uname: () => [os.type(), os.hostname(), os.release(), os.version(), os.machine()],
  cpus: () => [...new Set(os.cpus().map((c) => c.model.trim()))],
  availableParallelism: () => os.availableParallelism(),
  totalmem: () => os.totalmem(),
  libc: () => libcVersion(),
  node: () => process.version,
};

function libcVersion(): string {
  const report = process.report?.getReport();
  if (typeof report !== "object" || report === null || !("header" in report)) return "";
  const header = report.header;
  if (typeof header !== "object" || header === null || !("glibcVersionRuntime" in header)) return "";
  return typeof header.glibcVersionRuntime === "string" ? `glibc ${header.glibcVersionRuntime}` : "";
}

/** "" or a (nested) array made only of "" — nothing worth reporting. */
export function isEmptyFact(v: unknown): boolean {
  if (v === undefined || v === "") return true;
  if (Array.isArray(v)) return v.every((x) => isEmptyFact(x));
  return false;
}

export function platformInfo(queries: PlatformQueries = PLATFORM_QUERIES): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, query] of Object.entries(queries)) {
    let value: unknown;
    try {
      value = query();
    } catch {
      continue;
    }
    if (!isEmptyFact(value)) out[name] = value;
  }
  return out;
}
