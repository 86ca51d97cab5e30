// provenance.ts
//
// gatherProvenance(): the report stamped onto experiment outputs.
//
//   summary: time, runtimeVersion, module_versions, git_versions
//   full:    summary + executable, args, search_paths, config_paths,
//            platform, gpus, assets
//
// Steps run one after another: registry -> components (paths normalized on
// the way) -> git -> [full] platform -> gpus -> assets. Only a registry (or
// root list) that cannot be read at all fails the call; everything else
// degrades to an inline value.

import * as path from "node:path";

import { assetsInfo, DEFAULT_PEEKERS, type AssetRecord, type PeekerMap } from "./assets.js";
import { enumerateComponents, nodeComponentRegistry, type ComponentRegistry } from "./components.js";
import { ProvenanceError } from "./errors.js";
import { probeRepos, type RepoRecord } from "./gitProbe.js";
import { gpuInfo, type GpuRecord } from "./gpuInfo.js";
import { logger as defaultLogger, type Logger } from "./log.js";
import { nodeInstallRoots, nodeModulesChain, PathRootResolver, type InstallRoot } from "./pathRoots.js";
import { PLATFORM_QUERIES, platformInfo, type PlatformQueries } from "./platformInfo.js";
import type { CmdRunner } from "./runCmd.js";

export type SummaryReport = {
  time: string;
  runtimeVersion: string;
  module_versions: Record<string, string>;
  git_versions: Record<string, RepoRecord>;
};

export type FullReport = SummaryReport & {
  executable: string;
  args: string[];
  search_paths: string[];
  config_paths: Record<string, string>;
  platform: Record<string, unknown>;
  gpus: GpuRecord[] | string;
  assets: Record<string, AssetRecord | string>;
};

export type ProvenanceReport = SummaryReport | FullReport;

export type GatherOptions = {
  assets?: string[];
  full?: boolean;
};

export type ProvenanceDeps = {
  registry?: () => ComponentRegistry;
  roots?: () => InstallRoot[] | Promise<InstallRoot[]>;
  runner?: CmdRunner;
  which?: (cmd: string) => Promise<string | null>;
  now?: () => Date;
  peekers?: PeekerMap;
  platformQueries?: PlatformQueries;
  logger?: Pick<Logger, "error" | "debug">;
};

/** Where require() looks from the working directory, then NODE_PATH. */
export function moduleSearchPaths(cwd = process.cwd(), nodePath = process.env["NODE_PATH"] ?? ""): string[] {
  const extra = nodePath.split(path.delimiter).filter((p) => p.length > 0);
  return [...nodeModulesChain(cwd), ...extra];
}

export function gatherProvenance(opts: GatherOptions & { full: true }, deps?: ProvenanceDeps): Promise<FullReport>;
export function gatherProvenance(opts?: GatherOptions & { full?: false }, deps?: ProvenanceDeps): Promise<SummaryReport>;
export function gatherProvenance(opts?: GatherOptions, deps?: ProvenanceDeps): Promise<ProvenanceReport>;
export async function gatherProvenance(opts: GatherOptions = {}, deps: ProvenanceDeps = {}): Promise<ProvenanceReport> {
  const full = opts.full ?? false;
  const logger = deps.logger ?? defaultLogger;
  const now = deps.now ?? (() => new Date());

  let registry: ComponentRegistry;
  let roots: InstallRoot[];
  try {
    registry = (deps.registry ?? nodeComponentRegistry)();
    roots = await (deps.roots ?? nodeInstallRoots)();
  } catch (e) {
    throw new ProvenanceError("Cannot read the module registry or install roots", { cause: e });
  }

  const resolver = PathRootResolver.fromRoots(roots);
  const { versions, candidates } = enumerateComponents(registry, resolver, { full });
  logger.debug({ components: Object.keys(versions).length, candidates: candidates.length }, "components enumerated");

  const gitVersions = await probeRepos(candidates, { full, runner: deps.runner, logger });

  const summary: SummaryReport = {
    time: now().toISOString(),
    runtimeVersion: process.versions.node,
    module_versions: versions,
    git_versions: gitVersions,
  };
  if (!full) return summary;

  return {
    ...summary,
    executable: process.execPath,
    args: [...process.argv],
    search_paths: moduleSearchPaths(),
    config_paths: resolver.namedPaths(),
    platform: platformInfo(deps.platformQueries ?? PLATFORM_QUERIES),
    gpus: await gpuInfo({ runner: deps.runner, which: deps.which }),
    assets: await assetsInfo(opts.assets ?? [], { peekers: deps.peekers ?? DEFAULT_PEEKERS }),
  };
}
