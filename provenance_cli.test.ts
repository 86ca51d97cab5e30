// provenance_cli.test.ts
// Tests for CLI argument parsing and report output

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { createHash } from "node:crypto";
import { pathToFileURL } from "node:url";
import { isEntryPoint, main, parseArgs } from "./provenance_cli.js";

describe("provenance_cli", () => {
  let tempDir: string;
  let stderrOutput: string;
  let stdoutOutput: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "provkit-cli-test-"));
    stderrOutput = "";
    stdoutOutput = "";

    vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      stderrOutput += String(chunk);
      return true;
    });
    vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      stdoutOutput += String(chunk);
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("argument parsing", () => {
    it("defaults to a summary report on stdout", () => {
      expect(parseArgs([])).toEqual({ full: false, assets: [] });
    });

    it("collects flags and repeated assets", () => {
      expect(
        parseArgs(["--full", "--asset", "a.bin", "-a", "b.bin", "--out", "r.json", "--config", "c.json"])
      ).toEqual({ full: true, assets: ["a.bin", "b.bin"], outFile: "r.json", configPath: "c.json" });
    });

    it("drops an --asset with no value", () => {
      expect(parseArgs(["--asset"]).assets).toEqual([]);
    });
  });

  describe("entry point detection", () => {
    it("recognizes the module when started through a bin symlink", async () => {
      const real = path.join(tempDir, "dist", "provenance_cli.js");
      const link = path.join(tempDir, "bin", "provkit");
      await fs.mkdir(path.dirname(real), { recursive: true });
      await fs.mkdir(path.dirname(link), { recursive: true });
      await fs.writeFile(real, "");
      await fs.symlink(real, link);

      const url = pathToFileURL(real).href;
      expect(isEntryPoint(link, url)).toBe(true);
      expect(isEntryPoint(real, url)).toBe(true);
    });

    it("rejects other scripts, missing files and a missing argv", async () => {
      const real = path.join(tempDir, "provenance_cli.js");
      const other = path.join(tempDir, "other.js");
      await fs.writeFile(real, "");
      await fs.writeFile(other, "");

      const url = pathToFileURL(real).href;
      expect(isEntryPoint(other, url)).toBe(false);
      expect(isEntryPoint(path.join(tempDir, "gone.js"), url)).toBe(false);
      expect(isEntryPoint(undefined, url)).toBe(false);
    });
  });

  describe("main", () => {
    it("prints a summary report as JSON", async () => {
      await main(["--config", path.join(tempDir, "absent.json")]);

      const report: Record<string, unknown> = JSON.parse(stdoutOutput);
      expect(report["runtimeVersion"]).toBe(process.versions.node);
      expect(Object.keys(report).sort()).toEqual(["git_versions", "module_versions", "runtimeVersion", "time"]);
      expect(stderrOutput).toContain("Gathering summary provenance (0 assets)");
    });

    it("writes a full report with configured roots and assets to --out", async () => {
      const configPath = path.join(tempDir, "provkit.json");
      const asset = path.join(tempDir, "weights.bin");
      const outFile = path.join(tempDir, "run", "provenance.json");
      await fs.writeFile(configPath, JSON.stringify({ provenance: { roots: { workspace: tempDir } } }));
      await fs.writeFile(asset, "checkpoint bytes");

      await main(["--full", "--config", configPath, "--asset", asset, "--out", outFile]);

      const report: unknown = JSON.parse(await fs.readFile(outFile, "utf8"));
      expect(report).toMatchObject({
        config_paths: { workspace: tempDir },
        assets: { [asset]: { size: 16, md5: createHash("md5").update("checkpoint bytes").digest("hex") } },
      });
      expect(stdoutOutput).toBe("");
      expect(stderrOutput).toContain(`Wrote ${outFile}`);
    });
  });
});
