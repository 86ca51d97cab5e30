// components.test.ts
// Unit tests for component discovery and classification

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  classifyComponent,
  enumerateComponents,
  nodeComponentRegistry,
  type ComponentProbe,
} from "./components.js";
import { PathRootResolver } from "./pathRoots.js";

function probe(p: { version?: string; source?: string; builtin?: boolean; throws?: boolean; label?: string }): ComponentProbe {
  return {
    builtin: p.builtin ?? false,
    tryVersion: () => {
      if (p.throws) throw new Error("no introspection");
      return p.version;
    },
    trySourcePath: () => p.source,
    describe: () => p.label ?? "<component>",
  };
}

const resolver = PathRootResolver.fromRoots([
  { name: "stdlib", path: "/usr/lib/node_modules/npm" },
  { name: "globallib", path: "/usr/lib/node_modules" },
  { name: "purelib", path: "/work/app/node_modules" },
]);

describe("classifyComponent", () => {
  it("reports a version verbatim and leaves its path alone", () => {
    const c = classifyComponent("pino", probe({ version: "9.5.0", source: "/work/app/node_modules/pino/pino.js" }), resolver);
    expect(c).toEqual({ classification: "versioned", value: "9.5.0", candidate: undefined });
  });

  it("still collects a git candidate for a versioned local checkout", () => {
    const c = classifyComponent("mylib", probe({ version: "0.1.0", source: "/home/me/mylib/index.js" }), resolver);
    expect(c.value).toBe("0.1.0");
    expect(c.candidate).toEqual({ name: "mylib", path: "/home/me/mylib/index.js" });
  });

  it("elides an unmatched path to its base name in summary mode", () => {
    const c = classifyComponent("devpkg", probe({ source: "/opt/devwork/foo/mod.py" }), resolver);
    expect(c.classification).toBe("path-only");
    expect(c.value).toBe("…/mod.py");
    expect(c.candidate).toEqual({ name: "devpkg", path: "/opt/devwork/foo/mod.py" });
  });

  it("reports the full unmatched path in full mode", () => {
    const c = classifyComponent("devpkg", probe({ source: "/opt/devwork/foo/mod.py" }), resolver, { full: true });
    expect(c.value).toBe("/opt/devwork/foo/mod.py");
  });

  it("reports the token form for a path under a root in both modes", () => {
    const p = probe({ source: "/work/app/node_modules/lodash/lodash.js" });
    expect(classifyComponent("lodash", p, resolver).value).toBe("<purelib>/lodash/lodash.js");
    expect(classifyComponent("lodash", p, resolver, { full: true }).value).toBe("<purelib>/lodash/lodash.js");
    expect(classifyComponent("lodash", p, resolver).candidate).toBeUndefined();
  });

  it("skips standard-library components", () => {
    const c = classifyComponent("npm", probe({ source: "/usr/lib/node_modules/npm/index.js" }), resolver);
    expect(c).toEqual({ classification: "stdlib" });
  });

  it("skips builtins without a path and marks other pathless components as namespaces", () => {
    expect(classifyComponent("fs", probe({ builtin: true }), resolver)).toEqual({ classification: "builtin" });
    expect(classifyComponent("@acme", probe({}), resolver)).toEqual({ classification: "namespace-only" });
  });

  it("falls back to the description when a probe throws", () => {
    const c = classifyComponent("weird", probe({ throws: true, label: "<weird thing>" }), resolver);
    expect(c).toEqual({ classification: "opaque", value: "<weird thing>" });
  });
});

describe("enumerateComponents", () => {
  const registry = new Map<string, ComponentProbe>([
    ["node", probe({ version: "20.11.0", builtin: true })],
    ["fs", probe({ builtin: true })],
    ["npm", probe({ source: "/usr/lib/node_modules/npm/index.js" })],
    ["devpkg", probe({ source: "/opt/devwork/foo/mod.py" })],
    ["@acme", probe({})],
    ["@acme/beta", probe({ version: "2.1.0" })],
    ["@acme/beta/deep", probe({ version: "9.9.9" })],
    ["pino", probe({ version: "9.5.0" })],
    ["pino/child", probe({ version: "1.0.0" })],
    ["orphan/sub", probe({ version: "3.0.0" })],
  ]);

  it("emits versions, paths and sub-parts of namespace families only", () => {
    const { versions, candidates, classes } = enumerateComponents(registry, resolver);

    expect(versions).toEqual({
      node: "20.11.0",
      devpkg: "…/mod.py",
      pino: "9.5.0",
      "@acme/beta": "2.1.0",
    });
    expect(candidates).toEqual([{ name: "devpkg", path: "/opt/devwork/foo/mod.py" }]);
    expect(classes.get("@acme")).toBe("namespace-only");
    expect(classes.get("npm")).toBe("stdlib");
    expect(classes.has("@acme/beta/deep")).toBe(false);
    expect(classes.has("pino/child")).toBe(false);
    expect(classes.has("orphan/sub")).toBe(false);
  });

  it("emits names in sorted order", () => {
    const { versions } = enumerateComponents(registry, resolver);
    expect(Object.keys(versions)).toEqual(["devpkg", "node", "pino", "@acme/beta"]);
  });

  it("honours a custom hierarchy separator", () => {
    const dotted = new Map<string, ComponentProbe>([
      ["earthkit", probe({})],
      ["earthkit.meteo", probe({ version: "0.1.0" })],
    ]);
    const { versions } = enumerateComponents(dotted, resolver, { separator: "." });
    expect(versions).toEqual({ "earthkit.meteo": "0.1.0" });
  });
});

describe("nodeComponentRegistry", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "provkit-components-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function writeFile(rel: string, content = "") {
    const p = path.join(tempDir, rel);
    await fs.mkdir(path.dirname(p), { recursive: true });
    await fs.writeFile(p, content);
    return p;
  }

  it("groups cached files by package and reads versions from package.json", async () => {
    await writeFile("node_modules/alpha/package.json", JSON.stringify({ name: "alpha", version: "1.0.0" }));
    const alphaIndex = await writeFile("node_modules/alpha/index.js");
    const alphaUtil = await writeFile("node_modules/alpha/lib/util.js");
    await writeFile("node_modules/@acme/beta/package.json", JSON.stringify({ name: "@acme/beta", version: "2.1.0" }));
    const betaMain = await writeFile("node_modules/@acme/beta/main.js");
    await writeFile("app/package.json", JSON.stringify({ name: "my-app", version: "0.3.0" }));
    const appIndex = await writeFile("app/src/index.js");

    const registry = nodeComponentRegistry({
      cache: { [alphaUtil]: {}, [alphaIndex]: {}, [betaMain]: {}, [appIndex]: {} },
      versions: { node: "20.11.0", v8: "11.3.244.8" },
    });

    expect([...registry.keys()].sort()).toEqual(["@acme", "@acme/beta", "alpha", "my-app", "node", "v8"]);
    expect(registry.get("alpha")?.tryVersion()).toBe("1.0.0");
    expect(registry.get("alpha")?.trySourcePath()).toBe(alphaIndex);
    expect(registry.get("@acme")?.tryVersion()).toBeUndefined();
    expect(registry.get("@acme")?.trySourcePath()).toBeUndefined();
    expect(registry.get("node")?.builtin).toBe(true);

    const resolverForTree = PathRootResolver.fromRoots([{ name: "purelib", path: path.join(tempDir, "node_modules") }]);
    const { versions, candidates } = enumerateComponents(registry, resolverForTree);

    expect(versions).toEqual({
      alpha: "1.0.0",
      "my-app": "0.3.0",
      node: "20.11.0",
      v8: "11.3.244.8",
      "@acme/beta": "2.1.0",
    });
    expect(candidates).toEqual([{ name: "my-app", path: appIndex }]);
  });

  it("climbs past nameless nested manifests to the real package root", async () => {
    await writeFile("mylib/package.json", JSON.stringify({ name: "mylib", version: "1.2.3" }));
    await writeFile("mylib/dist/cjs/package.json", JSON.stringify({ type: "commonjs" }));
    const cjsIndex = await writeFile("mylib/dist/cjs/index.js");

    const registry = nodeComponentRegistry({ cache: { [cjsIndex]: {} }, versions: {} });

    expect([...registry.keys()]).toEqual(["mylib"]);
    expect(registry.get("mylib")?.tryVersion()).toBe("1.2.3");
    expect(registry.get("mylib")?.trySourcePath()).toBe(cjsIndex);
  });
});
