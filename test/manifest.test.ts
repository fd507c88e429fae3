import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parseManifest, readManifest } from "../src/manifest.js";
import type { Warning } from "../src/types.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

describe("parseManifest", () => {
  it("extracts the remote dependency and model override", () => {
    expect(parseManifest(readFileSync(join(FIXTURES, "manifest.lkml"), "utf-8"))).toEqual({
      baseRepoUrl: "https://github.com/acme-analytics/base_project.git",
      baseOwner: "acme-analytics",
      baseRepo: "base_project",
      baseRef: "v1.4.0",
      modelName: "tenant_1_model",
    });
  });

  it("reads ssh remotes", () => {
    const info = parseManifest('remote_dependency: base { url: "git@github.com:acme/base.git" ref: "main" }');
    expect(info.baseOwner).toBe("acme");
    expect(info.baseRepo).toBe("base");
    expect(info.baseRef).toBe("main");
  });

  it("keeps a non-GitHub url without an owner", () => {
    const info = parseManifest('url: "https://gitlab.example.com/acme/base.git"');
    expect(info).toEqual({ baseRepoUrl: "https://gitlab.example.com/acme/base.git" });
  });

  it("ignores other constants", () => {
    const info = parseManifest(
      'override_constant: schema { value: "s" }\noverride_constant: model_name { value: "m" }',
    );
    expect(info.modelName).toBe("m");
  });

  it("returns an empty object for an empty manifest", () => {
    expect(parseManifest("")).toEqual({});
  });
});

describe("readManifest", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dashboard-sync-manifest-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults and an info warning when the file is missing", () => {
    const warnings: Warning[] = [];
    expect(readManifest(join(dir, "manifest.lkml"), warnings)).toEqual({});
    expect(warnings.map((w) => w.level)).toEqual(["info"]);
  });

  it("lists missing fields", () => {
    const path = join(dir, "manifest.lkml");
    writeFileSync(path, 'project_name: "t"\nremote_dependency: base { url: "https://github.com/o/r" }\n');
    const warnings: Warning[] = [];
    expect(readManifest(path, warnings)).toEqual({
      baseRepoUrl: "https://github.com/o/r",
      baseOwner: "o",
      baseRepo: "r",
    });
    expect(warnings).toEqual([
      { level: "info", module: "manifest", message: "Manifest is missing: baseRef, modelName", file: path },
    ]);
  });

  it("adds no warning for a complete manifest", () => {
    const warnings: Warning[] = [];
    readManifest(join(FIXTURES, "manifest.lkml"), warnings);
    expect(warnings).toEqual([]);
  });
});
