// src/manifest.ts — Tenant manifest.lkml reader
// Best-effort extraction: every field is optional and callers supply defaults.

import { existsSync, readFileSync } from "node:fs";
import type { ManifestInfo, Warning } from "./types.js";

const REMOTE_URL = /url:\s*"([^"]+)"/;
const GITHUB_REPO = /github\.com[/:]([^/\s]+)\/([^/.\s"]+)/;
const REMOTE_REF = /ref:\s*"([^"]+)"/;
const MODEL_NAME_CONSTANT = /override_constant:\s*model_name\s*\{[^}]*?value:\s*"([^"]+)"/;

/**
 * Extract the base project's remote dependency and the tenant's
 * `model_name` override from manifest text.
 */
export function parseManifest(content: string): ManifestInfo {
  const info: ManifestInfo = {};

  const url = REMOTE_URL.exec(content);
  if (url) {
    info.baseRepoUrl = url[1];
    const repo = GITHUB_REPO.exec(url[1]);
    if (repo) {
      info.baseOwner = repo[1];
      info.baseRepo = repo[2];
    }
  }

  const ref = REMOTE_REF.exec(content);
  if (ref) info.baseRef = ref[1];

  const model = MODEL_NAME_CONSTANT.exec(content);
  if (model) info.modelName = model[1];

  return info;
}

/**
 * Read and parse a manifest. A missing file or missing fields are reported
 * as info warnings, never thrown.
 */
export function readManifest(manifestPath: string, warnings: Warning[] = []): ManifestInfo {
  if (!existsSync(manifestPath)) {
    warnings.push({
      level: "info",
      module: "manifest",
      message: "No manifest found; using defaults and CLI overrides",
      file: manifestPath,
    });
    return {};
  }

  const info = parseManifest(readFileSync(manifestPath, "utf-8"));
  const missing = (["baseOwner", "baseRepo", "baseRef", "modelName"] as const).filter(
    (field) => info[field] === undefined,
  );
  if (missing.length > 0) {
    warnings.push({
      level: "info",
      module: "manifest",
      message: `Manifest is missing: ${missing.join(", ")}`,
      file: manifestPath,
    });
  }
  return info;
}
