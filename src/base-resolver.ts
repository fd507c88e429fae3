// src/base-resolver.ts — Which base dashboard (if any) a tenant dashboard extends
// The tenant repository is the source of truth: a previously generated file
// for the dashboard records its `extends` target.

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import picomatch from "picomatch";
import type { Warning } from "./types.js";
import { DASHBOARD_FILE_SUFFIX } from "./types.js";

const isDashboardFile = picomatch(`*${DASHBOARD_FILE_SUFFIX}`, { dot: true });

const FLOW_EXTENDS = /extends:[ \t]*\[[ \t]*["']?([\w.-]+)/;
const BLOCK_EXTENDS = /extends:[ \t]*\r?\n[ \t]*-[ \t]+["']?([\w.-]+)/;

export function dashboardFileName(dashboardName: string): string {
  return `${dashboardName}${DASHBOARD_FILE_SUFFIX}`;
}

/**
 * Locate the file holding `dashboardName` in `dashboardsDir`: the exact
 * `<name>.dashboard.lookml` first, then any dashboard file declaring it.
 */
export function findExistingFile(
  dashboardsDir: string,
  dashboardName: string,
  warnings: Warning[] = [],
): string | null {
  const exactPath = join(dashboardsDir, dashboardFileName(dashboardName));
  if (existsSync(exactPath)) return exactPath;

  if (!existsSync(dashboardsDir) || !statSync(dashboardsDir).isDirectory()) return null;

  const declaration = new RegExp(`^-?\\s*dashboard:\\s+${escapeRegExp(dashboardName)}\\s*$`, "m");
  const candidates = readdirSync(dashboardsDir).filter((f) => isDashboardFile(f)).sort();

  for (const filename of candidates) {
    const filePath = join(dashboardsDir, filename);
    try {
      if (declaration.test(readFileSync(filePath, "utf-8"))) return filePath;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "warn",
        module: "base-resolver",
        message: `Skipping unreadable dashboard file: ${msg}`,
        file: filePath,
      });
    }
  }
  return null;
}

/**
 * Read the extends target from generated markup, in either the
 * `extends: [name]` or the block-list form. Only the first target counts.
 */
export function detectExtendsTarget(content: string): string | null {
  const match = FLOW_EXTENDS.exec(content) ?? BLOCK_EXTENDS.exec(content);
  return match ? match[1] : null;
}

/**
 * An explicit override wins; otherwise the existing tenant file decides.
 * Null means the dashboard is generated standalone.
 */
export function resolveBase(
  explicitOverride: string | undefined,
  existingContent: string | null,
): string | null {
  if (explicitOverride) return explicitOverride;
  if (existingContent === null) return null;
  return detectExtendsTarget(existingContent);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
