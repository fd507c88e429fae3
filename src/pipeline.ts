// src/pipeline.ts — Pipeline Orchestrator
// One run syncs one dashboard: fetch, decide extend vs. standalone, diff,
// generate, then write (or print on dry run). Nothing is written until the
// output has been generated.

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type {
  BaseRepository,
  DashboardSource,
  ResolvedConfig,
  SyncResult,
  Warning,
  WriteAction,
} from "./types.js";
import { ConfigError } from "./types.js";
import { extractDashboardName, stripVolatileFields, substituteModelReference, MODEL_PLACEHOLDER } from "./text-preprocessor.js";
import { parseDashboard } from "./normalizer.js";
import { changedRecords, diffElements, diffFilters, summarizeDiff } from "./diff-engine.js";
import { generateExtends, generateStandalone } from "./document-generator.js";
import { dashboardFileName, findExistingFile, resolveBase } from "./base-resolver.js";
import { readManifest } from "./manifest.js";

export interface TenantSyncDeps {
  dashboards: DashboardSource;
  baseRepository: BaseRepository;
}

export interface BaseSyncDeps {
  dashboards: DashboardSource;
}

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

/**
 * Sync one tenant dashboard. Extending dashboards are reduced to the
 * elements and filters that differ from the base at the tenant's pinned
 * ref; everything else is written standalone.
 */
export async function syncTenantDashboard(
  config: ResolvedConfig,
  deps: TenantSyncDeps,
  warnings: Warning[] = [],
): Promise<SyncResult> {
  const { dashboardId, verbose } = config;
  const tenantName = config.tenant.name;
  const tenantDir = config.tenant.dir;
  if (!dashboardId || !tenantName || !tenantDir) {
    throw new ConfigError("Tenant sync needs a dashboard id, tenant name and tenant directory");
  }

  const dashboardsDir = join(tenantDir, "dashboards");
  vlog(verbose, `Tenant dir: ${tenantDir}`);

  vlog(verbose, `Fetching LookML for dashboard ${dashboardId}...`);
  const rawLookml = await deps.dashboards.fetchDashboardMarkup(dashboardId);
  const dashboardName = extractDashboardName(rawLookml);
  vlog(verbose, `Dashboard detected: '${dashboardName}'`);

  const existingPath = findExistingFile(dashboardsDir, dashboardName, warnings);
  const baseName = resolveBase(
    config.base.dashboard,
    existingPath ? readFileSync(existingPath, "utf-8") : null,
  );

  const manifest = readManifest(join(tenantDir, "manifest.lkml"), warnings);
  const tenantModel = manifest.modelName ?? tenantName;
  const baseRef = manifest.baseRef ?? config.base.ref;
  const baseOwner = config.base.owner ?? manifest.baseOwner;
  const baseRepo = config.base.repo ?? manifest.baseRepo;

  const generateOptions = { flowFields: config.flowFields };
  let output: string;
  let elementsDiff: SyncResult["elements"];
  let filtersDiff: SyncResult["filters"];

  if (baseName) {
    vlog(verbose, `Dashboard extends '${baseName}' (${baseOwner ?? "?"}/${baseRepo ?? "?"}@${baseRef}, model ${tenantModel})`);
    if (!baseOwner || !baseRepo) {
      const missing: string[] = [];
      if (!baseOwner) missing.push("--base-repo-owner");
      if (!baseRepo) missing.push("--base-repo-name");
      throw new ConfigError(
        `Base repository unknown (${missing.join(", ")}): pass the flags or set the manifest remote_dependency url`,
        missing,
      );
    }

    const basePath = `${config.base.dashboardsPath}/${dashboardFileName(baseName)}`;
    const baseLookml = await deps.baseRepository.fetchFileAtRef(baseOwner, baseRepo, baseRef, basePath);

    const tenant = parseDashboard(stripVolatileFields(rawLookml));

    if (baseLookml === null) {
      warnings.push({
        level: "warn",
        module: "pipeline",
        message: `Base dashboard '${baseName}' not found in ${baseOwner}/${baseRepo}@${baseRef}; generating standalone`,
      });
      // Model stays on the model_name constant here.
      output = generateStandalone(tenant, undefined, generateOptions);
    } else {
      const base = parseDashboard(baseLookml);
      elementsDiff = diffElements(tenant.elements, base.elements, config.noisyDefaults);
      filtersDiff = diffFilters(tenant.filters, base.filters, config.noisyDefaults);
      vlog(verbose, summarizeDiff(elementsDiff, filtersDiff, base.elements.length));

      output = generateExtends(
        {
          dashboardName,
          tenantName,
          baseName,
          elements: changedRecords(elementsDiff),
          filters: changedRecords(filtersDiff),
          title: tenant.title,
          tenantModel,
        },
        generateOptions,
      );
    }
  } else {
    vlog(verbose, `Standalone dashboard (no base). Model: ${tenantModel}`);
    output = generateStandalone(parseDashboard(stripVolatileFields(rawLookml)), tenantModel, generateOptions);
  }

  const target = writeTarget(existingPath, dashboardsDir, dashboardName);
  if (!config.dryRun) writeFileSafe(target.filePath, output);

  return {
    dashboardName,
    filePath: target.filePath,
    action: target.action,
    isExtend: baseName !== null,
    baseDashboard: baseName ?? undefined,
    output,
    written: !config.dryRun,
    elements: elementsDiff,
    filters: filtersDiff,
  };
}

/**
 * Import a dashboard into the base project: drop dashboard-level ids and
 * slugs and point the model at the quoted `@{model_name}` constant.
 */
export async function syncBaseDashboard(
  config: ResolvedConfig,
  deps: BaseSyncDeps,
  warnings: Warning[] = [],
): Promise<SyncResult> {
  const { dashboardId, verbose } = config;
  if (!dashboardId) {
    throw new ConfigError("Base sync needs a dashboard id", ["--dashboard-id"]);
  }
  const dashboardsDir = config.base.outputDir;

  vlog(verbose, `Fetching LookML for dashboard ${dashboardId}...`);
  const rawLookml = await deps.dashboards.fetchDashboardMarkup(dashboardId);
  const dashboardName = extractDashboardName(rawLookml);
  vlog(verbose, `Dashboard detected: '${dashboardName}'`);

  const output = substituteModelReference(stripVolatileFields(rawLookml), MODEL_PLACEHOLDER, true);

  const existingPath = findExistingFile(dashboardsDir, dashboardName, warnings);
  const target = writeTarget(existingPath, dashboardsDir, dashboardName);
  if (!config.dryRun) writeFileSafe(target.filePath, output);

  return {
    dashboardName,
    filePath: target.filePath,
    action: target.action,
    isExtend: null,
    output,
    written: !config.dryRun,
  };
}

function writeTarget(
  existingPath: string | null,
  dashboardsDir: string,
  dashboardName: string,
): { filePath: string; action: WriteAction } {
  return existingPath
    ? { filePath: existingPath, action: "updated" }
    : { filePath: join(dashboardsDir, dashboardFileName(dashboardName)), action: "created" };
}

/** Whole-file write; creates the parent directory first. */
export function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

/**
 * Append step outputs for the CI workflow (`key=value` lines).
 */
export function writeGithubOutputs(outputPath: string, result: SyncResult): void {
  const lines = [
    `dashboard_name=${result.dashboardName}`,
    `file_path=${result.filePath}`,
    `action=${result.action}`,
  ];
  if (result.isExtend !== null) lines.push(`is_extend=${result.isExtend ? "true" : "false"}`);
  appendFileSync(outputPath, lines.join("\n") + "\n");
}
