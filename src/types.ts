// src/types.ts — Shared types for the dashboard sync engine

export const ENGINE_VERSION = "0.1.0";

// ─── Values ──────────────────────────────────────────────────────────────────

export type YamlScalar = string | number | boolean | null;

export type YamlValue = YamlScalar | YamlValue[] | YamlMap;

export interface YamlMap {
  [key: string]: YamlValue;
}

// ─── Dashboards ──────────────────────────────────────────────────────────────

/** One element (tile) or filter of a dashboard. Identity is its `name`. */
export type DashboardRecord = YamlMap;

export interface DashboardDocument {
  name?: string;
  title?: string;
  model?: string;
  elements: DashboardRecord[];
  filters: DashboardRecord[];
  /** Every top-level field in its original order. */
  raw: YamlMap;
}

export type NoisyDefaults = Readonly<Record<string, YamlValue>>;

export type ChangeKind = "new" | "modified";

export interface DiffEntry {
  name?: string;
  change: ChangeKind;
  /** The tenant record as parsed, not normalized. */
  record: DashboardRecord;
}

export interface DiffResult {
  entries: DiffEntry[];
  /** Names of tenant records that match their base counterpart. */
  inherited: string[];
}

export interface ManifestInfo {
  baseRepoUrl?: string;
  baseOwner?: string;
  baseRepo?: string;
  baseRef?: string;
  modelName?: string;
}

// ─── Collaborators ───────────────────────────────────────────────────────────

export interface DashboardSource {
  fetchDashboardMarkup(dashboardId: string): Promise<string>;
}

export interface BaseRepository {
  /** Resolves to null when the file does not exist at `ref`. */
  fetchFileAtRef(owner: string, repo: string, ref: string, path: string): Promise<string | null>;
}

export interface DispatchResult {
  ok: boolean;
  message: string;
}

export interface WorkflowDispatcher {
  dispatchWorkflow(dashboardId: string): Promise<DispatchResult>;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export type Command = "tenant" | "base" | "serve";

export interface ResolvedConfig {
  dashboardId?: string;
  tenant: {
    name?: string;
    dir?: string;
  };
  base: {
    dashboard?: string;
    owner?: string;
    repo?: string;
    ref: string;
    dashboardsPath: string;
    outputDir: string;
  };
  looker: {
    baseUrl?: string;
    clientId?: string;
    clientSecret?: string;
    timeoutMs: number;
  };
  github: {
    apiUrl: string;
    token?: string;
    owner?: string;
    repo?: string;
    workflowFile: string;
    workflowRef: string;
    timeoutMs: number;
  };
  server: {
    port: number;
    actionSecret?: string;
  };
  noisyDefaults: Record<string, YamlValue>;
  flowFields: string[];
  githubOutput?: string;
  dryRun: boolean;
  verbose: boolean;
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Pipeline results ────────────────────────────────────────────────────────

export type WriteAction = "created" | "updated";

export interface SyncResult {
  dashboardName: string;
  filePath: string;
  action: WriteAction;
  /** Null for base runs, which never extend. */
  isExtend: boolean | null;
  baseDashboard?: string;
  output: string;
  written: boolean;
  elements?: DiffResult;
  filters?: DiffResult;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export class ParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ParseError";
    if (cause !== undefined) this.cause = cause;
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DASHBOARD_FILE_SUFFIX = ".dashboard.lookml";
