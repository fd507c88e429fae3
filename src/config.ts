// src/config.ts — Config Resolver
// Precedence: defaults ← config file ← environment ← CLI flags.
// Secrets come from the environment only.

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { Command, ResolvedConfig, Warning, YamlValue } from "./types.js";
import { ConfigError } from "./types.js";
import { toYamlValue } from "./yaml-value.js";
import { NOISY_DEFAULTS } from "./normalizer.js";
import { DEFAULT_FLOW_FIELDS } from "./document-generator.js";

export const CONFIG_FILENAME = "dashboard-sync.config.json";
const PACKAGE_JSON_KEY = "dashboardSync";

export interface ParsedArgs {
  command?: string;
  dashboardId?: string;
  tenantName?: string;
  tenantDir?: string;
  baseDashboard?: string;
  baseRepoOwner?: string;
  baseRepoName?: string;
  outputDir?: string;
  port?: number;
  config?: string;
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
}

interface RawArgs {
  "dashboard-id"?: string;
  "tenant-name"?: string;
  "tenant-dir"?: string;
  "base-dashboard"?: string;
  "base-repo-owner"?: string;
  "base-repo-name"?: string;
  "output-dir"?: string;
  port?: string;
  config?: string;
  "dry-run"?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  help?: boolean;
}

/** Config file shape. Every field is optional. */
export interface FileConfig {
  tenant?: { name?: string; dir?: string };
  base?: {
    dashboard?: string;
    owner?: string;
    repo?: string;
    ref?: string;
    dashboardsPath?: string;
    outputDir?: string;
  };
  looker?: { baseUrl?: string; timeoutMs?: number };
  github?: {
    apiUrl?: string;
    owner?: string;
    repo?: string;
    workflowFile?: string;
    workflowRef?: string;
    timeoutMs?: number;
  };
  server?: { port?: number };
  noisyDefaults?: Record<string, YamlValue>;
  flowFields?: string[];
}

export type Env = Record<string, string | undefined>;

const DEFAULTS: ResolvedConfig = {
  tenant: {},
  base: {
    ref: "main",
    dashboardsPath: "dashboards",
    outputDir: "dashboards",
  },
  looker: {
    timeoutMs: 15_000,
  },
  github: {
    apiUrl: "https://api.github.com",
    workflowFile: "update_dashboard.yml",
    workflowRef: "main",
    timeoutMs: 15_000,
  },
  server: {
    port: 8080,
  },
  noisyDefaults: { ...NOISY_DEFAULTS },
  flowFields: [...DEFAULT_FLOW_FIELDS],
  dryRun: false,
  verbose: false,
};

/**
 * Parse CLI args using mri. Flags are kebab-case; `--dry_run`-style
 * underscores are accepted too.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri<RawArgs>(argv.map(normalizeFlag), {
    alias: { c: "config", v: "verbose", q: "quiet", h: "help" },
    boolean: ["dry-run", "verbose", "quiet", "help"],
    string: [
      "dashboard-id",
      "tenant-name",
      "tenant-dir",
      "base-dashboard",
      "base-repo-owner",
      "base-repo-name",
      "output-dir",
      "port",
      "config",
    ],
  });

  const port = args.port ? parseInt(args.port, 10) : undefined;

  return {
    command: args._[0],
    dashboardId: args["dashboard-id"] || undefined,
    tenantName: args["tenant-name"] || undefined,
    tenantDir: args["tenant-dir"] || undefined,
    baseDashboard: args["base-dashboard"] || undefined,
    baseRepoOwner: args["base-repo-owner"] || undefined,
    baseRepoName: args["base-repo-name"] || undefined,
    outputDir: args["output-dir"] || undefined,
    port: port !== undefined && !isNaN(port) ? port : undefined,
    config: args.config || undefined,
    dryRun: args["dry-run"] ?? false,
    verbose: args.verbose ?? false,
    quiet: args.quiet ?? false,
    help: args.help ?? false,
  };
}

function normalizeFlag(arg: string): string {
  if (!arg.startsWith("--")) return arg;
  const [flag, ...value] = arg.split("=");
  const normalized = flag.replace(/_/g, "-");
  return value.length > 0 ? `${normalized}=${value.join("=")}` : normalized;
}

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  env: Env = process.env,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const file = loadConfigFile(args.config, cwd, warnings) ?? {};

  const tenantName = args.tenantName ?? file.tenant?.name;
  const tenantDir = args.tenantDir ?? file.tenant?.dir;
  const lookerTimeout = env.LOOKERSDK_TIMEOUT ? parseInt(env.LOOKERSDK_TIMEOUT, 10) * 1000 : undefined;
  const envPort = env.PORT ? parseInt(env.PORT, 10) : undefined;

  return {
    dashboardId: args.dashboardId,
    tenant: {
      name: tenantName,
      dir: tenantDir ? resolve(cwd, tenantDir) : tenantName ? resolve(cwd, tenantName) : undefined,
    },
    base: {
      dashboard: args.baseDashboard ?? file.base?.dashboard,
      owner: args.baseRepoOwner ?? file.base?.owner,
      repo: args.baseRepoName ?? file.base?.repo,
      ref: file.base?.ref ?? DEFAULTS.base.ref,
      dashboardsPath: file.base?.dashboardsPath ?? DEFAULTS.base.dashboardsPath,
      outputDir: resolve(cwd, args.outputDir ?? file.base?.outputDir ?? DEFAULTS.base.outputDir),
    },
    looker: {
      baseUrl: env.LOOKERSDK_BASE_URL ?? file.looker?.baseUrl,
      clientId: env.LOOKERSDK_CLIENT_ID,
      clientSecret: env.LOOKERSDK_CLIENT_SECRET,
      timeoutMs: validNumber(lookerTimeout) ?? file.looker?.timeoutMs ?? DEFAULTS.looker.timeoutMs,
    },
    github: {
      apiUrl: file.github?.apiUrl ?? DEFAULTS.github.apiUrl,
      token: env.GH_TOKEN,
      owner: env.GH_REPO_OWNER ?? file.github?.owner,
      repo: env.GH_REPO_NAME ?? file.github?.repo,
      workflowFile: file.github?.workflowFile ?? DEFAULTS.github.workflowFile,
      workflowRef: file.github?.workflowRef ?? DEFAULTS.github.workflowRef,
      timeoutMs: file.github?.timeoutMs ?? DEFAULTS.github.timeoutMs,
    },
    server: {
      port: args.port ?? validNumber(envPort) ?? file.server?.port ?? DEFAULTS.server.port,
      actionSecret: env.ACTION_SECRET || undefined,
    },
    noisyDefaults: { ...DEFAULTS.noisyDefaults, ...file.noisyDefaults },
    flowFields: file.flowFields ?? DEFAULTS.flowFields,
    githubOutput: env.GITHUB_OUTPUT || undefined,
    dryRun: args.dryRun,
    verbose: args.verbose,
  };
}

const REQUIRED: Record<Command, Array<[label: string, read: (c: ResolvedConfig) => unknown]>> = {
  tenant: [
    ["--dashboard-id", (c) => c.dashboardId],
    ["--tenant-name", (c) => c.tenant.name],
    ["LOOKERSDK_BASE_URL", (c) => c.looker.baseUrl],
    ["LOOKERSDK_CLIENT_ID", (c) => c.looker.clientId],
    ["LOOKERSDK_CLIENT_SECRET", (c) => c.looker.clientSecret],
  ],
  base: [
    ["--dashboard-id", (c) => c.dashboardId],
    ["LOOKERSDK_BASE_URL", (c) => c.looker.baseUrl],
    ["LOOKERSDK_CLIENT_ID", (c) => c.looker.clientId],
    ["LOOKERSDK_CLIENT_SECRET", (c) => c.looker.clientSecret],
  ],
  serve: [
    ["GH_TOKEN", (c) => c.github.token],
    ["GH_REPO_OWNER", (c) => c.github.owner],
    ["GH_REPO_NAME", (c) => c.github.repo],
  ],
};

/**
 * Check everything `command` needs in one pass. Throws ConfigError naming
 * every missing field.
 */
export function validateConfig(config: ResolvedConfig, command: Command): void {
  const missing = REQUIRED[command]
    .filter(([, read]) => {
      const value = read(config);
      return value === undefined || value === "";
    })
    .map(([label]) => label);

  if (missing.length > 0) {
    throw new ConfigError(`Missing required configuration for "${command}": ${missing.join(", ")}`, missing);
  }
}

export function isCommand(value: string | undefined): value is Command {
  return value === "tenant" || value === "base" || value === "serve";
}

// ─── Config file ─────────────────────────────────────────────────────────────

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): FileConfig | null {
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = readJson(pkgJson, warnings);
    const section = pkg === undefined ? undefined : objectField(pkg, PACKAGE_JSON_KEY);
    if (section) return toFileConfig(section, pkgJson, warnings);
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  const parsed = readJson(filePath, warnings);
  if (parsed === undefined) return null;
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Config file ${filePath} must contain a JSON object`,
    });
    return null;
  }
  return toFileConfig(parsed, filePath, warnings);
}

function readJson(filePath: string, warnings: Warning[]): unknown {
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return undefined;
  }
}

/** Pick the known fields out of untyped JSON, skipping ill-typed ones. */
export function toFileConfig(raw: object, source: string, warnings: Warning[] = []): FileConfig {
  const config: FileConfig = {};

  const looker = objectField(raw, "looker");
  const github = objectField(raw, "github");
  if ((looker && "clientSecret" in looker) || (github && "token" in github)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Secrets in ${source} are ignored. Use LOOKERSDK_CLIENT_SECRET and GH_TOKEN instead.`,
    });
  }

  const tenant = objectField(raw, "tenant");
  if (tenant) config.tenant = { name: stringField(tenant, "name"), dir: stringField(tenant, "dir") };

  const base = objectField(raw, "base");
  if (base) {
    config.base = {
      dashboard: stringField(base, "dashboard"),
      owner: stringField(base, "owner"),
      repo: stringField(base, "repo"),
      ref: stringField(base, "ref"),
      dashboardsPath: stringField(base, "dashboardsPath"),
      outputDir: stringField(base, "outputDir"),
    };
  }

  if (looker) config.looker = { baseUrl: stringField(looker, "baseUrl"), timeoutMs: numberField(looker, "timeoutMs") };

  if (github) {
    config.github = {
      apiUrl: stringField(github, "apiUrl"),
      owner: stringField(github, "owner"),
      repo: stringField(github, "repo"),
      workflowFile: stringField(github, "workflowFile"),
      workflowRef: stringField(github, "workflowRef"),
      timeoutMs: numberField(github, "timeoutMs"),
    };
  }

  const server = objectField(raw, "server");
  if (server) config.server = { port: numberField(server, "port") };

  const noisy = objectField(raw, "noisyDefaults");
  if (noisy) {
    try {
      const value = toYamlValue(noisy);
      if (typeof value === "object" && value !== null && !Array.isArray(value)) config.noisyDefaults = value;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "warn", module: "config", message: `Ignoring noisyDefaults in ${source}: ${msg}` });
    }
  }

  const flowFields: unknown = Reflect.get(raw, "flowFields");
  if (Array.isArray(flowFields) && flowFields.every((f): f is string => typeof f === "string")) {
    config.flowFields = flowFields;
  }

  return config;
}

function objectField(raw: unknown, key: string): object | undefined {
  if (typeof raw !== "object" || raw === null) return undefined;
  const value: unknown = Reflect.get(raw, key);
  return typeof value === "object" && value !== null && !Array.isArray(value) ? value : undefined;
}

function stringField(raw: object, key: string): string | undefined {
  const value: unknown = Reflect.get(raw, key);
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function numberField(raw: object, key: string): number | undefined {
  const value: unknown = Reflect.get(raw, key);
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function validNumber(value: number | undefined): number | undefined {
  return value !== undefined && !isNaN(value) ? value : undefined;
}
