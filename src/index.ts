// src/index.ts — Library API

export type {
  YamlScalar,
  YamlValue,
  YamlMap,
  DashboardRecord,
  DashboardDocument,
  NoisyDefaults,
  ChangeKind,
  DiffEntry,
  DiffResult,
  ManifestInfo,
  DashboardSource,
  BaseRepository,
  DispatchResult,
  WorkflowDispatcher,
  Command,
  ResolvedConfig,
  Warning,
  WriteAction,
  SyncResult,
} from "./types.js";
export { ENGINE_VERSION, FetchError, ParseError, ConfigError } from "./types.js";

export { stripVolatileFields, substituteModelReference, extractDashboardName, MODEL_PLACEHOLDER } from "./text-preprocessor.js";
export { parseDashboard, normalizeRecord, NOISY_DEFAULTS, VOLATILE_KEYS } from "./normalizer.js";
export { diffElements, diffFilters, changedRecords, summarizeDiff } from "./diff-engine.js";
export { generateStandalone, generateExtends, DEFAULT_FLOW_FIELDS } from "./document-generator.js";
export type { ExtendsInput, GenerateOptions } from "./document-generator.js";
export { renderYaml } from "./yaml-renderer.js";
export { yamlEqual, toYamlValue } from "./yaml-value.js";
export { resolveBase, findExistingFile, detectExtendsTarget } from "./base-resolver.js";
export { parseManifest, readManifest } from "./manifest.js";
export { syncTenantDashboard, syncBaseDashboard, writeGithubOutputs } from "./pipeline.js";
export type { TenantSyncDeps, BaseSyncDeps } from "./pipeline.js";
export { resolveConfig, validateConfig, parseCliArgs } from "./config.js";
export { LookerClient } from "./clients/looker-client.js";
export { GitHubClient } from "./clients/github-client.js";
export { handleActionHubRequest } from "./action-hub.js";
export type { ActionHubRequest, ActionHubResponse, ActionHubOptions } from "./action-hub.js";
export { createActionHubServer, listenActionHub } from "./server.js";
