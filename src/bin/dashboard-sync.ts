#!/usr/bin/env node
// CLI entry point for dashboard-sync

import { ENGINE_VERSION } from "../types.js";
import type { Command, SyncResult, Warning } from "../types.js";
import { isCommand, parseCliArgs, resolveConfig, validateConfig } from "../config.js";
import { syncBaseDashboard, syncTenantDashboard, writeGithubOutputs } from "../pipeline.js";
import { LookerClient } from "../clients/looker-client.js";
import { GitHubClient } from "../clients/github-client.js";
import { createActionHubServer, listenActionHub } from "../server.js";

const HELP_TEXT = `
dashboard-sync v${ENGINE_VERSION}

Usage:
  dashboard-sync tenant [options]     Sync a tenant dashboard (extends the base when it can)
  dashboard-sync base [options]       Import a dashboard into the base project
  dashboard-sync serve [options]      Serve the Looker Action Hub endpoint

Options:
  --dashboard-id <id>       Looker dashboard ID (tenant, base)
  --tenant-name <name>      Tenant name, also the default model name (tenant)
  --tenant-dir <path>       Tenant project directory (default: ./<tenant-name>)
  --base-dashboard <name>   Base dashboard this one extends (default: detected from the existing file)
  --base-repo-owner <owner> Base repository owner (overrides the manifest)
  --base-repo-name <repo>   Base repository name (overrides the manifest)
  --output-dir <path>       Base project dashboards directory (base, default: ./dashboards)
  --port <port>             Listen port (serve, default: 8080)
  --config, -c <path>       Path to config file (default: ./dashboard-sync.config.json)
  --dry-run                 Print the generated LookML instead of writing it
  --verbose, -v             Print progress
  --quiet, -q               Suppress warnings
  --help, -h                Show this help text

Environment Variables:
  LOOKERSDK_BASE_URL, LOOKERSDK_CLIENT_ID, LOOKERSDK_CLIENT_SECRET
                            Looker API access (tenant, base)
  GH_TOKEN                  GitHub token (base file fetch, workflow dispatch)
  GH_REPO_OWNER, GH_REPO_NAME
                            Repository whose workflow the Action Hub dispatches (serve)
  ACTION_SECRET             Shared secret required on Action Hub execute requests
  GITHUB_OUTPUT             Step outputs file, set by GitHub Actions

Examples:
  dashboard-sync tenant --dashboard-id 270 --tenant-name tenant_1 --tenant-dir ../tenant_1
  dashboard-sync base --dashboard-id 42 --dry-run
  dashboard-sync serve --port 8080
`.trim();

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(args.help ? 0 : 1);
  }

  if (!isCommand(args.command)) {
    process.stderr.write(`[error] Unknown command: ${args.command}\n\n${HELP_TEXT}\n`);
    process.exit(1);
  }
  const command: Command = args.command;

  const warnings: Warning[] = [];
  const config = resolveConfig(args, process.env, warnings);
  validateConfig(config, command);

  if (command === "serve") {
    const github = new GitHubClient(config.github);
    const server = createActionHubServer({ dispatcher: github, actionSecret: config.server.actionSecret });
    printWarnings(warnings, args.quiet);
    await listenActionHub(server, config.server.port);
    process.stderr.write(`[INFO] Action Hub listening on port ${config.server.port}\n`);
    return;
  }

  const dashboards = new LookerClient(config.looker);
  const run: Promise<SyncResult> =
    command === "tenant"
      ? syncTenantDashboard(config, { dashboards, baseRepository: new GitHubClient(config.github) }, warnings)
      : syncBaseDashboard(config, { dashboards }, warnings);
  const result = await run.finally(() => printWarnings(warnings, args.quiet));

  if (config.dryRun) {
    process.stdout.write(`--- DRY RUN: ${result.action} → ${result.filePath} ---\n`);
    process.stdout.write(result.output.endsWith("\n") ? result.output : result.output + "\n");
  } else if (!args.quiet) {
    process.stderr.write(`Dashboard ${result.action}: ${result.filePath}\n`);
  }

  if (config.githubOutput) writeGithubOutputs(config.githubOutput, result);
  process.exit(0);
}

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${w.file ? ` (${w.file})` : ""}\n`);
  }
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
