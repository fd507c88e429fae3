// src/clients/github-client.ts — GitHub REST calls: base files and workflow dispatch

import type { BaseRepository, DispatchResult, ResolvedConfig, WorkflowDispatcher } from "../types.js";
import { FetchError } from "../types.js";
import { errorBody, fetchWithTimeout } from "./http.js";

type GitHubConfig = ResolvedConfig["github"];

export class GitHubClient implements BaseRepository, WorkflowDispatcher {
  constructor(private readonly config: GitHubConfig) {}

  /**
   * Raw file contents at `ref`. Null on 404; any other non-200 status is a
   * FetchError.
   */
  async fetchFileAtRef(owner: string, repo: string, ref: string, path: string): Promise<string | null> {
    const encodedPath = path.split("/").map(encodeURIComponent).join("/");
    const url =
      `${this.apiBase()}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}` +
      `/contents/${encodedPath}?ref=${encodeURIComponent(ref)}`;

    const response = await fetchWithTimeout(
      url,
      { headers: this.headers("application/vnd.github.v3.raw") },
      this.config.timeoutMs,
    );

    if (response.status === 404) return null;
    if (response.status !== 200) {
      throw new FetchError(
        `GitHub returned ${response.status} for ${owner}/${repo}/${path}@${ref}: ${await errorBody(response)}`,
        response.status,
      );
    }
    return response.text();
  }

  /**
   * Trigger the sync workflow for one dashboard. GitHub answers 204 on
   * success; other statuses are reported, not thrown.
   */
  async dispatchWorkflow(dashboardId: string): Promise<DispatchResult> {
    const { owner, repo, workflowFile, workflowRef } = this.config;
    if (!owner || !repo) {
      throw new FetchError("GitHub repository owner/name are not configured");
    }

    const url =
      `${this.apiBase()}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}` +
      `/actions/workflows/${encodeURIComponent(workflowFile)}/dispatches`;

    const response = await fetchWithTimeout(
      url,
      {
        method: "POST",
        headers: { ...this.headers("application/vnd.github.v3+json"), "Content-Type": "application/json" },
        body: JSON.stringify({ ref: workflowRef, inputs: { dashboard_id: dashboardId } }),
      },
      this.config.timeoutMs,
    );

    if (response.status === 204) {
      return { ok: true, message: `Workflow dispatched for dashboard ${dashboardId}` };
    }
    return { ok: false, message: `Error ${response.status}: ${await errorBody(response)}` };
  }

  private headers(accept: string): Record<string, string> {
    const headers: Record<string, string> = { Accept: accept };
    if (this.config.token) headers.Authorization = `Bearer ${this.config.token}`;
    return headers;
  }

  private apiBase(): string {
    return this.config.apiUrl.replace(/\/+$/, "");
  }
}
