// src/clients/looker-client.ts — Dashboard LookML from the Looker API 4.0

import type { DashboardSource, ResolvedConfig } from "../types.js";
import { FetchError } from "../types.js";
import { errorBody, fetchWithTimeout, stringProperty } from "./http.js";

/**
 * Logs in with API client credentials once per instance and reads
 * dashboard LookML.
 */
export class LookerClient implements DashboardSource {
  private accessToken: string | undefined;

  constructor(private readonly config: ResolvedConfig["looker"]) {}

  async fetchDashboardMarkup(dashboardId: string): Promise<string> {
    const token = await this.login();
    const url = `${this.apiBase()}/dashboards/${encodeURIComponent(dashboardId)}/lookml`;
    const response = await fetchWithTimeout(
      url,
      { headers: { Authorization: `token ${token}`, Accept: "application/json" } },
      this.config.timeoutMs,
    );

    if (!response.ok) {
      throw new FetchError(
        `Looker API returned ${response.status} for dashboard '${dashboardId}': ${await errorBody(response)}`,
        response.status,
      );
    }

    const lookml = stringProperty(await response.json(), "lookml");
    if (!lookml) {
      throw new FetchError(`Dashboard '${dashboardId}' returned no LookML`);
    }
    return lookml;
  }

  private async login(): Promise<string> {
    if (this.accessToken) return this.accessToken;

    const { clientId, clientSecret } = this.config;
    if (!clientId || !clientSecret) {
      throw new FetchError("Looker client credentials are not configured");
    }

    const response = await fetchWithTimeout(
      `${this.apiBase()}/login`,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({ client_id: clientId, client_secret: clientSecret }).toString(),
      },
      this.config.timeoutMs,
    );

    if (!response.ok) {
      throw new FetchError(`Looker login returned ${response.status}`, response.status);
    }

    const token = stringProperty(await response.json(), "access_token");
    if (!token) {
      throw new FetchError("Looker login response missing access_token");
    }
    this.accessToken = token;
    return token;
  }

  private apiBase(): string {
    if (!this.config.baseUrl) {
      throw new FetchError("Looker base URL is not configured");
    }
    return `${this.config.baseUrl.replace(/\/+$/, "")}/api/4.0`;
  }
}
