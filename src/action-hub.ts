// src/action-hub.ts — Looker Action Hub endpoint
// Listing, form and execute requests. Execute dispatches the CI workflow
// that runs the dashboard sync; failures come back as a structured
// `{ looker: { success, message } }` envelope, never as a raw fault.

import type { WorkflowDispatcher } from "./types.js";

export interface ActionHubRequest {
  method: string;
  path: string;
  headers: Record<string, string | undefined>;
  body: unknown;
}

export interface ActionHubResponse {
  status: number;
  body: unknown;
}

export interface ActionHubOptions {
  dispatcher: WorkflowDispatcher;
  /** When set, execute requests must carry `Token token="<secret>"`. */
  actionSecret?: string;
}

export const INTEGRATION_NAME = "update_lookml_dashboard";

const ROUTE_SUFFIXES = ["/form", "/execute", "/action_list"] as const;

/**
 * Route one Action Hub request. Header names are expected lower-case.
 */
export async function handleActionHubRequest(
  request: ActionHubRequest,
  options: ActionHubOptions,
): Promise<ActionHubResponse> {
  const path = request.path.replace(/\/+$/, "");
  const isForm = path.endsWith("/form");
  const isExecute = path.endsWith("/execute");

  if (!isForm && !isExecute) {
    return { status: 200, body: integrationListing(baseUrl(request)) };
  }
  if (isForm && request.method === "POST") {
    return { status: 200, body: actionForm() };
  }
  if (isExecute && request.method === "POST") {
    return execute(request, options);
  }
  return { status: 404, body: { error: "Not Found" } };
}

async function execute(request: ActionHubRequest, options: ActionHubOptions): Promise<ActionHubResponse> {
  try {
    if (options.actionSecret) {
      const auth = request.headers.authorization ?? "";
      if (!auth.includes(`Token token="${options.actionSecret}"`)) {
        return lookerResult(false, "Unauthorized", 401);
      }
    }

    const params = formParams(request.body);
    const dashboardId = params.dashboard_id?.trim() ?? "";
    const confirm = params.confirm ?? "no";

    if (confirm !== "yes") {
      return lookerResult(true, "Action cancelled by the user.");
    }
    if (!dashboardId) {
      return lookerResult(false, "Missing Dashboard ID.", 400);
    }

    const result = await options.dispatcher.dispatchWorkflow(dashboardId);
    return lookerResult(result.ok, result.message);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[ACTION HUB] Error in execute: ${msg}\n`);
    return lookerResult(false, `Error: ${msg}`, 500);
  }
}

function lookerResult(success: boolean, message: string, status = 200): ActionHubResponse {
  return { status, body: { looker: { success, message } } };
}

/** String-valued `form_params` of an execute body. */
function formParams(body: unknown): Record<string, string | undefined> {
  if (typeof body !== "object" || body === null) return {};
  const params: unknown = Reflect.get(body, "form_params");
  if (typeof params !== "object" || params === null) return {};

  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === "string") result[key] = value;
    else if (typeof value === "number") result[key] = String(value);
  }
  return result;
}

/**
 * Public URL of this endpoint, honouring the proxy's forwarded protocol.
 */
export function baseUrl(request: ActionHubRequest): string {
  const proto = request.headers["x-forwarded-proto"] ?? "https";
  const host = request.headers.host ?? "localhost";
  let path = request.path.replace(/\/+$/, "");
  const suffix = ROUTE_SUFFIXES.find((s) => path.endsWith(s));
  if (suffix) path = path.slice(0, -suffix.length);
  return `${proto}://${host}${path}`;
}

function integrationListing(url: string) {
  return {
    label: "LookML Dashboard Sync",
    integrations: [
      {
        name: INTEGRATION_NAME,
        label: "Update dashboard LookML",
        description:
          "Imports this dashboard's LookML, strips ids and slugs and points the model at @{model_name}",
        supported_action_types: ["dashboard"],
        form_url: `${url}/form`,
        url: `${url}/execute`,
        supported_formats: ["txt"],
        params: [],
      },
    ],
  };
}

function actionForm() {
  return [
    {
      name: "dashboard_id",
      label: "Dashboard ID",
      description: "ID of the Looker dashboard to update",
      type: "text",
      required: true,
    },
    {
      name: "confirm",
      label: "Confirm update",
      description: "Update this dashboard's LookML?",
      type: "select",
      required: true,
      options: [
        { name: "yes", label: "Yes, update" },
        { name: "no", label: "No, cancel" },
      ],
      default: "yes",
    },
  ];
}
