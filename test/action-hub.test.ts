import { describe, it, expect, vi } from "vitest";
import { baseUrl, handleActionHubRequest, INTEGRATION_NAME } from "../src/action-hub.js";
import type { ActionHubOptions, ActionHubRequest } from "../src/action-hub.js";
import type { WorkflowDispatcher } from "../src/types.js";

function request(overrides: Partial<ActionHubRequest> = {}): ActionHubRequest {
  return {
    method: "POST",
    path: "/execute",
    headers: { host: "hub.example.com" },
    body: { form_params: { dashboard_id: "270", confirm: "yes" } },
    ...overrides,
  };
}

function options(overrides: Partial<ActionHubOptions> = {}) {
  const dispatchWorkflow = vi
    .fn<WorkflowDispatcher["dispatchWorkflow"]>()
    .mockResolvedValue({ ok: true, message: "Workflow dispatched for dashboard 270" });
  return { dispatcher: { dispatchWorkflow }, dispatchWorkflow, ...overrides };
}

describe("listing", () => {
  it("describes the integration with absolute urls", async () => {
    const response = await handleActionHubRequest(
      request({ method: "GET", path: "/action_list", headers: { host: "hub.example.com", "x-forwarded-proto": "http" } }),
      options(),
    );
    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      integrations: [
        {
          name: INTEGRATION_NAME,
          supported_action_types: ["dashboard"],
          form_url: "http://hub.example.com/form",
          url: "http://hub.example.com/execute",
        },
      ],
    });
  });

  it("answers any other path with the listing", async () => {
    const response = await handleActionHubRequest(request({ method: "POST", path: "/" }), options());
    expect(response.status).toBe(200);
    expect(response.body).toHaveProperty("integrations");
  });
});

describe("form", () => {
  it("asks for the dashboard id and a confirmation", async () => {
    const response = await handleActionHubRequest(request({ path: "/form" }), options());
    expect(response.status).toBe(200);
    expect(Array.isArray(response.body)).toBe(true);
    expect(response.body).toMatchObject([
      { name: "dashboard_id", type: "text", required: true },
      { name: "confirm", type: "select", default: "yes" },
    ]);
  });

  it("rejects other methods", async () => {
    const response = await handleActionHubRequest(request({ method: "GET", path: "/form" }), options());
    expect(response).toEqual({ status: 404, body: { error: "Not Found" } });
  });
});

describe("execute", () => {
  it("dispatches the workflow", async () => {
    const opts = options();
    const response = await handleActionHubRequest(request(), opts);
    expect(opts.dispatchWorkflow).toHaveBeenCalledWith("270");
    expect(response).toEqual({
      status: 200,
      body: { looker: { success: true, message: "Workflow dispatched for dashboard 270" } },
    });
  });

  it("accepts a numeric dashboard id", async () => {
    const opts = options();
    await handleActionHubRequest(request({ body: { form_params: { dashboard_id: 270, confirm: "yes" } } }), opts);
    expect(opts.dispatchWorkflow).toHaveBeenCalledWith("270");
  });

  it("reports a failed dispatch", async () => {
    const opts = options();
    opts.dispatchWorkflow.mockResolvedValueOnce({ ok: false, message: "Error 422: bad inputs" });
    const response = await handleActionHubRequest(request(), opts);
    expect(response).toEqual({ status: 200, body: { looker: { success: false, message: "Error 422: bad inputs" } } });
  });

  it("treats anything but yes as a cancellation", async () => {
    const opts = options();
    const response = await handleActionHubRequest(
      request({ body: { form_params: { dashboard_id: "270", confirm: "no" } } }),
      opts,
    );
    expect(response).toEqual({ status: 200, body: { looker: { success: true, message: "Action cancelled by the user." } } });
    expect(opts.dispatchWorkflow).not.toHaveBeenCalled();
  });

  it("cancels when the body has no form params", async () => {
    const response = await handleActionHubRequest(request({ body: undefined }), options());
    expect(response.body).toEqual({ looker: { success: true, message: "Action cancelled by the user." } });
  });

  it("requires a dashboard id", async () => {
    const response = await handleActionHubRequest(
      request({ body: { form_params: { dashboard_id: "  ", confirm: "yes" } } }),
      options(),
    );
    expect(response).toEqual({ status: 400, body: { looker: { success: false, message: "Missing Dashboard ID." } } });
  });

  it("checks the shared secret before anything else", async () => {
    const opts = options({ actionSecret: "test-secret" });
    const denied = await handleActionHubRequest(request({ body: undefined }), opts);
    expect(denied).toEqual({ status: 401, body: { looker: { success: false, message: "Unauthorized" } } });

    const allowed = await handleActionHubRequest(
      request({ headers: { host: "hub.example.com", authorization: 'Token token="test-secret"' } }),
      opts,
    );
    expect(allowed.status).toBe(200);
    expect(opts.dispatchWorkflow).toHaveBeenCalledTimes(1);
  });

  it("turns a thrown dispatch into a 500 envelope", async () => {
    const opts = options();
    opts.dispatchWorkflow.mockRejectedValueOnce(new Error("socket hang up"));
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const response = await handleActionHubRequest(request(), opts);
    stderr.mockRestore();
    expect(response).toEqual({ status: 500, body: { looker: { success: false, message: "Error: socket hang up" } } });
  });
});

describe("baseUrl", () => {
  it("strips route suffixes and defaults to https", () => {
    expect(baseUrl(request({ path: "/hub/execute/" }))).toBe("https://hub.example.com/hub");
    expect(baseUrl(request({ path: "/hub", headers: {} }))).toBe("https://localhost/hub");
  });
});
