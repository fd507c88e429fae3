// src/server.ts — node:http adapter for the Action Hub handler

import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { handleActionHubRequest } from "./action-hub.js";
import type { ActionHubOptions, ActionHubResponse } from "./action-hub.js";

const MAX_BODY_BYTES = 1_000_000;

export function createActionHubServer(options: ActionHubOptions): Server {
  return createServer((req, res) => {
    handle(req, options)
      .then((response) => send(res, response))
      .catch((err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        send(res, { status: 500, body: { looker: { success: false, message: `Error: ${msg}` } } });
      });
  });
}

async function handle(req: IncomingMessage, options: ActionHubOptions): Promise<ActionHubResponse> {
  const method = req.method ?? "GET";
  const path = new URL(req.url ?? "/", "http://localhost").pathname;
  process.stderr.write(`[ACTION HUB] ${method} ${path}\n`);

  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name] = Array.isArray(value) ? value.join(", ") : value;
  }

  return handleActionHubRequest({ method, path, headers, body: await readJsonBody(req) }, options);
}

/**
 * Start listening. Resolves once bound; a listen failure such as
 * EADDRINUSE rejects instead of being thrown as an unhandled 'error' event.
 */
export function listenActionHub(server: Server, port: number, host?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      resolve();
    });
  });
}

/** Parsed JSON body, or undefined when it is empty or not JSON. */
async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new Error("Request body too large");
    chunks.push(buf);
  }
  const text = Buffer.concat(chunks).toString("utf-8").trim();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    // Looker sends JSON; anything else is treated as an empty body.
    return undefined;
  }
}

function send(res: ServerResponse, response: ActionHubResponse): void {
  res.writeHead(response.status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(response.body));
}
