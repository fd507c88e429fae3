// src/clients/http.ts — fetch with a hard timeout

import { FetchError } from "../types.js";

/**
 * Single fetch attempt aborted after `timeoutMs`. Network failures and
 * timeouts become FetchError; HTTP statuses are left to the caller.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (err: unknown) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new FetchError(`Request to ${url} timed out after ${timeoutMs / 1000}s`);
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Request to ${url} failed: ${msg}`);
  } finally {
    clearTimeout(timer);
  }
}

/** Response body trimmed for error messages. */
export async function errorBody(response: Response): Promise<string> {
  const body = await response.text().catch(() => "");
  return body.slice(0, 200);
}

/** A string property of a decoded JSON body, if present. */
export function stringProperty(data: unknown, key: string): string | undefined {
  if (typeof data !== "object" || data === null) return undefined;
  const value: unknown = Reflect.get(data, key);
  return typeof value === "string" ? value : undefined;
}
