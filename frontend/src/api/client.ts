import { env } from "../config/env";
import { createLogger } from "../logging/logger";

const logger = createLogger("api");

export async function apiFetch(path: string, init: RequestInit = {}): Promise<Response> {
  const method = init.method || "GET";
  const headers = new Headers(init.headers || {});
  if (!headers.has("Content-Type") && init.body) {
    headers.set("Content-Type", "application/json");
  }
  if (!headers.has("Accept")) {
    headers.set("Accept", "application/json");
  }

  const startedAt = performance.now();
  const elapsedMs = () => Math.round(performance.now() - startedAt);
  logger.debug("request", { method, path });
  try {
    const response = await fetch(`${env.apiBaseUrl}${path}`, {
      credentials: "same-origin",
      ...init,
      headers,
    });
    const log = response.ok ? logger.info : logger.warn;
    log("response", { method, path, status: response.status, durationMs: elapsedMs() });
    return response;
  } catch (error) {
    logger.error("network error", { method, path, durationMs: elapsedMs(), error });
    throw error;
  }
}

export function postJson(path: string, body: unknown, init: RequestInit = {}): Promise<Response> {
  return apiFetch(path, { ...init, method: "POST", body: JSON.stringify(body) });
}
