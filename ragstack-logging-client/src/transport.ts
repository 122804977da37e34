import type { TelemetryConfig } from "./types.js";
import { getHeaders } from "./config.js";

const MAX_BACKOFF_MS = 5000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function post(url: string, config: TelemetryConfig, body: Record<string, unknown>): Promise<void> {
  const res = await fetch(url, {
    method: "POST",
    headers: getHeaders(config),
    body: JSON.stringify(body),
  });
  if (!res.ok) {
    throw new Error(`Telemetry request failed: ${res.status} ${await res.text()}`);
  }
}

/**
 * POST one batch with up to `config.retry` retries on linear backoff.
 * Never rejects: a batch that still fails is dropped with a warning.
 */
export async function send(config: TelemetryConfig, path: string, body: Record<string, unknown>): Promise<void> {
  for (let attempt = 0; ; attempt++) {
    try {
      await post(`${config.endpoint}${path}`, config, body);
      return;
    } catch (error) {
      if (attempt >= config.retry) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[telemetry] Dropped batch for ${path}: ${message}`);
        return;
      }
      await sleep(Math.min(1000 * (attempt + 1), MAX_BACKOFF_MS));
    }
  }
}
