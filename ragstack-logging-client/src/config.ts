import type { TelemetryAuthMode, TelemetryConfig } from "./types.js";

const AUTH_MODES: readonly TelemetryAuthMode[] = ["apiKey", "bearer", "none"];

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Client settings from TELEMETRY_* variables. Telemetry is on when an
 * endpoint is configured, unless TELEMETRY_ENABLED says otherwise; the auth
 * mode follows whichever credential is present.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Omit<TelemetryConfig, "serviceId"> {
  const endpoint = env.TELEMETRY_ENDPOINT || "";
  const apiKey = env.TELEMETRY_API_KEY || "";
  const bearer = env.TELEMETRY_BEARER || "";
  const authMode =
    AUTH_MODES.find((mode) => mode === env.TELEMETRY_AUTH_MODE) ??
    (apiKey ? "apiKey" : bearer ? "bearer" : "none");

  return {
    enabled: env.TELEMETRY_ENABLED ? env.TELEMETRY_ENABLED === "true" : endpoint !== "",
    endpoint,
    authMode,
    apiKey,
    bearer,
    env: env.TELEMETRY_ENV || env.NODE_ENV || "dev",
    maxBatch: intFrom(env.TELEMETRY_MAX_BATCH, 50),
    flushMs: intFrom(env.TELEMETRY_FLUSH_MS, 1000),
    retry: intFrom(env.TELEMETRY_RETRY, 3),
    maxQueue: intFrom(env.TELEMETRY_MAX_QUEUE, 1000),
  };
}

export function normalizeEndpoint(endpoint: string): string {
  if (!endpoint) return "";
  const trimmed = endpoint.replace(/\/+$/, "");
  return trimmed.endsWith("/api") ? trimmed : `${trimmed}/api`;
}

export function getHeaders(config: TelemetryConfig): Record<string, string> {
  const auth: Record<string, string> = {};
  if (config.authMode === "apiKey" && config.apiKey) auth["X-API-Key"] = config.apiKey;
  if (config.authMode === "bearer" && config.bearer) auth.Authorization = `Bearer ${config.bearer}`;

  return {
    "Content-Type": "application/json",
    "X-Service-Id": config.serviceId,
    "X-Env": config.env,
    ...auth,
  };
}

export function buildBaseMetadata(config: TelemetryConfig): Record<string, unknown> {
  return { serviceId: config.serviceId, env: config.env };
}
