import type { NextFunction, Request, Response } from "express";
import type { TelemetryClient } from "@ragstack/logging-client";

/**
 * Console line with a wall-clock time and a source tag
 */
export function log(message: string, source = "express"): void {
  const time = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
  console.log(`${time} [${source}] ${message}`);
}

export interface LoggingMiddlewareOptions {
  verbose?: boolean;
  telemetry?: TelemetryClient;
  excludePaths?: string[];
}

const REDACTED_FIELDS = new Set(["password", "token", "apiKey", "secret"]);
// Uploaded PDFs arrive base64 encoded inside JSON bodies
const ELIDED_FIELDS = new Set(["content", "file"]);
const MAX_LOGGED_BODY = 500;

/**
 * Top-level body fields safe to log: secrets redacted, file payloads elided
 */
export function summarizeBody(body: unknown): Record<string, unknown> | undefined {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return undefined;
  const entries = Object.entries(body).map(([key, value]): [string, unknown] => {
    if (REDACTED_FIELDS.has(key)) return [key, "[REDACTED]"];
    if (ELIDED_FIELDS.has(key)) return [key, "[ELIDED]"];
    return [key, value];
  });
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

function truncate(text: string): string {
  if (text.length <= MAX_LOGGED_BODY) return text;
  return `${text.slice(0, MAX_LOGGED_BODY)}... [truncated ${text.length} bytes]`;
}

function levelFor(status: number): string {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

/**
 * Logs API requests and responses to the console (response bodies when
 * verbose or on errors) and mirrors them as telemetry events.
 */
export function createLoggingMiddleware(options: LoggingMiddlewareOptions = {}) {
  const verbose = options.verbose ?? true;
  const { telemetry } = options;
  const excluded = new Set(options.excludePaths ?? []);

  return (req: Request, res: Response, next: NextFunction) => {
    const path = req.path;
    if (excluded.has(path)) {
      next();
      return;
    }

    const start = Date.now();
    const request: Record<string, unknown> = {
      method: req.method,
      path,
      query: Object.keys(req.query).length > 0 ? req.query : undefined,
      traceId: req.headers["x-trace-id"],
      body: req.method === "GET" ? undefined : summarizeBody(req.body),
    };

    if (verbose) {
      log(`→ ${req.method} ${path} ${JSON.stringify(request)}`);
    }
    telemetry?.event("http.request", `${req.method} ${path}`, { ...request, direction: "inbound" }, "debug");

    let responseBody: unknown;
    const json = res.json.bind(res);
    res.json = (body: unknown) => {
      responseBody = body;
      return json(body);
    };

    res.on("finish", () => {
      const status = res.statusCode;
      const duration = Date.now() - start;

      if (verbose || path.startsWith("/api")) {
        const withBody = responseBody !== undefined && (verbose || status >= 400);
        log(`← ${req.method} ${path} ${status} in ${duration}ms${withBody ? ` :: ${truncate(JSON.stringify(responseBody))}` : ""}`);
      }

      telemetry?.event(
        "http.response",
        `${req.method} ${path} ${status}`,
        { method: req.method, path, status, duration, direction: "outbound" },
        levelFor(status),
      );
    });

    next();
  };
}
