import type { NextFunction, Request, Response } from "express";
import { randomUUID } from "crypto";
import type { TelemetryClient } from "@ragstack/logging-client";

/**
 * Per response: request count and latency metrics plus a server span. The
 * trace id is taken from `x-trace-id` when the caller sends one and echoed back.
 */
export function createTelemetryMiddleware(telemetry: TelemetryClient, excludePaths: string[] = []) {
  const excluded = new Set(excludePaths);

  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = new Date();
    const inbound = req.headers["x-trace-id"];
    const traceId = typeof inbound === "string" && inbound.length > 0 ? inbound : randomUUID();
    res.setHeader("x-trace-id", traceId);

    res.on("finish", () => {
      const path = req.path;
      if (excluded.has(path)) return;

      const status = res.statusCode;
      const failed = status >= 500;
      const labels = { endpoint: path, method: req.method, status: String(status) };

      telemetry.metric("service.request.count", 1, labels);
      telemetry.metric("service.request.latency_ms", Date.now() - startedAt.getTime(), labels);
      if (failed) {
        telemetry.metric("service.error.count", 1, labels);
      }

      telemetry.span({
        traceId,
        spanId: randomUUID(),
        parentSpanId: null,
        name: `${req.method} ${path}`,
        kind: "server",
        status: failed ? "error" : "ok",
        startTime: startedAt.toISOString(),
        endTime: new Date().toISOString(),
        attributes: { status },
      });
    });

    next();
  };
}
