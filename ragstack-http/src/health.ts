import type { Express, Response } from "express";
import type { HealthCheckResult, HealthConfig, HealthProbe } from "./types.js";

function now(): string {
  return new Date().toISOString();
}

async function runReadiness(probe: HealthProbe | undefined, res: Response): Promise<void> {
  let body: HealthCheckResult;
  try {
    const healthy = probe ? await probe() : true;
    body = { status: healthy ? "ok" : "unhealthy", timestamp: now() };
  } catch (err) {
    body = {
      status: "unhealthy",
      timestamp: now(),
      checks: {
        readiness: { status: "unhealthy", message: err instanceof Error ? err.message : "readiness check failed" },
      },
    };
  }
  res.status(body.status === "ok" ? 200 : 503).json(body);
}

/**
 * `/health` reports the ready flag, `/health/live` answers while the process
 * serves requests, and `/health/ready` also runs the readiness probe.
 */
export function mountHealthRoutes(app: Express, config: HealthConfig, isReady: () => boolean): void {
  app.get("/health", (_req, res) => {
    const ready = isReady();
    const body: HealthCheckResult = { status: ready ? "ok" : "degraded", timestamp: now() };
    res.status(ready ? 200 : 503).json(body);
  });

  app.get("/health/live", (_req, res) => {
    const body: HealthCheckResult = { status: "ok", timestamp: now() };
    res.json(body);
  });

  app.get("/health/ready", async (_req, res) => {
    if (!isReady()) {
      const body: HealthCheckResult = {
        status: "unhealthy",
        timestamp: now(),
        checks: { server: { status: "unhealthy", message: "Server not ready" } },
      };
      res.status(503).json(body);
      return;
    }
    await runReadiness(config.readinessCheck, res);
  });
}
