import express, { type NextFunction, type Request, type Response } from "express";
import { createServer } from "http";
import { Server as SocketIOServer } from "socket.io";
import type { ServerConfig, ServerInstance } from "./types.js";
import { buildCorsOptions, createCorsMiddleware } from "./cors.js";
import { createTelemetryMiddleware } from "./telemetry.js";
import { createLoggingMiddleware, log } from "./logging.js";
import { mountHealthRoutes } from "./health.js";
import { createShutdown } from "./shutdown.js";

const DEFAULT_PORT = 8000;

function resolvePort(): number {
  const parsed = Number.parseInt(process.env.PORT ?? "", 10);
  return Number.isNaN(parsed) ? DEFAULT_PORT : parsed;
}

function errorStatus(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  const candidate = "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
  return typeof candidate === "number" && candidate >= 400 && candidate < 600 ? candidate : 500;
}

/**
 * Last-resort Express error handler: `{ message }` with the error's own
 * status (statusCode or status) when it is a 4xx/5xx, else 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = errorStatus(err);
  const message = err instanceof Error && err.message ? err.message : "Internal Server Error";
  log(`Error ${status}: ${message}`);
  res.status(status).json({ message });
}

/**
 * Build the Express app, HTTP server and optional Socket.IO server of a
 * service. Routes are registered in start(), before the error handler.
 */
export function createServiceServer(config: ServerConfig): ServerInstance {
  const { serviceId, cors, telemetry } = config;
  const port = config.port ?? resolvePort();
  const host = config.host ?? process.env.HOST ?? "0.0.0.0";
  const mode = process.env.NODE_ENV || "development";

  let ready = false;

  const app = express();
  const httpServer = createServer(app);
  httpServer.keepAliveTimeout = 65000;
  httpServer.headersTimeout = 66000;

  const io = config.socket?.enabled
    ? new SocketIOServer(httpServer, { cors: buildCorsOptions(cors), ...config.socket.options })
    : undefined;

  app.use(createCorsMiddleware(cors));
  app.use(express.json({ limit: config.jsonLimit ?? "1mb" }));
  mountHealthRoutes(app, config.health ?? {}, () => ready);

  if (telemetry) {
    app.use(createTelemetryMiddleware(telemetry.client, telemetry.excludePaths));
  }
  if (config.enableLogging ?? true) {
    app.use(createLoggingMiddleware({
      verbose: process.env.LOG_VERBOSE === "true" || mode === "development",
      telemetry: telemetry?.client,
      excludePaths: telemetry?.excludePaths,
    }));
  }

  const shutdown = createShutdown({
    httpServer,
    io,
    telemetry: telemetry?.client,
    database: config.database,
    markNotReady: () => {
      ready = false;
    },
  }, config.shutdown);

  async function start(): Promise<void> {
    log(`Starting ${serviceId} (${mode})`);

    if (io && config.socket?.setupHandlers) {
      await config.socket.setupHandlers(io);
    }
    await config.registerRoutes?.(httpServer, app);
    app.use(errorHandler);

    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen({ port, host }, () => {
        httpServer.off("error", reject);
        resolve();
      });
    });

    ready = true;
    log(`${serviceId} listening on http://${host}:${port}`);
    telemetry?.client.event("service.started", `${serviceId} started`, { mode, port });
  }

  if (config.shutdown?.handleSignals ?? true) {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown()
          .catch((err: unknown) => log(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`))
          .finally(() => process.exit(0));
      });
    }
  }

  return {
    app,
    httpServer,
    io,
    telemetry: telemetry?.client,
    start,
    shutdown,
    isReady: () => ready,
    setReady: (value: boolean) => {
      ready = value;
    },
  };
}
