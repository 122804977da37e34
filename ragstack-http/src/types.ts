import type { Express } from "express";
import type { Server } from "http";
import type { Server as SocketIOServer, ServerOptions as SocketIOServerOptions } from "socket.io";
import type { TelemetryClient } from "@ragstack/logging-client";

export interface CorsConfig {
  /** Exact origins or `*.example.com` patterns; CORS_ALLOWED_ORIGINS when empty */
  origins?: string[];
  /** Outside production only. Defaults to true */
  allowLocalhost?: boolean;
}

export interface TelemetryConfig {
  client: TelemetryClient;
  /** Paths left out of request metrics and spans */
  excludePaths?: string[];
}

export interface ClosableDatabase {
  close: () => Promise<void>;
}

export interface SocketConfig {
  enabled: boolean;
  options?: Partial<SocketIOServerOptions>;
  setupHandlers?: (io: SocketIOServer) => void | Promise<void>;
}

export type HealthProbe = () => Promise<boolean>;

export interface HealthConfig {
  /** Run by /health/ready once the server is up, e.g. a database ping */
  readinessCheck?: HealthProbe;
}

export type HealthStatus = "ok" | "degraded" | "unhealthy";

export interface HealthCheckResult {
  status: HealthStatus;
  timestamp: string;
  checks?: Record<string, { status: "ok" | "unhealthy"; message?: string }>;
}

export interface ShutdownConfig {
  /** Open connections are destroyed after this long. Default 30000 */
  gracePeriodMs?: number;
  /** Pause between reporting not-ready and closing the listener. Default 5000 */
  preShutdownDelayMs?: number;
  /** Shut down and exit on SIGINT/SIGTERM. Default true */
  handleSignals?: boolean;
}

export interface ServerConfig {
  serviceId: string;
  /** PORT, else 8000 */
  port?: number;
  /** HOST, else 0.0.0.0 */
  host?: string;
  cors?: CorsConfig;
  socket?: SocketConfig;
  telemetry?: TelemetryConfig;
  enableLogging?: boolean;
  /** Body size limit for JSON requests. Default "1mb" */
  jsonLimit?: string;
  registerRoutes?: (server: Server, app: Express) => Promise<void> | void;
  health?: HealthConfig;
  shutdown?: ShutdownConfig;
  database?: ClosableDatabase;
}

export interface ServerInstance {
  app: Express;
  httpServer: Server;
  io?: SocketIOServer;
  telemetry?: TelemetryClient;
  start: () => Promise<void>;
  shutdown: () => Promise<void>;
  isReady: () => boolean;
  setReady: (ready: boolean) => void;
}
