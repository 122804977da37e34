/**
 * @ragstack/http
 *
 * `createServiceServer` builds an Express 5 app with CORS, JSON parsing,
 * request logging, telemetry, health probes, optional Socket.IO and a
 * drain-then-close shutdown. Routes are added through `registerRoutes`.
 */

export * from "./types.js";
export * from "./server.js";
export * from "./cors.js";
export * from "./telemetry.js";
export * from "./logging.js";
export * from "./health.js";
export * from "./shutdown.js";
