import type { Server } from "http";
import type { Socket } from "net";
import type { Server as SocketIOServer } from "socket.io";
import type { TelemetryClient } from "@ragstack/logging-client";
import type { ClosableDatabase, ShutdownConfig } from "./types.js";
import { log } from "./logging.js";

export interface ShutdownTargets {
  httpServer: Server;
  io?: SocketIOServer;
  telemetry?: TelemetryClient;
  database?: ClosableDatabase;
  /** Called first, so health probes start failing */
  markNotReady: () => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Track open sockets and build the drain sequence: not ready, delay,
 * telemetry flush, database close, Socket.IO close, HTTP close (forced after
 * the grace period).
 */
export function createShutdown(targets: ShutdownTargets, config: ShutdownConfig = {}): () => Promise<void> {
  const gracePeriodMs = config.gracePeriodMs ?? 30000;
  const preShutdownDelayMs = config.preShutdownDelayMs ?? 5000;
  const { httpServer, io, telemetry, database } = targets;

  const sockets = new Set<Socket>();
  httpServer.on("connection", (socket: Socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
  });

  function closeHttp(): Promise<void> {
    return new Promise((resolve) => {
      const force = setTimeout(() => {
        log(`Grace period expired, destroying ${sockets.size} connections`);
        for (const socket of sockets) socket.destroy();
        sockets.clear();
      }, gracePeriodMs);

      httpServer.close(() => {
        clearTimeout(force);
        resolve();
      });
      for (const socket of sockets) socket.end();
    });
  }

  let running: Promise<void> | undefined;

  async function drain(): Promise<void> {
    log("Shutting down");
    targets.markNotReady();

    if (preShutdownDelayMs > 0) {
      await sleep(preShutdownDelayMs);
    }

    await telemetry?.shutdown();
    await database?.close();

    if (io) {
      const socketServer = io;
      await new Promise<void>((resolve) => {
        socketServer.close(() => resolve());
      });
    }

    if (httpServer.listening) {
      log(`Closing HTTP server (${sockets.size} open connections)`);
      await closeHttp();
    }
    log("Shutdown complete");
  }

  // Repeated calls share the first run
  return () => {
    running ??= drain();
    return running;
  };
}
