/**
 * RAG Stack Runtime Service
 *
 * Builds document question-answering workflows out of nodes (PDF loader,
 * splitter, embeddings, vector store, QA chain, web search) and runs them.
 */

import type { Server as HttpServer } from 'http';
import type { Express } from 'express';
import { createServiceServer } from '@ragstack/http';
import { createTelemetryClient } from '@ragstack/logging-client';
import { config } from './config.js';
import { createRuntimeDatabase } from './db.js';
import { DatabaseStorage } from './storage.js';
import { NODE_TYPES } from './nodes/index.js';
import { createRuntimeServices, mountApiRoutes } from './app.js';
import { createSocketHandlers } from './socket.js';

const telemetry = createTelemetryClient({
  serviceId: process.env.TELEMETRY_SERVICE_ID || config.serviceId,
});

const database = createRuntimeDatabase();
const storage = new DatabaseStorage(database.db);

const services = createRuntimeServices({ storage, telemetry });

async function registerRoutes(_server: HttpServer, app: Express): Promise<void> {
  app.use((_req, res, next) => {
    res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
    next();
  });

  // Service discovery endpoint
  app.get('/api/bootstrap/service', (_req, res) => {
    res.json({
      service: config.serviceId,
      name: config.serviceName,
      version: '1.0.0',
      description: 'Workflow engine for document question answering',
      database: database.mode,
      nodeTypes: NODE_TYPES,
      endpoints: {
        nodeTypes: '/api/node-types',
        workflows: '/api/workflows',
        executions: '/api/executions',
        websocket: '/',
      },
      websocketEvents: {
        client: ['workflow:subscribe', 'workflow:unsubscribe'],
        server: ['execution:started', 'node:started', 'node:completed', 'execution:completed', 'error'],
      },
      runtime: {
        maxConcurrentExecutions: config.runtime.maxConcurrentExecutions,
        executionHistoryLimit: config.runtime.executionHistoryLimit,
      },
    });
  });

  mountApiRoutes(app, services);
}

const server = createServiceServer({
  serviceId: config.serviceId,
  port: config.port,
  host: config.host,
  jsonLimit: config.jsonBodyLimit,
  cors: {
    origins: config.corsOrigins,
    allowLocalhost: process.env.NODE_ENV !== 'production',
  },
  socket: {
    enabled: true,
    setupHandlers: createSocketHandlers(services.executor),
  },
  telemetry: {
    client: telemetry,
    excludePaths: ['/health', '/health/live', '/health/ready'],
  },
  health: {
    readinessCheck: database.ping,
  },
  database,
  registerRoutes,
});

server.start()
  .then(() => {
    console.log(`[Runtime] Service started on port ${config.port}`);
  })
  .catch((error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
