/**
 * Service wiring shared by the entry point and the HTTP tests
 */

import type { Express } from 'express';
import type { TelemetryClient } from '@ragstack/logging-client';
import { config } from './config.js';
import type { IStorage } from './storage.js';
import { NodeFactory, type NodeFactoryOptions } from './nodes/index.js';
import { WorkflowExecutor } from './engine/workflow-executor.js';
import { WorkflowRegistry } from './services/workflow-registry.js';
import { createExecutionRoutes, createNodeTypeRoutes, createWorkflowRoutes } from './routes/index.js';

export interface RuntimeServices {
  executor: WorkflowExecutor;
  registry: WorkflowRegistry;
}

export interface RuntimeServicesOptions {
  storage: IStorage;
  factory?: NodeFactoryOptions;
  telemetry?: TelemetryClient;
  maxConcurrentExecutions?: number;
  executionHistoryLimit?: number;
}

export function createRuntimeServices(options: RuntimeServicesOptions): RuntimeServices {
  const executor = new WorkflowExecutor({
    historyLimit: options.executionHistoryLimit ?? config.runtime.executionHistoryLimit,
    telemetry: options.telemetry,
  });

  const nodeFactory = new NodeFactory(options.factory ?? { credentials: config.providers });

  const registry = new WorkflowRegistry({
    storage: options.storage,
    nodeFactory,
    executor,
    maxConcurrentExecutions: options.maxConcurrentExecutions ?? config.runtime.maxConcurrentExecutions,
    telemetry: options.telemetry,
  });

  return { executor, registry };
}

export function mountApiRoutes(app: Express, services: RuntimeServices): void {
  app.use('/api/node-types', createNodeTypeRoutes());
  app.use('/api/workflows', createWorkflowRoutes(services.registry));
  app.use('/api/executions', createExecutionRoutes(services.executor));
}
