/**
 * Execution Routes
 *
 * Recent run records kept by the executor.
 */

import { Router } from 'express';
import type { ExecutionResult } from '../types/index.js';
import type { WorkflowExecutor } from '../engine/workflow-executor.js';
import { toJsonSafe } from '../lib/json-safe.js';
import { getParamId } from './helpers.js';

function summarize(execution: ExecutionResult) {
  return {
    id: execution.executionId,
    workflowId: execution.workflowId,
    nodeCount: execution.nodes.length,
    errorCount: execution.nodes.filter((n) => n.status === 'error').length,
    startedAt: execution.startedAt.toISOString(),
    completedAt: execution.completedAt.toISOString(),
    durationMs: execution.durationMs,
  };
}

export function createExecutionRoutes(executor: WorkflowExecutor): Router {
  const router = Router();

  /**
   * GET /api/executions?workflowId=
   */
  router.get('/', (req, res) => {
    const workflowId = typeof req.query.workflowId === 'string' ? req.query.workflowId : undefined;
    const executions = executor.getAllExecutions()
      .filter((e) => !workflowId || e.workflowId === workflowId);

    res.json({
      executions: executions.map(summarize),
      total: executions.length,
    });
  });

  /**
   * GET /api/executions/:id
   */
  router.get('/:id', (req, res) => {
    const execution = executor.getExecution(getParamId(req.params, 'id'));
    if (!execution) {
      res.status(404).json({ error: 'Execution not found', code: 'EXECUTION_NOT_FOUND' });
      return;
    }

    res.json({
      ...summarize(execution),
      order: execution.order,
      outputs: toJsonSafe(execution.outputs),
      nodes: execution.nodes.map((record) => ({
        nodeId: record.nodeId,
        nodeType: record.nodeType,
        name: record.name,
        status: record.status,
        error: record.error,
        diagnostics: record.diagnostics,
        durationMs: record.durationMs,
      })),
    });
  });

  return router;
}
