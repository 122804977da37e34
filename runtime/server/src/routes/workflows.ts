/**
 * Workflow Routes
 *
 * API endpoints for building workflows (nodes, connections, positions,
 * configs) and running them against a question and an optional PDF.
 */

import { Router } from 'express';
import { z } from 'zod';
import type { NodeRunRecord } from '../types/index.js';
import type { WorkflowRegistry } from '../services/workflow-registry.js';
import { toJsonSafe } from '../lib/json-safe.js';
import { getParamId, sendError, sendValidationError } from './helpers.js';

const positionSchema = z.object({
  x: z.coerce.number().finite(),
  y: z.coerce.number().finite(),
});

const createWorkflowSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().optional(),
  customPrompt: z.string().optional(),
});

const updateWorkflowSchema = z.object({
  name: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  customPrompt: z.string().optional(),
});

const addNodeSchema = z.object({
  nodeType: z.string().min(1, 'nodeType is required'),
  config: z.record(z.unknown()).optional(),
  position: positionSchema.optional(),
});

const updateConfigSchema = z.object({
  config: z.record(z.unknown()),
});

const connectSchema = z.object({
  sourceNode: z.string().min(1),
  sourceOutput: z.string().min(1),
  targetNode: z.string().min(1),
  targetInput: z.string().min(1),
});

const executeSchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  file: z.object({
    name: z.string().optional(),
    content: z.string().min(1, 'file content is required'),
  }).optional(),
});

function describeRecord(record: NodeRunRecord) {
  return {
    nodeId: record.nodeId,
    nodeType: record.nodeType,
    name: record.name,
    status: record.status,
    error: record.error,
    diagnostics: record.diagnostics,
    durationMs: record.durationMs,
    result: toJsonSafe(record.result),
  };
}

export function createWorkflowRoutes(registry: WorkflowRegistry): Router {
  const router = Router();

  /**
   * List workflows, newest first
   * GET /api/workflows
   */
  router.get('/', async (_req, res) => {
    try {
      const workflows = await registry.listWorkflows();
      res.json({ workflows, total: workflows.length });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Create a workflow
   * POST /api/workflows
   */
  router.post('/', async (req, res) => {
    const parsed = createWorkflowSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const workflow = await registry.createWorkflow(parsed.data);
      res.status(201).json(workflow);
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Workflow record plus graph snapshot
   * GET /api/workflows/:id
   */
  router.get('/:id', async (req, res) => {
    try {
      const id = getParamId(req.params, 'id');
      const record = await registry.getWorkflowRecord(id);
      const snapshot = await registry.describe(id);
      res.json({ ...snapshot, description: record.description, createdAt: record.createdAt, updatedAt: record.updatedAt });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Rename or change the custom prompt
   * PATCH /api/workflows/:id
   */
  router.patch('/:id', async (req, res) => {
    const parsed = updateWorkflowSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const workflow = await registry.updateWorkflow(getParamId(req.params, 'id'), parsed.data);
      res.json(workflow);
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * DELETE /api/workflows/:id
   */
  router.delete('/:id', async (req, res) => {
    try {
      const id = getParamId(req.params, 'id');
      await registry.deleteWorkflow(id);
      res.json({ success: true, id });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Add a node
   * POST /api/workflows/:id/nodes
   */
  router.post('/:id/nodes', async (req, res) => {
    const parsed = addNodeSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const node = await registry.addNode(getParamId(req.params, 'id'), parsed.data);
      res.status(201).json(node);
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Remove a node and every connection touching it
   * DELETE /api/workflows/:id/nodes/:nodeId
   */
  router.delete('/:id/nodes/:nodeId', async (req, res) => {
    try {
      const nodeId = getParamId(req.params, 'nodeId');
      const removed = await registry.removeNode(getParamId(req.params, 'id'), nodeId);
      res.json({ success: true, nodeId, removedConnections: removed.map((c) => c.id) });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * GET /api/workflows/:id/nodes/:nodeId/config
   */
  router.get('/:id/nodes/:nodeId/config', async (req, res) => {
    try {
      const node = await registry.getNode(getParamId(req.params, 'id'), getParamId(req.params, 'nodeId'));
      res.json({ nodeId: node.id, nodeType: node.nodeType, config: node.config });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Replace a node's config (rebuilds the node)
   * PUT /api/workflows/:id/nodes/:nodeId/config
   */
  router.put('/:id/nodes/:nodeId/config', async (req, res) => {
    const parsed = updateConfigSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const node = await registry.updateNodeConfig(
        getParamId(req.params, 'id'),
        getParamId(req.params, 'nodeId'),
        parsed.data.config,
      );
      res.json({ nodeId: node.id, nodeType: node.nodeType, config: node.config });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * PUT /api/workflows/:id/nodes/:nodeId/position
   */
  router.put('/:id/nodes/:nodeId/position', async (req, res) => {
    const parsed = positionSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const node = await registry.setNodePosition(
        getParamId(req.params, 'id'),
        getParamId(req.params, 'nodeId'),
        parsed.data,
      );
      res.json({ nodeId: node.id, position: node.position });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Connect an output port to an input port
   * POST /api/workflows/:id/connections
   */
  router.post('/:id/connections', async (req, res) => {
    const parsed = connectSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const connection = await registry.connect(getParamId(req.params, 'id'), parsed.data);
      res.status(201).json(connection);
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * DELETE /api/workflows/:id/connections/:connectionId
   */
  router.delete('/:id/connections/:connectionId', async (req, res) => {
    try {
      const connection = await registry.disconnect(
        getParamId(req.params, 'id'),
        getParamId(req.params, 'connectionId'),
      );
      res.json({ success: true, connection });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  /**
   * Run the workflow
   * POST /api/workflows/:id/execute
   *
   * Body: { question, file?: { name?, content } } with content base64-encoded
   */
  router.post('/:id/execute', async (req, res) => {
    const parsed = executeSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    let fileContent: Uint8Array | undefined;
    if (parsed.data.file) {
      fileContent = new Uint8Array(Buffer.from(parsed.data.file.content, 'base64'));
      if (fileContent.length === 0) {
        res.status(400).json({ error: 'file content is not valid base64', code: 'VALIDATION_ERROR' });
        return;
      }
    }

    try {
      const { result, summary } = await registry.execute(getParamId(req.params, 'id'), {
        question: parsed.data.question,
        fileContent,
      });

      res.json({
        success: true,
        results: toJsonSafe(summary),
        executionId: result.executionId,
        executionOrder: result.order,
        nodes: result.nodes.map(describeRecord),
        durationMs: result.durationMs,
      });
    } catch (error) {
      sendError(res, error, 'WorkflowRoutes');
    }
  });

  return router;
}
