import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express from 'express';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { errorHandler } from '@ragstack/http';
import { createRuntimeServices, mountApiRoutes } from '../../../runtime/server/src/app.js';
import { MemoryStorage } from '../../support/memory-storage.js';
import { TEST_CREDENTIALS, fakeProviders } from '../../support/fakes.js';

interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

describe('workflow API', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const app = express();
    app.use(express.json({ limit: '1mb' }));
    mountApiRoutes(app, createRuntimeServices({
      storage: new MemoryStorage(),
      factory: { credentials: TEST_CREDENTIALS, providers: fakeProviders() },
    }));
    app.use(errorHandler);

    server = createServer(app);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  async function call(method: string, path: string, body?: unknown): Promise<ApiResponse> {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const parsed: unknown = await response.json();
    return { status: response.status, body: isRecord(parsed) ? parsed : { value: parsed } };
  }

  async function createWorkflow(name = 'Papers'): Promise<string> {
    const { status, body } = await call('POST', '/api/workflows', { name });
    expect(status).toBe(201);
    return String(body.id);
  }

  async function addNode(workflowId: string, nodeType: string, config?: Record<string, unknown>): Promise<string> {
    const { status, body } = await call('POST', `/api/workflows/${workflowId}/nodes`, { nodeType, config });
    expect(status).toBe(201);
    return String(body.id);
  }

  describe('workflows', () => {
    it('validates the create body', async () => {
      const { status, body } = await call('POST', '/api/workflows', { name: '   ' });
      expect(status).toBe(400);
      expect(body.code).toBe('VALIDATION_ERROR');
    });

    it('creates, lists, updates and deletes workflows', async () => {
      const id = await createWorkflow('Papers');

      const listed = await call('GET', '/api/workflows');
      expect(listed.body.total).toBe(1);

      const patched = await call('PATCH', `/api/workflows/${id}`, { customPrompt: '  Be brief. ' });
      expect(patched.status).toBe(200);
      expect(patched.body.customPrompt).toBe('Be brief.');

      const fetched = await call('GET', `/api/workflows/${id}`);
      expect(fetched.status).toBe(200);
      expect(fetched.body).toMatchObject({
        id,
        name: 'Papers',
        description: '',
        customPrompt: 'Be brief.',
        nodes: [],
        connections: [],
        executionOrder: [],
      });

      expect(await call('DELETE', `/api/workflows/${id}`)).toEqual({ status: 200, body: { success: true, id } });
      expect((await call('GET', `/api/workflows/${id}`)).status).toBe(404);
    });

    it('answers 404 with the error body for unknown ids', async () => {
      expect(await call('GET', '/api/workflows/nope')).toEqual({
        status: 404,
        body: { error: 'Workflow not found: nope', code: 'WORKFLOW_NOT_FOUND', category: 'not_found' },
      });
    });

    it('reports malformed JSON through the error handler', async () => {
      const response = await fetch(`${baseUrl}/api/workflows`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"name":',
      });
      expect(response.status).toBe(400);
    });
  });

  describe('nodes and connections', () => {
    it('rejects unknown node types and invalid configs', async () => {
      const id = await createWorkflow();

      const unknown = await call('POST', `/api/workflows/${id}/nodes`, { nodeType: 'ocr' });
      expect(unknown).toEqual({
        status: 400,
        body: { error: 'Unknown node type: ocr', code: 'UNKNOWN_NODE_TYPE', category: 'configuration' },
      });

      const invalid = await call('POST', `/api/workflows/${id}/nodes`, { nodeType: 'text_splitter', config: { chunk_size: 1 } });
      expect(invalid.status).toBe(400);
      expect(invalid.body.code).toBe('INVALID_NODE_CONFIG');
    });

    it('edits node config and position', async () => {
      const id = await createWorkflow();
      const nodeId = await addNode(id, 'text_splitter');

      expect(await call('GET', `/api/workflows/${id}/nodes/${nodeId}/config`)).toEqual({
        status: 200,
        body: { nodeId, nodeType: 'text_splitter', config: { name: 'Text Splitter', chunk_size: 1000, chunk_overlap: 200 } },
      });

      const updated = await call('PUT', `/api/workflows/${id}/nodes/${nodeId}/config`, { config: { chunk_size: '400' } });
      expect(updated.body.config).toEqual({ name: 'Text Splitter', chunk_size: 400, chunk_overlap: 200 });

      expect(await call('PUT', `/api/workflows/${id}/nodes/${nodeId}/position`, { x: '15', y: 30 })).toEqual({
        status: 200,
        body: { nodeId, position: { x: 15, y: 30 } },
      });

      const badPosition = await call('PUT', `/api/workflows/${id}/nodes/${nodeId}/position`, { x: 'left', y: 0 });
      expect(badPosition.status).toBe(400);
    });

    it('connects nodes and removes a node with its connections', async () => {
      const id = await createWorkflow();
      const loader = await addNode(id, 'pdf_loader');
      const splitter = await addNode(id, 'text_splitter');

      const ghost = await call('POST', `/api/workflows/${id}/connections`, {
        sourceNode: loader, sourceOutput: 'documents', targetNode: 'ghost', targetInput: 'documents',
      });
      expect(ghost).toEqual({
        status: 400,
        body: { error: 'Connection references unknown target node: ghost', code: 'UNKNOWN_NODE', category: 'graph_structure' },
      });

      const connected = await call('POST', `/api/workflows/${id}/connections`, {
        sourceNode: loader, sourceOutput: 'documents', targetNode: splitter, targetInput: 'documents',
      });
      expect(connected.status).toBe(201);

      expect(await call('DELETE', `/api/workflows/${id}/nodes/${splitter}`)).toEqual({
        status: 200,
        body: { success: true, nodeId: splitter, removedConnections: [connected.body.id] },
      });
      expect((await call('DELETE', `/api/workflows/${id}/connections/${String(connected.body.id)}`)).body.code)
        .toBe('CONNECTION_NOT_FOUND');
    });
  });

  describe('execute', () => {
    it('validates the question and file content', async () => {
      const id = await createWorkflow();

      const noQuestion = await call('POST', `/api/workflows/${id}/execute`, { question: ' ' });
      expect(noQuestion.status).toBe(400);
      expect(noQuestion.body.code).toBe('VALIDATION_ERROR');

      expect(await call('POST', `/api/workflows/${id}/execute`, { question: 'q', file: { content: '!!!' } })).toEqual({
        status: 400,
        body: { error: 'file content is not valid base64', code: 'VALIDATION_ERROR' },
      });
    });

    it('answers 422 with node errors when the run produces no answer', async () => {
      const id = await createWorkflow();
      const loader = await addNode(id, 'pdf_loader', { name: 'Loader' });

      const { status, body } = await call('POST', `/api/workflows/${id}/execute`, { question: 'What is inside?' });

      expect(status).toBe(422);
      expect(body).toMatchObject({
        error: 'Workflow execution failed: Loader: Missing required inputs: file_content',
        code: 'RUN_FAILED',
        category: 'run_failed',
        nodeErrors: [{ nodeId: loader, name: 'Loader', error: 'Missing required inputs: file_content' }],
      });

      const executions = await call('GET', `/api/executions?workflowId=${id}`);
      expect(executions.body.total).toBe(1);
      expect(executions.body.executions).toEqual([expect.objectContaining({
        id: body.executionId,
        workflowId: id,
        nodeCount: 1,
        errorCount: 1,
      })]);

      const detail = await call('GET', `/api/executions/${String(body.executionId)}`);
      expect(detail.body.order).toEqual([loader]);
      expect(detail.body.outputs).toEqual({ question: 'What is inside?' });
    });

    it('answers 400 with the cycle for a cyclic workflow', async () => {
      const id = await createWorkflow();
      const first = await addNode(id, 'text_splitter');
      const second = await addNode(id, 'text_splitter');
      await call('POST', `/api/workflows/${id}/connections`, {
        sourceNode: first, sourceOutput: 'chunks', targetNode: second, targetInput: 'documents',
      });
      await call('POST', `/api/workflows/${id}/connections`, {
        sourceNode: second, sourceOutput: 'chunks', targetNode: first, targetInput: 'documents',
      });

      const { status, body } = await call('POST', `/api/workflows/${id}/execute`, { question: 'q' });

      expect(status).toBe(400);
      expect(body.code).toBe('CYCLE_DETECTED');
      expect(body.nodeIds).toEqual(expect.arrayContaining([first, second]));
    });

    it('answers 404 for an unknown execution', async () => {
      expect(await call('GET', '/api/executions/nope')).toEqual({
        status: 404,
        body: { error: 'Execution not found', code: 'EXECUTION_NOT_FOUND' },
      });
    });
  });

  describe('node types', () => {
    it('lists the catalog with default configs', async () => {
      const { body } = await call('GET', '/api/node-types');
      expect(Array.isArray(body.nodeTypes)).toBe(true);
      expect(body.nodeTypes).toHaveLength(6);
      expect(body.nodeTypes).toEqual(expect.arrayContaining([
        expect.objectContaining({ nodeType: 'pdf_loader', role: 'ingestion', defaultConfig: { name: 'PDF Loader' } }),
      ]));
    });

    it('returns an empty field list for unknown types', async () => {
      expect(await call('GET', '/api/node-types/ocr/schema')).toEqual({
        status: 200,
        body: { nodeType: 'ocr', fields: [] },
      });
    });
  });
});
