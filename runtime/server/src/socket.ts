/**
 * WebSocket Handlers
 *
 * Clients join a workflow room and receive that workflow's execution events.
 */

import type { Server as SocketServer, Socket } from 'socket.io';
import type { WorkflowExecutor } from './engine/workflow-executor.js';
import { toJsonSafe } from './lib/json-safe.js';

export function workflowRoom(workflowId: string): string {
  return `workflow:${workflowId}`;
}

function readWorkflowId(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('workflowId' in data)) return undefined;
  return typeof data.workflowId === 'string' && data.workflowId ? data.workflowId : undefined;
}

export function createSocketHandlers(executor: WorkflowExecutor) {
  return function setupSocketHandlers(io: SocketServer): void {
    executor.on('execution:started', (event) => {
      io.to(workflowRoom(event.workflowId)).emit('execution:started', {
        executionId: event.executionId,
        workflowId: event.workflowId,
        order: event.order,
        startedAt: event.startedAt.toISOString(),
      });
    });

    executor.on('node:started', (event) => {
      io.to(workflowRoom(event.workflowId)).emit('node:started', event);
    });

    executor.on('node:completed', ({ executionId, workflowId, record }) => {
      io.to(workflowRoom(workflowId)).emit('node:completed', {
        executionId,
        workflowId,
        nodeId: record.nodeId,
        name: record.name,
        status: record.status,
        error: record.error,
        durationMs: record.durationMs,
        result: toJsonSafe(record.result),
      });
    });

    executor.on('execution:completed', (result) => {
      io.to(workflowRoom(result.workflowId)).emit('execution:completed', {
        executionId: result.executionId,
        workflowId: result.workflowId,
        durationMs: result.durationMs,
        errorCount: result.nodes.filter((n) => n.status === 'error').length,
        completedAt: result.completedAt.toISOString(),
      });
    });

    io.on('connection', (socket: Socket) => {
      console.log(`[Socket] Client connected: ${socket.id}`);

      socket.on('workflow:subscribe', (data: unknown) => {
        const workflowId = readWorkflowId(data);
        if (!workflowId) {
          socket.emit('error', { message: 'workflowId is required' });
          return;
        }
        void socket.join(workflowRoom(workflowId));
        console.log(`[Socket] ${socket.id} subscribed to workflow ${workflowId}`);
      });

      socket.on('workflow:unsubscribe', (data: unknown) => {
        const workflowId = readWorkflowId(data);
        if (!workflowId) return;
        void socket.leave(workflowRoom(workflowId));
        console.log(`[Socket] ${socket.id} unsubscribed from workflow ${workflowId}`);
      });

      socket.on('disconnect', () => {
        console.log(`[Socket] Client disconnected: ${socket.id}`);
      });
    });
  };
}
