/**
 * Workflow Executor
 *
 * Runs a workflow once, sequentially, in dependency order. Node failures
 * are recorded and the run continues; only graph-structure errors abort
 * a run, and they do so before any node executes.
 */

import { v4 as uuid } from 'uuid';
import { EventEmitter } from 'events';
import type { TelemetryClient } from '@ragstack/logging-client';
import type {
  Connection,
  ExecutionResult,
  InitialValues,
  NodeEntry,
  NodeInputs,
  NodeResult,
  NodeRunRecord,
} from '../types/index.js';
import { config } from '../config.js';
import type { Workflow } from './workflow.js';
import { RunContext } from './run-context.js';
import { CUSTOM_PROMPT_KEY, resolveInputs } from './input-strategies.js';

export interface WorkflowExecutorConfig {
  /** Completed executions kept for inspection */
  historyLimit?: number;
  telemetry?: TelemetryClient;
}

export interface ExecutionStartedEvent {
  executionId: string;
  workflowId: string;
  order: string[];
  startedAt: Date;
}

export interface NodeStartedEvent {
  executionId: string;
  workflowId: string;
  nodeId: string;
  name: string;
}

export interface NodeCompletedEvent {
  executionId: string;
  workflowId: string;
  record: NodeRunRecord;
}

export type ExecutorEvents = {
  'execution:started': [event: ExecutionStartedEvent];
  'node:started': [event: NodeStartedEvent];
  'node:completed': [event: NodeCompletedEvent];
  'execution:completed': [result: ExecutionResult];
};

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class WorkflowExecutor extends EventEmitter<ExecutorEvents> {
  private readonly executions = new Map<string, ExecutionResult>();
  private readonly historyLimit: number;
  private readonly telemetry?: TelemetryClient;

  constructor(executorConfig: WorkflowExecutorConfig = {}) {
    super();
    this.historyLimit = executorConfig.historyLimit ?? config.runtime.executionHistoryLimit;
    this.telemetry = executorConfig.telemetry;
  }

  /**
   * Execute every node of the workflow once.
   *
   * @throws CycleDetectedError before any node runs
   */
  async execute(workflow: Workflow, initial: InitialValues = {}): Promise<ExecutionResult> {
    const order = workflow.calculateExecutionOrder();
    const executionId = uuid();
    const startedAt = new Date();

    const context = new RunContext(initial);
    if (workflow.customPrompt) {
      context.setDefault(CUSTOM_PROMPT_KEY, workflow.customPrompt);
    }

    console.log(`[WorkflowExecutor] Execution ${executionId} started for ${workflow.id}: ${order.length} nodes`);
    this.telemetry?.metric('workflow.execution.count', 1, { workflowId: workflow.id });
    this.emit('execution:started', { executionId, workflowId: workflow.id, order, startedAt });

    const records: NodeRunRecord[] = [];
    for (const nodeId of order) {
      const entry = workflow.requireNode(nodeId);
      this.emit('node:started', { executionId, workflowId: workflow.id, nodeId, name: entry.node.name });

      const record = await this.runNode(entry, workflow.connections, context, initial);
      workflow.recordResult(nodeId, record.status, record.result);
      records.push(record);

      this.telemetry?.metric('workflow.node.latency_ms', record.durationMs, {
        workflowId: workflow.id,
        nodeType: record.nodeType,
        status: record.status,
      });
      this.emit('node:completed', { executionId, workflowId: workflow.id, record });
    }

    const completedAt = new Date();
    const result: ExecutionResult = {
      executionId,
      workflowId: workflow.id,
      order,
      outputs: context.toRecord(),
      nodes: records,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };

    this.remember(result);
    const failed = records.filter((r) => r.status === 'error').length;
    console.log(`[WorkflowExecutor] Execution ${executionId} finished in ${result.durationMs}ms (${failed} failed)`);
    this.telemetry?.metric('workflow.execution.latency_ms', result.durationMs, { workflowId: workflow.id });
    this.emit('execution:completed', result);

    return result;
  }

  getExecution(executionId: string): ExecutionResult | undefined {
    return this.executions.get(executionId);
  }

  /**
   * Most recent first
   */
  getAllExecutions(): ExecutionResult[] {
    return Array.from(this.executions.values()).reverse();
  }

  private remember(result: ExecutionResult): void {
    this.executions.set(result.executionId, result);
    while (this.executions.size > this.historyLimit) {
      const oldest = this.executions.keys().next();
      if (oldest.done) break;
      this.executions.delete(oldest.value);
    }
  }

  private bindConnections(
    nodeId: string,
    connections: readonly Connection[],
    context: RunContext,
    diagnostics: string[],
  ): NodeInputs {
    const bound: NodeInputs = {};
    for (const connection of connections) {
      if (connection.targetNode !== nodeId) continue;
      if (context.has(connection.sourceOutput)) {
        bound[connection.targetInput] = context.get(connection.sourceOutput);
      } else {
        diagnostics.push(`missing source output '${connection.sourceOutput}' for input '${connection.targetInput}'`);
      }
    }
    return bound;
  }

  private async runNode(
    entry: NodeEntry,
    connections: readonly Connection[],
    context: RunContext,
    initial: InitialValues,
  ): Promise<NodeRunRecord> {
    const { node } = entry;
    const startedAt = new Date();
    const diagnostics: string[] = [];

    const connected = this.bindConnections(entry.id, connections, context, diagnostics);
    for (const diagnostic of diagnostics) {
      console.warn(`[WorkflowExecutor] ${node.name} (${entry.id}): ${diagnostic}`);
    }

    const { inputs, missing } = resolveInputs(node.role, {
      namespace: context.view(),
      initial,
      connected,
      inputs: node.inputs,
    });

    let result: NodeResult;
    if (missing.length > 0) {
      result = { success: false, error: `Missing required inputs: ${missing.join(', ')}` };
    } else {
      try {
        result = await node.process(inputs);
      } catch (error) {
        result = { success: false, error: errorMessage(error) };
      }
    }

    if (result.success) {
      context.merge(result, node.outputs);
    } else {
      console.error(`[WorkflowExecutor] ${node.name} (${entry.id}) failed: ${result.error}`);
      this.telemetry?.metric('workflow.node.error.count', 1, { nodeType: node.nodeType });
    }

    const completedAt = new Date();
    return {
      nodeId: entry.id,
      nodeType: node.nodeType,
      name: node.name,
      status: result.success ? 'success' : 'error',
      ...(result.success ? {} : { error: result.error }),
      result,
      diagnostics,
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    };
  }
}
