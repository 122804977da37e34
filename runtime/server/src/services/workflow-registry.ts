/**
 * Workflow Registry
 *
 * Owns the resident workflows of this process. Every mutation is written to
 * storage first and then applied in memory; a workflow that is not resident
 * is re-hydrated from storage on first reference. Work on one workflow id
 * (edits and executions) runs one task at a time, in arrival order.
 */

import { v4 as uuid } from 'uuid';
import type { TelemetryClient } from '@ragstack/logging-client';
import type { Connection, ConnectionSpec, ExecutionResult, NodeEntry, Position, WorkflowNode } from '../types/index.js';
import type { WorkflowRecord } from '../../../shared/schema.js';
import type { IStorage, WorkflowUpdate } from '../storage.js';
import { Workflow } from '../engine/workflow.js';
import type { WorkflowExecutor } from '../engine/workflow-executor.js';
import { summarizeRun, type RunSummary } from '../engine/run-summary.js';
import { FILE_CONTENT_KEY, QUESTION_KEY } from '../engine/input-strategies.js';
import {
  ConcurrencyLimitError,
  NodeNotFoundError,
  WorkflowNotFoundError,
} from '../engine/errors.js';
import { safeFloat, toJsonSafe } from '../lib/json-safe.js';

export interface NodeInstanceFactory {
  create(nodeType: string, rawConfig?: unknown): WorkflowNode;
}

export interface WorkflowRegistryOptions {
  storage: IStorage;
  nodeFactory: NodeInstanceFactory;
  executor: WorkflowExecutor;
  maxConcurrentExecutions: number;
  telemetry?: TelemetryClient;
}

export interface CreateWorkflowInput {
  name: string;
  description?: string;
  customPrompt?: string;
}

export interface AddNodeInput {
  nodeType: string;
  config?: Record<string, unknown>;
  position?: Position;
}

export interface ExecuteInput {
  question: string;
  fileContent?: Uint8Array;
}

export interface NodeDescriptor {
  id: string;
  nodeType: string;
  name: string;
  role: string;
  inputs: string[];
  outputs: string[];
  config: Record<string, unknown>;
  position: Position;
  status: string;
}

export interface NodeSnapshot extends NodeDescriptor {
  lastResult: unknown;
}

export interface WorkflowSnapshot {
  id: string;
  name: string;
  customPrompt: string;
  nodes: NodeSnapshot[];
  connections: Connection[];
  executionOrder: string[];
}

export interface ExecutionOutcome {
  result: ExecutionResult;
  summary: RunSummary;
}

function describeNode(entry: NodeEntry): NodeDescriptor {
  return {
    id: entry.id,
    nodeType: entry.node.nodeType,
    name: entry.node.name,
    role: entry.node.role,
    inputs: [...entry.node.inputs],
    outputs: [...entry.node.outputs],
    config: { ...entry.node.config },
    position: { ...entry.position },
    status: entry.status,
  };
}

export class WorkflowRegistry {
  private readonly active = new Map<string, Workflow>();
  private readonly loading = new Map<string, Promise<Workflow>>();
  private readonly queues = new Map<string, Promise<void>>();
  private pendingExecutions = 0;

  constructor(private readonly options: WorkflowRegistryOptions) {}

  get residentCount(): number {
    return this.active.size;
  }

  async createWorkflow(input: CreateWorkflowInput): Promise<WorkflowRecord> {
    const record = await this.options.storage.createWorkflow({
      id: uuid(),
      name: input.name,
      description: input.description ?? '',
      customPrompt: (input.customPrompt ?? '').trim(),
    });

    this.active.set(record.id, new Workflow({
      id: record.id,
      name: record.name,
      customPrompt: record.customPrompt,
    }));

    console.log(`[WorkflowRegistry] Created workflow: ${record.name} (${record.id})`);
    this.options.telemetry?.event('workflow.created', 'Workflow created', { workflowId: record.id });
    return record;
  }

  async listWorkflows(): Promise<WorkflowRecord[]> {
    return this.options.storage.listWorkflows();
  }

  async getWorkflowRecord(id: string): Promise<WorkflowRecord> {
    const record = await this.options.storage.getWorkflow(id);
    if (!record) {
      throw new WorkflowNotFoundError(id);
    }
    await this.ensureLoaded(id);
    return record;
  }

  async updateWorkflow(id: string, update: WorkflowUpdate): Promise<WorkflowRecord> {
    return this.withWorkflow(id, async (workflow) => {
      const record = await this.options.storage.updateWorkflow(id, {
        ...update,
        ...(update.customPrompt !== undefined ? { customPrompt: update.customPrompt.trim() } : {}),
      });
      if (!record) {
        throw new WorkflowNotFoundError(id);
      }
      workflow.name = record.name;
      workflow.customPrompt = record.customPrompt;
      return record;
    });
  }

  /**
   * Queued like any other edit. A re-hydration already in flight is allowed
   * to finish first so it cannot make the workflow resident again afterwards.
   */
  async deleteWorkflow(id: string): Promise<void> {
    return this.enqueue(id, async () => {
      await this.loading.get(id)?.catch(() => undefined);
      const deleted = await this.options.storage.deleteWorkflow(id);
      const wasResident = this.active.delete(id);
      if (!deleted && !wasResident) {
        throw new WorkflowNotFoundError(id);
      }
      console.log(`[WorkflowRegistry] Deleted workflow: ${id}`);
    });
  }

  /**
   * Resident workflow for an id, re-hydrated from storage when needed
   */
  async ensureLoaded(id: string): Promise<Workflow> {
    const resident = this.active.get(id);
    if (resident) return resident;

    const inFlight = this.loading.get(id);
    if (inFlight) return inFlight;

    const load = this.rehydrate(id).finally(() => {
      this.loading.delete(id);
    });
    this.loading.set(id, load);
    return load;
  }

  async addNode(id: string, input: AddNodeInput): Promise<NodeDescriptor> {
    return this.withWorkflow(id, async (workflow) => {
      const node = this.options.nodeFactory.create(input.nodeType, input.config ?? {});
      const position = input.position ?? { x: 0, y: 0 };
      const nodeId = uuid();

      await this.options.storage.createNode({
        id: nodeId,
        workflowId: id,
        nodeType: node.nodeType,
        config: { ...node.config },
        positionX: String(position.x),
        positionY: String(position.y),
      });

      const entry = workflow.addNode(nodeId, node, position);
      console.log(`[WorkflowRegistry] Added ${node.nodeType} node ${nodeId} to ${id}`);
      return describeNode(entry);
    });
  }

  async removeNode(id: string, nodeId: string): Promise<Connection[]> {
    return this.withWorkflow(id, async (workflow) => {
      workflow.requireNode(nodeId);
      await this.options.storage.deleteNode(nodeId);
      return workflow.removeNode(nodeId);
    });
  }

  async getNode(id: string, nodeId: string): Promise<NodeDescriptor> {
    const workflow = await this.ensureLoaded(id);
    return describeNode(workflow.requireNode(nodeId));
  }

  /**
   * Replace a node's config. The node instance is rebuilt so the new
   * settings take effect on the next run.
   */
  async updateNodeConfig(id: string, nodeId: string, config: Record<string, unknown>): Promise<NodeDescriptor> {
    return this.withWorkflow(id, async (workflow) => {
      const entry = workflow.requireNode(nodeId);
      const node = this.options.nodeFactory.create(entry.node.nodeType, config);
      const updated = await this.options.storage.updateNodeConfig(nodeId, { ...node.config });
      if (!updated) {
        throw new NodeNotFoundError(nodeId);
      }
      return describeNode(workflow.replaceNode(nodeId, node));
    });
  }

  async setNodePosition(id: string, nodeId: string, position: Position): Promise<NodeDescriptor> {
    return this.withWorkflow(id, async (workflow) => {
      workflow.requireNode(nodeId);
      await this.options.storage.updateNodePosition(nodeId, position.x, position.y);
      return describeNode(workflow.setPosition(nodeId, position));
    });
  }

  async connect(id: string, spec: ConnectionSpec): Promise<Connection> {
    return this.withWorkflow(id, async (workflow) => {
      workflow.validateConnection(spec);
      const connectionId = uuid();
      await this.options.storage.createConnection({
        id: connectionId,
        workflowId: id,
        sourceNodeId: spec.sourceNode,
        sourceOutput: spec.sourceOutput,
        targetNodeId: spec.targetNode,
        targetInput: spec.targetInput,
      });
      return workflow.connect(spec, connectionId);
    });
  }

  async disconnect(id: string, connectionId: string): Promise<Connection> {
    return this.withWorkflow(id, async (workflow) => {
      const connection = workflow.disconnect(connectionId);
      await this.options.storage.deleteConnection(connectionId);
      return connection;
    });
  }

  async describe(id: string): Promise<WorkflowSnapshot> {
    const workflow = await this.ensureLoaded(id);
    return {
      id: workflow.id,
      name: workflow.name,
      customPrompt: workflow.customPrompt,
      nodes: workflow.listNodes().map((entry) => ({
        ...describeNode(entry),
        lastResult: toJsonSafe(entry.lastResult),
      })),
      connections: workflow.connections.map((connection) => ({ ...connection })),
      executionOrder: [...workflow.executionOrder],
    };
  }

  /**
   * Run the workflow with a question and optional uploaded file.
   *
   * @throws CycleDetectedError, ConcurrencyLimitError, RunFailedError
   */
  async execute(id: string, input: ExecuteInput): Promise<ExecutionOutcome> {
    if (this.pendingExecutions >= this.options.maxConcurrentExecutions) {
      throw new ConcurrencyLimitError(this.options.maxConcurrentExecutions);
    }

    this.pendingExecutions += 1;
    try {
      return await this.withWorkflow(id, async (workflow) => {
        const initial: Record<string, unknown> = { [QUESTION_KEY]: input.question };
        if (input.fileContent) {
          initial[FILE_CONTENT_KEY] = input.fileContent;
        }
        const result = await this.options.executor.execute(workflow, initial);
        return { result, summary: summarizeRun(result) };
      });
    } finally {
      this.pendingExecutions -= 1;
    }
  }

  private async rehydrate(id: string): Promise<Workflow> {
    const stored = await this.options.storage.loadWorkflow(id);
    if (!stored) {
      throw new WorkflowNotFoundError(id);
    }

    const workflow = new Workflow({
      id,
      name: stored.workflow.name,
      customPrompt: stored.workflow.customPrompt,
    });

    for (const record of stored.nodes) {
      const node = this.options.nodeFactory.create(record.nodeType, record.config);
      workflow.addNode(record.id, node, { x: safeFloat(record.positionX), y: safeFloat(record.positionY) });
    }

    for (const record of stored.connections) {
      const spec: ConnectionSpec = {
        sourceNode: record.sourceNodeId,
        sourceOutput: record.sourceOutput,
        targetNode: record.targetNodeId,
        targetInput: record.targetInput,
      };
      if (!workflow.hasNode(spec.sourceNode) || !workflow.hasNode(spec.targetNode)) {
        console.warn(`[WorkflowRegistry] Skipping dangling connection ${record.id} in ${id}`);
        continue;
      }
      workflow.connect(spec, record.id);
    }

    // Deleted while the graph was being rebuilt
    if (!(await this.options.storage.getWorkflow(id))) {
      throw new WorkflowNotFoundError(id);
    }

    this.active.set(id, workflow);
    console.log(`[WorkflowRegistry] Re-hydrated workflow ${id}: ${stored.nodes.length} nodes, ${workflow.connections.length} connections`);
    return workflow;
  }

  private async withWorkflow<T>(id: string, task: (workflow: Workflow) => Promise<T>): Promise<T> {
    return this.enqueue(id, async () => task(await this.ensureLoaded(id)));
  }

  /**
   * Queue a task behind every earlier task for the same workflow id
   */
  private async enqueue<T>(id: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(() => undefined, () => undefined);
    this.queues.set(id, tail);

    try {
      return await run;
    } finally {
      if (this.queues.get(id) === tail) {
        this.queues.delete(id);
      }
    }
  }
}
