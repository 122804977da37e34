/**
 * Workflow
 *
 * In-memory graph of nodes and connections owned by one workflow id.
 */

import { v4 as uuid } from 'uuid';
import type {
  Connection,
  ConnectionSpec,
  NodeEntry,
  NodeResult,
  NodeStatus,
  Position,
  WorkflowNode,
} from '../types/index.js';
import { calculateExecutionOrder } from './execution-order.js';
import {
  ConnectionNotFoundError,
  NodeNotFoundError,
  UnknownNodeError,
  WorkflowError,
} from './errors.js';

export interface WorkflowOptions {
  id: string;
  name?: string;
  customPrompt?: string;
}

export class Workflow {
  readonly id: string;
  name: string;
  private prompt: string;
  private readonly nodes = new Map<string, NodeEntry>();
  private connectionList: Connection[] = [];
  private order: string[] = [];

  constructor(options: WorkflowOptions) {
    this.id = options.id;
    this.name = options.name ?? '';
    this.prompt = (options.customPrompt ?? '').trim();
  }

  /**
   * Free-text instruction seeded into every run under `custom_prompt`
   */
  get customPrompt(): string {
    return this.prompt;
  }

  set customPrompt(value: string) {
    this.prompt = value.trim();
  }

  get connections(): readonly Connection[] {
    return this.connectionList;
  }

  /**
   * Order computed by the most recent calculateExecutionOrder() call
   */
  get executionOrder(): readonly string[] {
    return this.order;
  }

  addNode(id: string, node: WorkflowNode, position: Position = { x: 0, y: 0 }): NodeEntry {
    if (this.nodes.has(id)) {
      throw new WorkflowError({
        message: `Node already exists: ${id}`,
        code: 'DUPLICATE_NODE',
        category: 'graph_structure',
      });
    }
    const entry: NodeEntry = { id, node, status: 'pending', lastResult: null, position: { ...position } };
    this.nodes.set(id, entry);
    return entry;
  }

  /**
   * Swap the node instance behind an id (after a config change). Connections
   * and position are kept; status resets to pending.
   */
  replaceNode(id: string, node: WorkflowNode): NodeEntry {
    const entry = this.requireNode(id);
    entry.node = node;
    entry.status = 'pending';
    entry.lastResult = null;
    return entry;
  }

  getNode(id: string): NodeEntry | undefined {
    return this.nodes.get(id);
  }

  requireNode(id: string): NodeEntry {
    const entry = this.nodes.get(id);
    if (!entry) {
      throw new NodeNotFoundError(id);
    }
    return entry;
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  listNodes(): NodeEntry[] {
    return Array.from(this.nodes.values());
  }

  nodeIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Remove a node together with every connection touching it.
   * Returns the removed connections.
   */
  removeNode(id: string): Connection[] {
    this.requireNode(id);
    this.nodes.delete(id);

    const removed = this.connectionList.filter((c) => c.sourceNode === id || c.targetNode === id);
    this.connectionList = this.connectionList.filter((c) => c.sourceNode !== id && c.targetNode !== id);
    this.order = this.order.filter((nodeId) => nodeId !== id);

    return removed;
  }

  setPosition(id: string, position: Position): NodeEntry {
    const entry = this.requireNode(id);
    entry.position = { ...position };
    return entry;
  }

  /**
   * @throws UnknownNodeError when either endpoint is not in the workflow
   */
  validateConnection(spec: ConnectionSpec): void {
    if (!this.nodes.has(spec.sourceNode)) {
      throw new UnknownNodeError(spec.sourceNode, 'source');
    }
    if (!this.nodes.has(spec.targetNode)) {
      throw new UnknownNodeError(spec.targetNode, 'target');
    }
  }

  connect(spec: ConnectionSpec, id: string = uuid()): Connection {
    this.validateConnection(spec);
    const connection: Connection = { id, ...spec };
    this.connectionList.push(connection);
    return connection;
  }

  disconnect(connectionId: string): Connection {
    const connection = this.connectionList.find((c) => c.id === connectionId);
    if (!connection) {
      throw new ConnectionNotFoundError(connectionId);
    }
    this.connectionList = this.connectionList.filter((c) => c.id !== connectionId);
    return connection;
  }

  /**
   * Recompute and cache the execution order.
   * @throws CycleDetectedError
   */
  calculateExecutionOrder(): string[] {
    this.order = calculateExecutionOrder(this.nodeIds(), this.connectionList);
    return [...this.order];
  }

  recordResult(id: string, status: NodeStatus, result: NodeResult): void {
    const entry = this.requireNode(id);
    entry.status = status;
    entry.lastResult = result;
  }
}
