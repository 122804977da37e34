/**
 * Execution Types
 */

import type { NodeResult, NodeStatus } from './node.js';

export type InitialValues = Record<string, unknown>;

export interface NodeRunRecord {
  nodeId: string;
  nodeType: string;
  name: string;
  status: Exclude<NodeStatus, 'pending'>;
  error?: string;
  result: NodeResult;
  /** Non-fatal findings while resolving inputs, such as a missing source output */
  diagnostics: string[];
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}

export interface ExecutionResult {
  executionId: string;
  workflowId: string;
  order: string[];
  /** Shared namespace after the run: initial values plus every merged output */
  outputs: Record<string, unknown>;
  nodes: NodeRunRecord[];
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
}
