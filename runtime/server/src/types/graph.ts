/**
 * Workflow Graph Types
 */

import type { NodeResult, NodeStatus, PortName, WorkflowNode } from './node.js';

export interface Position {
  x: number;
  y: number;
}

/**
 * Directed data dependency: the source node's output port feeds the
 * target node's input port.
 */
export interface Connection {
  id: string;
  sourceNode: string;
  sourceOutput: PortName;
  targetNode: string;
  targetInput: PortName;
}

export type ConnectionSpec = Omit<Connection, 'id'>;

export interface NodeEntry {
  id: string;
  node: WorkflowNode;
  status: NodeStatus;
  lastResult: NodeResult | null;
  position: Position;
}
