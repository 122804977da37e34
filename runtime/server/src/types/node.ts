/**
 * Node Types
 *
 * The contract every processing node in a workflow implements.
 */

export type PortName = string;

/**
 * Behavioural role of a node. The executor picks an input strategy per role.
 */
export type NodeRole =
  | 'ingestion'
  | 'chunking'
  | 'embedding'
  | 'indexing'
  | 'retrieval-answering'
  | 'search'
  | 'generic';

export type NodeStatus = 'pending' | 'success' | 'error';

export type NodeInputs = Record<PortName, unknown>;

export interface NodeSuccess {
  success: true;
  metadata?: Record<string, unknown>;
  [port: string]: unknown;
}

export interface NodeFailure {
  success: false;
  error: string;
}

export type NodeResult = NodeSuccess | NodeFailure;

export interface WorkflowNode {
  readonly nodeType: string;
  readonly role: NodeRole;
  readonly name: string;
  readonly inputs: readonly PortName[];
  readonly outputs: readonly PortName[];
  readonly config: Readonly<Record<string, unknown>>;
  process(inputs: NodeInputs): Promise<NodeResult>;
}
