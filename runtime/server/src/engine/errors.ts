/**
 * Workflow Error Taxonomy
 *
 * Graph-structure errors abort a run before any node executes. Lookup,
 * configuration and service errors surface from the management API.
 * Node-level failures never raise: they are recorded on the node and the
 * run continues. RunFailedError is derived after the run completes.
 */

export type WorkflowErrorCategory =
  | 'graph_structure'   // Unknown endpoint, cycle
  | 'not_found'         // Workflow, node or connection id does not exist
  | 'configuration'     // Unknown node type, invalid config blob
  | 'auth'              // Provider credential missing
  | 'rate_limit'        // Too many concurrent executions
  | 'run_failed';       // Terminal output missing after a run

function categoryToStatus(category: WorkflowErrorCategory): number {
  switch (category) {
    case 'graph_structure':
    case 'configuration':
    case 'auth':
      return 400;
    case 'not_found':
      return 404;
    case 'rate_limit':
      return 429;
    case 'run_failed':
      return 422;
  }
}

export class WorkflowError extends Error {
  readonly code: string;
  readonly category: WorkflowErrorCategory;
  readonly statusCode: number;

  constructor(opts: { message: string; code: string; category: WorkflowErrorCategory; statusCode?: number }) {
    super(opts.message);
    this.name = 'WorkflowError';
    this.code = opts.code;
    this.category = opts.category;
    this.statusCode = opts.statusCode ?? categoryToStatus(opts.category);
  }

  /**
   * Serialize for API response
   */
  toResponse(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      category: this.category,
    };
  }
}

export class UnknownNodeError extends WorkflowError {
  readonly nodeId: string;

  constructor(nodeId: string, role: 'source' | 'target') {
    super({
      message: `Connection references unknown ${role} node: ${nodeId}`,
      code: 'UNKNOWN_NODE',
      category: 'graph_structure',
    });
    this.name = 'UnknownNodeError';
    this.nodeId = nodeId;
  }
}

export class CycleDetectedError extends WorkflowError {
  readonly nodeIds: string[];

  constructor(nodeIds: string[]) {
    super({
      message: `Cycle detected involving nodes: ${nodeIds.join(' -> ')}`,
      code: 'CYCLE_DETECTED',
      category: 'graph_structure',
    });
    this.name = 'CycleDetectedError';
    this.nodeIds = nodeIds;
  }

  override toResponse(): Record<string, unknown> {
    return { ...super.toResponse(), nodeIds: this.nodeIds };
  }
}

export class WorkflowNotFoundError extends WorkflowError {
  constructor(workflowId: string) {
    super({ message: `Workflow not found: ${workflowId}`, code: 'WORKFLOW_NOT_FOUND', category: 'not_found' });
    this.name = 'WorkflowNotFoundError';
  }
}

export class NodeNotFoundError extends WorkflowError {
  constructor(nodeId: string) {
    super({ message: `Node not found: ${nodeId}`, code: 'NODE_NOT_FOUND', category: 'not_found' });
    this.name = 'NodeNotFoundError';
  }
}

export class ConnectionNotFoundError extends WorkflowError {
  constructor(connectionId: string) {
    super({ message: `Connection not found: ${connectionId}`, code: 'CONNECTION_NOT_FOUND', category: 'not_found' });
    this.name = 'ConnectionNotFoundError';
  }
}

export class UnknownNodeTypeError extends WorkflowError {
  constructor(nodeType: string) {
    super({ message: `Unknown node type: ${nodeType}`, code: 'UNKNOWN_NODE_TYPE', category: 'configuration' });
    this.name = 'UnknownNodeTypeError';
  }
}

export class InvalidNodeConfigError extends WorkflowError {
  constructor(nodeType: string, detail: string) {
    super({
      message: `Invalid config for ${nodeType}: ${detail}`,
      code: 'INVALID_NODE_CONFIG',
      category: 'configuration',
    });
    this.name = 'InvalidNodeConfigError';
  }
}

export class MissingCredentialError extends WorkflowError {
  readonly envVar: string;

  constructor(envVar: string, nodeType: string) {
    super({
      message: `${envVar} not configured; cannot create ${nodeType} node`,
      code: 'MISSING_CREDENTIAL',
      category: 'auth',
    });
    this.name = 'MissingCredentialError';
    this.envVar = envVar;
  }
}

export class ConcurrencyLimitError extends WorkflowError {
  constructor(limit: number) {
    super({
      message: `Maximum concurrent executions reached: ${limit}`,
      code: 'CONCURRENCY_LIMIT',
      category: 'rate_limit',
    });
    this.name = 'ConcurrencyLimitError';
  }
}

export interface NodeErrorSummary {
  nodeId: string;
  name: string;
  error: string;
}

export class RunFailedError extends WorkflowError {
  readonly nodeErrors: NodeErrorSummary[];
  readonly executionId: string;

  constructor(message: string, executionId: string, nodeErrors: NodeErrorSummary[]) {
    super({ message, code: 'RUN_FAILED', category: 'run_failed' });
    this.name = 'RunFailedError';
    this.executionId = executionId;
    this.nodeErrors = nodeErrors;
  }

  override toResponse(): Record<string, unknown> {
    return { ...super.toResponse(), executionId: this.executionId, nodeErrors: this.nodeErrors };
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}
