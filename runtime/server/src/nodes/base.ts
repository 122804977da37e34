import type {
  NodeFailure,
  NodeInputs,
  NodeResult,
  NodeRole,
  NodeSuccess,
  PortName,
  WorkflowNode,
} from '../types/index.js';
import { NODE_CATALOG, type NodeType } from './catalog.js';

export abstract class BaseNode<TConfig extends Record<string, unknown> & { name: string }> implements WorkflowNode {
  abstract readonly nodeType: NodeType;

  constructor(readonly config: TConfig) {}

  get name(): string {
    return this.config.name;
  }

  get role(): NodeRole {
    return NODE_CATALOG[this.nodeType].role;
  }

  get inputs(): readonly PortName[] {
    return NODE_CATALOG[this.nodeType].inputs;
  }

  get outputs(): readonly PortName[] {
    return NODE_CATALOG[this.nodeType].outputs;
  }

  abstract process(inputs: NodeInputs): Promise<NodeResult>;

  protected success(outputs: Record<PortName, unknown>, metadata?: Record<string, unknown>): NodeSuccess {
    return {
      ...outputs,
      success: true,
      ...(metadata ? { metadata } : {}),
    };
  }

  protected failure(error: unknown): NodeFailure {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
