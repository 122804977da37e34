import type { ExecutionResult } from '../types/index.js';
import { RunFailedError, type NodeErrorSummary } from './errors.js';

export const TERMINAL_OUTPUT_KEY = 'answer';

export interface RunSummary {
  answer: unknown;
  sources: unknown[];
}

/**
 * Derive overall success after a run: the terminal output must be present.
 *
 * @throws RunFailedError listing every failed node as "name: error"
 */
export function summarizeRun(result: ExecutionResult, terminalKey: string = TERMINAL_OUTPUT_KEY): RunSummary {
  if (terminalKey in result.outputs) {
    const sources = result.outputs.sources;
    return {
      answer: result.outputs[terminalKey],
      sources: Array.isArray(sources) ? sources : [],
    };
  }

  const nodeErrors: NodeErrorSummary[] = result.nodes
    .filter((record) => record.status === 'error')
    .map((record) => ({ nodeId: record.nodeId, name: record.name, error: record.error ?? 'Unknown error' }));

  const message = nodeErrors.length > 0
    ? `Workflow execution failed: ${nodeErrors.map((e) => `${e.name}: ${e.error}`).join('; ')}`
    : 'No answer generated. Check node connections and execution order.';

  throw new RunFailedError(message, result.executionId, nodeErrors);
}
