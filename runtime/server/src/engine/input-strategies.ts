/**
 * Input Strategies
 *
 * One pure resolver per node role. Each receives the run namespace, the
 * caller's initial values, the bindings produced by matching connections
 * and the node's declared inputs, and returns the effective inputs plus
 * the required ports it could not fill.
 */

import type { InitialValues, NodeInputs, NodeRole, PortName } from '../types/index.js';
import { isRetriever, isRetrieverSource, type Retriever } from './capabilities.js';

export interface StrategyContext {
  namespace: ReadonlyMap<string, unknown>;
  initial: InitialValues;
  connected: NodeInputs;
  inputs: readonly PortName[];
}

export interface ResolvedInputs {
  inputs: NodeInputs;
  missing: PortName[];
}

export type InputStrategy = (ctx: StrategyContext) => ResolvedInputs;

export const FILE_CONTENT_KEY = 'file_content';
export const QUESTION_KEY = 'question';
export const CUSTOM_PROMPT_KEY = 'custom_prompt';
export const INDEX_HANDLE_KEY = 'vector_store';

function firstDefined(...candidates: unknown[]): unknown {
  return candidates.find((value) => value !== undefined);
}

function compact(values: NodeInputs): NodeInputs {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function finish(values: NodeInputs, required: PortName[]): ResolvedInputs {
  const inputs = compact(values);
  return { inputs, missing: required.filter((port) => !(port in inputs)) };
}

const resolveIngestion: InputStrategy = ({ initial, connected }) =>
  finish(
    { [FILE_CONTENT_KEY]: firstDefined(connected[FILE_CONTENT_KEY], initial[FILE_CONTENT_KEY]) },
    [FILE_CONTENT_KEY],
  );

const resolveChunking: InputStrategy = ({ namespace, connected }) =>
  finish(
    { ...connected, documents: firstDefined(connected.documents, namespace.get('documents')) },
    ['documents'],
  );

const resolveIndexing: InputStrategy = ({ namespace, connected }) =>
  finish(
    {
      ...connected,
      documents: firstDefined(
        connected.documents,
        connected.chunks,
        namespace.get('documents'),
        namespace.get('chunks'),
      ),
    },
    ['documents'],
  );

function deriveRetriever(connected: NodeInputs, namespace: ReadonlyMap<string, unknown>): Retriever | undefined {
  const bound = connected.retriever;
  if (isRetriever(bound)) return bound;
  if (isRetrieverSource(bound)) return bound.asRetriever();

  const handle = namespace.get(INDEX_HANDLE_KEY);
  if (isRetrieverSource(handle)) return handle.asRetriever();

  const shared = namespace.get('retriever');
  return isRetriever(shared) ? shared : undefined;
}

const resolveRetrievalAnswering: InputStrategy = ({ namespace, connected }) =>
  finish(
    {
      ...connected,
      [QUESTION_KEY]: firstDefined(connected[QUESTION_KEY], namespace.get(QUESTION_KEY)),
      [CUSTOM_PROMPT_KEY]: firstDefined(connected[CUSTOM_PROMPT_KEY], namespace.get(CUSTOM_PROMPT_KEY)),
      retriever: deriveRetriever(connected, namespace),
    },
    [QUESTION_KEY, 'retriever'],
  );

/**
 * Connection bindings only. Resolution fails when the node declares inputs
 * and none of them was bound.
 */
const resolveGeneric: InputStrategy = ({ connected, inputs }) => {
  const filtered = compact(Object.fromEntries(inputs.map((port) => [port, connected[port]])));
  const missing = inputs.length > 0 && Object.keys(filtered).length === 0 ? [...inputs] : [];
  return { inputs: filtered, missing };
};

export const INPUT_STRATEGIES: Record<NodeRole, InputStrategy> = {
  ingestion: resolveIngestion,
  chunking: resolveChunking,
  indexing: resolveIndexing,
  'retrieval-answering': resolveRetrievalAnswering,
  embedding: resolveGeneric,
  search: resolveGeneric,
  generic: resolveGeneric,
};

/**
 * Resolve a node's effective inputs, restricted to its declared ports
 */
export function resolveInputs(role: NodeRole, ctx: StrategyContext): ResolvedInputs {
  const { inputs, missing } = INPUT_STRATEGIES[role](ctx);
  const declared = Object.fromEntries(
    Object.entries(inputs).filter(([port]) => ctx.inputs.includes(port)),
  );
  return { inputs: declared, missing: missing.filter((port) => ctx.inputs.includes(port)) };
}
