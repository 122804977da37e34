/**
 * Retrieval capabilities exchanged between indexing and answering nodes.
 * Values in the run namespace are untyped, so consumers check for the
 * operation they need instead of trusting a port name.
 */

import type { Document } from '@langchain/core/documents';

export interface Retriever {
  retrieve(query: string): Promise<Document[]>;
}

export interface RetrieverSource {
  asRetriever(k?: number): Retriever;
}

function hasMethod(value: unknown, method: string): boolean {
  return typeof value === 'object' && value !== null && method in value
    && typeof Reflect.get(value, method) === 'function';
}

export function isRetriever(value: unknown): value is Retriever {
  return hasMethod(value, 'retrieve');
}

export function isRetrieverSource(value: unknown): value is RetrieverSource {
  return hasMethod(value, 'asRetriever');
}
