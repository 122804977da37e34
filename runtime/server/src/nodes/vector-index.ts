/**
 * In-memory vector index with cosine similarity search.
 */

import type { Document } from '@langchain/core/documents';
import type { Retriever, RetrieverSource } from '../engine/capabilities.js';
import type { EmbeddingProvider } from '../providers/openai.js';

export const EMBED_BATCH_SIZE = 64;
export const DEFAULT_RETRIEVER_K = 4;

interface IndexedDocument {
  document: Document;
  vector: number[];
}

export interface ScoredDocument {
  document: Document;
  score: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  return magnitude === 0 ? 0 : dotProduct / magnitude;
}

export class VectorIndex implements RetrieverSource {
  private readonly entries: IndexedDocument[] = [];

  constructor(private readonly embeddings: EmbeddingProvider) {}

  get size(): number {
    return this.entries.length;
  }

  async addDocuments(documents: Document[]): Promise<void> {
    for (let start = 0; start < documents.length; start += EMBED_BATCH_SIZE) {
      const batch = documents.slice(start, start + EMBED_BATCH_SIZE);
      const vectors = await this.embeddings.embedDocuments(batch.map((doc) => doc.pageContent));
      if (vectors.length !== batch.length) {
        throw new Error(`Expected ${batch.length} embeddings, received ${vectors.length}`);
      }
      batch.forEach((document, i) => {
        this.entries.push({ document, vector: vectors[i] });
      });
    }
  }

  async similaritySearch(query: string, k: number = DEFAULT_RETRIEVER_K): Promise<ScoredDocument[]> {
    if (this.entries.length === 0) return [];
    const queryVector = await this.embeddings.embedQuery(query);
    return this.entries
      .map((entry) => ({ document: entry.document, score: cosineSimilarity(queryVector, entry.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  asRetriever(k: number = DEFAULT_RETRIEVER_K): Retriever {
    return {
      retrieve: async (query: string) => {
        const scored = await this.similaritySearch(query, k);
        return scored.map((item) => item.document);
      },
    };
  }

  toJSON(): Record<string, unknown> {
    return { type: 'VectorIndex', size: this.entries.length };
  }
}
