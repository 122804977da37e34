import type { NodeInputs, NodeResult } from '../types/index.js';
import type { EmbeddingProvider } from '../providers/openai.js';
import { BaseNode } from './base.js';
import type { VectorStoreConfig } from './config-schemas.js';
import { toDocuments } from './documents.js';
import { VectorIndex } from './vector-index.js';

export class VectorStoreNode extends BaseNode<VectorStoreConfig> {
  readonly nodeType = 'vector_store';

  constructor(config: VectorStoreConfig, private readonly embeddings: EmbeddingProvider) {
    super(config);
  }

  async process(inputs: NodeInputs): Promise<NodeResult> {
    const documents = toDocuments(inputs.documents);
    if (!documents || documents.length === 0) {
      return this.failure('No documents to index');
    }

    try {
      const index = new VectorIndex(this.embeddings);
      await index.addDocuments(documents);
      return this.success(
        { vector_store: index, retriever: index.asRetriever() },
        { document_count: index.size },
      );
    } catch (error) {
      return this.failure(error);
    }
  }
}
