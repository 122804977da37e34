import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import type { NodeInputs, NodeResult } from '../types/index.js';
import { BaseNode } from './base.js';
import type { TextSplitterConfig } from './config-schemas.js';
import { toDocuments } from './documents.js';

export class TextSplitterNode extends BaseNode<TextSplitterConfig> {
  readonly nodeType = 'text_splitter';

  async process(inputs: NodeInputs): Promise<NodeResult> {
    const documents = toDocuments(inputs.documents);
    if (!documents) {
      return this.failure('No documents provided');
    }

    try {
      const splitter = new RecursiveCharacterTextSplitter({
        chunkSize: this.config.chunk_size,
        chunkOverlap: this.config.chunk_overlap,
      });
      const chunks = await splitter.splitDocuments(documents);
      return this.success({ chunks }, { chunk_count: chunks.length });
    } catch (error) {
      return this.failure(error);
    }
  }
}
