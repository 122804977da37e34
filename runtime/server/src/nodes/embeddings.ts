import type { NodeInputs, NodeResult } from '../types/index.js';
import type { EmbeddingProvider } from '../providers/openai.js';
import { BaseNode } from './base.js';
import type { EmbeddingsConfig } from './config-schemas.js';

export class EmbeddingsNode extends BaseNode<EmbeddingsConfig> {
  readonly nodeType = 'embeddings';

  constructor(config: EmbeddingsConfig, private readonly provider: EmbeddingProvider) {
    super(config);
  }

  async process(inputs: NodeInputs): Promise<NodeResult> {
    const text = inputs.text;
    if (typeof text !== 'string' || text.length === 0) {
      return this.failure('No text provided');
    }

    try {
      const embeddings = await this.provider.embedQuery(text);
      return this.success({ embeddings }, { model: this.config.model, dimensions: embeddings.length });
    } catch (error) {
      return this.failure(error);
    }
  }
}
