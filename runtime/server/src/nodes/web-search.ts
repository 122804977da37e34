import type { NodeInputs, NodeResult } from '../types/index.js';
import type { SearchProvider } from '../providers/search.js';
import { BaseNode } from './base.js';
import type { WebSearchConfig } from './config-schemas.js';

export class WebSearchNode extends BaseNode<WebSearchConfig> {
  readonly nodeType = 'web_search';

  constructor(config: WebSearchConfig, private readonly provider: SearchProvider) {
    super(config);
  }

  async process(inputs: NodeInputs): Promise<NodeResult> {
    const query = inputs.query;
    if (typeof query !== 'string' || query.trim().length === 0) {
      return this.failure('No query provided');
    }

    try {
      const results = await this.provider.search(query, this.config.num_results);
      return this.success({ search_results: results }, { provider: this.provider.name, count: results.length });
    } catch (error) {
      return this.failure(error);
    }
  }
}
