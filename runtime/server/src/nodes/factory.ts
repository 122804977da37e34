/**
 * Node Factory
 *
 * Builds node instances from a node type and a raw config blob, wiring in
 * provider clients. Provider constructors are injectable so the service can
 * run against fakes.
 */

import type { WorkflowNode } from '../types/index.js';
import { MissingCredentialError, UnknownNodeTypeError } from '../engine/errors.js';
import {
  createOpenAIClient,
  OpenAIChat,
  OpenAIEmbeddings,
  type ChatProvider,
  type EmbeddingProvider,
} from '../providers/openai.js';
import { BraveSearch, SerpApiSearch, type SearchProvider, type SearchProviderName } from '../providers/search.js';
import { isNodeType, type NodeType } from './catalog.js';
import {
  embeddingsConfigSchema,
  parseNodeConfig,
  pdfLoaderConfigSchema,
  qaChainConfigSchema,
  textSplitterConfigSchema,
  vectorStoreConfigSchema,
  webSearchConfigSchema,
} from './config-schemas.js';
import { PdfLoaderNode } from './pdf-loader.js';
import { TextSplitterNode } from './text-splitter.js';
import { EmbeddingsNode } from './embeddings.js';
import { VectorStoreNode } from './vector-store.js';
import { QaChainNode } from './qa-chain.js';
import { WebSearchNode } from './web-search.js';

export interface ProviderCredentials {
  openaiApiKey?: string;
  openaiTimeoutMs?: number;
  serpApiKey?: string;
  braveApiKey?: string;
}

export interface ProviderFactories {
  embeddings(apiKey: string, model: string): EmbeddingProvider;
  chat(apiKey: string): ChatProvider;
  search(provider: SearchProviderName, apiKey: string): SearchProvider;
}

export interface NodeFactoryOptions {
  credentials: ProviderCredentials;
  providers?: Partial<ProviderFactories>;
}

const DEFAULT_OPENAI_TIMEOUT_MS = 60_000;

type NodeBuilder = (rawConfig: unknown) => WorkflowNode;

export class NodeFactory {
  private readonly credentials: ProviderCredentials;
  private readonly providers: ProviderFactories;
  private readonly builders: Record<NodeType, NodeBuilder>;

  constructor(options: NodeFactoryOptions) {
    this.credentials = options.credentials;
    const timeoutMs = options.credentials.openaiTimeoutMs ?? DEFAULT_OPENAI_TIMEOUT_MS;
    this.providers = {
      embeddings: (apiKey, model) => new OpenAIEmbeddings(createOpenAIClient(apiKey, timeoutMs), model),
      chat: (apiKey) => new OpenAIChat(createOpenAIClient(apiKey, timeoutMs)),
      search: (provider, apiKey) => (provider === 'brave' ? new BraveSearch(apiKey) : new SerpApiSearch(apiKey)),
      ...options.providers,
    };

    this.builders = {
      pdf_loader: (raw) => new PdfLoaderNode(parseNodeConfig(pdfLoaderConfigSchema, 'pdf_loader', raw)),
      text_splitter: (raw) => new TextSplitterNode(parseNodeConfig(textSplitterConfigSchema, 'text_splitter', raw)),
      embeddings: (raw) => {
        const config = parseNodeConfig(embeddingsConfigSchema, 'embeddings', raw);
        const apiKey = this.requireCredential('OPENAI_API_KEY', this.credentials.openaiApiKey, 'embeddings');
        return new EmbeddingsNode(config, this.providers.embeddings(apiKey, config.model));
      },
      vector_store: (raw) => {
        const config = parseNodeConfig(vectorStoreConfigSchema, 'vector_store', raw);
        const apiKey = this.requireCredential('OPENAI_API_KEY', this.credentials.openaiApiKey, 'vector_store');
        return new VectorStoreNode(config, this.providers.embeddings(apiKey, config.model));
      },
      qa_chain: (raw) => {
        const config = parseNodeConfig(qaChainConfigSchema, 'qa_chain', raw);
        const apiKey = this.requireCredential('OPENAI_API_KEY', this.credentials.openaiApiKey, 'qa_chain');
        return new QaChainNode(config, this.providers.chat(apiKey));
      },
      web_search: (raw) => {
        const config = parseNodeConfig(webSearchConfigSchema, 'web_search', raw);
        const apiKey = config.provider === 'brave'
          ? this.requireCredential('BRAVE_API_KEY', this.credentials.braveApiKey, 'web_search')
          : this.requireCredential('SERPAPI_KEY', this.credentials.serpApiKey, 'web_search');
        return new WebSearchNode(config, this.providers.search(config.provider, apiKey));
      },
    };
  }

  /**
   * @throws UnknownNodeTypeError, InvalidNodeConfigError, MissingCredentialError
   */
  create(nodeType: string, rawConfig: unknown = {}): WorkflowNode {
    if (!isNodeType(nodeType)) {
      throw new UnknownNodeTypeError(nodeType);
    }
    return this.builders[nodeType](rawConfig);
  }

  private requireCredential(envVar: string, value: string | undefined, nodeType: NodeType): string {
    if (!value) {
      throw new MissingCredentialError(envVar, nodeType);
    }
    return value;
  }
}
