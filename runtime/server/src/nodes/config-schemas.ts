/**
 * Node Configuration Schemas
 *
 * A zod schema per node type materializes a config blob (defaults, bounds,
 * numeric coercion for values edited as text). The field descriptors are
 * what the editor renders.
 */

import { z } from 'zod';
import { fromError } from 'zod-validation-error';
import { InvalidNodeConfigError } from '../engine/errors.js';
import type { NodeType } from './catalog.js';

export interface ConfigField {
  name: string;
  label: string;
  type: 'text' | 'number' | 'select';
  default: string | number;
  required: boolean;
  min?: number;
  max?: number;
  step?: number;
  options?: string[];
}

export const pdfLoaderConfigSchema = z.object({
  name: z.string().min(1).default('PDF Loader'),
});

export const textSplitterConfigSchema = z.object({
  name: z.string().min(1).default('Text Splitter'),
  chunk_size: z.coerce.number().int().min(100).max(10000).default(1000),
  chunk_overlap: z.coerce.number().int().min(0).max(1000).default(200),
}).refine((config) => config.chunk_overlap < config.chunk_size, {
  message: 'chunk_overlap must be smaller than chunk_size',
  path: ['chunk_overlap'],
});

export const embeddingsConfigSchema = z.object({
  name: z.string().min(1).default('Embeddings'),
  provider: z.enum(['openai']).default('openai'),
  model: z.string().min(1).default('text-embedding-ada-002'),
});

export const vectorStoreConfigSchema = z.object({
  name: z.string().min(1).default('Vector Store'),
  provider: z.enum(['openai']).default('openai'),
  model: z.string().min(1).default('text-embedding-ada-002'),
});

export const qaChainConfigSchema = z.object({
  name: z.string().min(1).default('QA Chain'),
  provider: z.enum(['openai']).default('openai'),
  model: z.string().min(1).default('gpt-3.5-turbo'),
  temperature: z.coerce.number().min(0).max(2).default(0),
});

export const webSearchConfigSchema = z.object({
  name: z.string().min(1).default('Web Search'),
  provider: z.enum(['serpapi', 'brave']).default('serpapi'),
  num_results: z.coerce.number().int().min(1).max(20).default(5),
});

export type PdfLoaderConfig = z.infer<typeof pdfLoaderConfigSchema>;
export type TextSplitterConfig = z.infer<typeof textSplitterConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof embeddingsConfigSchema>;
export type VectorStoreConfig = z.infer<typeof vectorStoreConfigSchema>;
export type QaChainConfig = z.infer<typeof qaChainConfigSchema>;
export type WebSearchConfig = z.infer<typeof webSearchConfigSchema>;

const nameField = (label: string): ConfigField => ({
  name: 'name', label: 'Name', type: 'text', default: label, required: true,
});

export const CONFIG_FIELDS: Record<NodeType, ConfigField[]> = {
  pdf_loader: [nameField('PDF Loader')],
  text_splitter: [
    nameField('Text Splitter'),
    { name: 'chunk_size', label: 'Chunk Size', type: 'number', default: 1000, min: 100, max: 10000, required: true },
    { name: 'chunk_overlap', label: 'Chunk Overlap', type: 'number', default: 200, min: 0, max: 1000, required: true },
  ],
  embeddings: [
    nameField('Embeddings'),
    { name: 'provider', label: 'Provider', type: 'select', options: ['openai'], default: 'openai', required: true },
    { name: 'model', label: 'Model', type: 'text', default: 'text-embedding-ada-002', required: true },
  ],
  vector_store: [
    nameField('Vector Store'),
    { name: 'provider', label: 'Embedding Provider', type: 'select', options: ['openai'], default: 'openai', required: true },
  ],
  qa_chain: [
    nameField('QA Chain'),
    { name: 'provider', label: 'LLM Provider', type: 'select', options: ['openai'], default: 'openai', required: true },
    { name: 'model', label: 'Model', type: 'text', default: 'gpt-3.5-turbo', required: true },
    { name: 'temperature', label: 'Temperature', type: 'number', default: 0, min: 0, max: 2, step: 0.1, required: true },
  ],
  web_search: [
    nameField('Web Search'),
    { name: 'provider', label: 'Search Provider', type: 'select', options: ['serpapi', 'brave'], default: 'serpapi', required: true },
    { name: 'num_results', label: 'Number of Results', type: 'number', default: 5, min: 1, max: 20, required: true },
  ],
};

/**
 * Validate a raw config blob for a node type and fill in defaults
 *
 * @throws InvalidNodeConfigError
 */
export function parseNodeConfig<T extends z.ZodTypeAny>(schema: T, nodeType: string, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidNodeConfigError(nodeType, fromError(result.error).toString());
  }
  return result.data;
}

const CONFIG_SCHEMAS = {
  pdf_loader: pdfLoaderConfigSchema,
  text_splitter: textSplitterConfigSchema,
  embeddings: embeddingsConfigSchema,
  vector_store: vectorStoreConfigSchema,
  qa_chain: qaChainConfigSchema,
  web_search: webSearchConfigSchema,
} satisfies Record<NodeType, z.ZodTypeAny>;

/**
 * Materialized config of a node type with every field at its default
 */
export function defaultConfig(nodeType: NodeType): Record<string, unknown> {
  return CONFIG_SCHEMAS[nodeType].parse({});
}
