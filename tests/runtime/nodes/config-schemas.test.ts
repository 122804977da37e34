import { describe, expect, it } from 'vitest';
import {
  CONFIG_FIELDS,
  defaultConfig,
  parseNodeConfig,
  qaChainConfigSchema,
  textSplitterConfigSchema,
  webSearchConfigSchema,
} from '../../../runtime/server/src/nodes/config-schemas.js';
import { InvalidNodeConfigError } from '../../../runtime/server/src/engine/errors.js';
import { NODE_TYPES } from '../../../runtime/server/src/nodes/catalog.js';

describe('node config schemas', () => {
  it('fill in defaults', () => {
    expect(defaultConfig('text_splitter')).toEqual({ name: 'Text Splitter', chunk_size: 1000, chunk_overlap: 200 });
    expect(defaultConfig('qa_chain')).toEqual({ name: 'QA Chain', provider: 'openai', model: 'gpt-3.5-turbo', temperature: 0 });
    expect(defaultConfig('web_search')).toEqual({ name: 'Web Search', provider: 'serpapi', num_results: 5 });
    expect(defaultConfig('pdf_loader')).toEqual({ name: 'PDF Loader' });
  });

  it('coerce numbers edited as text', () => {
    expect(parseNodeConfig(textSplitterConfigSchema, 'text_splitter', { chunk_size: '500', chunk_overlap: '50' }))
      .toEqual({ name: 'Text Splitter', chunk_size: 500, chunk_overlap: 50 });
    expect(parseNodeConfig(qaChainConfigSchema, 'qa_chain', { temperature: '0.7' }).temperature).toBe(0.7);
  });

  it('enforce bounds', () => {
    expect(() => parseNodeConfig(textSplitterConfigSchema, 'text_splitter', { chunk_size: 50 }))
      .toThrowError(InvalidNodeConfigError);
    expect(() => parseNodeConfig(qaChainConfigSchema, 'qa_chain', { temperature: 3 }))
      .toThrowError(/^Invalid config for qa_chain: /);
    expect(() => parseNodeConfig(webSearchConfigSchema, 'web_search', { num_results: 21 }))
      .toThrowError(InvalidNodeConfigError);
  });

  it('reject a chunk overlap that is not smaller than the chunk size', () => {
    expect(() => parseNodeConfig(textSplitterConfigSchema, 'text_splitter', { chunk_size: 100, chunk_overlap: 500 }))
      .toThrowError(/chunk_overlap must be smaller than chunk_size/);
    expect(() => parseNodeConfig(textSplitterConfigSchema, 'text_splitter', { chunk_size: 300, chunk_overlap: 300 }))
      .toThrowError(InvalidNodeConfigError);
    expect(parseNodeConfig(textSplitterConfigSchema, 'text_splitter', { chunk_size: 300, chunk_overlap: 299 }).chunk_overlap)
      .toBe(299);
  });

  it('reject unknown providers', () => {
    expect(() => parseNodeConfig(webSearchConfigSchema, 'web_search', { provider: 'bing' }))
      .toThrowError(InvalidNodeConfigError);
  });

  it('treat a missing blob as empty', () => {
    expect(parseNodeConfig(webSearchConfigSchema, 'web_search', undefined).num_results).toBe(5);
  });

  it('describe fields whose defaults match the schema defaults', () => {
    for (const nodeType of NODE_TYPES) {
      const defaults = defaultConfig(nodeType);
      for (const field of CONFIG_FIELDS[nodeType]) {
        expect(defaults[field.name]).toEqual(field.default);
      }
    }
  });

  it('give temperature a 0.1 step', () => {
    const temperature = CONFIG_FIELDS.qa_chain.find((field) => field.name === 'temperature');
    expect(temperature).toMatchObject({ type: 'number', min: 0, max: 2, step: 0.1 });
  });
});
