import { describe, expect, it, vi } from 'vitest';
import { NodeFactory } from '../../../runtime/server/src/nodes/factory.js';
import {
  InvalidNodeConfigError,
  MissingCredentialError,
  UnknownNodeTypeError,
} from '../../../runtime/server/src/engine/errors.js';
import { fakeProviders, KeywordEmbeddings, TEST_CREDENTIALS } from '../../support/fakes.js';

describe('NodeFactory', () => {
  it('builds nodes with their catalog role and ports', () => {
    const factory = new NodeFactory({ credentials: TEST_CREDENTIALS, providers: fakeProviders() });
    const node = factory.create('qa_chain');

    expect(node.nodeType).toBe('qa_chain');
    expect(node.role).toBe('retrieval-answering');
    expect(node.name).toBe('QA Chain');
    expect(node.inputs).toEqual(['retriever', 'question', 'custom_prompt']);
    expect(node.outputs).toEqual(['answer', 'sources']);
  });

  it('materializes the config', () => {
    const factory = new NodeFactory({ credentials: TEST_CREDENTIALS, providers: fakeProviders() });
    expect(factory.create('text_splitter', { name: 'Chunker', chunk_size: '400' }).config)
      .toEqual({ name: 'Chunker', chunk_size: 400, chunk_overlap: 200 });
  });

  it('passes the configured embedding model to the provider', () => {
    const embeddings = vi.fn((_apiKey: string, _model: string) => new KeywordEmbeddings([]));
    const factory = new NodeFactory({ credentials: TEST_CREDENTIALS, providers: { ...fakeProviders(), embeddings } });

    factory.create('embeddings', { model: 'text-embedding-3-small' });

    expect(embeddings).toHaveBeenCalledWith('test-key', 'text-embedding-3-small');
  });

  it('needs no credential for local nodes', () => {
    const factory = new NodeFactory({ credentials: {} });
    expect(factory.create('pdf_loader').name).toBe('PDF Loader');
    expect(factory.create('text_splitter').role).toBe('chunking');
  });

  it('names the missing credential', () => {
    const factory = new NodeFactory({ credentials: {} });
    expect(() => factory.create('vector_store')).toThrowError('OPENAI_API_KEY not configured; cannot create vector_store node');
    expect(() => factory.create('web_search')).toThrowError(MissingCredentialError);
    expect(() => factory.create('web_search', { provider: 'brave' }))
      .toThrowError('BRAVE_API_KEY not configured; cannot create web_search node');
  });

  it('rejects unknown node types and invalid configs', () => {
    const factory = new NodeFactory({ credentials: TEST_CREDENTIALS, providers: fakeProviders() });
    expect(() => factory.create('csv_loader')).toThrowError(UnknownNodeTypeError);
    expect(() => factory.create('qa_chain', { temperature: -1 })).toThrowError(InvalidNodeConfigError);
  });
});
