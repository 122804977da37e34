import { describe, expect, it } from 'vitest';
import { Document } from '@langchain/core/documents';
import { buildPrompt, collectSources, QaChainNode } from '../../../runtime/server/src/nodes/qa-chain.js';
import { defaultConfig, qaChainConfigSchema } from '../../../runtime/server/src/nodes/config-schemas.js';
import type { Retriever } from '../../../runtime/server/src/engine/capabilities.js';
import { RecordingChat } from '../../support/fakes.js';

function page(pageContent: string, pageNumber?: number): Document {
  return new Document({ pageContent, metadata: pageNumber === undefined ? {} : { page: pageNumber } });
}

const TEMPLATE_HEAD = "Use the following context to answer the question. If the answer is not in the context, say you don't know.";

describe('buildPrompt', () => {
  it('fills the context and question into the template', () => {
    expect(buildPrompt('What?', [page('one'), page('two')])).toBe(
      `${TEMPLATE_HEAD}\n\nCONTEXT:\none\n\ntwo\n\nQUESTION: What?\nANSWER:`,
    );
  });

  it('prepends a custom prompt with a separator', () => {
    expect(buildPrompt('Q', [page('ctx')], '  Answer in one line.  ')).toBe(
      `Answer in one line.\n\n-----\n\n${TEMPLATE_HEAD}\n\nCONTEXT:\nctx\n\nQUESTION: Q\nANSWER:`,
    );
  });

  it('uses at most six documents of context', () => {
    const documents = Array.from({ length: 8 }, (_, i) => page(`d${i}`));
    const prompt = buildPrompt('Q', documents);
    expect(prompt).toContain('d5\n\nQUESTION');
    expect(prompt).not.toContain('d6');
  });

  it('keeps dollar signs in the question literal', () => {
    expect(buildPrompt('Cost in $&?', [])).toContain('QUESTION: Cost in $&?\n');
  });
});

describe('collectSources', () => {
  it('lists unique 1-based pages in first-seen order', () => {
    expect(collectSources([page('a', 2), page('b', 0), page('c', 2), page('d')])).toEqual(['Page 3', 'Page 1']);
  });
});

describe('QaChainNode', () => {
  const config = qaChainConfigSchema.parse({ model: 'gpt-4o-mini', temperature: 0.2 });

  it('answers from retrieved documents', async () => {
    const chat = new RecordingChat('\nThe invoice total is 40 EUR.\n');
    const node = new QaChainNode(config, chat);
    const retriever: Retriever = { retrieve: async () => [page('Total: 40 EUR', 1)] };

    const result = await node.process({ retriever, question: 'What is the total?', custom_prompt: '' });

    expect(result).toEqual({
      success: true,
      answer: 'The invoice total is 40 EUR.',
      sources: ['Page 2'],
      metadata: { model: 'gpt-4o-mini', context_documents: 1 },
    });
    expect(chat.requests).toEqual([{
      model: 'gpt-4o-mini',
      temperature: 0.2,
      maxTokens: 800,
      messages: [{ role: 'user', content: buildPrompt('What is the total?', [page('Total: 40 EUR', 1)]) }],
    }]);
  });

  it('fails without a retriever', async () => {
    const node = new QaChainNode(qaChainConfigSchema.parse(defaultConfig('qa_chain')), new RecordingChat());
    expect(await node.process({ question: 'Q' })).toEqual({
      success: false,
      error: 'No retriever available; index documents first',
    });
  });

  it('fails on a blank question', async () => {
    const node = new QaChainNode(config, new RecordingChat());
    const retriever: Retriever = { retrieve: async () => [] };
    expect(await node.process({ retriever, question: '   ' })).toEqual({ success: false, error: 'No question provided' });
  });

  it('captures provider errors', async () => {
    const node = new QaChainNode(config, { complete: async () => { throw new Error('rate limited'); } });
    const retriever: Retriever = { retrieve: async () => [] };
    expect(await node.process({ retriever, question: 'Q' })).toEqual({ success: false, error: 'rate limited' });
  });
});
