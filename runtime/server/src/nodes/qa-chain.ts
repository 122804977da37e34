import type { Document } from '@langchain/core/documents';
import type { NodeInputs, NodeResult } from '../types/index.js';
import type { ChatProvider } from '../providers/openai.js';
import { isRetriever } from '../engine/capabilities.js';
import { BaseNode } from './base.js';
import type { QaChainConfig } from './config-schemas.js';
import { pageOf } from './documents.js';

export const MAX_CONTEXT_DOCUMENTS = 6;
export const MAX_ANSWER_TOKENS = 800;

const PROMPT_TEMPLATE = [
  "Use the following context to answer the question. If the answer is not in the context, say you don't know.",
  '',
  'CONTEXT:',
  '{context}',
  '',
  'QUESTION: {question}',
  'ANSWER:',
].join('\n');

const CUSTOM_PROMPT_SEPARATOR = '\n\n-----\n\n';

export function buildPrompt(question: string, documents: Document[], customPrompt = ''): string {
  const context = documents
    .slice(0, MAX_CONTEXT_DOCUMENTS)
    .map((doc) => doc.pageContent)
    .join('\n\n');
  const prompt = PROMPT_TEMPLATE
    .replace('{context}', () => context)
    .replace('{question}', () => question);
  const custom = customPrompt.trim();
  return custom ? `${custom}${CUSTOM_PROMPT_SEPARATOR}${prompt}` : prompt;
}

/**
 * "Page N" labels (1-based) for documents that carry a page number, first occurrence order
 */
export function collectSources(documents: Document[]): string[] {
  const labels = documents
    .map(pageOf)
    .filter((page): page is number => page !== undefined)
    .map((page) => `Page ${page + 1}`);
  return Array.from(new Set(labels));
}

export class QaChainNode extends BaseNode<QaChainConfig> {
  readonly nodeType = 'qa_chain';

  constructor(config: QaChainConfig, private readonly chat: ChatProvider) {
    super(config);
  }

  async process(inputs: NodeInputs): Promise<NodeResult> {
    const { retriever, question, custom_prompt: customPrompt } = inputs;
    if (!isRetriever(retriever)) {
      return this.failure('No retriever available; index documents first');
    }
    if (typeof question !== 'string' || question.trim().length === 0) {
      return this.failure('No question provided');
    }

    try {
      const documents = await retriever.retrieve(question);
      const prompt = buildPrompt(question, documents, typeof customPrompt === 'string' ? customPrompt : '');
      const answer = await this.chat.complete({
        model: this.config.model,
        temperature: this.config.temperature,
        maxTokens: MAX_ANSWER_TOKENS,
        messages: [{ role: 'user', content: prompt }],
      });

      return this.success(
        { answer: answer.trim(), sources: collectSources(documents) },
        { model: this.config.model, context_documents: Math.min(documents.length, MAX_CONTEXT_DOCUMENTS) },
      );
    } catch (error) {
      return this.failure(error);
    }
  }
}
