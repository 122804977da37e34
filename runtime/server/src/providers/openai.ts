/**
 * OpenAI Provider
 *
 * Embeddings and chat completions through the official SDK.
 */

import OpenAI from 'openai';

export interface EmbeddingProvider {
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface ChatRequest {
  model: string;
  temperature: number;
  maxTokens: number;
  messages: ChatMessage[];
}

export interface ChatProvider {
  complete(request: ChatRequest): Promise<string>;
}

export function createOpenAIClient(apiKey: string, timeoutMs: number): OpenAI {
  return new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 2 });
}

export class OpenAIEmbeddings implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const response = await this.client.embeddings.create({ model: this.model, input: texts });
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embedQuery(text: string): Promise<number[]> {
    const [embedding] = await this.embedDocuments([text]);
    if (!embedding) {
      throw new Error('Embedding response was empty');
    }
    return embedding;
  }
}

export class OpenAIChat implements ChatProvider {
  constructor(private readonly client: OpenAI) {}

  async complete(request: ChatRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      messages: request.messages,
    });
    return response.choices[0]?.message?.content ?? '';
  }
}
