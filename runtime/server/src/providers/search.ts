/**
 * Web Search Providers
 *
 * SerpAPI (Google results) and Brave Search, normalized to one result shape.
 */

import { z } from 'zod';

export type SearchProviderName = 'serpapi' | 'brave';

export interface SearchResult {
  title: string;
  link: string;
  snippet: string;
}

export interface SearchProvider {
  readonly name: SearchProviderName;
  search(query: string, numResults: number): Promise<SearchResult[]>;
}

const SERPAPI_URL = 'https://serpapi.com/search.json';
const BRAVE_URL = 'https://api.search.brave.com/res/v1/web/search';

const serpApiResponseSchema = z.object({
  organic_results: z.array(z.object({
    title: z.string().default(''),
    link: z.string().default(''),
    snippet: z.string().default(''),
  }).passthrough()).default([]),
}).passthrough();

const braveResponseSchema = z.object({
  web: z.object({
    results: z.array(z.object({
      title: z.string().default(''),
      url: z.string().default(''),
      description: z.string().default(''),
    }).passthrough()).default([]),
  }).passthrough().default({}),
}).passthrough();

async function getJson(url: URL, headers: Record<string, string>, provider: SearchProviderName): Promise<unknown> {
  const response = await fetch(url, { headers });
  if (!response.ok) {
    const text = await response.text();
    throw new Error(`${provider} search failed: ${response.status} ${text}`);
  }
  return response.json();
}

export class SerpApiSearch implements SearchProvider {
  readonly name = 'serpapi';

  constructor(private readonly apiKey: string) {}

  async search(query: string, numResults: number): Promise<SearchResult[]> {
    const url = new URL(SERPAPI_URL);
    url.searchParams.set('engine', 'google');
    url.searchParams.set('q', query);
    url.searchParams.set('num', String(numResults));
    url.searchParams.set('api_key', this.apiKey);

    const body = serpApiResponseSchema.parse(await getJson(url, { Accept: 'application/json' }, this.name));
    return body.organic_results.slice(0, numResults).map((result) => ({
      title: result.title,
      link: result.link,
      snippet: result.snippet,
    }));
  }
}

export class BraveSearch implements SearchProvider {
  readonly name = 'brave';

  constructor(private readonly apiKey: string) {}

  async search(query: string, numResults: number): Promise<SearchResult[]> {
    const url = new URL(BRAVE_URL);
    url.searchParams.set('q', query);
    url.searchParams.set('count', String(numResults));

    const body = braveResponseSchema.parse(await getJson(url, {
      Accept: 'application/json',
      'X-Subscription-Token': this.apiKey,
    }, this.name));
    return body.web.results.slice(0, numResults).map((result) => ({
      title: result.title,
      link: result.url,
      snippet: result.description,
    }));
  }
}
