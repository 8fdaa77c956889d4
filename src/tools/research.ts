/**
 * @fileoverview Built-in research tools.
 *
 * - `web_search`: queries an injected {@link SearchProvider}
 * - `fetch_page`: downloads a page and extracts its text
 * - `wait`: pauses the run, for sources that publish results with a delay
 *
 * Each factory returns a {@link ToolSpec} for `ToolRegistry.register`.
 *
 * @module research-loop/tools/research
 * @version 0.1.0
 */

import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import type { ToolSpec } from '../types/tools.types.js';
import { ConfigurationError } from '../types/errors.js';
import { clipText } from '../runtime/context-manager.js';
import { extractText } from './html-text.js';

// ============ Input Schemas ============

const WebSearchArgsSchema = z.object({
  query: z.string().trim().min(1).describe('Search query'),
  limit: z.number().int().min(1).max(10).default(5).describe('Maximum number of results (1-10)'),
});

const FetchPageArgsSchema = z.object({
  url: z.string().url().describe('Absolute http(s) URL of the page'),
});

const WaitArgsSchema = z.object({
  seconds: z.number().int().nonnegative().describe('Seconds to wait'),
});

type WebSearchArgs = z.infer<typeof WebSearchArgsSchema>;
type FetchPageArgs = z.infer<typeof FetchPageArgsSchema>;
type WaitArgs = z.infer<typeof WaitArgsSchema>;

// ============ web_search ============

export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

/**
 * Any search backend: a hosted search API, a site index, a fixture.
 */
export interface SearchProvider {
  search(query: string, options: { limit: number; signal: AbortSignal }): Promise<ReadonlyArray<SearchResult>>;
}

export function createWebSearchTool(provider: SearchProvider): ToolSpec<WebSearchArgs> {
  return {
    name: 'web_search',
    description: 'Search the web. Returns up to `limit` results with title, URL and snippet.',
    argsSchema: WebSearchArgsSchema,
    execute: async ({ query, limit }, context) => {
      const results = await provider.search(query, { limit, signal: context.abortSignal });
      context.logger.debug('Search completed', { query, results: results.length });

      if (results.length === 0) {
        return `No results for "${query}".`;
      }
      return results.slice(0, limit).map(result => ({
        title: result.title,
        url: result.url,
        snippet: result.snippet,
      }));
    },
  };
}

// ============ fetch_page ============

export interface FetchPageOptions {
  /** Characters of page text kept in the observation */
  readonly maxChars?: number;
  readonly fetchImpl?: typeof fetch;
  readonly userAgent?: string;
}

/**
 * Fetches a URL and returns its text. HTML is reduced to visible text;
 * plain text and JSON are returned as served.
 */
export function createFetchPageTool(options: FetchPageOptions = {}): ToolSpec<FetchPageArgs> {
  const maxChars = options.maxChars ?? 8_000;
  const fetchImpl = options.fetchImpl ?? fetch;
  const userAgent = options.userAgent ?? 'research-loop/0.1';

  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new ConfigurationError('fetch_page maxChars must be a positive integer');
  }

  return {
    name: 'fetch_page',
    description: 'Fetch a web page by URL and return its readable text.',
    argsSchema: FetchPageArgsSchema,
    execute: async ({ url }, context) => {
      const protocol = new URL(url).protocol;
      if (protocol !== 'http:' && protocol !== 'https:') {
        throw new Error(`Unsupported URL scheme '${protocol}'`);
      }

      const response = await fetchImpl(url, {
        signal: context.abortSignal,
        headers: {
          'user-agent': userAgent,
          accept: 'text/html,text/plain;q=0.9,application/json;q=0.8',
        },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} for ${url}`);
      }

      const contentType = response.headers.get('content-type') ?? '';
      const body = await response.text();
      context.logger.debug('Page fetched', { url, status: response.status, contentType, bytes: body.length });

      if (/html/i.test(contentType) || (contentType === '' && /^\s*</.test(body))) {
        const page = extractText(body);
        const text = clipText(page.text, maxChars);
        return page.title === null ? text : `Title: ${page.title}\n\n${text}`;
      }
      if (contentType === '' || contentType.startsWith('text/') || /json/i.test(contentType)) {
        return clipText(body.trim(), maxChars);
      }
      throw new Error(`Unsupported content type '${contentType}'`);
    },
  };
}

// ============ wait ============

export interface WaitToolOptions {
  /** Shorter waits are rounded up to this */
  readonly minSeconds?: number;

  /** Longer waits are capped at this */
  readonly maxSeconds?: number;

  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export function createWaitTool(options: WaitToolOptions = {}): ToolSpec<WaitArgs> {
  const minSeconds = options.minSeconds ?? 5;
  const maxSeconds = options.maxSeconds ?? 25;
  const sleep = options.sleep ?? ((ms: number, signal: AbortSignal) => delay(ms, undefined, { signal }));

  if (minSeconds < 0 || maxSeconds < minSeconds) {
    throw new ConfigurationError(`wait bounds are invalid: min ${minSeconds}s, max ${maxSeconds}s`);
  }

  return {
    name: 'wait',
    description: `Wait for a number of seconds before continuing (minimum ${minSeconds}, maximum ${maxSeconds}).`,
    argsSchema: WaitArgsSchema,
    execute: async ({ seconds }, context) => {
      const effective = Math.min(Math.max(seconds, minSeconds), maxSeconds);
      await sleep(effective * 1_000, context.abortSignal);
      context.logger.info('Waited', { seconds: effective });
      return `Waited for ${effective} seconds`;
    },
  };
}
