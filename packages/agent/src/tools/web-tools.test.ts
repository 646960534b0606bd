import { describe, it, expect, vi } from 'vitest';
import { createWebTools } from './registry.js';
import { createWebClient } from '../execution/web.js';
import { createSilentLogger } from '../logging/index.js';
import type { RegisteredTool } from '../types/index.js';
import { searchPolicy } from '../../tests/support/search-policy.js';

type FetchCall = [input: string | URL | Request, init?: RequestInit];

function setup(...responses: Response[]) {
  const fetch = vi.fn(async (..._args: FetchCall): Promise<Response> => {
    const next = responses.shift();
    if (!next) {
      throw new Error('unexpected fetch');
    }
    return next;
  });
  const web = createWebClient({ policy: searchPolicy(), fetch, resolveHost: async () => ['93.184.216.34'] });
  const tools = new Map<string, RegisteredTool>(createWebTools({ web }).map((tool) => [tool.spec.name, tool]));

  async function run(name: string, args: Record<string, unknown>): Promise<unknown> {
    const parsed = tools.get(name)?.handler.parse(args);
    if (!parsed?.ok) {
      throw new Error(`could not parse arguments for ${name}`);
    }
    return parsed.call.invoke({ signal: new AbortController().signal, logger: createSilentLogger() });
  }

  return { fetch, tools, run };
}

describe('web tools', () => {
  it('should register the web tools in a fixed order', () => {
    const { tools } = setup();

    expect(Array.from(tools.keys())).toEqual([
      'web_search',
      'extract_content',
      'validate_url',
      'parse_rss',
      'search_news',
      'get_page_info',
      'bulk_fetch',
    ]);
    expect(Array.from(tools.values()).every((tool) => tool.spec.category === 'network')).toBe(true);
  });

  describe('search_news', () => {
    it('should search for news from the past week by default', async () => {
      const { fetch, run } = setup(Response.json({ Heading: '', AbstractURL: '', RelatedTopics: [] }));

      const response = await run('search_news', { query: 'green tea' });

      expect(response).toMatchObject({ query: 'green tea news', timeRange: 'week', results: [] });
      const url = new URL(String(fetch.mock.calls[0]?.[0]));
      expect(url.searchParams.get('q')).toBe('green tea news');
      expect(url.searchParams.get('df')).toBe('w');
    });
  });

  describe('bulk_fetch', () => {
    it('should validate each URL by default', async () => {
      const { run } = setup(new Response(null, { status: 200 }), new Response(null, { status: 404 }));

      const result = await run('bulk_fetch', { urls: ['https://example.com/a', 'https://example.com/b'] });

      expect(result).toMatchObject({
        operation: 'validate_url',
        totalUrls: 2,
        processedUrls: 2,
        results: [
          { url: 'https://example.com/a', ok: true, result: { statusCode: 200 } },
          { url: 'https://example.com/b', ok: true, result: { statusCode: 404 } },
        ],
      });
    });

    it('should refuse an empty URL list', () => {
      const { tools } = setup();

      expect(tools.get('bulk_fetch')?.handler.parse({ urls: [] }).ok).toBe(false);
    });
  });
});
