import { z } from 'zod';
import { SEARCH_ENGINES } from '../types/index.js';
import type { RegisteredTool } from '../types/index.js';
import { TIME_RANGES } from '../execution/search-engines.js';
import { defineTool } from './define.js';
import type { WebToolDeps } from './web-deps.js';

export function createWebSearchTool({ web }: WebToolDeps): RegisteredTool {
  return defineTool({
    name: 'web_search',
    description: 'Search the web. Returns title, URL and snippet for each result.',
    category: 'network',
    input: z
      .object({
        query: z.string().trim().min(1).describe('Search query'),
        engine: z.enum(SEARCH_ENGINES).optional().describe('Search backend; defaults to the configured one'),
        max_results: z.number().int().min(1).max(50).optional().describe('Result count, capped by policy'),
        time_range: z.enum(TIME_RANGES).default('all').describe('Only results from this period'),
      })
      .strict(),
    invoke: ({ query, engine, max_results, time_range }, { signal }) =>
      web.search(query, { engine, maxResults: max_results, timeRange: time_range, signal }),
  });
}
