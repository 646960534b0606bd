import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { TIME_RANGES } from '../execution/search-engines.js';
import { defineTool } from './define.js';
import type { WebToolDeps } from './web-deps.js';

export function createSearchNewsTool({ web }: WebToolDeps): RegisteredTool {
  return defineTool({
    name: 'search_news',
    description: 'Search recent news on a topic. Defaults to the past week.',
    category: 'network',
    input: z
      .object({
        query: z.string().trim().min(1).describe('News topic'),
        max_results: z.number().int().min(1).max(50).optional().describe('Result count, capped by policy'),
        time_range: z.enum(TIME_RANGES).default('week').describe('Only results from this period'),
      })
      .strict(),
    invoke: ({ query, max_results, time_range }, { signal }) =>
      web.search(`${query} news`, { maxResults: max_results, timeRange: time_range, signal }),
  });
}
