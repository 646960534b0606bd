import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import type { WebToolDeps } from './web-deps.js';

export function createParseRssTool({ web }: WebToolDeps): RegisteredTool {
  return defineTool({
    name: 'parse_rss',
    description: 'Fetch an RSS or Atom feed and return its entries.',
    category: 'network',
    input: z
      .object({
        url: z.string().min(1).describe('Feed URL'),
        max_entries: z.number().int().min(1).optional().describe('Entry count, capped by policy'),
      })
      .strict(),
    invoke: ({ url, max_entries }, { signal }) => web.parseRss(url, { maxEntries: max_entries, signal }),
  });
}
