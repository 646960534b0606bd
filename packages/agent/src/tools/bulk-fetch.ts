import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { BULK_OPERATIONS, MAX_BULK_URLS } from '../execution/web.js';
import { defineTool } from './define.js';
import type { WebToolDeps } from './web-deps.js';

export function createBulkFetchTool({ web }: WebToolDeps): RegisteredTool {
  return defineTool({
    name: 'bulk_fetch',
    description: `Run validate_url, extract_content or get_page_info on several URLs. Only the first ${MAX_BULK_URLS} are processed; each URL reports its own result or error.`,
    category: 'network',
    input: z
      .object({
        urls: z.array(z.string().min(1)).min(1).describe('http or https URLs'),
        operation: z.enum(BULK_OPERATIONS).default('validate_url').describe('Operation to run on each URL'),
      })
      .strict(),
    invoke: ({ urls, operation }, { signal }) => web.bulk(urls, operation, signal),
  });
}
