import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import type { WebToolDeps } from './web-deps.js';

export function createGetPageInfoTool({ web }: WebToolDeps): RegisteredTool {
  return defineTool({
    name: 'get_page_info',
    description:
      'Check a URL and, when it answers with a success status, also extract its content. Combines validate_url and extract_content.',
    category: 'network',
    input: z
      .object({
        url: z.string().min(1).describe('http or https URL'),
      })
      .strict(),
    invoke: ({ url }, { signal }) => web.getPageInfo(url, signal),
  });
}
