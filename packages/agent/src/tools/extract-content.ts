import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import type { WebToolDeps } from './web-deps.js';

export function createExtractContentTool({ web }: WebToolDeps): RegisteredTool {
  return defineTool({
    name: 'extract_content',
    description:
      'Fetch a web page and return its title, description, readable text and links. Long pages are truncated.',
    category: 'network',
    input: z
      .object({
        url: z.string().min(1).describe('http or https URL'),
      })
      .strict(),
    invoke: ({ url }, { signal }) => web.extractContent(url, signal),
  });
}
