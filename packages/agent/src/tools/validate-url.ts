import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import type { WebToolDeps } from './web-deps.js';

export function createValidateUrlTool({ web }: WebToolDeps): RegisteredTool {
  return defineTool({
    name: 'validate_url',
    description: 'Check whether a URL is reachable. Returns the status code and selected headers; a 404 is not an error.',
    category: 'network',
    input: z
      .object({
        url: z.string().min(1).describe('http or https URL'),
      })
      .strict(),
    invoke: ({ url }, { signal }) => web.validateUrl(url, signal),
  });
}
