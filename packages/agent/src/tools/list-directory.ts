import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createListDirectoryTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'list_directory',
    description: 'List the entries of a directory, optionally recursing up to the configured depth.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Directory to list'),
        recursive: z.boolean().default(false).describe('Descend into subdirectories'),
        depth: z.number().int().min(1).optional().describe('Maximum depth when recursive'),
      })
      .strict(),
    invoke: ({ path, recursive, depth }) => fs.list(path, { recursive, depth }),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
