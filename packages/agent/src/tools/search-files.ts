import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createSearchFilesTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'search_files',
    description: 'Find files under a directory whose names match a glob pattern such as "*.md".',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Directory to search'),
        pattern: z.string().min(1).describe('Glob pattern, relative to path'),
        recursive: z.boolean().default(true).describe('Search subdirectories'),
      })
      .strict(),
    invoke: ({ path, pattern, recursive }) => fs.search(path, pattern, { recursive }),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
