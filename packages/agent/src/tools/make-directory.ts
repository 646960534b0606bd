import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createMakeDirectoryTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'make_directory',
    description: 'Create a directory and any missing parents.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Directory to create'),
      })
      .strict(),
    invoke: ({ path }) => fs.makeDirectory(path),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
