import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createDeletePathTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'delete_path',
    description: 'Delete a file or directory. A backup is made first; its location is returned.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Path to delete'),
        recursive: z.boolean().default(false).describe('Required to delete a non-empty directory'),
      })
      .strict(),
    invoke: ({ path, recursive }) => fs.remove(path, { recursive }),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
