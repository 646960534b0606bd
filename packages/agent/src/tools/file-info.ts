import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createFileInfoTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'file_info',
    description: 'Report type, size, timestamps and permission bits of a path.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Path to inspect'),
      })
      .strict(),
    invoke: ({ path }) => fs.info(path),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
