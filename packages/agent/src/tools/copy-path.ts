import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createCopyPathTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'copy_path',
    description: 'Copy a file or directory. Both paths must be inside the allowed directories.',
    category: 'filesystem',
    input: z
      .object({
        source: z.string().min(1).describe('Path to copy from'),
        destination: z.string().min(1).describe('Path to copy to'),
        overwrite: z.boolean().default(false).describe('Replace an existing destination'),
      })
      .strict(),
    invoke: ({ source, destination, overwrite }) => fs.copy(source, destination, { overwrite }),
    lockTargets: ({ source, destination }) => lockKeys(guard, source, destination),
  });
}
