import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { HASH_ALGORITHMS } from '../execution/file-system.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createHashFileTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'hash_file',
    description: 'Compute the hex digest of a file.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('File to hash'),
        algorithm: z.enum(HASH_ALGORITHMS).default('sha256').describe('Digest algorithm'),
      })
      .strict(),
    invoke: ({ path, algorithm }) => fs.hash(path, algorithm),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
