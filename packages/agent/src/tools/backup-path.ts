import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createBackupPathTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'backup_path',
    description: 'Copy a file or directory into the backup directory under a timestamped name.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Path to back up'),
      })
      .strict(),
    invoke: ({ path }) => fs.backup(path),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
