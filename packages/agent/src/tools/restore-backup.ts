import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createRestoreBackupTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'restore_backup',
    description:
      'Restore a backup over a path. Without backup_name the most recent backup of that file name is used. The current file is backed up first.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Path to restore'),
        backup_name: z.string().min(1).optional().describe('Name of the backup, as returned by backup_path'),
      })
      .strict(),
    invoke: ({ path, backup_name }) => fs.restoreBackup(path, backup_name),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
