import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createMovePathTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'move_path',
    description: 'Move or rename a file or directory. Both paths must be inside the allowed directories.',
    category: 'filesystem',
    input: z
      .object({
        source: z.string().min(1).describe('Path to move'),
        destination: z.string().min(1).describe('New path'),
        overwrite: z.boolean().default(false).describe('Replace an existing destination'),
      })
      .strict(),
    invoke: ({ source, destination, overwrite }) => fs.move(source, destination, { overwrite }),
    lockTargets: ({ source, destination }) => lockKeys(guard, source, destination),
  });
}
