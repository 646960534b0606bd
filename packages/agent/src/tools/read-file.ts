import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createReadFileTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'read_file',
    description:
      'Read a file inside the allowed directories. Text is returned as UTF-8; binary content is returned base64-encoded.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Path to the file to read'),
      })
      .strict(),
    invoke: ({ path }) => fs.read(path),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
