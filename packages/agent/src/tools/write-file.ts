import { z } from 'zod';
import type { RegisteredTool } from '../types/index.js';
import { defineTool } from './define.js';
import { lockKeys } from './file-deps.js';
import type { FileToolDeps } from './file-deps.js';

export function createWriteFileTool({ fs, guard }: FileToolDeps): RegisteredTool {
  return defineTool({
    name: 'write_file',
    description:
      'Write content to a file. Fails if the file exists unless overwrite is true; an overwritten file is backed up first.',
    category: 'filesystem',
    input: z
      .object({
        path: z.string().min(1).describe('Path to the file to write'),
        content: z.string().describe('Content to write'),
        overwrite: z.boolean().default(false).describe('Replace an existing file'),
        encoding: z.enum(['utf-8', 'base64']).default('utf-8').describe('How content is encoded'),
        create_directories: z.boolean().default(true).describe('Create missing parent directories'),
      })
      .strict(),
    invoke: ({ path, content, overwrite, encoding, create_directories }) =>
      fs.write(path, content, { overwrite, encoding, createDirectories: create_directories }),
    lockTargets: ({ path }) => lockKeys(guard, path),
  });
}
