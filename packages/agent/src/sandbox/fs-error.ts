import { ToolError } from '../types/error.js';
import type { ToolErrorKind } from '../types/error.js';

const ERRNO_KINDS: Readonly<Record<string, ToolErrorKind>> = {
  ENOENT: 'NotFound',
  EEXIST: 'AlreadyExists',
  ENOTEMPTY: 'AlreadyExists',
  EACCES: 'Denied',
  EPERM: 'Denied',
  EROFS: 'Denied',
  EISDIR: 'InvalidArguments',
  ENOTDIR: 'InvalidArguments',
  ELOOP: 'Malformed',
  ENAMETOOLONG: 'Malformed',
  EFBIG: 'TooLarge',
};

export function errnoCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Maps a Node filesystem error onto the tool error taxonomy. Errors that
 * are already ToolErrors pass through; unknown errno codes are rethrown
 * unchanged so the dispatcher reports them as Internal.
 */
export function toToolError(error: unknown, path: string): unknown {
  if (error instanceof ToolError) {
    return error;
  }
  const code = errnoCode(error);
  const kind = code === null ? undefined : ERRNO_KINDS[code];
  if (kind === undefined || !(error instanceof Error)) {
    return error;
  }

  const messages: Partial<Record<ToolErrorKind, string>> = {
    NotFound: `No such file or directory: ${path}`,
    AlreadyExists: `Already exists: ${path}`,
    Denied: `Permission denied by the operating system: ${path}`,
  };
  return new ToolError(kind, messages[kind] ?? error.message, {
    details: { path, code },
    cause: error,
  });
}
