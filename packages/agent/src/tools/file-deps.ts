import type { PathGuard } from '../sandbox/index.js';
import type { SandboxedFileSystem } from '../execution/file-system.js';

export type FileToolDeps = {
  readonly fs: SandboxedFileSystem;
  readonly guard: PathGuard;
};

/**
 * Lock keys for a call. Canonicalization applies no policy: a path that will
 * be refused still gets a key, and the operation re-validates under the lock.
 */
export function lockKeys(guard: PathGuard, ...paths: ReadonlyArray<string>): Promise<ReadonlyArray<string>> {
  return Promise.all(paths.map((path) => guard.canonicalize(path)));
}
