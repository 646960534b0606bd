import { createHash } from 'node:crypto';
import { constants, createReadStream } from 'node:fs';
import type { Stats } from 'node:fs';
import {
  copyFile,
  cp,
  lstat,
  mkdir,
  readdir,
  readFile,
  rename,
  rm,
  stat,
  writeFile,
} from 'node:fs/promises';
import { basename, dirname, extname, isAbsolute, join, relative, sep } from 'node:path';
import { nanoid } from 'nanoid';
import { glob } from 'tinyglobby';
import { ToolError } from '../types/error.js';
import type { PathPolicy } from '../types/config.js';
import type { PathGuard } from '../sandbox/path-guard.js';
import { errnoCode, toToolError } from '../sandbox/fs-error.js';

export const HASH_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha512'] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export type ContentEncoding = 'utf-8' | 'base64';

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

export type ReadResult = {
  readonly path: string;
  readonly content: string;
  readonly encoding: ContentEncoding;
  readonly size: number;
  readonly modified: string;
};

export type WriteOptions = {
  readonly overwrite?: boolean;
  readonly encoding?: ContentEncoding;
  readonly createDirectories?: boolean;
};

export type WriteResult = {
  readonly path: string;
  readonly bytesWritten: number;
  readonly created: boolean;
  readonly backupPath: string | null;
};

export type DirectoryEntry = {
  /** Relative to the listed directory, `/`-separated. */
  readonly name: string;
  readonly type: EntryType;
  readonly isDirectory: boolean;
  readonly size: number;
  readonly modified: string;
};

export type ListOptions = {
  readonly recursive?: boolean;
  readonly depth?: number;
};

export type ListResult = {
  readonly path: string;
  readonly entries: ReadonlyArray<DirectoryEntry>;
  readonly truncated: boolean;
};

export type TransferOptions = {
  readonly overwrite?: boolean;
};

export type TransferResult = {
  readonly source: string;
  readonly destination: string;
  readonly isDirectory: boolean;
  readonly backupPath: string | null;
};

export type DeleteResult = {
  readonly path: string;
  readonly isDirectory: boolean;
  readonly backupPath: string;
};

export type FileSearchOptions = {
  readonly recursive?: boolean;
};

export type FileSearchMatch = {
  readonly path: string;
  readonly relativePath: string;
  readonly size: number;
};

export type FileSearchResult = {
  readonly path: string;
  readonly pattern: string;
  readonly matches: ReadonlyArray<FileSearchMatch>;
  readonly truncated: boolean;
};

export type HashResult = {
  readonly path: string;
  readonly algorithm: HashAlgorithm;
  readonly digest: string;
  readonly size: number;
};

export type BackupResult = {
  readonly path: string;
  readonly backupPath: string;
  readonly backupName: string;
};

export type RestoreResult = {
  readonly path: string;
  readonly restoredFrom: string;
  readonly backupOfCurrent: string | null;
};

export type FileInfo = {
  readonly path: string;
  readonly name: string;
  readonly type: EntryType;
  readonly size: number;
  readonly created: string;
  readonly modified: string;
  readonly accessed: string;
  readonly permissions: string;
  readonly extension: string;
};

export type MakeDirectoryResult = {
  readonly path: string;
  readonly created: boolean;
};

/**
 * File operations confined by a PathGuard. Every path argument is validated
 * before the first syscall that touches it.
 */
export type SandboxedFileSystem = {
  readonly read: (path: string) => Promise<ReadResult>;
  readonly write: (path: string, content: string, options?: WriteOptions) => Promise<WriteResult>;
  readonly list: (path: string, options?: ListOptions) => Promise<ListResult>;
  readonly copy: (source: string, destination: string, options?: TransferOptions) => Promise<TransferResult>;
  readonly move: (source: string, destination: string, options?: TransferOptions) => Promise<TransferResult>;
  readonly remove: (path: string, options?: { readonly recursive?: boolean }) => Promise<DeleteResult>;
  readonly search: (path: string, pattern: string, options?: FileSearchOptions) => Promise<FileSearchResult>;
  readonly hash: (path: string, algorithm?: HashAlgorithm) => Promise<HashResult>;
  readonly backup: (path: string) => Promise<BackupResult>;
  readonly restoreBackup: (path: string, backupName?: string) => Promise<RestoreResult>;
  readonly info: (path: string) => Promise<FileInfo>;
  readonly makeDirectory: (path: string) => Promise<MakeDirectoryResult>;
};

export type FileSystemDeps = {
  readonly guard: PathGuard;
  readonly policy: PathPolicy;
  readonly clock?: () => Date;
};

const HASH_CHUNK_BYTES = 64 * 1024;
const BACKUP_SUFFIX = /^_(\d{8}-\d{6}-\d{3})_[A-Za-z0-9_-]{8}$/;

function entryType(stats: Stats): EntryType {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

function backupStamp(date: Date): string {
  // 2026-10-18T09:04:05.123Z -> 20261018-090405-123
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replaceAll('-', '')}-${iso.slice(11, 19).replaceAll(':', '')}-${iso.slice(20, 23)}`;
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

function decodeUtf8(buffer: Buffer): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    return null;
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw toToolError(error, path);
  }
}

async function statOrThrow(path: string): Promise<Stats> {
  try {
    return await stat(path);
  } catch (error) {
    throw toToolError(error, path);
  }
}

export function createSandboxedFileSystem(deps: FileSystemDeps): SandboxedFileSystem {
  const { guard, policy } = deps;
  const clock = deps.clock ?? (() => new Date());

  function assertWithinSizeLimit(path: string, size: number): void {
    if (size > policy.maxFileSize) {
      throw new ToolError(
        'TooLarge',
        `File is ${size} bytes, over the ${policy.maxFileSize} byte limit: ${path}`,
        { details: { path, size, maxFileSize: policy.maxFileSize } },
      );
    }
  }

  function assertCopyable(path: string, stats: Stats): void {
    if (!stats.isFile() && !stats.isDirectory()) {
      throw new ToolError('InvalidArguments', `Not a regular file or directory: ${path}`, { details: { path } });
    }
  }

  /**
   * Copies `path` into the backup directory. Any failure becomes a ToolError
   * so callers abort whatever they were about to do to the original.
   */
  async function makeBackup(path: string, stats: Stats): Promise<BackupResult> {
    const backupName = `${basename(path)}_${backupStamp(clock())}_${nanoid(8)}`;
    const backupPath = join(policy.backupDirectory, backupName);
    assertCopyable(path, stats);
    try {
      await mkdir(policy.backupDirectory, { recursive: true });
      if (stats.isDirectory()) {
        await cp(path, backupPath, { recursive: true, errorOnExist: true, force: false });
      } else {
        await copyFile(path, backupPath, constants.COPYFILE_EXCL);
      }
    } catch (error) {
      throw new ToolError('Internal', `Could not back up ${path}; the original was left untouched`, {
        details: { path, backupDirectory: policy.backupDirectory, code: errnoCode(error) },
        cause: error instanceof Error ? error : undefined,
      });
    }
    return { path, backupPath, backupName };
  }

  async function writeAtomically(target: string, data: Buffer): Promise<void> {
    const temp = join(dirname(target), `.${basename(target)}.${nanoid(8)}.tmp`);
    try {
      await writeFile(temp, data, { flag: 'wx' });
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw toToolError(error, target);
    }
  }

  async function read(path: string): Promise<ReadResult> {
    const { path: target } = await guard.validate(path, 'read');
    const stats = await statOrThrow(target);
    if (stats.isDirectory()) {
      throw new ToolError('InvalidArguments', `Is a directory, not a file: ${target}`, { details: { path: target } });
    }
    if (!stats.isFile()) {
      throw new ToolError('InvalidArguments', `Not a regular file: ${target}`, { details: { path: target } });
    }
    assertWithinSizeLimit(target, stats.size);

    let buffer: Buffer;
    try {
      buffer = await readFile(target);
    } catch (error) {
      throw toToolError(error, target);
    }

    const text = decodeUtf8(buffer);
    return {
      path: target,
      content: text ?? buffer.toString('base64'),
      encoding: text === null ? 'base64' : 'utf-8',
      size: buffer.byteLength,
      modified: stats.mtime.toISOString(),
    };
  }

  async function write(path: string, content: string, options: WriteOptions = {}): Promise<WriteResult> {
    const { overwrite = false, encoding = 'utf-8', createDirectories = true } = options;
    const { path: target } = await guard.validate(path, 'write');

    const data = Buffer.from(content, encoding === 'base64' ? 'base64' : 'utf8');
    assertWithinSizeLimit(target, data.byteLength);

    const existing = await statOrNull(target);
    if (existing?.isDirectory()) {
      throw new ToolError('InvalidArguments', `Is a directory, not a file: ${target}`, { details: { path: target } });
    }
    if (existing && !overwrite) {
      throw new ToolError('AlreadyExists', `File already exists: ${target} (pass overwrite=true to replace it)`, {
        details: { path: target },
      });
    }

    const backup = existing ? await makeBackup(target, existing) : null;

    if (createDirectories) {
      try {
        await mkdir(dirname(target), { recursive: true });
      } catch (error) {
        throw toToolError(error, dirname(target));
      }
    }
    await writeAtomically(target, data);

    return {
      path: target,
      bytesWritten: data.byteLength,
      created: existing === null,
      backupPath: backup?.backupPath ?? null,
    };
  }

  async function list(path: string, options: ListOptions = {}): Promise<ListResult> {
    const { path: root } = await guard.validate(path, 'list');
    const rootStats = await statOrThrow(root);
    if (!rootStats.isDirectory()) {
      throw new ToolError('InvalidArguments', `Not a directory: ${root}`, { details: { path: root } });
    }

    const maxDepth = options.recursive ? Math.min(options.depth ?? policy.maxDepth, policy.maxDepth) : 0;
    const entries: DirectoryEntry[] = [];
    let truncated = false;

    async function walk(directory: string, depth: number): Promise<void> {
      let names: string[];
      try {
        names = await readdir(directory);
      } catch (error) {
        throw toToolError(error, directory);
      }
      names.sort();

      for (const name of names) {
        if (guard.isBlockedName(name)) {
          continue;
        }
        if (entries.length >= policy.maxListEntries) {
          truncated = true;
          return;
        }
        const fullPath = join(directory, name);
        let stats: Stats;
        try {
          stats = await lstat(fullPath);
        } catch (error) {
          // Removed between readdir and lstat.
          if (errnoCode(error) === 'ENOENT') {
            continue;
          }
          throw toToolError(error, fullPath);
        }
        const type = entryType(stats);
        entries.push({
          name: toPosix(relative(root, fullPath)),
          type,
          isDirectory: type === 'directory',
          size: stats.size,
          modified: stats.mtime.toISOString(),
        });
        // Symlinked directories are listed but never entered.
        if (type === 'directory' && depth < maxDepth) {
          await walk(fullPath, depth + 1);
          if (truncated) {
            return;
          }
        }
      }
    }

    await walk(root, 0);
    return { path: root, entries, truncated };
  }

  async function prepareDestination(destination: string, overwrite: boolean): Promise<string | null> {
    const existing = await statOrNull(destination);
    if (!existing) {
      return null;
    }
    if (!overwrite) {
      throw new ToolError('AlreadyExists', `Destination already exists: ${destination} (pass overwrite=true to replace it)`, {
        details: { path: destination },
      });
    }
    const backup = await makeBackup(destination, existing);
    try {
      await rm(destination, { recursive: true, force: true });
    } catch (error) {
      throw toToolError(error, destination);
    }
    return backup.backupPath;
  }

  async function copy(source: string, destination: string, options: TransferOptions = {}): Promise<TransferResult> {
    const { path: from } = await guard.validate(source, 'read');
    const { path: to } = await guard.validate(destination, 'write');
    const stats = await statOrThrow(from);
    assertCopyable(from, stats);

    const backupPath = await prepareDestination(to, options.overwrite ?? false);
    try {
      await mkdir(dirname(to), { recursive: true });
      if (stats.isDirectory()) {
        await cp(from, to, { recursive: true, errorOnExist: true, force: false });
      } else {
        await copyFile(from, to, constants.COPYFILE_EXCL);
      }
    } catch (error) {
      throw toToolError(error, to);
    }

    return { source: from, destination: to, isDirectory: stats.isDirectory(), backupPath };
  }

  async function move(source: string, destination: string, options: TransferOptions = {}): Promise<TransferResult> {
    // The source disappears, so it is held to the delete rules.
    const { path: from } = await guard.validate(source, 'delete');
    const { path: to } = await guard.validate(destination, 'write');
    const stats = await statOrThrow(from);

    const backupPath = await prepareDestination(to, options.overwrite ?? false);
    try {
      await mkdir(dirname(to), { recursive: true });
      await rename(from, to);
    } catch (error) {
      if (errnoCode(error) !== 'EXDEV') {
        throw toToolError(error, to);
      }
      try {
        await cp(from, to, { recursive: true, errorOnExist: true, force: false });
        await rm(from, { recursive: true });
      } catch (fallbackError) {
        throw toToolError(fallbackError, to);
      }
    }

    return { source: from, destination: to, isDirectory: stats.isDirectory(), backupPath };
  }

  async function remove(path: string, options: { readonly recursive?: boolean } = {}): Promise<DeleteResult> {
    const { path: target } = await guard.validate(path, 'delete');
    const stats = await statOrThrow(target);

    if (stats.isDirectory() && !options.recursive) {
      const children = await readdir(target);
      if (children.length > 0) {
        throw new ToolError(
          'InvalidArguments',
          `Directory is not empty: ${target} (pass recursive=true to delete it with its contents)`,
          { details: { path: target, entries: children.length } },
        );
      }
    }

    const backup = await makeBackup(target, stats);
    try {
      await rm(target, { recursive: true });
    } catch (error) {
      throw toToolError(error, target);
    }

    return { path: target, isDirectory: stats.isDirectory(), backupPath: backup.backupPath };
  }

  async function search(path: string, pattern: string, options: FileSearchOptions = {}): Promise<FileSearchResult> {
    const { recursive = true } = options;
    const { path: root } = await guard.validate(path, 'list');

    const trimmed = pattern.trim();
    if (trimmed === '') {
      throw new ToolError('InvalidArguments', 'Search pattern is empty');
    }
    if (isAbsolute(trimmed) || trimmed.split(/[\\/]/).includes('..')) {
      throw new ToolError('Denied', `Search pattern must stay inside the directory: ${pattern}`, {
        details: { pattern },
      });
    }

    const expanded = recursive && !trimmed.includes('/') ? `**/${trimmed}` : trimmed;
    let found: string[];
    try {
      found = await glob([expanded], {
        cwd: root,
        absolute: true,
        onlyFiles: true,
        dot: true,
        followSymbolicLinks: false,
        expandDirectories: false,
        deep: recursive ? policy.maxDepth + 1 : 1,
      });
    } catch (error) {
      throw toToolError(error, root);
    }
    found.sort();

    const matches: FileSearchMatch[] = [];
    let truncated = false;
    for (const candidate of found) {
      let resolved: string;
      try {
        ({ path: resolved } = await guard.validate(candidate, 'read'));
      } catch (error) {
        if (error instanceof ToolError) {
          continue;
        }
        throw error;
      }
      if (matches.length >= policy.maxListEntries) {
        truncated = true;
        break;
      }
      const stats = await statOrNull(resolved);
      matches.push({
        path: resolved,
        relativePath: toPosix(relative(root, candidate)),
        size: stats?.size ?? 0,
      });
    }

    return { path: root, pattern, matches, truncated };
  }

  async function hash(path: string, algorithm: HashAlgorithm = 'sha256'): Promise<HashResult> {
    const { path: target } = await guard.validate(path, 'read');
    const stats = await statOrThrow(target);
    if (!stats.isFile()) {
      throw new ToolError('InvalidArguments', `Not a regular file: ${target}`, { details: { path: target } });
    }

    const digest = createHash(algorithm);
    let size = 0;
    try {
      for await (const chunk of createReadStream(target, { highWaterMark: HASH_CHUNK_BYTES })) {
        if (!Buffer.isBuffer(chunk)) {
          throw new ToolError('Internal', `Unexpected chunk type while hashing ${target}`);
        }
        digest.update(chunk);
        size += chunk.byteLength;
      }
    } catch (error) {
      throw toToolError(error, target);
    }

    return { path: target, algorithm, digest: digest.digest('hex'), size };
  }

  async function backup(path: string): Promise<BackupResult> {
    const { path: target } = await guard.validate(path, 'read');
    const stats = await statOrThrow(target);
    return makeBackup(target, stats);
  }

  async function findLatestBackup(target: string): Promise<string> {
    const base = basename(target);
    let names: string[];
    try {
      names = await readdir(policy.backupDirectory);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        names = [];
      } else {
        throw toToolError(error, policy.backupDirectory);
      }
    }

    const candidates = names
      .filter((name) => name.startsWith(base))
      .map((name) => ({ name, stamp: name.slice(base.length).match(BACKUP_SUFFIX)?.[1] }))
      .flatMap(({ name, stamp }) => (stamp === undefined ? [] : [{ name, stamp }]))
      .sort((a, b) => (a.stamp === b.stamp ? a.name.localeCompare(b.name) : a.stamp < b.stamp ? 1 : -1));

    const latest = candidates[0];
    if (!latest) {
      throw new ToolError('NotFound', `No backups found for ${basename(target)}`, {
        details: { path: target, backupDirectory: policy.backupDirectory },
      });
    }
    return latest.name;
  }

  async function restoreBackup(path: string, backupName?: string): Promise<RestoreResult> {
    const { path: target } = await guard.validate(path, 'write');

    if (backupName !== undefined && (basename(backupName) !== backupName || backupName === '.' || backupName === '..')) {
      throw new ToolError('Malformed', `Backup name must be a bare file name: ${backupName}`, {
        details: { backupName },
      });
    }

    const name = backupName ?? (await findLatestBackup(target));
    const source = join(policy.backupDirectory, name);
    const backupStats = await statOrThrow(source);

    const current = await statOrNull(target);
    const backupOfCurrent = current ? await makeBackup(target, current) : null;

    try {
      await mkdir(dirname(target), { recursive: true });
      if (backupStats.isDirectory()) {
        await rm(target, { recursive: true, force: true });
        await cp(source, target, { recursive: true });
      } else {
        if (current?.isDirectory()) {
          await rm(target, { recursive: true });
        }
        await writeAtomically(target, await readFile(source));
      }
    } catch (error) {
      throw toToolError(error, target);
    }

    return { path: target, restoredFrom: source, backupOfCurrent: backupOfCurrent?.backupPath ?? null };
  }

  async function info(path: string): Promise<FileInfo> {
    const { path: target } = await guard.validate(path, 'list');
    const stats = await statOrThrow(target);
    return {
      path: target,
      name: basename(target),
      type: entryType(stats),
      size: stats.size,
      created: stats.birthtime.toISOString(),
      modified: stats.mtime.toISOString(),
      accessed: stats.atime.toISOString(),
      permissions: (stats.mode & 0o777).toString(8).padStart(3, '0'),
      extension: stats.isDirectory() ? '' : extname(target).toLowerCase(),
    };
  }

  async function makeDirectory(path: string): Promise<MakeDirectoryResult> {
    const { path: target } = await guard.validate(path, 'list');
    const existing = await statOrNull(target);
    if (existing && !existing.isDirectory()) {
      throw new ToolError('AlreadyExists', `A file already exists at ${target}`, { details: { path: target } });
    }
    if (existing) {
      return { path: target, created: false };
    }
    try {
      await mkdir(target, { recursive: true });
    } catch (error) {
      throw toToolError(error, target);
    }
    return { path: target, created: true };
  }

  return {
    read,
    write,
    list,
    copy,
    move,
    remove,
    search,
    hash,
    backup,
    restoreBackup,
    info,
    makeDirectory,
  };
}
