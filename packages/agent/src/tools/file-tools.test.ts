import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createFileSystemTools } from './registry.js';
import { createPathGuard } from '../sandbox/index.js';
import { createSandboxedFileSystem } from '../execution/file-system.js';
import { createSilentLogger } from '../logging/index.js';
import type { PathPolicy, RegisteredTool } from '../types/index.js';

describe('file tools', () => {
  let root: string;
  let workspace: string;
  let tools: Map<string, RegisteredTool>;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), 'toolgate-tools-')));
    workspace = join(root, 'workspace');
    await mkdir(workspace);
    const policy: PathPolicy = {
      allowedPaths: [workspace],
      allowedExtensions: [],
      blockedExtensions: ['.exe'],
      blockedPatterns: ['.git'],
      maxFileSize: 1024,
      maxDepth: 3,
      maxListEntries: 50,
      backupDirectory: join(root, 'backups'),
    };
    const guard = createPathGuard(policy);
    const fs = createSandboxedFileSystem({ guard, policy });
    tools = new Map(createFileSystemTools({ fs, guard }).map((tool) => [tool.spec.name, tool]));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function run(name: string, args: Record<string, unknown>): Promise<unknown> {
    const tool = tools.get(name);
    if (!tool) {
      throw new Error(`no tool ${name}`);
    }
    const parsed = tool.handler.parse(args);
    if (!parsed.ok) {
      throw new Error(parsed.issues.map((issue) => `${issue.path}: ${issue.message}`).join('; '));
    }
    return parsed.call.invoke({ signal: new AbortController().signal, logger: createSilentLogger() });
  }

  it('should register the file tools in a fixed order', () => {
    expect(Array.from(tools.keys())).toEqual([
      'read_file',
      'write_file',
      'list_directory',
      'copy_path',
      'move_path',
      'delete_path',
      'search_files',
      'hash_file',
      'backup_path',
      'restore_backup',
      'file_info',
      'make_directory',
    ]);
    expect(Array.from(tools.values()).every((tool) => tool.spec.category === 'filesystem')).toBe(true);
  });

  it('should lock the canonical path of every file argument', async () => {
    const move = tools.get('move_path');
    const parsed = move?.handler.parse({ source: 'a.txt', destination: 'nested/../b.txt' });

    expect(parsed?.ok && (await parsed.call.lockTargets())).toEqual([join(workspace, 'a.txt'), join(workspace, 'b.txt')]);
  });

  describe('write_file and read_file', () => {
    it('should create parent directories by default', async () => {
      const written = await run('write_file', { path: 'notes/today.md', content: '# Today' });

      expect(written).toMatchObject({ path: join(workspace, 'notes', 'today.md'), bytesWritten: 7, created: true });
      expect(await run('read_file', { path: 'notes/today.md' })).toMatchObject({
        content: '# Today',
        encoding: 'utf-8',
        size: 7,
      });
    });

    it('should decode base64 content before writing', async () => {
      await run('write_file', { path: 'bytes.bin', content: Buffer.from('hi there').toString('base64'), encoding: 'base64' });

      expect(await readFile(join(workspace, 'bytes.bin'), 'utf-8')).toBe('hi there');
    });

    it('should refuse to replace a file unless overwrite is set', async () => {
      await writeFile(join(workspace, 'a.txt'), 'old');

      await expect(run('write_file', { path: 'a.txt', content: 'new' })).rejects.toMatchObject({
        kind: 'AlreadyExists',
      });

      const replaced = await run('write_file', { path: 'a.txt', content: 'new', overwrite: true });
      expect(replaced).toMatchObject({ created: false, backupPath: expect.stringContaining(join(root, 'backups')) });
      expect(await readFile(join(workspace, 'a.txt'), 'utf-8')).toBe('new');
    });
  });

  describe('list_directory', () => {
    it('should descend only when recursive is set', async () => {
      await mkdir(join(workspace, 'src'));
      await writeFile(join(workspace, 'src', 'main.ts'), '');
      await writeFile(join(workspace, 'README.md'), '');

      const flat = await run('list_directory', { path: workspace });
      const deep = await run('list_directory', { path: workspace, recursive: true, depth: 1 });

      expect(flat).toMatchObject({ entries: [{ name: 'README.md' }, { name: 'src' }] });
      expect(deep).toMatchObject({ entries: [{ name: 'README.md' }, { name: 'src' }, { name: 'src/main.ts' }] });
    });
  });

  describe('search_files and hash_file', () => {
    it('should find matches below the directory', async () => {
      await mkdir(join(workspace, 'docs'));
      await writeFile(join(workspace, 'docs', 'guide.md'), 'guide');
      await writeFile(join(workspace, 'todo.txt'), 'todo');

      const result = await run('search_files', { path: workspace, pattern: '*.md' });

      expect(result).toMatchObject({ matches: [{ relativePath: 'docs/guide.md', size: 5 }], truncated: false });
    });

    it('should hash with the default algorithm', async () => {
      await writeFile(join(workspace, 'hello.txt'), 'hello');

      expect(await run('hash_file', { path: 'hello.txt' })).toMatchObject({
        algorithm: 'sha256',
        digest: '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824',
      });
    });
  });

  describe('delete_path and restore_backup', () => {
    it('should restore a deleted file from its backup', async () => {
      await writeFile(join(workspace, 'draft.txt'), 'keep me');

      await run('delete_path', { path: 'draft.txt' });
      await expect(run('read_file', { path: 'draft.txt' })).rejects.toMatchObject({ kind: 'NotFound' });

      await run('restore_backup', { path: 'draft.txt' });
      expect(await readFile(join(workspace, 'draft.txt'), 'utf-8')).toBe('keep me');
    });
  });

  describe('make_directory and file_info', () => {
    it('should report a new directory', async () => {
      expect(await run('make_directory', { path: 'build/out' })).toEqual({
        path: join(workspace, 'build', 'out'),
        created: true,
      });
      expect(await run('file_info', { path: 'build/out' })).toMatchObject({ name: 'out', type: 'directory' });
    });
  });
});
