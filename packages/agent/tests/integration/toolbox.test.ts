import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, realpath, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createToolbox, createSilentLogger, loadToolboxConfig } from '../../src/index.js';
import type { Toolbox, ToolboxConfigOverrides } from '../../src/index.js';

type FetchCall = [input: string | URL | Request, init?: RequestInit];

const wikipediaPage = `<html><head><title>Tea - Wikipedia</title></head>
<body><p>Tea is an aromatic beverage.</p></body></html>`;

describe('toolbox', () => {
  let root: string;
  let workspace: string;
  let fetch: Mock<(...args: FetchCall) => Promise<Response>>;
  let toolbox: Toolbox;

  function build(overrides: ToolboxConfigOverrides = {}): Toolbox {
    const config = loadToolboxConfig(
      {},
      {
        ...overrides,
        paths: { allowedPaths: [workspace], backupDirectory: join(root, 'backups'), ...overrides.paths },
      },
    );
    return createToolbox(config, {
      logger: createSilentLogger(),
      fetch,
      resolveHost: async () => ['93.184.216.34'],
      retryPolicy: { maxRetries: 1, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 1 },
    });
  }

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), 'toolgate-toolbox-')));
    workspace = join(root, 'workspace');
    await mkdir(workspace);
    fetch = vi.fn(async (..._args: FetchCall): Promise<Response> => {
      return new Response(wikipediaPage, { status: 200, headers: { 'content-type': 'text/html' } });
    });
    toolbox = build();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should write and read back a file, then refuse a path outside the sandbox', async () => {
    const [written, read, escaped] = await toolbox.dispatcher.dispatchAll([
      { callId: '1', toolName: 'write_file', arguments: { path: 'hello.txt', content: 'Hello, world' } },
      { callId: '2', toolName: 'read_file', arguments: { path: 'hello.txt' } },
      { callId: '3', toolName: 'read_file', arguments: { path: '/etc/passwd' } },
    ]);

    expect(written?.success).toBe(true);
    expect(read?.output).toMatchObject({ path: join(workspace, 'hello.txt'), content: 'Hello, world' });
    expect(escaped).toMatchObject({ callId: '3', success: false, output: null, error: { kind: 'NotAllowed' } });
  });

  it('should serialize a write and a read on the same file', async () => {
    await toolbox.fs.write('shared.txt', 'v1');

    const [, read] = await toolbox.dispatcher.dispatchAll([
      { callId: 'w', toolName: 'write_file', arguments: { path: 'shared.txt', content: 'v2', overwrite: true } },
      { callId: 'r', toolName: 'read_file', arguments: { path: join(workspace, 'shared.txt') } },
    ]);

    expect(read?.output).toMatchObject({ content: 'v2' });
  });

  it('should keep a backup of a deleted file', async () => {
    await toolbox.fs.write('draft.md', '# Draft');

    const deleted = await toolbox.dispatcher.dispatch({
      callId: 'd',
      toolName: 'delete_path',
      arguments: { path: 'draft.md' },
    });

    expect(deleted.success).toBe(true);
    const backups = await readdir(join(root, 'backups'));
    expect(backups).toHaveLength(1);
    expect(backups[0]).toMatch(/^draft\.md_\d{8}-\d{6}-\d{3}_[A-Za-z0-9_-]{8}$/);
    expect(await readFile(join(root, 'backups', backups[0] ?? ''), 'utf-8')).toBe('# Draft');
  });

  it('should fetch only from allowed domains', async () => {
    toolbox = build({ search: { allowedDomains: ['wikipedia.org'] } });

    const refused = await toolbox.dispatcher.dispatch({
      callId: 'evil',
      toolName: 'extract_content',
      arguments: { url: 'https://evil.example.com/' },
    });
    expect(refused.error?.kind).toBe('NotAllowed');
    expect(fetch).not.toHaveBeenCalled();

    const allowed = await toolbox.dispatcher.dispatch({
      callId: 'wiki',
      toolName: 'extract_content',
      arguments: { url: 'https://en.wikipedia.org/wiki/Tea' },
    });
    expect(allowed.output).toMatchObject({ title: 'Tea - Wikipedia', finalUrl: 'https://en.wikipedia.org/wiki/Tea' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should retry a search once when the engine is briefly unavailable', async () => {
    fetch
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(
        Response.json({
          Heading: 'Tea',
          AbstractText: 'Tea is an aromatic beverage.',
          AbstractURL: 'https://en.wikipedia.org/wiki/Tea',
          RelatedTopics: [],
        }),
      );

    const result = await toolbox.dispatcher.dispatch({
      callId: 's',
      toolName: 'web_search',
      arguments: { query: 'tea' },
    });

    expect(result.success).toBe(true);
    expect(toolbox.dispatcher.statistics().find((entry) => entry.toolName === 'web_search')).toMatchObject({
      executions: 1,
      successes: 1,
    });
    expect(result.output).toMatchObject({
      query: 'tea',
      engine: 'duckduckgo',
      results: [{ url: 'https://en.wikipedia.org/wiki/Tea' }],
      filtered: 0,
    });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('should describe every tool as a closed JSON schema', () => {
    const definitions = toolbox.definitions();

    expect(definitions.map((definition) => definition.name)).toEqual([
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
      'web_search',
      'extract_content',
      'validate_url',
      'parse_rss',
      'search_news',
      'get_page_info',
      'bulk_fetch',
    ]);
    expect(definitions.every((definition) => definition.parameters.additionalProperties === false)).toBe(true);
    expect(definitions.find((definition) => definition.name === 'read_file')?.parameters.required).toEqual(['path']);
  });
});
