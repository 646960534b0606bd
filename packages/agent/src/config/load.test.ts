import { describe, it, expect } from 'vitest';
import { delimiter } from 'node:path';
import { loadToolboxConfig, DEFAULT_BLOCKED_EXTENSIONS } from './load.js';
import { ConfigurationError } from '../types/error.js';
import { LOG_LEVELS } from '../logging/logger.js';

const baseEnv = { TOOLGATE_ALLOWED_PATHS: '/data/workspace' };

describe('loadToolboxConfig', () => {
  it('should fill every default from a minimal environment', () => {
    const config = loadToolboxConfig(baseEnv, {}, { cwd: '/srv/app' });

    expect(config.paths).toEqual({
      allowedPaths: ['/data/workspace'],
      allowedExtensions: [],
      blockedExtensions: [...DEFAULT_BLOCKED_EXTENSIONS],
      blockedPatterns: ['.ssh', '.env', '.env.*', '.git'],
      maxFileSize: 50 * 1024 * 1024,
      maxDepth: 10,
      maxListEntries: 1000,
      backupDirectory: '/srv/app/data/backups',
    });
    expect(config.search).toEqual({
      engine: 'duckduckgo',
      braveApiKey: null,
      searxngUrl: null,
      allowedDomains: [],
      blockedDomains: [],
      maxContentBytes: 50_000,
      requestTimeoutMs: 30_000,
      maxResults: 10,
      maxRedirects: 5,
    });
    expect(config.dispatch).toEqual({ maxConcurrency: 4, fileTimeoutMs: 30_000 });
    expect(config.logLevel).toBe('info');
  });

  it('should split and normalize list variables', () => {
    const config = loadToolboxConfig({
      TOOLGATE_ALLOWED_PATHS: ['/data/workspace', '/data/shared'].join(delimiter),
      TOOLGATE_ALLOWED_EXTENSIONS: 'TXT, .md,,',
      TOOLGATE_ALLOWED_DOMAINS: ' .Wikipedia.org., example.com',
      TOOLGATE_BLOCKED_PATTERNS: '*.pem,secrets',
    });

    expect(config.paths.allowedPaths).toEqual(['/data/workspace', '/data/shared']);
    expect(config.paths.allowedExtensions).toEqual(['.txt', '.md']);
    expect(config.paths.blockedPatterns).toEqual(['*.pem', 'secrets']);
    expect(config.search.allowedDomains).toEqual(['wikipedia.org', 'example.com']);
  });

  it('should parse numeric and enum variables', () => {
    const config = loadToolboxConfig({
      ...baseEnv,
      TOOLGATE_MAX_DEPTH: '3',
      TOOLGATE_MAX_CONCURRENCY: '8',
      TOOLGATE_SEARCH_ENGINE: 'searxng',
      SEARXNG_URL: 'http://search.internal.test:8080',
      TOOLGATE_LOG_LEVEL: 'DEBUG',
    });

    expect(config.paths.maxDepth).toBe(3);
    expect(config.dispatch.maxConcurrency).toBe(8);
    expect(config.search.engine).toBe('searxng');
    expect(config.search.searxngUrl).toBe('http://search.internal.test:8080');
    expect(config.logLevel).toBe('debug');
  });

  it('should expand variables in directory paths', () => {
    const config = loadToolboxConfig({ DATA_ROOT: '/data', TOOLGATE_ALLOWED_PATHS: '${DATA_ROOT}/workspace' });

    expect(config.paths.allowedPaths).toEqual(['/data/workspace']);
  });

  it('should let overrides win over the environment', () => {
    const config = loadToolboxConfig(
      { ...baseEnv, TOOLGATE_MAX_RESULTS: '20' },
      { search: { maxResults: 3 }, paths: { maxDepth: undefined } },
    );

    expect(config.search.maxResults).toBe(3);
    expect(config.paths.maxDepth).toBe(10);
  });

  it('should return a deeply frozen object', () => {
    const config = loadToolboxConfig(baseEnv);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.paths)).toBe(true);
    expect(Object.isFrozen(config.paths.allowedPaths)).toBe(true);
  });

  it('should require at least one allowed directory', () => {
    expect(() => loadToolboxConfig({})).toThrow(ConfigurationError);
    expect(() => loadToolboxConfig({})).toThrow(/TOOLGATE_ALLOWED_PATHS/);
  });

  it('should reject relative directories', () => {
    expect(() => loadToolboxConfig({ TOOLGATE_ALLOWED_PATHS: 'workspace' })).toThrow(/must be an absolute path/);
  });

  it('should name the variable behind an invalid number', () => {
    try {
      loadToolboxConfig({ ...baseEnv, TOOLGATE_MAX_DEPTH: 'deep' });
      expect.unreachable('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      const issues = error instanceof ConfigurationError ? error.issues : [];
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^paths\.maxDepth \(TOOLGATE_MAX_DEPTH\): /);
    }
  });

  it('should accept every level the logger knows', () => {
    for (const level of LOG_LEVELS) {
      expect(loadToolboxConfig({ ...baseEnv, TOOLGATE_LOG_LEVEL: level }).logLevel).toBe(level);
    }
  });

  it('should reject an unknown log level', () => {
    expect(() => loadToolboxConfig({ ...baseEnv, TOOLGATE_LOG_LEVEL: 'chatty' })).toThrow(/TOOLGATE_LOG_LEVEL/);
  });
});
