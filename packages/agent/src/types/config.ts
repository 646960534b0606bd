import type { DomainPolicy } from '@toolgate/net';
import type { LogLevel } from '../logging/logger.js';

/**
 * Where file tools may reach. Every path a file tool touches is checked
 * against this before any I/O.
 */
export type PathPolicy = {
  /** Absolute base directories, in priority order. Relative paths resolve against the first. */
  readonly allowedPaths: ReadonlyArray<string>;
  /** Lower-case with a leading dot. Empty means any extension not blocked. */
  readonly allowedExtensions: ReadonlyArray<string>;
  readonly blockedExtensions: ReadonlyArray<string>;
  /**
   * Glob patterns. Without a `/` they match any single path segment below the
   * base (`.git`, `*.pem`); with one they match the whole canonical path.
   */
  readonly blockedPatterns: ReadonlyArray<string>;
  readonly maxFileSize: number;
  readonly maxDepth: number;
  readonly maxListEntries: number;
  readonly backupDirectory: string;
};

export const SEARCH_ENGINES = ['duckduckgo', 'brave', 'searxng'] as const;
export type SearchEngine = (typeof SEARCH_ENGINES)[number];

export type SearchPolicy = DomainPolicy & {
  readonly engine: SearchEngine;
  readonly braveApiKey: string | null;
  readonly searxngUrl: string | null;
  readonly maxContentBytes: number;
  readonly requestTimeoutMs: number;
  readonly maxResults: number;
  readonly maxRedirects: number;
};

export type DispatchPolicy = {
  readonly maxConcurrency: number;
  readonly fileTimeoutMs: number;
};

export type ToolboxConfig = {
  readonly paths: PathPolicy;
  readonly search: SearchPolicy;
  readonly dispatch: DispatchPolicy;
  readonly logLevel: LogLevel;
};
