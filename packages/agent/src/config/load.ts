import { delimiter, isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../types/error.js';
import { SEARCH_ENGINES } from '../types/config.js';
import type { DispatchPolicy, PathPolicy, SearchPolicy, ToolboxConfig } from '../types/config.js';
import { LOG_LEVELS } from '../logging/logger.js';
import type { LogLevel } from '../logging/logger.js';
import { expandPath } from '../sandbox/expand.js';
import type { EnvLookup } from '../sandbox/expand.js';

export const DEFAULT_BLOCKED_EXTENSIONS: ReadonlyArray<string> = [
  '.exe',
  '.bat',
  '.cmd',
  '.com',
  '.scr',
  '.vbs',
  '.dll',
];

export const DEFAULT_BLOCKED_PATTERNS: ReadonlyArray<string> = ['.ssh', '.env', '.env.*', '.git'];

export type ToolboxConfigOverrides = {
  readonly paths?: Partial<PathPolicy>;
  readonly search?: Partial<SearchPolicy>;
  readonly dispatch?: Partial<DispatchPolicy>;
  readonly logLevel?: LogLevel;
};

export type LoadConfigOptions = {
  readonly cwd?: string;
};

function normalizeExtension(extension: string): string {
  const lowered = extension.trim().toLowerCase();
  return lowered.startsWith('.') ? lowered : `.${lowered}`;
}

function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^\.+/, '').replace(/\.+$/, '');
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const extensionList = z.array(z.string().min(1).transform(normalizeExtension));
const domainList = z.array(z.string().transform(normalizeDomain)).transform((domains) =>
  domains.filter((domain) => domain !== ''),
);

function createSchema(env: EnvLookup, cwd: string) {
  const absolutePath = z
    .string()
    .min(1)
    .transform((path) => expandPath(path.trim(), env))
    .refine(isAbsolute, { message: 'must be an absolute path' })
    .transform((path) => resolve(path));

  const paths = z.object({
    allowedPaths: z.array(absolutePath).min(1, 'at least one allowed directory is required'),
    allowedExtensions: extensionList.default([]),
    blockedExtensions: extensionList.default([...DEFAULT_BLOCKED_EXTENSIONS]),
    blockedPatterns: z.array(z.string().min(1)).default([...DEFAULT_BLOCKED_PATTERNS]),
    maxFileSize: positiveInt.default(50 * 1024 * 1024),
    maxDepth: nonNegativeInt.default(10),
    maxListEntries: positiveInt.default(1000),
    backupDirectory: absolutePath.default(join(cwd, 'data', 'backups')),
  });

  const search = z.object({
    engine: z.enum(SEARCH_ENGINES).default('duckduckgo'),
    braveApiKey: z.string().min(1).nullable().default(null),
    searxngUrl: z.string().url().nullable().default(null),
    allowedDomains: domainList.default([]),
    blockedDomains: domainList.default([]),
    maxContentBytes: positiveInt.default(50_000),
    requestTimeoutMs: positiveInt.default(30_000),
    maxResults: positiveInt.default(10),
    maxRedirects: nonNegativeInt.default(5),
  });

  const dispatch = z.object({
    maxConcurrency: positiveInt.default(4),
    fileTimeoutMs: positiveInt.default(30_000),
  });

  return z.object({
    paths,
    search: search.default({}),
    dispatch: dispatch.default({}),
    logLevel: z.enum(LOG_LEVELS).default('info'),
  });
}

// Config key -> environment variable, also used to name the culprit in errors.
const ENV_VARS = {
  paths: {
    allowedPaths: 'TOOLGATE_ALLOWED_PATHS',
    allowedExtensions: 'TOOLGATE_ALLOWED_EXTENSIONS',
    blockedExtensions: 'TOOLGATE_BLOCKED_EXTENSIONS',
    blockedPatterns: 'TOOLGATE_BLOCKED_PATTERNS',
    maxFileSize: 'TOOLGATE_MAX_FILE_SIZE',
    maxDepth: 'TOOLGATE_MAX_DEPTH',
    maxListEntries: 'TOOLGATE_MAX_LIST_ENTRIES',
    backupDirectory: 'TOOLGATE_BACKUP_DIR',
  },
  search: {
    engine: 'TOOLGATE_SEARCH_ENGINE',
    braveApiKey: 'BRAVE_API_KEY',
    searxngUrl: 'SEARXNG_URL',
    allowedDomains: 'TOOLGATE_ALLOWED_DOMAINS',
    blockedDomains: 'TOOLGATE_BLOCKED_DOMAINS',
    maxContentBytes: 'TOOLGATE_MAX_CONTENT_BYTES',
    requestTimeoutMs: 'TOOLGATE_REQUEST_TIMEOUT_MS',
    maxResults: 'TOOLGATE_MAX_RESULTS',
    maxRedirects: 'TOOLGATE_MAX_REDIRECTS',
  },
  dispatch: {
    maxConcurrency: 'TOOLGATE_MAX_CONCURRENCY',
    fileTimeoutMs: 'TOOLGATE_FILE_TIMEOUT_MS',
  },
} as const;

const LIST_KEYS = new Set([
  'allowedPaths',
  'allowedExtensions',
  'blockedExtensions',
  'blockedPatterns',
  'allowedDomains',
  'blockedDomains',
]);

function splitList(key: string, value: string): string[] {
  // Directories use the platform delimiter so that paths may contain commas.
  const separator = key === 'allowedPaths' ? delimiter : ',';
  return value
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function readSection(env: EnvLookup, names: Readonly<Record<string, string>>): Record<string, unknown> {
  const section: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(names)) {
    const value = env[name];
    if (value === undefined || value.trim() === '') {
      continue;
    }
    section[key] = LIST_KEYS.has(key) ? splitList(key, value) : value.trim();
  }
  return section;
}

function definedEntries(overrides: object | undefined): Record<string, unknown> {
  const entries: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(overrides ?? {})) {
    if (value !== undefined) {
      entries[key] = value;
    }
  }
  return entries;
}

function envNameFor(path: ReadonlyArray<string | number>): string | null {
  const [section, key] = path;
  if (section === 'logLevel') {
    return 'TOOLGATE_LOG_LEVEL';
  }
  const names: Readonly<Record<string, string>> | null =
    section === 'paths'
      ? ENV_VARS.paths
      : section === 'search'
        ? ENV_VARS.search
        : section === 'dispatch'
          ? ENV_VARS.dispatch
          : null;
  return names !== null && typeof key === 'string' ? (names[key] ?? null) : null;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null) {
    return;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
}

/**
 * Builds the immutable toolbox configuration from environment variables,
 * with `overrides` taking precedence. Throws ConfigurationError listing
 * every invalid or missing value.
 */
export function loadToolboxConfig(
  env: EnvLookup = process.env,
  overrides: ToolboxConfigOverrides = {},
  options: LoadConfigOptions = {},
): ToolboxConfig {
  const schema = createSchema(env, options.cwd ?? process.cwd());

  const raw = {
    paths: { ...readSection(env, ENV_VARS.paths), ...definedEntries(overrides.paths) },
    search: { ...readSection(env, ENV_VARS.search), ...definedEntries(overrides.search) },
    dispatch: { ...readSection(env, ENV_VARS.dispatch), ...definedEntries(overrides.dispatch) },
    logLevel: overrides.logLevel ?? (env['TOOLGATE_LOG_LEVEL']?.trim().toLowerCase() || undefined),
  };

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const where = issue.path.join('.');
      const envName = envNameFor(issue.path);
      return envName ? `${where} (${envName}): ${issue.message}` : `${where}: ${issue.message}`;
    });
    throw new ConfigurationError('Invalid toolbox configuration', issues);
  }

  const config: ToolboxConfig = parsed.data;
  deepFreeze(config);
  return config;
}
