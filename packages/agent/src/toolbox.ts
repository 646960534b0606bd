import type { FetchFn, HostResolver, RetryPolicy } from '@toolgate/net';
import { createToolRegistry } from './types/index.js';
import type { ToolboxConfig, ToolRegistry } from './types/index.js';
import { ConsoleLogger } from './logging/index.js';
import type { Logger } from './logging/index.js';
import { createPathGuard, createPathLockTable } from './sandbox/index.js';
import type { EnvLookup, PathGuard } from './sandbox/index.js';
import { createSandboxedFileSystem } from './execution/file-system.js';
import type { SandboxedFileSystem } from './execution/file-system.js';
import { createWebClient } from './execution/web.js';
import type { WebClient } from './execution/web.js';
import { createToolDispatcher } from './tools/dispatch.js';
import type { ToolDispatcher } from './tools/dispatch.js';
import { createFileSystemTools, createWebTools } from './tools/registry.js';
import { toFunctionDefinition } from './tools/schema.js';
import type { FunctionDefinition } from './tools/schema.js';

export type ToolboxDeps = {
  readonly logger?: Logger;
  readonly fetch?: FetchFn;
  readonly resolveHost?: HostResolver;
  readonly clock?: () => Date;
  readonly env?: EnvLookup;
  readonly retryPolicy?: RetryPolicy;
};

export type Toolbox = {
  readonly config: ToolboxConfig;
  readonly guard: PathGuard;
  readonly fs: SandboxedFileSystem;
  readonly web: WebClient;
  readonly registry: ToolRegistry;
  readonly dispatcher: ToolDispatcher;
  /** Function-calling definitions for every registered tool, in registration order. */
  readonly definitions: () => ReadonlyArray<FunctionDefinition>;
};

/**
 * Wires the sandbox, the tools and the dispatcher from one immutable config.
 * Nothing here reads the environment except through `deps.env`.
 */
export function createToolbox(config: ToolboxConfig, deps: ToolboxDeps = {}): Toolbox {
  const logger = deps.logger ?? new ConsoleLogger(config.logLevel, { component: 'toolbox' });

  const guard = createPathGuard(config.paths, { env: deps.env });
  const fs = createSandboxedFileSystem({ guard, policy: config.paths, clock: deps.clock });
  const web = createWebClient({ policy: config.search, fetch: deps.fetch, resolveHost: deps.resolveHost });

  const registry = createToolRegistry([...createFileSystemTools({ fs, guard }), ...createWebTools({ web })]);
  const dispatcher = createToolDispatcher({
    registry,
    locks: createPathLockTable(),
    logger,
    policy: config.dispatch,
    retryPolicy: deps.retryPolicy,
    clock: deps.clock,
  });

  logger.info('Toolbox ready', {
    tools: registry.list().length,
    allowedPaths: config.paths.allowedPaths.length,
    engine: config.search.engine,
  });

  return {
    config,
    guard,
    fs,
    web,
    registry,
    dispatcher,
    definitions: () => registry.list().map(toFunctionDefinition),
  };
}
