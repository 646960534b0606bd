import { DEFAULT_RETRY_POLICY, retry } from '@toolgate/net';
import type { RetryPolicy } from '@toolgate/net';
import { nanoid } from 'nanoid';
import { ToolError, isToolError } from '../types/index.js';
import type {
  DispatchPolicy,
  RegisteredTool,
  ToolCallRequest,
  ToolCallResult,
  ToolErrorKind,
  ToolRegistry,
  ValidatedCall,
} from '../types/index.js';
import type { Logger } from '../logging/index.js';
import type { PathLockTable } from '../sandbox/index.js';

export type DispatchOptions = {
  /** Aborts network calls in flight. File operations run to completion. */
  readonly signal?: AbortSignal;
};

export type ToolStatistics = {
  readonly toolName: string;
  readonly executions: number;
  readonly successes: number;
  readonly failures: number;
  /** successes / executions, 0 before the first call. */
  readonly successRate: number;
  readonly totalDurationMs: number;
  readonly averageDurationMs: number;
  readonly lastExecutedAt: string | null;
};

export type ToolDispatcher = {
  /** Never rejects: every failure comes back as a result with `success: false`. */
  readonly dispatch: (request: ToolCallRequest, options?: DispatchOptions) => Promise<ToolCallResult>;
  /** Runs up to `maxConcurrency` calls at once. Results are in request order. */
  readonly dispatchAll: (
    requests: ReadonlyArray<ToolCallRequest>,
    options?: DispatchOptions,
  ) => Promise<ReadonlyArray<ToolCallResult>>;
  /** One entry per registered tool, in registration order. */
  readonly statistics: () => ReadonlyArray<ToolStatistics>;
  readonly resetStatistics: () => void;
};

export type DispatcherDeps = {
  readonly registry: ToolRegistry;
  readonly locks: PathLockTable;
  readonly logger: Logger;
  readonly policy: DispatchPolicy;
  readonly retryPolicy?: RetryPolicy;
  readonly clock?: () => Date;
};

type Counters = {
  executions: number;
  successes: number;
  totalDurationMs: number;
  lastExecutedAt: Date | null;
};

type Outcome = Omit<ToolCallResult, 'durationMs'>;

const POLICY_KINDS: ReadonlySet<ToolErrorKind> = new Set<ToolErrorKind>(['NotAllowed', 'Denied', 'Malformed']);

function isArgumentObject(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cancelled(toolName: string): ToolError {
  return new ToolError('Cancelled', `Tool call ${toolName} was cancelled`, { retryable: false });
}

function timedOut(toolName: string, timeoutMs: number): ToolError {
  return new ToolError('Timeout', `Tool call ${toolName} did not finish within ${timeoutMs}ms`, {
    details: { timeoutMs },
    retryable: false,
  });
}

function withTimeout<T>(operation: Promise<T>, timeoutMs: number, toolName: string, onExpire: () => void): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      onExpire();
      reject(timedOut(toolName, timeoutMs));
    }, timeoutMs);
  });
  return Promise.race([operation, deadline]).finally(() => clearTimeout(timer));
}

export function createToolDispatcher(deps: DispatcherDeps): ToolDispatcher {
  const { registry, locks, logger, policy } = deps;
  const retryPolicy = deps.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const clock = deps.clock ?? (() => new Date());
  const counters = new Map<string, Counters>();

  function parseCall(tool: RegisteredTool, args: unknown): ValidatedCall {
    const { name } = tool.spec;
    if (!isArgumentObject(args)) {
      throw new ToolError('InvalidArguments', `Invalid arguments for ${name}: arguments must be a JSON object`);
    }
    const parsed = tool.handler.parse(args);
    if (!parsed.ok) {
      const summary = parsed.issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
      throw new ToolError('InvalidArguments', `Invalid arguments for ${name}: ${summary}`, {
        details: { issues: parsed.issues },
      });
    }
    return parsed.call;
  }

  async function runFileCall(call: ValidatedCall, toolName: string, signal: AbortSignal, log: Logger) {
    let expired = false;
    // The deadline covers the wait for the path locks as well as the run.
    const operation = (async () => {
      const release = await locks.acquireAll(await call.lockTargets());
      if (expired || signal.aborted) {
        release();
        throw expired ? timedOut(toolName, policy.fileTimeoutMs) : cancelled(toolName);
      }
      // The lock is held until the operation settles, even past the deadline.
      return call.invoke({ signal, logger: log }).finally(release);
    })();
    return withTimeout(operation, policy.fileTimeoutMs, toolName, () => {
      expired = true;
    });
  }

  function runNetworkCall(call: ValidatedCall, signal: AbortSignal, log: Logger) {
    return retry(() => call.invoke({ signal, logger: log }), {
      policy: retryPolicy,
      shouldRetry: (error) => isToolError(error) && error.retryable && !signal.aborted,
      onRetry: (error, attempt, delayMs) => {
        log.warn('Retrying tool call', { attempt, delayMs: Math.round(delayMs), error });
      },
    });
  }

  function failure(request: ToolCallRequest, error: unknown, log: Logger): Outcome {
    const { callId, toolName } = request;

    if (isToolError(error) && error.kind !== 'Internal') {
      const data = { kind: error.kind, reason: error.message };
      if (POLICY_KINDS.has(error.kind)) {
        log.warn('Tool call rejected by policy', data);
      } else {
        log.info('Tool call failed', data);
      }
      return {
        callId,
        toolName,
        success: false,
        output: null,
        error: {
          kind: error.kind,
          message: error.message,
          ...(error.details ? { details: error.details } : {}),
        },
      };
    }

    // Internal failures keep their stack in the log; the caller gets a reference.
    const ref = nanoid(10);
    log.error('Tool call failed unexpectedly', { ref, error });
    const message = isToolError(error) ? error.message : `Internal error while running ${toolName}`;
    return {
      callId,
      toolName,
      success: false,
      output: null,
      error: { kind: 'Internal', message: `${message} (ref ${ref})`, details: { ref } },
    };
  }

  function record(toolName: string, success: boolean, durationMs: number): void {
    if (!registry.has(toolName)) {
      return;
    }
    const entry = counters.get(toolName) ?? { executions: 0, successes: 0, totalDurationMs: 0, lastExecutedAt: null };
    entry.executions += 1;
    entry.successes += success ? 1 : 0;
    entry.totalDurationMs += durationMs;
    entry.lastExecutedAt = clock();
    counters.set(toolName, entry);
  }

  async function execute(request: ToolCallRequest, signal: AbortSignal, log: Logger): Promise<Outcome> {
    const { callId, toolName } = request;
    try {
      if (signal.aborted) {
        throw cancelled(toolName);
      }
      const tool = registry.get(toolName);
      const call = parseCall(tool, request.arguments);

      log.debug('Tool call started', { category: tool.spec.category });
      const output =
        tool.spec.category === 'network'
          ? await runNetworkCall(call, signal, log)
          : await runFileCall(call, toolName, signal, log);
      return { callId, toolName, success: true, output, error: null };
    } catch (error) {
      return failure(request, error, log);
    }
  }

  async function dispatch(request: ToolCallRequest, options: DispatchOptions = {}): Promise<ToolCallResult> {
    const signal = options.signal ?? new AbortController().signal;
    const log = logger.child({ callId: request.callId, tool: request.toolName });
    const startedAt = Date.now();

    const outcome = await execute(request, signal, log);
    const durationMs = Date.now() - startedAt;
    record(request.toolName, outcome.success, durationMs);
    log.debug('Tool call finished', { success: outcome.success, durationMs });

    return { ...outcome, durationMs };
  }

  function statistics(): ReadonlyArray<ToolStatistics> {
    return registry.list().map(({ name }) => {
      const entry = counters.get(name);
      const executions = entry?.executions ?? 0;
      const successes = entry?.successes ?? 0;
      const totalDurationMs = entry?.totalDurationMs ?? 0;
      return {
        toolName: name,
        executions,
        successes,
        failures: executions - successes,
        successRate: executions === 0 ? 0 : successes / executions,
        totalDurationMs,
        averageDurationMs: executions === 0 ? 0 : totalDurationMs / executions,
        lastExecutedAt: entry?.lastExecutedAt?.toISOString() ?? null,
      };
    });
  }

  function resetStatistics(): void {
    counters.clear();
    logger.info('Tool statistics reset');
  }

  async function dispatchAll(
    requests: ReadonlyArray<ToolCallRequest>,
    options: DispatchOptions = {},
  ): Promise<ReadonlyArray<ToolCallResult>> {
    const results: ToolCallResult[] = new Array<ToolCallResult>(requests.length);
    let next = 0;

    async function worker(): Promise<void> {
      while (next < requests.length) {
        const index = next;
        next += 1;
        const request = requests[index];
        if (request) {
          results[index] = await dispatch(request, options);
        }
      }
    }

    const workerCount = Math.min(Math.max(policy.maxConcurrency, 1), requests.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }

  return { dispatch, dispatchAll, statistics, resetStatistics };
}
