import { ToolError } from './error.js';
import type { ToolErrorKind } from './error.js';
import type { Logger } from '../logging/logger.js';

export type ToolCategory = 'filesystem' | 'network';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'string[]';

export type ParameterSpec = {
  readonly name: string;
  readonly type: ParameterType;
  readonly description: string;
  readonly required: boolean;
  readonly default?: unknown;
  readonly enum?: ReadonlyArray<string>;
  readonly minimum?: number;
  readonly maximum?: number;
};

export type ToolSpec = {
  readonly name: string;
  readonly description: string;
  readonly category: ToolCategory;
  readonly parameters: ReadonlyArray<ParameterSpec>;
};

export type ToolCallRequest = {
  readonly callId: string;
  readonly toolName: string;
  readonly arguments: unknown;
};

export type ToolCallError = {
  readonly kind: ToolErrorKind;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
};

export type ToolCallResult = {
  readonly callId: string;
  readonly toolName: string;
  readonly success: boolean;
  readonly output: unknown;
  readonly error: ToolCallError | null;
  /** Wall time from receipt to result, lock waits included. */
  readonly durationMs: number;
};

export type ToolContext = {
  readonly signal: AbortSignal;
  readonly logger: Logger;
};

export type ArgumentIssue = {
  readonly path: string;
  readonly message: string;
};

/**
 * A call whose arguments already passed the tool's schema. `lockTargets`
 * yields the canonical paths the call will touch.
 */
export type ValidatedCall = {
  readonly invoke: (ctx: ToolContext) => Promise<unknown>;
  readonly lockTargets: () => Promise<ReadonlyArray<string>>;
};

export type ParseOutcome =
  | { readonly ok: true; readonly call: ValidatedCall }
  | { readonly ok: false; readonly issues: ReadonlyArray<ArgumentIssue> };

export type ToolHandler = {
  readonly parse: (args: Readonly<Record<string, unknown>>) => ParseOutcome;
};

export type RegisteredTool = {
  readonly spec: ToolSpec;
  readonly handler: ToolHandler;
};

/**
 * Tools are registered once at startup. Registration order is the order
 * `list()` reports, and names are unique.
 */
export type ToolRegistry = {
  readonly register: (spec: ToolSpec, handler: ToolHandler) => void;
  readonly get: (name: string) => RegisteredTool;
  readonly has: (name: string) => boolean;
  readonly list: () => ReadonlyArray<ToolSpec>;
};

export function createToolRegistry(initial?: ReadonlyArray<RegisteredTool>): ToolRegistry {
  const tools = new Map<string, RegisteredTool>();

  function register(spec: ToolSpec, handler: ToolHandler): void {
    if (tools.has(spec.name)) {
      throw new ToolError('DuplicateTool', `Tool already registered: ${spec.name}`, {
        details: { tool: spec.name },
      });
    }
    tools.set(spec.name, { spec, handler });
  }

  if (initial) {
    for (const tool of initial) {
      register(tool.spec, tool.handler);
    }
  }

  return {
    register,
    get(name: string): RegisteredTool {
      const tool = tools.get(name);
      if (!tool) {
        const available = Array.from(tools.keys()).join(', ');
        throw new ToolError('UnknownTool', `Unknown tool: ${name}. Available tools: ${available}`, {
          details: { tool: name },
        });
      }
      return tool;
    },
    has(name: string): boolean {
      return tools.has(name);
    },
    list(): ReadonlyArray<ToolSpec> {
      return Array.from(tools.values(), (tool) => tool.spec);
    },
  };
}
