export type ToolErrorKind =
  // path policy
  | 'NotAllowed'
  | 'Denied'
  | 'Malformed'
  // filesystem
  | 'NotFound'
  | 'AlreadyExists'
  | 'TooLarge'
  // network
  | 'EngineUnavailable'
  | 'Timeout'
  | 'UnreachableHost'
  // dispatch
  | 'UnknownTool'
  | 'InvalidArguments'
  | 'Cancelled'
  | 'DuplicateTool'
  | 'Internal';

const TRANSIENT_KINDS: ReadonlySet<ToolErrorKind> = new Set<ToolErrorKind>([
  'EngineUnavailable',
  'Timeout',
  'UnreachableHost',
]);

export type ToolErrorOptions = {
  readonly details?: Readonly<Record<string, unknown>>;
  readonly retryable?: boolean;
  readonly cause?: Error;
};

/**
 * The one error type tool handlers raise. The dispatcher turns it into the
 * `error` field of a ToolCallResult; `details` travels with it, `cause` does not.
 */
export class ToolError extends Error {
  override name = 'ToolError';
  readonly kind: ToolErrorKind;
  readonly details: Readonly<Record<string, unknown>> | undefined;
  readonly retryable: boolean;
  override readonly cause?: Error;

  constructor(kind: ToolErrorKind, message: string, options: ToolErrorOptions = {}) {
    super(message);
    this.kind = kind;
    this.details = options.details;
    this.retryable = options.retryable ?? TRANSIENT_KINDS.has(kind);
    this.cause = options.cause;
  }
}

/**
 * Invalid or missing startup configuration. Thrown by the config loader only.
 */
export class ConfigurationError extends Error {
  override name = 'ConfigurationError';
  readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string> = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.issues = issues;
  }
}

export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}
