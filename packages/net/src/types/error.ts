export class NetError extends Error {
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class AbortError extends NetError {}

export class RequestTimeoutError extends NetError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection-level failure: DNS miss, refused connection, reset socket.
 * The request never produced an HTTP status.
 */
export class NetworkError extends NetError {}

export class HttpStatusError extends NetError {
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly retryAfter: number | null;
  readonly url: string;

  constructor(
    message: string,
    statusCode: number,
    url: string,
    retryAfter: number | null = null,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.url = url;
    this.retryAfter = retryAfter;
    this.retryable = statusCode === 429 || statusCode >= 500;
  }
}

export type UrlPolicyReason =
  | 'malformed'
  | 'scheme'
  | 'private-address'
  | 'domain-not-allowed'
  | 'domain-denied'
  | 'unresolvable'
  | 'too-many-redirects';

export class UrlPolicyError extends NetError {
  readonly reason: UrlPolicyReason;
  readonly url: string;

  constructor(message: string, reason: UrlPolicyReason, url: string) {
    super(message);
    this.reason = reason;
    this.url = url;
  }
}

export class FeedParseError extends NetError {}
