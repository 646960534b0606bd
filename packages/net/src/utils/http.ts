import {
  AbortError,
  HttpStatusError,
  NetError,
  NetworkError,
  RequestTimeoutError,
  UrlPolicyError,
} from '../types/error.js';
import type { DomainPolicy, FetchFn, HostResolver } from '../types/config.js';
import { checkUrl, defaultHostResolver } from './url-policy.js';

export type FetchJsonOptions = {
  readonly url: string;
  readonly headers?: Record<string, string>;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  readonly fetch?: FetchFn;
};

export type FetchJsonResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

export type GuardedFetchOptions = {
  readonly url: string;
  readonly method?: 'GET' | 'HEAD';
  readonly headers?: Record<string, string>;
  readonly timeoutMs: number;
  readonly maxBytes: number;
  readonly maxRedirects: number;
  readonly policy: DomainPolicy;
  readonly resolveHost?: HostResolver;
  readonly signal?: AbortSignal;
  readonly fetch?: FetchFn;
};

export type GuardedResponse = {
  readonly url: string;
  readonly finalUrl: string;
  readonly status: number;
  readonly statusText: string;
  readonly headers: Headers;
  readonly body: Uint8Array;
  readonly bytes: number;
  readonly truncated: boolean;
  readonly redirects: ReadonlyArray<string>;
};

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Parses the Retry-After header into milliseconds, or null when absent.
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

/**
 * Links two abort signals so that either one being aborted triggers the target.
 */
function linkSignals(
  externalSignal: AbortSignal | undefined,
  targetSignal: AbortSignal,
): AbortSignal {
  if (!externalSignal) {
    return targetSignal;
  }

  if (externalSignal.aborted) {
    return externalSignal;
  }

  const controller = new AbortController();

  externalSignal.addEventListener('abort', () => controller.abort(), { once: true });
  targetSignal.addEventListener('abort', () => controller.abort(), { once: true });

  return controller.signal;
}

type Deadline = {
  readonly signal: AbortSignal;
  readonly toNetError: (err: unknown) => NetError;
  readonly clear: () => void;
};

function startDeadline(timeoutMs: number, externalSignal: AbortSignal | undefined, url: string): Deadline {
  const timeoutController = new AbortController();
  const signal = linkSignals(externalSignal, timeoutController.signal);
  const timeoutId = setTimeout(() => {
    timeoutController.abort();
  }, timeoutMs);

  return {
    signal,
    toNetError: (err) => {
      if (timeoutController.signal.aborted) {
        return new RequestTimeoutError(`Request to ${url} timed out after ${timeoutMs}ms`, timeoutMs);
      }
      if (externalSignal?.aborted) {
        return new AbortError(`Request to ${url} was aborted`);
      }
      if (err instanceof NetError) {
        return err;
      }
      const cause = err instanceof Error ? err : undefined;
      const detail = err instanceof Error ? err.message : String(err);
      return new NetworkError(`Network error fetching ${url}: ${detail}`, cause);
    },
    clear: () => {
      clearTimeout(timeoutId);
    },
  };
}

/**
 * GET a JSON endpoint (a configured search backend, not user-supplied URLs).
 * Non-2xx statuses become HttpStatusError.
 */
export async function fetchJson(options: FetchJsonOptions): Promise<FetchJsonResult> {
  const { url, headers = {}, timeoutMs, signal: externalSignal, fetch: fetchImpl = globalThis.fetch } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const deadline = startDeadline(timeoutMs, externalSignal, url);

  try {
    const response = await fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...headers },
      signal: deadline.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new HttpStatusError(
        `HTTP ${response.status} from ${url}: ${text.slice(0, 200)}`,
        response.status,
        url,
        parseRetryAfter(response.headers),
      );
    }

    const body: unknown = await response.json();
    return { response, body };
  } catch (err) {
    throw deadline.toNetError(err);
  } finally {
    deadline.clear();
  }
}

async function readCapped(
  response: globalThis.Response,
  maxBytes: number,
): Promise<{ body: Uint8Array; truncated: boolean }> {
  if (!response.body) {
    return { body: new Uint8Array(0), truncated: false };
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  let truncated = false;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    const room = maxBytes - total;
    if (value.byteLength >= room) {
      chunks.push(value.subarray(0, room));
      total += room;
      truncated = value.byteLength > room;
      if (!truncated) {
        // Exactly at the cap; find out whether anything follows.
        const next = await reader.read();
        truncated = !next.done;
      }
      if (truncated) {
        await reader.cancel();
      }
      break;
    }
    chunks.push(value);
    total += value.byteLength;
  }

  const body = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return { body, truncated };
}

/**
 * Fetches a user-supplied URL under a domain policy.
 *
 * Redirects are followed by hand so that every hop gets the same scheme,
 * domain and address checks as the original URL. The body is read up to
 * `maxBytes` and cut there. Non-2xx statuses are returned, not thrown.
 */
export async function fetchGuarded(options: GuardedFetchOptions): Promise<GuardedResponse> {
  const {
    url,
    method = 'GET',
    headers = {},
    timeoutMs,
    maxBytes,
    maxRedirects,
    policy,
    resolveHost = defaultHostResolver,
    signal: externalSignal,
    fetch: fetchImpl = globalThis.fetch,
  } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  let current = await checkUrl(url, policy, resolveHost);
  const redirects: string[] = [];
  let currentMethod = method;

  const deadline = startDeadline(timeoutMs, externalSignal, url);

  try {
    for (;;) {
      const response = await fetchImpl(current.href, {
        method: currentMethod,
        headers,
        redirect: 'manual',
        signal: deadline.signal,
      });

      const location = response.headers.get('location');
      if (REDIRECT_STATUSES.has(response.status) && location) {
        await response.body?.cancel();

        if (redirects.length >= maxRedirects) {
          throw new UrlPolicyError(
            `Too many redirects (more than ${maxRedirects}) starting from ${url}`,
            'too-many-redirects',
            url,
          );
        }

        let next: string;
        try {
          next = new URL(location, current).href;
        } catch {
          throw new UrlPolicyError(`Malformed redirect target: ${location}`, 'malformed', url);
        }

        current = await checkUrl(next, policy, resolveHost);
        redirects.push(current.href);
        if (response.status === 303 && currentMethod !== 'HEAD') {
          currentMethod = 'GET';
        }
        continue;
      }

      const { body, truncated } =
        currentMethod === 'HEAD'
          ? { body: new Uint8Array(0), truncated: false }
          : await readCapped(response, maxBytes);

      return {
        url,
        finalUrl: current.href,
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
        body,
        bytes: body.byteLength,
        truncated,
        redirects,
      };
    }
  } catch (err) {
    throw deadline.toNetError(err);
  } finally {
    deadline.clear();
  }
}

/**
 * Decodes a body using the charset from its Content-Type, falling back to UTF-8
 * for unknown labels.
 */
export function decodeBody(body: Uint8Array, contentType: string | null): string {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  const charset = match?.[1] ?? 'utf-8';
  try {
    return new TextDecoder(charset).decode(body);
  } catch {
    return new TextDecoder('utf-8').decode(body);
  }
}
