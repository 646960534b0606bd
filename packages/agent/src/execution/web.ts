import {
  AbortError,
  checkDomain,
  decodeBody,
  defaultHostResolver,
  extractPage,
  FeedParseError,
  fetchGuarded,
  HttpStatusError,
  NetworkError,
  parseFeed,
  parseWebUrl,
  RequestTimeoutError,
  UrlPolicyError,
} from '@toolgate/net';
import type {
  ExtractedPage,
  FetchFn,
  GuardedResponse,
  HostResolver,
  ParsedFeed,
  UrlPolicyReason,
} from '@toolgate/net';
import { ToolError } from '../types/error.js';
import type { ToolErrorKind } from '../types/error.js';
import type { SearchEngine, SearchPolicy } from '../types/config.js';
import { createSearchBackend } from './search-engines.js';
import type { SearchHit, TimeRange } from './search-engines.js';

export type WebSearchOptions = {
  readonly engine?: SearchEngine;
  readonly maxResults?: number;
  readonly timeRange?: TimeRange;
  readonly signal?: AbortSignal;
};

export type SearchResponse = {
  readonly query: string;
  readonly engine: SearchEngine;
  readonly timeRange: TimeRange;
  readonly results: ReadonlyArray<SearchHit>;
  /** Results removed because their URL failed the domain policy. */
  readonly filtered: number;
};

export type ExtractedContent = ExtractedPage & {
  readonly url: string;
  readonly finalUrl: string;
  readonly status: number;
  readonly contentType: string;
  readonly bytes: number;
  readonly truncated: boolean;
};

export type UrlValidation = {
  readonly url: string;
  readonly finalUrl: string | null;
  readonly reachable: boolean;
  readonly statusCode: number | null;
  readonly headers: Readonly<Record<string, string>>;
  readonly redirects: ReadonlyArray<string>;
  readonly error: string | null;
};

export type FeedResult = ParsedFeed & {
  readonly url: string;
  readonly finalUrl: string;
  readonly truncated: boolean;
};

export type PageInfo = {
  readonly url: string;
  readonly validation: UrlValidation;
  /** Null when the page was unreachable, answered with an error status, or is not text. */
  readonly content: ExtractedContent | null;
};

export const BULK_OPERATIONS = ['validate_url', 'extract_content', 'get_page_info'] as const;
export type BulkOperation = (typeof BULK_OPERATIONS)[number];

export const MAX_BULK_URLS = 10;

export type BulkItem =
  | { readonly url: string; readonly ok: true; readonly result: UrlValidation | ExtractedContent | PageInfo }
  | { readonly url: string; readonly ok: false; readonly error: { readonly kind: ToolErrorKind; readonly message: string } };

export type BulkResult = {
  readonly operation: BulkOperation;
  readonly totalUrls: number;
  /** At most MAX_BULK_URLS; the rest of the list is ignored. */
  readonly processedUrls: number;
  readonly results: ReadonlyArray<BulkItem>;
};

export type WebClient = {
  readonly search: (query: string, options?: WebSearchOptions) => Promise<SearchResponse>;
  readonly extractContent: (url: string, signal?: AbortSignal) => Promise<ExtractedContent>;
  readonly validateUrl: (url: string, signal?: AbortSignal) => Promise<UrlValidation>;
  readonly parseRss: (url: string, options?: { readonly maxEntries?: number; readonly signal?: AbortSignal }) => Promise<FeedResult>;
  /** validateUrl, then extractContent when the page answered with a success status. */
  readonly getPageInfo: (url: string, signal?: AbortSignal) => Promise<PageInfo>;
  /** Runs one operation over several URLs in turn. Per-URL failures are reported, not thrown. */
  readonly bulk: (urls: ReadonlyArray<string>, operation: BulkOperation, signal?: AbortSignal) => Promise<BulkResult>;
};

export type WebClientDeps = {
  readonly policy: SearchPolicy;
  readonly fetch?: FetchFn;
  readonly resolveHost?: HostResolver;
};

const POLICY_KINDS: Readonly<Record<UrlPolicyReason, ToolErrorKind>> = {
  malformed: 'Malformed',
  scheme: 'Denied',
  'private-address': 'Denied',
  'domain-not-allowed': 'NotAllowed',
  'domain-denied': 'Denied',
  unresolvable: 'UnreachableHost',
  'too-many-redirects': 'UnreachableHost',
};

const REPORTED_HEADERS = ['content-type', 'content-length', 'last-modified', 'etag', 'server', 'cache-control'];

const USER_AGENT = 'toolgate/0.1';

/**
 * Maps a failure from the net layer onto the tool error taxonomy. Anything
 * unrecognized is returned unchanged.
 */
export function toWebToolError(error: unknown): unknown {
  if (error instanceof ToolError) {
    return error;
  }
  if (error instanceof UrlPolicyError) {
    return new ToolError(POLICY_KINDS[error.reason], error.message, {
      details: { url: error.url, reason: error.reason },
      retryable: false,
      cause: error,
    });
  }
  if (error instanceof AbortError) {
    return new ToolError('Cancelled', error.message, { cause: error });
  }
  if (error instanceof RequestTimeoutError) {
    return new ToolError('Timeout', error.message, { details: { timeoutMs: error.timeoutMs }, cause: error });
  }
  if (error instanceof HttpStatusError) {
    return new ToolError('UnreachableHost', error.message, {
      details: { url: error.url, status: error.statusCode },
      retryable: error.retryable,
      cause: error,
    });
  }
  if (error instanceof NetworkError) {
    return new ToolError('UnreachableHost', error.message, { cause: error });
  }
  if (error instanceof FeedParseError) {
    return new ToolError('Malformed', error.message, { cause: error });
  }
  return error;
}

// Search backends are configured endpoints: any failure to talk to one means
// the engine is unavailable, not that a user-supplied host is unreachable.
function toEngineError(engine: SearchEngine, error: unknown): unknown {
  const mapped = toWebToolError(error);
  if (mapped instanceof ToolError && mapped.kind === 'UnreachableHost') {
    return new ToolError('EngineUnavailable', `Search engine ${engine} is unavailable: ${mapped.message}`, {
      details: { engine, ...mapped.details },
      retryable: mapped.retryable,
      cause: mapped,
    });
  }
  return mapped;
}

function assertSuccessStatus(response: GuardedResponse): void {
  if (response.status >= 200 && response.status < 300) {
    return;
  }
  throw new ToolError('UnreachableHost', `HTTP ${response.status} ${response.statusText} from ${response.finalUrl}`, {
    details: { url: response.finalUrl, status: response.status },
    retryable: response.status === 429 || response.status >= 500,
  });
}

function mediaType(contentType: string | null): string {
  return (contentType ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
}

function isHtml(type: string): boolean {
  return type === 'text/html' || type === 'application/xhtml+xml';
}

function isJson(type: string): boolean {
  return type === 'application/json' || type.endsWith('+json');
}

function isText(type: string): boolean {
  return type === '' || type.startsWith('text/') || type.endsWith('+xml') || type === 'application/xml';
}

export function createWebClient(deps: WebClientDeps): WebClient {
  const { policy } = deps;
  const resolveHost = deps.resolveHost ?? defaultHostResolver;

  function guarded(url: string, signal: AbortSignal | undefined, method: 'GET' | 'HEAD' = 'GET') {
    return fetchGuarded({
      url,
      method,
      headers: { 'User-Agent': USER_AGENT },
      timeoutMs: policy.requestTimeoutMs,
      maxBytes: policy.maxContentBytes,
      maxRedirects: policy.maxRedirects,
      policy,
      resolveHost,
      signal,
      fetch: deps.fetch,
    });
  }

  function passesDomainPolicy(url: string): boolean {
    try {
      checkDomain(parseWebUrl(url), policy);
      return true;
    } catch (error) {
      if (error instanceof UrlPolicyError) {
        return false;
      }
      throw error;
    }
  }

  async function search(query: string, options: WebSearchOptions = {}): Promise<SearchResponse> {
    const engine = options.engine ?? policy.engine;
    const timeRange = options.timeRange ?? 'all';
    const maxResults = Math.min(options.maxResults ?? policy.maxResults, policy.maxResults);

    const backend = createSearchBackend(engine, { policy, fetch: deps.fetch });
    let hits: ReadonlyArray<SearchHit>;
    try {
      hits = await backend({ query, maxResults, timeRange, signal: options.signal });
    } catch (error) {
      throw toEngineError(engine, error);
    }

    const allowed = hits.filter((hit) => passesDomainPolicy(hit.url));
    return {
      query,
      engine,
      timeRange,
      results: allowed.slice(0, maxResults),
      filtered: hits.length - allowed.length,
    };
  }

  async function extractContent(url: string, signal?: AbortSignal): Promise<ExtractedContent> {
    let response: GuardedResponse;
    try {
      response = await guarded(url, signal);
    } catch (error) {
      throw toWebToolError(error);
    }
    assertSuccessStatus(response);

    const contentType = response.headers.get('content-type');
    const type = mediaType(contentType);
    const body = decodeBody(response.body, contentType);

    let page: ExtractedPage;
    if (isHtml(type)) {
      page = extractPage(body, response.finalUrl);
    } else if (isJson(type)) {
      let text = body;
      try {
        text = JSON.stringify(JSON.parse(body), null, 2);
      } catch {
        // Cut off mid-document or not really JSON; return it as fetched.
      }
      page = { title: '', description: '', text, links: [] };
    } else if (isText(type)) {
      page = { title: '', description: '', text: body, links: [] };
    } else {
      throw new ToolError('InvalidArguments', `Unsupported content type ${type} at ${response.finalUrl}`, {
        details: { url: response.finalUrl, contentType: type },
      });
    }

    return {
      url,
      finalUrl: response.finalUrl,
      status: response.status,
      contentType: type,
      ...page,
      bytes: response.bytes,
      truncated: response.truncated,
    };
  }

  async function checkReachable(url: string, signal: AbortSignal | undefined): Promise<GuardedResponse> {
    const head = await guarded(url, signal, 'HEAD');
    if (head.status !== 405 && head.status !== 501) {
      return head;
    }
    return guarded(url, signal, 'GET');
  }

  async function validateUrl(url: string, signal?: AbortSignal): Promise<UrlValidation> {
    let response: GuardedResponse;
    try {
      response = await checkReachable(url, signal);
    } catch (error) {
      const mapped = toWebToolError(error);
      if (mapped instanceof ToolError && (mapped.kind === 'UnreachableHost' || mapped.kind === 'Timeout')) {
        return {
          url,
          finalUrl: null,
          reachable: false,
          statusCode: null,
          headers: {},
          redirects: [],
          error: mapped.message,
        };
      }
      throw mapped;
    }

    const headers: Record<string, string> = {};
    for (const name of REPORTED_HEADERS) {
      const value = response.headers.get(name);
      if (value !== null) {
        headers[name] = value;
      }
    }

    return {
      url,
      finalUrl: response.finalUrl,
      reachable: true,
      statusCode: response.status,
      headers,
      redirects: response.redirects,
      error: null,
    };
  }

  async function parseRss(
    url: string,
    options: { readonly maxEntries?: number; readonly signal?: AbortSignal } = {},
  ): Promise<FeedResult> {
    const limit = Math.min(options.maxEntries ?? policy.maxResults, policy.maxResults);
    try {
      const response = await guarded(url, options.signal);
      assertSuccessStatus(response);
      const feed = parseFeed(decodeBody(response.body, response.headers.get('content-type')), limit);
      return {
        url,
        finalUrl: response.finalUrl,
        ...feed,
        truncated: response.truncated,
      };
    } catch (error) {
      throw toWebToolError(error);
    }
  }

  async function getPageInfo(url: string, signal?: AbortSignal): Promise<PageInfo> {
    const validation = await validateUrl(url, signal);
    const status = validation.statusCode;
    if (!validation.reachable || status === null || status < 200 || status >= 300) {
      return { url, validation, content: null };
    }
    try {
      return { url, validation, content: await extractContent(url, signal) };
    } catch (error) {
      // Images and other binary pages still have headers worth reporting.
      if (error instanceof ToolError && error.kind === 'InvalidArguments') {
        return { url, validation, content: null };
      }
      throw error;
    }
  }

  function runBulkOperation(
    operation: BulkOperation,
    url: string,
    signal: AbortSignal | undefined,
  ): Promise<UrlValidation | ExtractedContent | PageInfo> {
    switch (operation) {
      case 'validate_url':
        return validateUrl(url, signal);
      case 'extract_content':
        return extractContent(url, signal);
      case 'get_page_info':
        return getPageInfo(url, signal);
    }
  }

  async function bulk(
    urls: ReadonlyArray<string>,
    operation: BulkOperation,
    signal?: AbortSignal,
  ): Promise<BulkResult> {
    const results: BulkItem[] = [];
    for (const url of urls.slice(0, MAX_BULK_URLS)) {
      try {
        results.push({ url, ok: true, result: await runBulkOperation(operation, url, signal) });
      } catch (error) {
        if (!(error instanceof ToolError) || error.kind === 'Cancelled') {
          throw error;
        }
        results.push({ url, ok: false, error: { kind: error.kind, message: error.message } });
      }
    }
    return { operation, totalUrls: urls.length, processedUrls: results.length, results };
  }

  return { search, extractContent, validateUrl, parseRss, getPageInfo, bulk };
}
