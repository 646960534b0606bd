import { fetchJson, inlineText } from '@toolgate/net';
import type { FetchFn } from '@toolgate/net';
import { z } from 'zod';
import { ToolError } from '../types/error.js';
import type { SearchEngine, SearchPolicy } from '../types/config.js';

export const TIME_RANGES = ['day', 'week', 'month', 'year', 'all'] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

export type SearchHit = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly source: string;
};

export type EngineQuery = {
  readonly query: string;
  readonly maxResults: number;
  readonly timeRange: TimeRange;
  readonly signal?: AbortSignal;
};

export type SearchBackend = (query: EngineQuery) => Promise<ReadonlyArray<SearchHit>>;

export type EngineDeps = {
  readonly policy: SearchPolicy;
  readonly fetch?: FetchFn;
};

const USER_AGENT = 'toolgate/0.1';

const DuckDuckGoTopic = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional(),
});

const DuckDuckGoResponse = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  AbstractSource: z.string().optional(),
  Results: z.array(DuckDuckGoTopic).optional(),
  // Topic groups nest one level: { Name, Topics: [...] }.
  RelatedTopics: z.array(DuckDuckGoTopic.extend({ Topics: z.array(DuckDuckGoTopic).optional() })).optional(),
});

const BraveResponse = z.object({
  web: z
    .object({
      results: z.array(
        z.object({
          title: z.string(),
          url: z.string(),
          description: z.string().optional(),
        }),
      ),
    })
    .optional(),
});

const SearxngResponse = z.object({
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      content: z.string().optional(),
      engine: z.string().optional(),
    }),
  ),
});

const DUCKDUCKGO_FRESHNESS: Readonly<Record<TimeRange, string | null>> = {
  day: 'd',
  week: 'w',
  month: 'm',
  year: 'y',
  all: null,
};

const BRAVE_FRESHNESS: Readonly<Record<TimeRange, string | null>> = {
  day: 'pd',
  week: 'pw',
  month: 'pm',
  year: 'py',
  all: null,
};

function parsePayload<T>(engine: SearchEngine, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ToolError('EngineUnavailable', `Search engine ${engine} returned an unexpected response`, {
      details: { engine, issues: parsed.error.issues.slice(0, 3).map((issue) => issue.message) },
      retryable: false,
    });
  }
  return parsed.data;
}

// https://duckduckgo.com/Tea_culture -> "Tea culture"
function titleFromUrl(url: string): string {
  const segment = url.split('/').pop() ?? '';
  try {
    return decodeURIComponent(segment).replaceAll('_', ' ');
  } catch {
    return segment.replaceAll('_', ' ');
  }
}

function createDuckDuckGo(deps: EngineDeps): SearchBackend {
  return async ({ query, maxResults, timeRange, signal }) => {
    const url = new URL('https://api.duckduckgo.com/');
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('no_html', '1');
    url.searchParams.set('skip_disambig', '1');
    const freshness = DUCKDUCKGO_FRESHNESS[timeRange];
    if (freshness !== null) {
      url.searchParams.set('df', freshness);
    }

    const { body } = await fetchJson({
      url: url.href,
      headers: { 'User-Agent': USER_AGENT },
      timeoutMs: deps.policy.requestTimeoutMs,
      signal,
      fetch: deps.fetch,
    });
    const data = parsePayload('duckduckgo', DuckDuckGoResponse, body);

    const hits: SearchHit[] = [];
    if (data.AbstractText && data.AbstractURL) {
      hits.push({
        title: data.Heading || 'Abstract',
        url: data.AbstractURL,
        snippet: data.AbstractText,
        source: data.AbstractSource || 'DuckDuckGo',
      });
    }

    const topics = [
      ...(data.Results ?? []),
      ...(data.RelatedTopics ?? []).flatMap((topic) => topic.Topics ?? [topic]),
    ];
    for (const topic of topics) {
      if (hits.length >= maxResults) break;
      if (topic.Text && topic.FirstURL) {
        hits.push({ title: titleFromUrl(topic.FirstURL), url: topic.FirstURL, snippet: topic.Text, source: 'DuckDuckGo' });
      }
    }
    return hits;
  };
}

function createBrave(deps: EngineDeps): SearchBackend {
  return async ({ query, maxResults, timeRange, signal }) => {
    const apiKey = deps.policy.braveApiKey;
    if (apiKey === null) {
      throw new ToolError('EngineUnavailable', 'Brave search is not configured (set BRAVE_API_KEY)', {
        details: { engine: 'brave' },
        retryable: false,
      });
    }

    const url = new URL('https://api.search.brave.com/res/v1/web/search');
    url.searchParams.set('q', query);
    url.searchParams.set('count', String(Math.min(maxResults, 20)));
    const freshness = BRAVE_FRESHNESS[timeRange];
    if (freshness !== null) {
      url.searchParams.set('freshness', freshness);
    }

    const { body } = await fetchJson({
      url: url.href,
      headers: { 'X-Subscription-Token': apiKey, 'User-Agent': USER_AGENT },
      timeoutMs: deps.policy.requestTimeoutMs,
      signal,
      fetch: deps.fetch,
    });
    const data = parsePayload('brave', BraveResponse, body);

    return (data.web?.results ?? []).map((result) => ({
      title: inlineText(result.title),
      url: result.url,
      snippet: inlineText(result.description ?? ''),
      source: 'Brave',
    }));
  };
}

function createSearxng(deps: EngineDeps): SearchBackend {
  return async ({ query, timeRange, signal }) => {
    const baseUrl = deps.policy.searxngUrl;
    if (baseUrl === null) {
      throw new ToolError('EngineUnavailable', 'SearXNG search is not configured (set SEARXNG_URL)', {
        details: { engine: 'searxng' },
        retryable: false,
      });
    }

    const url = new URL('search', baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    if (timeRange !== 'all') {
      url.searchParams.set('time_range', timeRange);
    }

    const { body } = await fetchJson({
      url: url.href,
      headers: { 'User-Agent': USER_AGENT },
      timeoutMs: deps.policy.requestTimeoutMs,
      signal,
      fetch: deps.fetch,
    });
    const data = parsePayload('searxng', SearxngResponse, body);

    return data.results.map((result) => ({
      title: result.title,
      url: result.url,
      snippet: result.content ?? '',
      source: result.engine ? `SearXNG (${result.engine})` : 'SearXNG',
    }));
  };
}

export function createSearchBackend(engine: SearchEngine, deps: EngineDeps): SearchBackend {
  switch (engine) {
    case 'duckduckgo':
      return createDuckDuckGo(deps);
    case 'brave':
      return createBrave(deps);
    case 'searxng':
      return createSearxng(deps);
  }
}
