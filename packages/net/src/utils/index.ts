export { isPublicAddress } from './address.js';
export {
  checkDomain,
  checkUrl,
  defaultHostResolver,
  matchesDomain,
  normalizeHost,
  parseWebUrl,
} from './url-policy.js';
export {
  decodeBody,
  fetchGuarded,
  fetchJson,
  parseRetryAfter,
  type FetchJsonOptions,
  type FetchJsonResult,
  type GuardedFetchOptions,
  type GuardedResponse,
} from './http.js';
export { calculateBackoff, isRetryableNetError, retry, type RetryOptions } from './retry.js';
export {
  collapseWhitespace,
  extractLinks,
  extractPage,
  inlineText,
  MAX_PAGE_LINKS,
  stripBoilerplate,
  type ExtractedPage,
  type PageLink,
} from './html.js';
export { decodeXmlText, parseFeed, type FeedEntry, type ParsedFeed } from './feed.js';
