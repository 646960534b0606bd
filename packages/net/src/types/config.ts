export type RetryPolicy = {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 1,
  initialDelayMs: 250,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
};

/**
 * Which hosts a URL may point at. An empty allow-list means "any host not
 * on the deny-list"; a non-empty one denies everything it does not name.
 * Entries match the host itself and any of its subdomains.
 */
export type DomainPolicy = {
  readonly allowedDomains: ReadonlyArray<string>;
  readonly blockedDomains: ReadonlyArray<string>;
};

export type HostResolver = (hostname: string) => Promise<ReadonlyArray<string>>;

export type FetchFn = typeof globalThis.fetch;
