import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import { UrlPolicyError } from '../types/error.js';
import type { DomainPolicy, HostResolver } from '../types/config.js';
import { isPublicAddress } from './address.js';

const ALLOWED_SCHEMES = new Set(['http:', 'https:']);

export const defaultHostResolver: HostResolver = async (hostname) => {
  const records = await lookup(hostname, { all: true, verbatim: true });
  return records.map((record) => record.address);
};

/**
 * Parses a URL and rejects anything that is not plain http(s).
 */
export function parseWebUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new UrlPolicyError(`Malformed URL: ${raw}`, 'malformed', raw);
  }

  if (!ALLOWED_SCHEMES.has(url.protocol)) {
    throw new UrlPolicyError(
      `URL scheme not allowed: ${url.protocol} (only http and https are permitted)`,
      'scheme',
      raw,
    );
  }

  if (url.hostname === '') {
    throw new UrlPolicyError(`URL has no host: ${raw}`, 'malformed', raw);
  }

  return url;
}

/**
 * Lower-cased hostname without IPv6 brackets or a trailing root dot.
 */
export function normalizeHost(hostname: string): string {
  let host = hostname.toLowerCase();
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }
  if (host.endsWith('.')) {
    host = host.slice(0, -1);
  }
  return host;
}

/**
 * Label-wise suffix match: `en.wikipedia.org` matches `wikipedia.org`,
 * `notwikipedia.org` does not.
 */
export function matchesDomain(host: string, domain: string): boolean {
  const normalizedDomain = normalizeHost(domain.replace(/^\.+/, ''));
  if (normalizedDomain === '') {
    return false;
  }
  return host === normalizedDomain || host.endsWith(`.${normalizedDomain}`);
}

export function checkDomain(url: URL, policy: DomainPolicy): void {
  const host = normalizeHost(url.hostname);

  if (policy.allowedDomains.length > 0) {
    if (!policy.allowedDomains.some((domain) => matchesDomain(host, domain))) {
      throw new UrlPolicyError(
        `Domain not in allowed list: ${host}`,
        'domain-not-allowed',
        url.href,
      );
    }
    return;
  }

  const blocked = policy.blockedDomains.find((domain) => matchesDomain(host, domain));
  if (blocked !== undefined) {
    throw new UrlPolicyError(`Domain is blocked: ${host}`, 'domain-denied', url.href);
  }
}

export async function assertPublicHost(url: URL, resolveHost: HostResolver): Promise<void> {
  const host = normalizeHost(url.hostname);

  let addresses: ReadonlyArray<string>;
  if (isIP(host) !== 0) {
    addresses = [host];
  } else {
    try {
      addresses = await resolveHost(host);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UrlPolicyError(`Could not resolve host ${host}: ${message}`, 'unresolvable', url.href);
    }
  }

  if (addresses.length === 0) {
    throw new UrlPolicyError(`Could not resolve host ${host}`, 'unresolvable', url.href);
  }

  // Every address must be public; one internal record is enough to refuse.
  const internal = addresses.find((address) => !isPublicAddress(address));
  if (internal !== undefined) {
    throw new UrlPolicyError(
      `Host ${host} resolves to a non-public address (${internal})`,
      'private-address',
      url.href,
    );
  }
}

/**
 * Scheme, domain and address checks for one URL. Domain policy runs before
 * any DNS lookup, so a denied domain never causes network traffic.
 */
export async function checkUrl(
  raw: string,
  policy: DomainPolicy,
  resolveHost: HostResolver = defaultHostResolver,
): Promise<URL> {
  const url = parseWebUrl(raw);
  checkDomain(url, policy);
  await assertPublicHost(url, resolveHost);
  return url;
}
