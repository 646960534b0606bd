import { describe, it, expect, vi } from 'vitest';
import { checkDomain, checkUrl, matchesDomain, normalizeHost, parseWebUrl } from './url-policy.js';
import { UrlPolicyError } from '../types/error.js';
import type { DomainPolicy } from '../types/config.js';

const openPolicy: DomainPolicy = { allowedDomains: [], blockedDomains: [] };

describe('parseWebUrl', () => {
  it('should accept http and https', () => {
    expect(parseWebUrl('https://example.com/a?b=1').hostname).toBe('example.com');
    expect(parseWebUrl('  http://example.com  ').protocol).toBe('http:');
  });

  it('should reject other schemes', () => {
    for (const raw of ['file:///etc/passwd', 'ftp://example.com/', 'javascript:alert(1)']) {
      expect(() => parseWebUrl(raw)).toThrow(UrlPolicyError);
      expect(() => parseWebUrl(raw)).toThrow(expect.objectContaining({ reason: 'scheme' }));
    }
  });

  it('should reject unparseable input as malformed', () => {
    expect(() => parseWebUrl('not a url')).toThrow(expect.objectContaining({ reason: 'malformed' }));
  });
});

describe('normalizeHost', () => {
  it('should lower-case and strip brackets and the root dot', () => {
    expect(normalizeHost('Example.COM.')).toBe('example.com');
    expect(normalizeHost('[::1]')).toBe('::1');
  });
});

describe('matchesDomain', () => {
  it('should match the domain and its subdomains', () => {
    expect(matchesDomain('wikipedia.org', 'wikipedia.org')).toBe(true);
    expect(matchesDomain('en.wikipedia.org', 'wikipedia.org')).toBe(true);
    expect(matchesDomain('en.wikipedia.org', '.wikipedia.org')).toBe(true);
  });

  it('should not match on a bare suffix', () => {
    expect(matchesDomain('notwikipedia.org', 'wikipedia.org')).toBe(false);
    expect(matchesDomain('wikipedia.org.evil.test', 'wikipedia.org')).toBe(false);
  });
});

describe('checkDomain', () => {
  it('should make a non-empty allow-list exclusive', () => {
    const policy: DomainPolicy = { allowedDomains: ['wikipedia.org'], blockedDomains: [] };
    expect(() => checkDomain(new URL('https://en.wikipedia.org/'), policy)).not.toThrow();
    expect(() => checkDomain(new URL('https://evil.example.com/'), policy)).toThrow(
      expect.objectContaining({ reason: 'domain-not-allowed' }),
    );
  });

  it('should apply the block-list when there is no allow-list', () => {
    const policy: DomainPolicy = { allowedDomains: [], blockedDomains: ['tracker.test'] };
    expect(() => checkDomain(new URL('https://cdn.tracker.test/p'), policy)).toThrow(
      expect.objectContaining({ reason: 'domain-denied' }),
    );
    expect(() => checkDomain(new URL('https://example.com/'), policy)).not.toThrow();
  });
});

describe('checkUrl', () => {
  it('should return the parsed URL when every check passes', async () => {
    const url = await checkUrl('https://example.com/x', openPolicy, async () => ['93.184.216.34']);
    expect(url.href).toBe('https://example.com/x');
  });

  it('should refuse a literal loopback address without resolving', async () => {
    const resolveHost = vi.fn(async () => ['93.184.216.34']);
    await expect(checkUrl('http://127.0.0.1:8080/', openPolicy, resolveHost)).rejects.toMatchObject({
      reason: 'private-address',
    });
    expect(resolveHost).not.toHaveBeenCalled();
  });

  it('should refuse a name that resolves to a private address', async () => {
    await expect(
      checkUrl('http://intranet.example.com/', openPolicy, async () => ['93.184.216.34', '10.0.0.5']),
    ).rejects.toMatchObject({ reason: 'private-address' });
  });

  it('should report resolution failures as unresolvable', async () => {
    await expect(
      checkUrl('https://missing.example.com/', openPolicy, async () => {
        throw new Error('ENOTFOUND');
      }),
    ).rejects.toMatchObject({ reason: 'unresolvable' });
    await expect(checkUrl('https://empty.example.com/', openPolicy, async () => [])).rejects.toMatchObject({
      reason: 'unresolvable',
    });
  });

  it('should check the domain before touching DNS', async () => {
    const resolveHost = vi.fn(async () => ['93.184.216.34']);
    const policy: DomainPolicy = { allowedDomains: ['wikipedia.org'], blockedDomains: [] };
    await expect(checkUrl('https://evil.example.com/', policy, resolveHost)).rejects.toMatchObject({
      reason: 'domain-not-allowed',
    });
    expect(resolveHost).not.toHaveBeenCalled();
  });
});
