import { describe, it, expect } from 'vitest';
import { isPublicAddress } from './address.js';

describe('isPublicAddress', () => {
  it('should accept ordinary public addresses', () => {
    expect(isPublicAddress('93.184.216.34')).toBe(true);
    expect(isPublicAddress('8.8.8.8')).toBe(true);
    expect(isPublicAddress('2606:4700:4700::1111')).toBe(true);
  });

  it('should reject loopback and private IPv4 ranges', () => {
    for (const address of ['127.0.0.1', '10.1.2.3', '172.16.0.1', '172.31.255.255', '192.168.0.10', '0.0.0.0']) {
      expect(isPublicAddress(address)).toBe(false);
    }
  });

  it('should reject link-local, CGNAT and multicast', () => {
    expect(isPublicAddress('169.254.169.254')).toBe(false);
    expect(isPublicAddress('100.64.0.1')).toBe(false);
    expect(isPublicAddress('224.0.0.1')).toBe(false);
  });

  it('should keep the edges of 172.16.0.0/12 straight', () => {
    expect(isPublicAddress('172.15.255.255')).toBe(true);
    expect(isPublicAddress('172.32.0.0')).toBe(true);
  });

  it('should reject internal IPv6 space', () => {
    expect(isPublicAddress('::1')).toBe(false);
    expect(isPublicAddress('[::1]')).toBe(false);
    expect(isPublicAddress('fe80::1')).toBe(false);
    expect(isPublicAddress('fd12:3456::1')).toBe(false);
  });

  it('should judge IPv4-mapped addresses by their IPv4 part', () => {
    expect(isPublicAddress('::ffff:127.0.0.1')).toBe(false);
    expect(isPublicAddress('::ffff:8.8.8.8')).toBe(true);
  });

  it('should treat garbage as not public', () => {
    expect(isPublicAddress('localhost')).toBe(false);
    expect(isPublicAddress('')).toBe(false);
  });
});
