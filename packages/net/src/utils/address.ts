import { BlockList, isIPv4, isIPv6 } from 'node:net';

// Loopback, private, link-local, CGNAT, multicast and reserved ranges.
// Anything in here is treated as internal network space.
const NON_PUBLIC_V4: ReadonlyArray<readonly [string, number]> = [
  ['0.0.0.0', 8],
  ['10.0.0.0', 8],
  ['100.64.0.0', 10],
  ['127.0.0.0', 8],
  ['169.254.0.0', 16],
  ['172.16.0.0', 12],
  ['192.0.0.0', 24],
  ['192.0.2.0', 24],
  ['192.168.0.0', 16],
  ['198.18.0.0', 15],
  ['198.51.100.0', 24],
  ['203.0.113.0', 24],
  ['224.0.0.0', 4],
  ['240.0.0.0', 4],
];

const NON_PUBLIC_V6: ReadonlyArray<readonly [string, number]> = [
  ['::', 128],
  ['::1', 128],
  ['64:ff9b::', 96],
  ['100::', 64],
  ['2001:db8::', 32],
  ['fc00::', 7],
  ['fe80::', 10],
  ['ff00::', 8],
];

function buildBlockList(): BlockList {
  const list = new BlockList();
  for (const [network, prefix] of NON_PUBLIC_V4) {
    list.addSubnet(network, prefix, 'ipv4');
  }
  for (const [network, prefix] of NON_PUBLIC_V6) {
    list.addSubnet(network, prefix, 'ipv6');
  }
  return list;
}

const nonPublic = buildBlockList();

/**
 * True only for addresses routable on the public internet. Unparseable input
 * is not public. IPv4-mapped IPv6 addresses are judged by their IPv4 part.
 */
export function isPublicAddress(address: string): boolean {
  const bare = address.startsWith('[') && address.endsWith(']') ? address.slice(1, -1) : address;
  const lowered = bare.toLowerCase();

  if (lowered.startsWith('::ffff:')) {
    const mapped = lowered.slice('::ffff:'.length);
    if (isIPv4(mapped)) {
      return !nonPublic.check(mapped, 'ipv4');
    }
  }

  if (isIPv4(lowered)) {
    return !nonPublic.check(lowered, 'ipv4');
  }

  if (isIPv6(lowered)) {
    return !nonPublic.check(lowered, 'ipv6');
  }

  return false;
}
