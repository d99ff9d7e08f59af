import { BlockList, isIP } from 'node:net';

export type IpFamily = 'ipv4' | 'ipv6';

export type BlockedRangeTag =
  | 'unspecified'
  | 'private'
  | 'shared'
  | 'loopback'
  | 'link_local'
  | 'reserved'
  | 'documentation'
  | 'benchmarking'
  | 'multicast'
  | 'unique_local';

export interface BlockedRange {
  tag: BlockedRangeTag;
  family: IpFamily;
  subnet: string;
  prefix: number;
}

export interface NormalizedAddress {
  ip: string;
  family: IpFamily;
}

/**
 * Ordered list of blocked ranges. Each entry becomes its own predicate; adding a range is adding a row.
 */
export const BLOCKED_RANGES: readonly BlockedRange[] = [
  { tag: 'unspecified', family: 'ipv4', subnet: '0.0.0.0', prefix: 8 },
  { tag: 'private', family: 'ipv4', subnet: '10.0.0.0', prefix: 8 },
  { tag: 'shared', family: 'ipv4', subnet: '100.64.0.0', prefix: 10 },
  { tag: 'loopback', family: 'ipv4', subnet: '127.0.0.0', prefix: 8 },
  { tag: 'link_local', family: 'ipv4', subnet: '169.254.0.0', prefix: 16 },
  { tag: 'private', family: 'ipv4', subnet: '172.16.0.0', prefix: 12 },
  { tag: 'reserved', family: 'ipv4', subnet: '192.0.0.0', prefix: 24 },
  { tag: 'documentation', family: 'ipv4', subnet: '192.0.2.0', prefix: 24 },
  { tag: 'private', family: 'ipv4', subnet: '192.168.0.0', prefix: 16 },
  { tag: 'benchmarking', family: 'ipv4', subnet: '198.18.0.0', prefix: 15 },
  { tag: 'documentation', family: 'ipv4', subnet: '198.51.100.0', prefix: 24 },
  { tag: 'documentation', family: 'ipv4', subnet: '203.0.113.0', prefix: 24 },
  { tag: 'multicast', family: 'ipv4', subnet: '224.0.0.0', prefix: 4 },
  { tag: 'reserved', family: 'ipv4', subnet: '240.0.0.0', prefix: 4 },
  { tag: 'unspecified', family: 'ipv6', subnet: '::', prefix: 128 },
  { tag: 'loopback', family: 'ipv6', subnet: '::1', prefix: 128 },
  { tag: 'link_local', family: 'ipv6', subnet: 'fe80::', prefix: 10 },
  { tag: 'unique_local', family: 'ipv6', subnet: 'fc00::', prefix: 7 },
  { tag: 'multicast', family: 'ipv6', subnet: 'ff00::', prefix: 8 },
];

type RangePredicate = (address: NormalizedAddress) => boolean;

const toPredicate = (range: BlockedRange): RangePredicate => {
  const list = new BlockList();
  list.addSubnet(range.subnet, range.prefix, range.family);
  return (address) => address.family === range.family && list.check(address.ip, address.family);
};

const RANGE_CHECKS: ReadonlyArray<{ range: BlockedRange; matches: RangePredicate }> = BLOCKED_RANGES.map(
  (range) => ({ range, matches: toPredicate(range) }),
);

const MAPPED_PREFIX = '::ffff:';

const hexPairToIpv4 = (value: string): string | null => {
  const match = value.match(/^([0-9a-f]{1,4}):([0-9a-f]{1,4})$/);
  if (!match) return null;
  const hi = Number.parseInt(match[1], 16);
  const lo = Number.parseInt(match[2], 16);
  return [hi >> 8, hi & 0xff, lo >> 8, lo & 0xff].join('.');
};

// The URL parser serialises IPv6 in compressed lower-case form, with mapped IPv4 as two hex groups.
const canonicalIpv6 = (value: string): string | null => {
  const href = `http://[${value}]/`;
  if (!URL.canParse(href)) return null;
  return new URL(href).hostname.replace(/^\[|\]$/g, '');
};

/**
 * Normalizes a resolved or literal address; IPv4-mapped IPv6 addresses come back as IPv4.
 */
export const normalizeAddress = (input: string): NormalizedAddress | null => {
  let value = input.trim().toLowerCase().replace(/^\[|\]$/g, '');
  const zoneIndex = value.indexOf('%');
  if (zoneIndex > 0) {
    value = value.slice(0, zoneIndex);
  }
  switch (isIP(value)) {
    case 4:
      return { ip: value, family: 'ipv4' };
    case 6: {
      const canonical = canonicalIpv6(value);
      if (!canonical) return null;
      if (canonical.startsWith(MAPPED_PREFIX)) {
        const tail = canonical.slice(MAPPED_PREFIX.length);
        const mapped = isIP(tail) === 4 ? tail : hexPairToIpv4(tail);
        if (mapped) return { ip: mapped, family: 'ipv4' };
      }
      return { ip: canonical, family: 'ipv6' };
    }
    default:
      return null;
  }
};

export type BlockVerdict = BlockedRangeTag | 'unparseable';

/**
 * Returns the tag of the first blocked range the address falls in, or null when it is routable.
 * Unparseable input counts as blocked.
 */
export const findBlockedRange = (ip: string): BlockVerdict | null => {
  const address = normalizeAddress(ip);
  if (!address) {
    return 'unparseable';
  }
  for (const check of RANGE_CHECKS) {
    if (check.matches(address)) {
      return check.range.tag;
    }
  }
  return null;
};

export const isBlockedIp = (ip: string): boolean => findBlockedRange(ip) !== null;
