/**
 * IP address parsing and classification
 *
 * Classifies IPv4 and IPv6 literals into public and non-public ranges.
 * IPv4-mapped, IPv4-compatible and NAT64 IPv6 forms are classified by the
 * embedded IPv4 address.
 */

export type AddressClass =
  | 'public'
  | 'unspecified'
  | 'loopback'
  | 'private'
  | 'shared'      // 100.64.0.0/10 carrier-grade NAT
  | 'link_local'
  | 'multicast'
  | 'documentation'
  | 'benchmark'
  | 'reserved'
  | 'broadcast';

interface Ipv4Range {
  base: number;
  prefix: number;
  kind: AddressClass;
}

function ipv4ToNumber(octets: readonly number[]): number {
  return ((octets[0] * 256 + octets[1]) * 256 + octets[2]) * 256 + octets[3];
}

function range(cidr: string, kind: AddressClass): Ipv4Range {
  const [address, prefix] = cidr.split('/');
  const octets = address.split('.').map(Number);
  return { base: ipv4ToNumber(octets), prefix: Number(prefix), kind };
}

const IPV4_RANGES: Ipv4Range[] = [
  range('0.0.0.0/8', 'unspecified'),
  range('10.0.0.0/8', 'private'),
  range('100.64.0.0/10', 'shared'),
  range('127.0.0.0/8', 'loopback'),
  range('169.254.0.0/16', 'link_local'),
  range('172.16.0.0/12', 'private'),
  range('192.0.0.0/24', 'reserved'),
  range('192.0.2.0/24', 'documentation'),
  range('192.88.99.0/24', 'reserved'),
  range('192.168.0.0/16', 'private'),
  range('198.18.0.0/15', 'benchmark'),
  range('198.51.100.0/24', 'documentation'),
  range('203.0.113.0/24', 'documentation'),
  range('224.0.0.0/4', 'multicast'),
  range('255.255.255.255/32', 'broadcast'),
  range('240.0.0.0/4', 'reserved'),
];

const CANONICAL_IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

/**
 * Strict dotted-quad parse: four decimal octets, no leading zeros
 */
export function parseIPv4(value: string): number[] | null {
  if (!CANONICAL_IPV4.test(value)) return null;
  return value.split('.').map(Number);
}

export function isIPv4Literal(value: string): boolean {
  return parseIPv4(value) !== null;
}

/**
 * Host text that a WHATWG URL parser would reinterpret as an IPv4 address:
 * integers, hex, octal, and forms with fewer than four parts.
 */
export function looksLikeNumericHost(host: string): boolean {
  if (host.length === 0) return false;
  const parts = host.replace(/\.$/, '').split('.');
  if (parts.length > 4) return false;
  return parts.every((part) => /^(0x[0-9a-f]*|[0-9]+)$/i.test(part));
}

export function classifyIPv4(octets: readonly number[]): AddressClass {
  const value = ipv4ToNumber(octets);
  for (const r of IPV4_RANGES) {
    const size = 2 ** (32 - r.prefix);
    if (value >= r.base && value < r.base + size) {
      return r.kind;
    }
  }
  return 'public';
}

/**
 * Parse an IPv6 literal (no brackets) into eight 16-bit groups. Zone
 * identifiers are not accepted.
 */
export function parseIPv6(value: string): number[] | null {
  if (value.includes('%')) return null;
  let text = value.toLowerCase();

  let tail: number[] = [];
  const lastColon = text.lastIndexOf(':');
  if (lastColon >= 0 && text.slice(lastColon + 1).includes('.')) {
    const v4 = parseIPv4(text.slice(lastColon + 1));
    if (!v4) return null;
    tail = [v4[0] * 256 + v4[1], v4[2] * 256 + v4[3]];
    text = text.slice(0, lastColon + 1) + '0';
  }

  const halves = text.split('::');
  if (halves.length > 2) return null;

  const parseGroups = (part: string): number[] | null => {
    if (part === '') return [];
    const groups = part.split(':');
    const out: number[] = [];
    for (const group of groups) {
      if (!/^[0-9a-f]{1,4}$/.test(group)) return null;
      out.push(parseInt(group, 16));
    }
    return out;
  };

  const head = parseGroups(halves[0]);
  const rest = halves.length === 2 ? parseGroups(halves[1]) : [];
  if (!head || !rest) return null;

  const targetLength = tail.length > 0 ? 7 : 8;
  let groups: number[];
  if (halves.length === 2) {
    const missing = targetLength - head.length - rest.length;
    if (missing < 1) return null;
    groups = [...head, ...new Array<number>(missing).fill(0), ...rest];
  } else {
    if (head.length !== targetLength) return null;
    groups = head;
  }

  if (tail.length > 0) {
    // The dotted tail replaced its own group with a single 0 placeholder
    groups = [...groups.slice(0, 6), ...tail];
  }
  return groups.length === 8 ? groups : null;
}

/**
 * Embedded IPv4 address of mapped (::ffff:a.b.c.d), compatible (::a.b.c.d)
 * and NAT64 (64:ff9b::a.b.c.d) forms
 */
export function embeddedIPv4(groups: readonly number[]): number[] | null {
  const toOctets = (): number[] => [groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff];
  const zeroPrefix = groups.slice(0, 5).every((g) => g === 0);

  if (zeroPrefix && groups[5] === 0xffff) return toOctets();
  if (zeroPrefix && groups[5] === 0 && (groups[6] !== 0 || groups[7] > 1)) return toOctets();
  if (groups[0] === 0x64 && groups[1] === 0xff9b && groups.slice(2, 6).every((g) => g === 0)) {
    return toOctets();
  }
  return null;
}

export function classifyIPv6(groups: readonly number[]): AddressClass {
  if (groups.every((g) => g === 0)) return 'unspecified';
  if (groups.slice(0, 7).every((g) => g === 0) && groups[7] === 1) return 'loopback';

  const embedded = embeddedIPv4(groups);
  if (embedded) return classifyIPv4(embedded);

  const first = groups[0];
  if ((first & 0xffc0) === 0xfe80) return 'link_local';
  if ((first & 0xffc0) === 0xfec0) return 'private'; // deprecated site-local
  if ((first & 0xfe00) === 0xfc00) return 'private'; // unique local
  if ((first & 0xff00) === 0xff00) return 'multicast';
  if (first === 0x2001 && groups[1] === 0x0db8) return 'documentation';
  if (first === 0x0100 && groups.slice(1, 4).every((g) => g === 0)) return 'reserved'; // discard-only
  return 'public';
}

/**
 * Classify any IP literal. Returns null when the text is not an IP address.
 */
export function classifyAddress(address: string): AddressClass | null {
  const bare = address.startsWith('[') && address.endsWith(']') ? address.slice(1, -1) : address;
  const v4 = parseIPv4(bare);
  if (v4) return classifyIPv4(v4);
  const v6 = parseIPv6(bare);
  if (v6) return classifyIPv6(v6);
  return null;
}

export function isPublicAddress(address: string): boolean {
  return classifyAddress(address) === 'public';
}
