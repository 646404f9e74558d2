import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';

const INTERNAL_HOSTNAMES = new Set([
  'localhost',
  'host.docker.internal',
  'metadata.google.internal',
]);

const INTERNAL_HOST_SUFFIXES = ['.localhost', '.local', '.internal', '.lan', '.home'];

interface Ipv4Range {
  base: number;
  prefix: number;
}

function ipv4Range(cidr: string): Ipv4Range {
  const [address, prefix] = cidr.split('/');
  return { base: ipv4ToInt(address.split('.').map(Number)), prefix: Number(prefix) };
}

// Ranges a capture must never reach: loopback, RFC 1918, link-local (cloud
// metadata), CGNAT, benchmarking, multicast and reserved.
const NON_PUBLIC_IPV4 = [
  '0.0.0.0/8',
  '10.0.0.0/8',
  '100.64.0.0/10',
  '127.0.0.0/8',
  '169.254.0.0/16',
  '172.16.0.0/12',
  '192.168.0.0/16',
  '198.18.0.0/15',
  '224.0.0.0/4',
  '240.0.0.0/4',
].map(ipv4Range);

export function normalizeUrl(rawUrl: string): string {
  const candidate = rawUrl.trim();
  const prefixed = /^[a-z][a-z0-9+.-]*:\/\//i.test(candidate) ? candidate : `https://${candidate}`;
  let parsed: URL;
  try {
    parsed = new URL(prefixed);
  } catch {
    throw new Error('Please enter a valid URL');
  }

  if (!['http:', 'https:'].includes(parsed.protocol)) {
    throw new Error('Only HTTP(S) URLs are supported');
  }

  return parsed.toString();
}

function ipv4ToInt(octets: number[]): number {
  return octets.reduce((acc, octet) => acc * 256 + octet, 0);
}

function isNonPublicIpv4(value: number): boolean {
  return NON_PUBLIC_IPV4.some(({ base, prefix }) => {
    const size = 2 ** (32 - prefix);
    return Math.floor(value / size) === Math.floor(base / size);
  });
}

/** Expands an IPv6 literal into its eight 16-bit groups, or null when malformed. */
export function parseIpv6(address: string): number[] | null {
  let text = address.toLowerCase().split('%')[0];
  const tail: number[] = [];

  // Embedded dotted quad, e.g. ::ffff:10.0.0.1
  const dotted = text.match(/^(.*:)(\d{1,3}(?:\.\d{1,3}){3})$/);
  if (dotted) {
    const octets = dotted[2].split('.').map(Number);
    if (octets.some(o => o > 255)) return null;
    tail.push(octets[0] * 256 + octets[1], octets[2] * 256 + octets[3]);
    text = dotted[1].endsWith('::') ? dotted[1] : dotted[1].slice(0, -1);
  }

  const halves = text.split('::');
  if (halves.length > 2) return null;
  const readGroups = (part: string) => (part === '' ? [] : part.split(':'));
  const head = readGroups(halves[0]);
  const rest = halves.length === 2 ? readGroups(halves[1]) : [];
  if ([...head, ...rest].some(group => !/^[0-9a-f]{1,4}$/.test(group))) return null;

  const explicit = head.length + rest.length + tail.length;
  if (halves.length === 1 ? explicit !== 8 : explicit > 7) return null;

  const zeros = Array.from({ length: 8 - explicit }, () => 0);
  return [
    ...head.map(g => parseInt(g, 16)),
    ...(halves.length === 2 ? zeros : []),
    ...rest.map(g => parseInt(g, 16)),
    ...tail,
  ];
}

/** The IPv4 address an IPv6 literal carries (mapped, compatible or NAT64), if any. */
function embeddedIpv4(groups: number[]): number | null {
  const [g0, g1, g2, g3, g4, g5, g6, g7] = groups;
  const low = g6 * 65536 + g7;
  const upperZero = g0 === 0 && g1 === 0 && g2 === 0 && g3 === 0 && g4 === 0;
  if (upperZero && (g5 === 0xffff || g5 === 0)) return low;
  if (g0 === 0x64 && g1 === 0xff9b && g2 === 0 && g3 === 0 && g4 === 0 && g5 === 0) return low;
  return null;
}

function isNonPublicIpv6(address: string): boolean {
  const groups = parseIpv6(address);
  if (!groups) return true;

  if (groups.every(g => g === 0)) return true;
  if (groups.slice(0, 7).every(g => g === 0) && groups[7] === 1) return true;
  if ((groups[0] & 0xfe00) === 0xfc00) return true; // unique local
  if ((groups[0] & 0xff80) === 0xfe80) return true; // link/site local
  if ((groups[0] & 0xff00) === 0xff00) return true; // multicast

  const v4 = embeddedIpv4(groups);
  return v4 !== null && isNonPublicIpv4(v4);
}

export function isPrivateIpAddress(address: string): boolean {
  const version = isIP(address);
  if (version === 4) return isNonPublicIpv4(ipv4ToInt(address.split('.').map(Number)));
  if (version === 6) return isNonPublicIpv6(address);
  return false;
}

function isInternalHostname(hostname: string): boolean {
  const normalized = hostname.toLowerCase().replace(/\.$/, '');
  return INTERNAL_HOSTNAMES.has(normalized) || INTERNAL_HOST_SUFFIXES.some(suffix => normalized.endsWith(suffix));
}

export async function isBlockedTarget(url: URL): Promise<boolean> {
  if (!['http:', 'https:'].includes(url.protocol)) return true;

  // URL keeps IPv6 hosts in brackets
  const hostname = url.hostname.replace(/^\[|\]$/g, '');

  if (isInternalHostname(hostname)) return true;
  if (isIP(hostname) !== 0) return isPrivateIpAddress(hostname);

  try {
    const resolved = await lookup(hostname, { all: true, verbatim: true });
    return resolved.some(entry => isPrivateIpAddress(entry.address));
  } catch {
    // Unresolvable hosts fail later in the capture step with a clearer error.
    return false;
  }
}
