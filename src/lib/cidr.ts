/**
 * IPv4 address and CIDR helpers on top of ipaddr.js
 *
 * Only dotted four-part decimal text is accepted; ipaddr.js would otherwise
 * also take hex, octal and shortened forms. Malformed text yields null.
 */

import ipaddr from 'ipaddr.js';

/** Address as written plus its prefix length, as returned by `parseCIDR` */
export type Ipv4Cidr = [ipaddr.IPv4, number];

export function parseIpv4(address: string): ipaddr.IPv4 | null {
  if (!ipaddr.IPv4.isValidFourPartDecimal(address)) return null;
  return ipaddr.IPv4.parse(address);
}

export function parseCidr(cidr: string): Ipv4Cidr | null {
  const [address] = cidr.split('/');
  if (address === undefined || !ipaddr.IPv4.isValidFourPartDecimal(address)) return null;

  try {
    return ipaddr.IPv4.parseCIDR(cidr);
  } catch {
    return null;
  }
}

/**
 * CIDR blocks are either nested or disjoint, so two blocks overlap exactly
 * when one block's address falls inside the other.
 */
export function rangesOverlap(a: Ipv4Cidr, b: Ipv4Cidr): boolean {
  return a[0].match(b) || b[0].match(a);
}

export function rangeContains(range: Ipv4Cidr, address: ipaddr.IPv4): boolean {
  return address.match(range);
}
