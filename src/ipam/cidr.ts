/**
 * IPv4 prefix arithmetic.
 *
 * Addresses are handled as unsigned 32-bit integers held in plain numbers.
 */

export interface ParsedCidr {
  network: number;
  length: number;
}

const MAX_LENGTH = 32;
const ADDRESS_SPACE = 2 ** MAX_LENGTH;

export function ipToNumber(ip: string): number {
  const octets = ip.split('.');
  if (octets.length !== 4) {
    throw new Error(`Invalid IPv4 address: ${ip}`);
  }
  return octets.reduce((acc, octet) => {
    if (!/^\d{1,3}$/.test(octet)) {
      throw new Error(`Invalid IPv4 address: ${ip}`);
    }
    const value = Number(octet);
    if (value > 255) {
      throw new Error(`Invalid IPv4 address: ${ip}`);
    }
    return acc * 256 + value;
  }, 0);
}

export function numberToIp(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value >= ADDRESS_SPACE) {
    throw new Error(`Address out of range: ${value}`);
  }
  return [
    Math.floor(value / 2 ** 24) % 256,
    Math.floor(value / 2 ** 16) % 256,
    Math.floor(value / 2 ** 8) % 256,
    value % 256,
  ].join('.');
}

export function blockSize(length: number): number {
  assertLength(length);
  return 2 ** (MAX_LENGTH - length);
}

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length < 0 || length > MAX_LENGTH) {
    throw new Error(`Invalid prefix length: ${length}`);
  }
}

/**
 * Parse "a.b.c.d/len". A bare address is read as a host route.
 * Host bits must be zero.
 */
export function parseCidr(cidr: string): ParsedCidr {
  const [ip, lengthPart] = cidr.split('/');
  const length = lengthPart === undefined ? MAX_LENGTH : Number(lengthPart);
  assertLength(length);
  const address = ipToNumber(ip);
  if (address % blockSize(length) !== 0) {
    throw new Error(`Host bits set in prefix: ${cidr}`);
  }
  return { network: address, length };
}

export function formatCidr(network: number, length: number): string {
  return `${numberToIp(network)}/${length}`;
}

/** Address part of "a.b.c.d/len", without the mask. */
export function addressOf(cidr: string): string {
  return cidr.split('/')[0];
}

export function lastAddress({ network, length }: ParsedCidr): number {
  return network + blockSize(length) - 1;
}

/**
 * First and last assignable host of a prefix.
 * /31 and /32 have no network or broadcast address to skip.
 */
export function usableRange(prefix: ParsedCidr): { first: number; last: number } {
  const size = blockSize(prefix.length);
  if (prefix.length >= 31) {
    return { first: prefix.network, last: prefix.network + size - 1 };
  }
  return { first: prefix.network + 1, last: prefix.network + size - 2 };
}

/** The assignable host addresses of a prefix, in order. */
export function hostAddresses(cidr: string): string[] {
  const range = usableRange(parseCidr(cidr));
  const hosts: string[] = [];
  for (let value = range.first; value <= range.last; value++) {
    hosts.push(numberToIp(value));
  }
  return hosts;
}
