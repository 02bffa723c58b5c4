/**
 * CIDR parsing and containment for IPv4 and IPv6.
 *
 * Addresses are compared as integers; a prefix with host bits set is masked
 * down to its network rather than rejected.
 */

import { isIPv4, isIPv6 } from "node:net";
import { ParseError } from "../errors.js";

export type IpFamily = 4 | 6;

export type ParsedAddress = {
  family: IpFamily;
  value: bigint;
};

export type CidrBlock = {
  family: IpFamily;
  network: bigint;
  prefixLength: number;
  /** Original text, for labelling graph edges and log lines. */
  text: string;
};

const WIDTH: Record<IpFamily, number> = { 4: 32, 6: 128 };

// =============================================================================
// Addresses
// =============================================================================

function ipv4ToBigInt(address: string): bigint {
  return address.split(".").reduce((acc, octet) => (acc << 8n) | BigInt(Number(octet)), 0n);
}

function ipv6ToBigInt(address: string): bigint {
  let text = address.split("%")[0] ?? "";

  // Trailing dotted quad (::ffff:10.0.0.1) becomes two hextets
  const lastColon = text.lastIndexOf(":");
  const tail = text.slice(lastColon + 1);
  if (tail.includes(".")) {
    const v4 = ipv4ToBigInt(tail);
    text = `${text.slice(0, lastColon + 1)}${(v4 >> 16n).toString(16)}:${(v4 & 0xffffn).toString(16)}`;
  }

  const [head = "", rest] = text.split("::");
  const headGroups = head ? head.split(":") : [];
  const tailGroups = rest ? rest.split(":") : [];
  const zeros = rest === undefined ? 0 : 8 - headGroups.length - tailGroups.length;
  const groups = [...headGroups, ...Array<string>(zeros).fill("0"), ...tailGroups];

  return groups.reduce((acc, group) => (acc << 16n) | BigInt(parseInt(group, 16)), 0n);
}

export function parseIpAddress(address: string): ParsedAddress | null {
  const trimmed = address.trim();
  if (isIPv4(trimmed)) return { family: 4, value: ipv4ToBigInt(trimmed) };
  if (isIPv6(trimmed)) return { family: 6, value: ipv6ToBigInt(trimmed) };
  return null;
}

// =============================================================================
// Prefixes
// =============================================================================

function maskFor(family: IpFamily, prefixLength: number): bigint {
  const width = WIDTH[family];
  if (prefixLength === 0) return 0n;
  return ((1n << BigInt(prefixLength)) - 1n) << BigInt(width - prefixLength);
}

/**
 * Parse "a.b.c.d/n" or an IPv6 equivalent. A bare address is treated as a
 * single-host prefix.
 */
export function parseCidr(prefix: string): CidrBlock {
  const text = prefix.trim();
  const [addressPart = "", lengthPart, ...extra] = text.split("/");

  const address = parseIpAddress(addressPart);
  if (!address || extra.length > 0) {
    throw new ParseError(`Invalid address prefix: ${prefix}`, prefix);
  }

  const width = WIDTH[address.family];
  let prefixLength = width;
  if (lengthPart !== undefined) {
    if (!/^\d{1,3}$/.test(lengthPart) || Number(lengthPart) > width) {
      throw new ParseError(`Invalid prefix length in ${prefix}`, prefix);
    }
    prefixLength = Number(lengthPart);
  }

  return {
    family: address.family,
    network: address.value & maskFor(address.family, prefixLength),
    prefixLength,
    text,
  };
}

export function tryParseCidr(prefix: string): CidrBlock | null {
  try {
    return parseCidr(prefix);
  } catch (error) {
    if (error instanceof ParseError) return null;
    throw error;
  }
}

/**
 * True when `address` lies inside `block`. Malformed, empty and
 * cross-family addresses never match.
 */
export function cidrContains(block: CidrBlock, address: string | null | undefined): boolean {
  if (!address) return false;
  const parsed = parseIpAddress(address);
  if (!parsed || parsed.family !== block.family) return false;
  return (parsed.value & maskFor(block.family, block.prefixLength)) === block.network;
}

/**
 * String form of {@link cidrContains}; a malformed prefix contains nothing.
 */
export function prefixContains(prefix: string, address: string | null | undefined): boolean {
  const block = tryParseCidr(prefix);
  return block !== null && cidrContains(block, address);
}
