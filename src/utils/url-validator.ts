import { lookup } from 'dns/promises';
import { isIP } from 'net';
import ipaddr from 'ipaddr.js';

/**
 * URL validation utilities for SSRF protection
 *
 * Every outbound fetch is checked against the addresses its hostname actually
 * resolves to, so a public name pointing at an internal address is refused.
 */

/** Ports reachable by default */
export const DEFAULT_ALLOWED_PORTS = [80, 443] as const;

/**
 * Resolves a hostname to every address it maps to
 */
export type HostResolver = (hostname: string) => Promise<string[]>;

export const resolveHostAddresses: HostResolver = async (hostname) => {
  const records = await lookup(hostname, { all: true, verbatim: true });
  return records.map((record) => record.address);
};

export interface UrlSafetyOptions {
  allowedPorts?: readonly number[];
  resolver?: HostResolver;
}

export type UrlSafetyResult =
  | { allowed: true; url: URL; addresses: string[] }
  | { allowed: false; reason: string };

/**
 * Check if a URL uses a safe protocol (http or https)
 * @param url - The URL to check
 * @returns true if the protocol is safe
 */
export function isSafeProtocol(url: string): boolean {
  try {
    const parsedUrl = new URL(url);
    return parsedUrl.protocol === 'http:' || parsedUrl.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Port a URL will connect to, falling back to the scheme default
 */
export function getEffectivePort(url: URL): number {
  if (url.port) {
    return parseInt(url.port, 10);
  }
  return url.protocol === 'https:' ? 443 : 80;
}

/**
 * Name of the blocked range an address falls in, or null for public unicast.
 * IPv4-mapped IPv6 addresses are unwrapped before classification.
 */
export function blockedAddressRange(address: string): string | null {
  if (!ipaddr.isValid(address)) {
    return 'invalid';
  }

  const range = ipaddr.process(address).range();
  return range === 'unicast' ? null : range;
}

function stripBrackets(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;
}

/**
 * Validate a URL for outbound fetching. Fails closed: anything that cannot be
 * positively verified as a public http(s) target is refused.
 */
export async function validateUrl(
  rawUrl: string,
  options: UrlSafetyOptions = {}
): Promise<UrlSafetyResult> {
  const { allowedPorts = DEFAULT_ALLOWED_PORTS, resolver = resolveHostAddresses } = options;

  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    return { allowed: false, reason: 'Invalid URL' };
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { allowed: false, reason: `Scheme ${url.protocol.replace(/:$/, '')} is not allowed` };
  }

  if (url.username || url.password) {
    return { allowed: false, reason: 'URLs with embedded credentials are not allowed' };
  }

  const hostname = stripBrackets(url.hostname);
  if (!hostname) {
    return { allowed: false, reason: 'URL has no hostname' };
  }

  const port = getEffectivePort(url);
  if (!allowedPorts.includes(port)) {
    return { allowed: false, reason: `Port ${port} is not allowed` };
  }

  let addresses: string[];
  if (isIP(hostname)) {
    addresses = [hostname];
  } else {
    try {
      addresses = await resolver(hostname);
    } catch {
      return { allowed: false, reason: `Unable to resolve hostname ${hostname}` };
    }
  }

  if (addresses.length === 0) {
    return { allowed: false, reason: `Hostname ${hostname} did not resolve to any address` };
  }

  for (const address of addresses) {
    const range = blockedAddressRange(address);
    if (range) {
      return { allowed: false, reason: `Address ${address} is in a blocked range (${range})` };
    }
  }

  return { allowed: true, url, addresses };
}
