/**
 * Request Target Utilities
 *
 * Turns inbound request targets into outbound URLs and dialable addresses.
 *
 * @module proxy/target
 */

import { InvalidTargetError, UnsupportedSchemeError } from './errors.js';

/** Schemes the request path can forward */
export const SUPPORTED_SCHEMES: ReadonlySet<string> = new Set(['http', 'https']);

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;
const PORT_PATTERN = /^\d{1,5}$/;

/** Host and port of a dialable address */
export interface HostPort {
  host: string;
  port: number;
}

// =============================================================================
// Address Parsing
// =============================================================================

/**
 * Split `host:port` or `[ipv6]:port`.
 *
 * @param address - Address to split
 * @returns Host (brackets removed) and numeric port
 * @throws Error when the port is missing or out of range
 */
export function splitHostPort(address: string): HostPort {
  let host: string;
  let portStr: string;

  if (address.startsWith('[')) {
    const end = address.indexOf(']');
    if (end === -1) {
      throw new Error(`address ${address}: missing ']' in address`);
    }
    host = address.slice(1, end);
    const rest = address.slice(end + 1);
    if (!rest.startsWith(':')) {
      throw new Error(`address ${address}: missing port in address`);
    }
    portStr = rest.slice(1);
  } else {
    const colon = address.lastIndexOf(':');
    if (colon === -1) {
      throw new Error(`address ${address}: missing port in address`);
    }
    host = address.slice(0, colon);
    if (host.includes(':')) {
      throw new Error(`address ${address}: too many colons in address`);
    }
    portStr = address.slice(colon + 1);
  }

  if (!PORT_PATTERN.test(portStr) || Number(portStr) > 65535) {
    throw new Error(`address ${address}: invalid port "${portStr}"`);
  }

  return { host, port: Number(portStr) };
}

/**
 * Strip the IPv4-mapped IPv6 prefix (`::ffff:10.0.0.1` → `10.0.0.1`).
 * Every other address, IPv6 loopback included, is returned unchanged.
 */
export function normalizeIpAddress(ip: string): string {
  return ip.replace(/^::ffff:(?=\d+\.\d+\.\d+\.\d+$)/i, '');
}

// =============================================================================
// Target URL Resolution
// =============================================================================

/**
 * Extract the port of a scheme-less `host[:port][/path]` target.
 */
function authorityPort(target: string): string {
  const authority = target.split(/[/?#]/, 1)[0];
  const bracketEnd = authority.lastIndexOf(']');
  const colon = authority.lastIndexOf(':');
  if (colon === -1 || colon < bracketEnd) {
    return '';
  }
  return authority.slice(colon + 1);
}

/**
 * Resolve an inbound request target into the absolute URL to forward to.
 *
 * - `scheme://...` keeps its scheme; only http and https are accepted
 * - `host:port/path` gets `https` when the port is 443, `http` otherwise
 * - origin-form (`/path`) has no upstream to go to and is rejected
 *
 * @param rawTarget - Request target as received on the request line
 * @returns Absolute target URL
 * @throws UnsupportedSchemeError for schemes other than http/https
 * @throws InvalidTargetError for targets that are not absolute
 */
export function resolveTargetUrl(rawTarget: string): URL {
  const target = rawTarget.trim();
  if (!target || target.startsWith('/') || target === '*') {
    throw new InvalidTargetError(`request target must be an absolute URI: ${rawTarget}`);
  }

  let absolute: string;
  const schemeMatch = SCHEME_PATTERN.exec(target);
  if (schemeMatch) {
    const scheme = schemeMatch[1].toLowerCase();
    if (!SUPPORTED_SCHEMES.has(scheme)) {
      throw new UnsupportedSchemeError(scheme);
    }
    absolute = target;
  } else {
    const scheme = authorityPort(target) === '443' ? 'https' : 'http';
    absolute = `${scheme}://${target}`;
  }

  let url: URL;
  try {
    url = new URL(absolute);
  } catch {
    throw new InvalidTargetError(`invalid request target: ${rawTarget}`);
  }
  if (!url.hostname) {
    throw new InvalidTargetError(`request target has no host: ${rawTarget}`);
  }
  return url;
}
