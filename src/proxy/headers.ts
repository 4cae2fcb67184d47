/**
 * Header Sanitizer
 *
 * Pure functions over a {@link HeaderMap}:
 * - case-insensitive lookup and mutation
 * - hop-by-hop header removal, fixed list and Connection-declared (RFC 7230 §6.1)
 * - X-Forwarded-For chaining
 *
 * @module proxy/headers
 */

import type { OutgoingHttpHeaders } from 'node:http';
import type { HeaderMap } from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Hop-by-hop headers that are never forwarded, in either direction */
export const HOP_BY_HOP_HEADERS = [
  'connection',
  'proxy-connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
] as const;

export const FORWARDED_FOR_HEADER = 'x-forwarded-for';

// =============================================================================
// Conversion
// =============================================================================

/**
 * Build a header map from Node's flat `rawHeaders` list.
 *
 * @param rawHeaders - Alternating name/value entries, as received
 * @returns Header map keyed by lower-cased name
 */
export function headerMapFromRaw(rawHeaders: readonly string[]): HeaderMap {
  const headers: HeaderMap = new Map();
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    appendHeader(headers, rawHeaders[i], rawHeaders[i + 1]);
  }
  return headers;
}

/**
 * Convert a header map for `writeHead` / `request`.
 * Single values stay strings so Node does not repeat singleton headers.
 */
export function toOutgoingHeaders(headers: HeaderMap): OutgoingHttpHeaders {
  const outgoing: OutgoingHttpHeaders = {};
  for (const [name, values] of headers) {
    if (values.length === 0) continue;
    outgoing[name] = values.length === 1 ? values[0] : [...values];
  }
  return outgoing;
}

// =============================================================================
// Access
// =============================================================================

export function getHeader(headers: HeaderMap, name: string): string[] | undefined {
  return headers.get(name.trim().toLowerCase());
}

export function setHeader(headers: HeaderMap, name: string, value: string): void {
  headers.set(name.trim().toLowerCase(), [value]);
}

export function appendHeader(headers: HeaderMap, name: string, value: string): void {
  const key = name.trim().toLowerCase();
  const existing = headers.get(key);
  if (existing) {
    existing.push(value);
  } else {
    headers.set(key, [value]);
  }
}

export function deleteHeader(headers: HeaderMap, name: string): void {
  headers.delete(name.trim().toLowerCase());
}

// =============================================================================
// Sanitizing
// =============================================================================

/**
 * Remove every header named in the Connection header's comma-separated
 * tokens. Tokens are trimmed and empty tokens are skipped.
 */
export function removeConnectionHeaders(headers: HeaderMap): void {
  const connection = getHeader(headers, 'connection');
  if (!connection) return;

  for (const value of connection) {
    for (const token of value.split(',')) {
      const name = token.trim();
      if (name) {
        deleteHeader(headers, name);
      }
    }
  }
}

/**
 * Remove the fixed hop-by-hop header list.
 */
export function removeHopHeaders(headers: HeaderMap): void {
  for (const name of HOP_BY_HOP_HEADERS) {
    headers.delete(name);
  }
}

/**
 * Strip all hop-by-hop headers, dynamic ones first: the Connection tokens
 * have to be read before Connection itself goes.
 */
export function sanitizeHopByHopHeaders(headers: HeaderMap): HeaderMap {
  removeConnectionHeaders(headers);
  removeHopHeaders(headers);
  return headers;
}

/**
 * Append the caller IP to X-Forwarded-For.
 * Prior values are folded into one, comma+space separated, new IP last.
 * Request path only.
 */
export function appendForwardedFor(headers: HeaderMap, ip: string): void {
  const prior = getHeader(headers, FORWARDED_FOR_HEADER);
  const chain = prior && prior.length > 0 ? `${prior.join(', ')}, ${ip}` : ip;
  setHeader(headers, FORWARDED_FOR_HEADER, chain);
}
