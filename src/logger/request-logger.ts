/**
 * Request Logger
 *
 * One console line per proxy event:
 * - inbound request line (remote address, method, target, Host)
 * - inbound header set, on a second indented line
 * - tunnel lifecycle events (dial failure, established, closed)
 *
 * @module logger/request-logger
 */

import type { HeaderMap } from '../proxy/types.js';

/** Tunnel lifecycle events worth a log line */
export type TunnelEvent = 'requested' | 'dial-failed' | 'established' | 'takeover-unsupported' | 'closed';

const TUNNEL_EVENT_TAGS: Record<TunnelEvent, string> = {
  requested: '🔒',
  'dial-failed': '❌',
  established: '🚇',
  'takeover-unsupported': '⚠️',
  closed: '🔚',
};

/**
 * Flatten an unknown thrown value into a single message.
 * AggregateError (e.g. every resolved address refused the dial) lists its
 * inner messages.
 *
 * @param err - Thrown value
 * @returns Printable message
 */
export function describeError(err: unknown): string {
  if (err instanceof AggregateError) {
    const errorMessages = err.errors
      .map((e: unknown) => (e instanceof Error ? e.message : String(e)))
      .join('; ');
    return err.message ? `${err.message}: [${errorMessages}]` : errorMessages;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Render a header set as `name: v1, v2` pairs.
 */
export function formatHeaders(headers: HeaderMap): string {
  const parts: string[] = [];
  for (const [name, values] of headers) {
    parts.push(`${name}: ${values.join(', ')}`);
  }
  return `{${parts.join('; ')}}`;
}

/**
 * Log an inbound proxy request.
 */
export function logRequest(
  remoteAddress: string,
  method: string,
  target: string,
  host: string | undefined,
  headers: HeaderMap
): void {
  console.log(`📡 ${remoteAddress}\t${method}\t${target}\tHost: ${host ?? ''}`);
  console.log(`\t${formatHeaders(headers)}`);
}

/**
 * Log a tunnel lifecycle event.
 *
 * @param event - Lifecycle event
 * @param target - CONNECT authority (host:port)
 * @param remoteAddress - Client address
 * @param detail - Optional extra context (error text, byte counts)
 */
export function logTunnelEvent(
  event: TunnelEvent,
  target: string,
  remoteAddress: string,
  detail?: string
): void {
  const suffix = detail ? ` (${detail})` : '';
  const line = `${TUNNEL_EVENT_TAGS[event]} CONNECT ${event}: ${target} from ${remoteAddress}${suffix}`;
  if (event === 'dial-failed' || event === 'takeover-unsupported') {
    console.error(line);
  } else {
    console.log(line);
  }
}
