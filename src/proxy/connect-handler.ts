/**
 * CONNECT Handler
 *
 * Flow:
 * 1. Client sends: CONNECT example.com:443 HTTP/1.1
 * 2. Dial example.com:443 directly over TCP (never through SOCKS5)
 * 3. Dial failed: 503 with the dial error, done
 * 4. Respond: HTTP/1.1 200 Connection Established
 * 5. Take over the raw client connection and relay bytes both ways
 *
 * @module proxy/connect-handler
 */

import { STATUS_CODES, type IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { describeError, logTunnelEvent } from '../logger/index.js';
import { normalizeIpAddress } from './target.js';
import { TunnelSession } from './tunnel.js';
import type { ConnectContext } from './types.js';

/**
 * Build a raw HTTP/1.1 response for a socket the HTTP layer no longer
 * writes to.
 *
 * @param statusCode - HTTP status code
 * @param body - Optional text/plain body
 * @returns Response head, plus body when given
 */
export function buildRawResponse(statusCode: number, body?: string): string {
  if (statusCode === 200 && body === undefined) {
    return 'HTTP/1.1 200 Connection Established\r\n\r\n';
  }

  const payload = body ?? '';
  return [
    `HTTP/1.1 ${statusCode} ${STATUS_CODES[statusCode] ?? 'Unknown'}`,
    'Content-Type: text/plain; charset=utf-8',
    'X-Content-Type-Options: nosniff',
    `Content-Length: ${Buffer.byteLength(payload)}`,
    'Connection: close',
    '',
    payload,
  ].join('\r\n');
}

/**
 * Wrap the socket Node hands to the `connect` event.
 * Takeover is always available here, once.
 *
 * @param req - CONNECT request
 * @param socket - Client connection, already detached from the HTTP parser
 * @param head - Bytes read past the request head
 */
export function createSocketConnectContext(
  req: IncomingMessage,
  socket: Duplex,
  head: Buffer
): ConnectContext {
  const remoteAddress = `${normalizeIpAddress(req.socket.remoteAddress ?? '')}:${req.socket.remotePort ?? 0}`;
  let takenOver = false;

  // The HTTP server drops its own error listener before emitting `connect`.
  socket.on('error', (err) => {
    console.error(`❌ Client socket error (${remoteAddress}): ${err.message}`);
  });

  return {
    target: req.url ?? '',
    remoteAddress,
    respond(statusCode: number, body?: string): void {
      const response = buildRawResponse(statusCode, body);
      if (statusCode >= 200 && statusCode < 300) {
        socket.write(response);
      } else {
        socket.end(response);
      }
    },
    takeOver() {
      if (takenOver) return null;
      takenOver = true;
      return { connection: socket, head };
    },
  };
}

/**
 * Handle one CONNECT request.
 *
 * Success responses (2xx) leave the connection open for takeover; any other
 * status completes the response and closes it.
 *
 * @param context - Per-request CONNECT context
 * @returns The tunnel session; await `session.closed` for teardown
 */
export async function handleConnect(context: ConnectContext): Promise<TunnelSession> {
  const { target, remoteAddress } = context;
  logTunnelEvent('requested', target, remoteAddress);

  const session = new TunnelSession(target);
  try {
    await session.dial();
  } catch (err) {
    const message = describeError(err);
    logTunnelEvent('dial-failed', target, remoteAddress, message);
    context.respond(503, message);
    return session;
  }

  context.respond(200);

  const raw = context.takeOver();
  if (!raw) {
    // The 200 is already out; nothing left to do but drop the target.
    logTunnelEvent('takeover-unsupported', target, remoteAddress, 'raw connection takeover not supported');
    session.abort();
    return session;
  }

  logTunnelEvent('established', target, remoteAddress);
  session
    .relay(raw.connection, raw.head)
    .then((stats) => {
      logTunnelEvent(
        'closed',
        target,
        remoteAddress,
        `${stats.bytesFromClient} bytes up, ${stats.bytesFromTarget} bytes down`
      );
    })
    .catch((err: unknown) => {
      console.error(`❌ Tunnel ${session.id} relay error: ${describeError(err)}`);
    });

  return session;
}
