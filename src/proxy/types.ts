/**
 * Proxy Types
 * Shared type definitions for the request path and the CONNECT tunnel path
 */

import type { Duplex, Readable } from 'node:stream';

/**
 * Header set keyed by lower-cased name.
 * Values are kept per key in arrival order.
 */
export type HeaderMap = Map<string, string[]>;

/**
 * One inbound client request, as handed to the request path
 */
export interface InboundRequest {
  /** HTTP method (GET, POST, ...) */
  method: string;
  /** Absolute target URL, scheme already inferred */
  target: URL;
  /** Request headers */
  headers: HeaderMap;
  /** Client address without the IPv4-mapped prefix */
  remoteAddress: string;
  /** Request body */
  body: Readable;
}

/**
 * Request issued through the SOCKS5-backed client.
 * The URL is authoritative; nothing from the inbound request line is reused.
 */
export interface OutboundRequest {
  method: string;
  url: URL;
  headers: HeaderMap;
  body: Readable;
}

/**
 * Upstream response as seen by the request path
 */
export interface OutboundResponse {
  /** HTTP status code (e.g., 200, 404, 502) */
  statusCode: number;
  /** HTTP status message (e.g., "OK", "Not Found") */
  statusMessage: string;
  /** Response headers */
  headers: HeaderMap;
  /** Response body, streamed */
  body: Readable;
  /** Release the body and its connection. Safe to call more than once. */
  release(): void;
}

/**
 * Independent timers applied to every outbound request, in milliseconds
 */
export interface OutboundTimeouts {
  /** Whole exchange: dial, request, response headers and body */
  requestMs: number;
  /** TLS handshake with the target, through the SOCKS tunnel */
  tlsHandshakeMs: number;
  /** From request written to response headers received */
  responseHeaderMs: number;
  /** Wait for `100 Continue` before sending the body anyway */
  expectContinueMs: number;
}

/**
 * HTTP client whose connections are all dialed through the SOCKS5 upstream
 */
export interface OutboundClient {
  send(request: OutboundRequest): Promise<OutboundResponse>;
}

/**
 * Raw connection takeover capability.
 * A CONNECT context either hands over exclusive ownership of the client
 * connection or reports that it cannot.
 */
export interface RawConnectionTakeover {
  /**
   * Detach the client connection from the HTTP layer.
   *
   * @returns The raw connection plus any bytes already read past the
   *   request head, or null when takeover is not supported
   */
  takeOver(): { connection: Duplex; head: Buffer } | null;
}

/**
 * Per-CONNECT context handed to the tunnel path by the listening layer
 */
export interface ConnectContext extends RawConnectionTakeover {
  /** CONNECT authority, host:port */
  readonly target: string;
  /** Client address */
  readonly remoteAddress: string;
  /** Write a complete status response; `body` is sent as text/plain */
  respond(statusCode: number, body?: string): void;
}
