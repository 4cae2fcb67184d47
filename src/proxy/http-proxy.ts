/**
 * HTTP Forward Proxy
 *
 * Dispatches each inbound request by method:
 * - CONNECT: raw TCP tunnel to the target (see connect-handler)
 * - anything else: forwarded through the SOCKS5 upstream and the response
 *   streamed back
 *
 * Request path steps:
 * 1. Resolve the target URL (infer the scheme from the port when missing)
 * 2. Build the SOCKS5-backed client
 * 3. Strip hop-by-hop headers, append the caller to X-Forwarded-For
 * 4. Send; on failure answer 500, never retry
 * 5. Strip hop-by-hop response headers, write status and headers, stream body
 * 6. Release the upstream body on every exit path
 *
 * @module proxy/http-proxy
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { pipeline } from 'node:stream/promises';
import type { ProxyConfig } from '../config/index.js';
import { describeError, logRequest } from '../logger/index.js';
import { createSocketConnectContext, handleConnect } from './connect-handler.js';
import { ProxyError } from './errors.js';
import {
  appendForwardedFor,
  headerMapFromRaw,
  sanitizeHopByHopHeaders,
  toOutgoingHeaders,
} from './headers.js';
import { createOutboundClient } from './http-client.js';
import { normalizeIpAddress, resolveTargetUrl } from './target.js';
import type {
  InboundRequest,
  OutboundClient,
  OutboundResponse,
  OutboundTimeouts,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/** Builds the client used for one proxied request */
export type OutboundClientFactory = (
  config: ProxyConfig,
  timeouts: Partial<OutboundTimeouts>
) => OutboundClient;

export interface ForwardProxyOptions {
  /** Timer overrides for outbound requests */
  timeouts?: Partial<OutboundTimeouts>;
  /** Client factory; defaults to the SOCKS5-backed client */
  createClient?: OutboundClientFactory;
}

// =============================================================================
// Error Handling
// =============================================================================

/**
 * Send error response to client.
 *
 * @param res - Server response
 * @param statusCode - HTTP status code
 * @param message - Error message, sent as text/plain
 */
export function sendErrorResponse(res: ServerResponse, statusCode: number, message: string): void {
  if (res.headersSent) return;
  res.writeHead(statusCode, {
    'content-type': 'text/plain; charset=utf-8',
    'x-content-type-options': 'nosniff',
    'content-length': Buffer.byteLength(message),
  });
  res.end(message);
}

/**
 * Log a failure that happened before anything reached the client and
 * answer with the error's own status and message.
 */
function rejectRequest(err: unknown, res: ServerResponse, context: string): void {
  if (err instanceof ProxyError) {
    console.error(`❌ ${context} [${err.code}]: ${err.message}`);
    sendErrorResponse(res, err.statusCode, err.message);
  } else {
    console.error(`❌ ${context}: ${describeError(err)}`);
    sendErrorResponse(res, 500, 'Internal Server Error');
  }
}

// =============================================================================
// Inbound Request
// =============================================================================

/**
 * Read the parts of a Node request the request path works on.
 *
 * @throws UnsupportedSchemeError, InvalidTargetError
 */
export function toInboundRequest(req: IncomingMessage): InboundRequest {
  return {
    method: req.method ?? 'GET',
    target: resolveTargetUrl(req.url ?? ''),
    headers: headerMapFromRaw(req.rawHeaders),
    remoteAddress: normalizeIpAddress(req.socket.remoteAddress ?? ''),
    body: req,
  };
}

// =============================================================================
// Request Path
// =============================================================================

/**
 * Forward one non-CONNECT request through the SOCKS5 upstream.
 *
 * @param req - Inbound request
 * @param res - Response to the client
 * @param config - Proxy configuration
 * @param options - Client factory and timer overrides
 */
export async function proxyRequest(
  req: IncomingMessage,
  res: ServerResponse,
  config: ProxyConfig,
  options: ForwardProxyOptions = {}
): Promise<void> {
  const remote = `${normalizeIpAddress(req.socket.remoteAddress ?? '')}:${req.socket.remotePort ?? 0}`;
  logRequest(remote, req.method ?? '', req.url ?? '', req.headers.host, headerMapFromRaw(req.rawHeaders));

  let inbound: InboundRequest;
  try {
    inbound = toInboundRequest(req);
  } catch (err) {
    rejectRequest(err, res, 'Invalid request target');
    return;
  }

  let client: OutboundClient;
  try {
    client = (options.createClient ?? createOutboundClient)(config, options.timeouts ?? {});
  } catch (err) {
    rejectRequest(err, res, 'Client construction error');
    return;
  }

  sanitizeHopByHopHeaders(inbound.headers);
  if (inbound.remoteAddress) {
    appendForwardedFor(inbound.headers, inbound.remoteAddress);
  }

  let response: OutboundResponse | null = null;
  try {
    try {
      response = await client.send({
        method: inbound.method,
        url: inbound.target,
        headers: inbound.headers,
        body: inbound.body,
      });
    } catch (err) {
      console.error(`❌ Proxy request error: ${describeError(err)}`);
      sendErrorResponse(res, 500, 'Server Error');
      return;
    }

    console.log(`📥 ${remote} ${inbound.method} ${inbound.target.href} → ${response.statusCode} ${response.statusMessage}`);

    const responseHeaders = sanitizeHopByHopHeaders(response.headers);
    res.writeHead(response.statusCode, toOutgoingHeaders(responseHeaders));

    try {
      await pipeline(response.body, res);
    } catch (err) {
      // Status and headers are already out; the connection is closed as is.
      console.error(`❌ Proxy copy body error: ${describeError(err)}`);
    }
  } finally {
    response?.release();
  }
}

// =============================================================================
// Server Factory
// =============================================================================

/**
 * Create the HTTP proxy server. It is not listening yet.
 *
 * @param config - Proxy configuration
 * @param options - Client factory and timer overrides
 * @returns Node.js HTTP server instance
 */
export function createForwardProxy(config: ProxyConfig, options: ForwardProxyOptions = {}): Server {
  const server = createServer((req, res) => {
    proxyRequest(req, res, config, options).catch((err: unknown) => {
      console.error(`❌ HTTP proxy error: ${describeError(err)}`);
      sendErrorResponse(res, 500, 'Internal Server Error');
    });
  });

  server.on('connect', (req: IncomingMessage, socket, head: Buffer) => {
    handleConnect(createSocketConnectContext(req, socket, head)).catch((err: unknown) => {
      console.error(`❌ CONNECT error: ${describeError(err)}`);
      socket.destroy();
    });
  });

  return server;
}

/**
 * Create the proxy server and listen on the configured address.
 *
 * @param config - Proxy configuration
 * @param options - Client factory and timer overrides
 * @returns Listening server
 * @throws The listen error (address in use, permission denied, ...)
 */
export function startForwardProxy(config: ProxyConfig, options: ForwardProxyOptions = {}): Promise<Server> {
  const server = createForwardProxy(config, options);

  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(err);
    };
    server.once('error', onError);
    server.listen(config.listenPort, config.listenHost, () => {
      server.off('error', onError);
      const address = server.address();
      const where = address && typeof address === 'object' ? `${address.address}:${address.port}` : config.httpAddress;
      console.log(`🌐 HTTP Proxy listening on ${where}`);
      resolve(server);
    });
  });
}
