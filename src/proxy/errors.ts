/**
 * Proxy Error Hierarchy
 *
 * Each class maps a per-request failure to the status code the client sees.
 * None of these ever escape the request handler.
 *
 * @module proxy/errors
 */

/**
 * Base class for all per-request proxy errors
 */
export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string
  ) {
    super(message);
    this.name = 'ProxyError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Target URL carries a scheme other than http/https (400)
 */
export class UnsupportedSchemeError extends ProxyError {
  constructor(public readonly scheme: string) {
    super(`unsupported protocol scheme ${scheme}`, 400, 'UNSUPPORTED_SCHEME');
    this.name = 'UnsupportedSchemeError';
  }
}

/**
 * Request target is not an absolute URI or host:port (400)
 */
export class InvalidTargetError extends ProxyError {
  constructor(message: string) {
    super(message, 400, 'INVALID_TARGET');
    this.name = 'InvalidTargetError';
  }
}

/**
 * SOCKS5-backed client could not be built (500)
 */
export class ClientConstructionError extends ProxyError {
  constructor(message: string) {
    super(`failed create http client: ${message}`, 500, 'CLIENT_CONSTRUCTION_FAILED');
    this.name = 'ClientConstructionError';
  }
}

/**
 * Outbound request failed in transport (500)
 */
export class UpstreamRequestError extends ProxyError {
  constructor(message: string) {
    super(message, 500, 'UPSTREAM_REQUEST_FAILED');
    this.name = 'UpstreamRequestError';
  }
}

/** Outbound phases bounded by their own timer */
export type TimeoutPhase = 'request' | 'tls-handshake' | 'response-header';

/**
 * One of the outbound timers expired (500)
 */
export class OutboundTimeoutError extends ProxyError {
  constructor(public readonly phase: TimeoutPhase, public readonly timeoutMs: number) {
    super(`${phase} timeout after ${timeoutMs}ms`, 500, 'OUTBOUND_TIMEOUT');
    this.name = 'OutboundTimeoutError';
  }
}

/**
 * Direct TCP dial for a CONNECT tunnel failed (503)
 */
export class TunnelDialError extends ProxyError {
  constructor(message: string) {
    super(message, 503, 'TUNNEL_DIAL_FAILED');
    this.name = 'TunnelDialError';
  }
}
