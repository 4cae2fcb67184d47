/**
 * Proxy Module
 *
 * Main entry point for the proxy functionality: an HTTP forward proxy that
 * sends plain requests through an authenticated SOCKS5 upstream and tunnels
 * CONNECT requests over direct TCP.
 *
 * @module proxy
 *
 * @example
 * ```typescript
 * import { startForwardProxy } from './proxy/index.js';
 *
 * const server = await startForwardProxy(config);
 * ```
 */

// =============================================================================
// Proxy Server
// =============================================================================

export {
  createForwardProxy,
  startForwardProxy,
  proxyRequest,
  toInboundRequest,
  sendErrorResponse,
  type ForwardProxyOptions,
  type OutboundClientFactory,
} from './http-proxy.js';

// =============================================================================
// CONNECT Tunnel
// =============================================================================

export { handleConnect, createSocketConnectContext, buildRawResponse } from './connect-handler.js';
export { TunnelSession, TunnelState, dialTarget, type TunnelStats } from './tunnel.js';

// =============================================================================
// HTTP Client
// =============================================================================

export {
  createOutboundClient,
  buildSocksProxyUrl,
  DEFAULT_OUTBOUND_TIMEOUTS,
  type SocksSettings,
} from './http-client.js';

// =============================================================================
// Headers & Targets
// =============================================================================

export {
  HOP_BY_HOP_HEADERS,
  FORWARDED_FOR_HEADER,
  headerMapFromRaw,
  toOutgoingHeaders,
  getHeader,
  setHeader,
  appendHeader,
  deleteHeader,
  removeConnectionHeaders,
  removeHopHeaders,
  sanitizeHopByHopHeaders,
  appendForwardedFor,
} from './headers.js';

export {
  SUPPORTED_SCHEMES,
  resolveTargetUrl,
  splitHostPort,
  normalizeIpAddress,
  type HostPort,
} from './target.js';

// =============================================================================
// Errors & Types
// =============================================================================

export {
  ProxyError,
  UnsupportedSchemeError,
  InvalidTargetError,
  ClientConstructionError,
  UpstreamRequestError,
  OutboundTimeoutError,
  TunnelDialError,
  type TimeoutPhase,
} from './errors.js';

export type {
  HeaderMap,
  InboundRequest,
  OutboundRequest,
  OutboundResponse,
  OutboundTimeouts,
  OutboundClient,
  RawConnectionTakeover,
  ConnectContext,
} from './types.js';
