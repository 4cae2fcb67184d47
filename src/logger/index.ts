/**
 * Logger Module
 *
 * Console helpers shared by the request and tunnel paths.
 *
 * @module logger
 */

export { describeError, formatHeaders, logRequest, logTunnelEvent, type TunnelEvent } from './request-logger.js';
