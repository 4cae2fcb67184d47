/**
 * CONNECT Tunnel
 *
 * A tunnel session owns two raw connections (client side, target side)
 * and, once relaying, two copy tasks. Each task copies one direction until
 * its source ends or fails, then closes both connections; closing is
 * idempotent, so whichever task finishes first tears the session down and
 * the other fails on its next read or write.
 *
 * States: dialing → established → relaying → closed
 *
 * @module proxy/tunnel
 */

import { connect, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { describeError } from '../logger/index.js';
import { TunnelDialError } from './errors.js';
import { splitHostPort } from './target.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Tunnel session state machine states
 */
export enum TunnelState {
  /** Direct TCP dial to the CONNECT target in progress */
  DIALING = 'dialing',
  /** Target connected, client connection not yet handed over */
  ESTABLISHED = 'established',
  /** Both copy tasks running */
  RELAYING = 'relaying',
  /** Both connections closed, both copy tasks exited */
  CLOSED = 'closed',
}

/** Byte counts of a finished session */
export interface TunnelStats {
  bytesFromClient: number;
  bytesFromTarget: number;
}

/** Outcome of one copy direction */
interface CopyResult {
  bytes: number;
  error?: unknown;
}

// =============================================================================
// Dialing
// =============================================================================

/**
 * Dial the CONNECT target directly over TCP.
 *
 * @param authority - host:port from the CONNECT request line
 * @returns Connected socket
 * @throws TunnelDialError with the dial error text
 */
export async function dialTarget(authority: string): Promise<Socket> {
  let host: string;
  let port: number;
  try {
    ({ host, port } = splitHostPort(authority));
  } catch (err) {
    throw new TunnelDialError(describeError(err));
  }

  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });

    const onError = (err: Error): void => {
      socket.destroy();
      reject(new TunnelDialError(describeError(err)));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

// =============================================================================
// Relay
// =============================================================================

/** Teardown of a peer surfaces on the other direction as a premature close */
function isPeerTeardown(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ERR_STREAM_PREMATURE_CLOSE' || err.code === 'ECONNRESET' || err.code === 'EPIPE')
  );
}

/**
 * Copy `source` into `destination` until the source is exhausted or fails,
 * then close both.
 */
async function copyAndClose(source: Duplex, destination: Duplex): Promise<CopyResult> {
  let bytes = 0;
  const count = (chunk: Buffer): void => {
    bytes += chunk.length;
  };
  source.on('data', count);

  try {
    await pipeline(source, destination);
    return { bytes };
  } catch (err) {
    return { bytes, error: err };
  } finally {
    source.off('data', count);
    destination.destroy();
    source.destroy();
  }
}

// =============================================================================
// Session
// =============================================================================

let nextSessionId = 1;

function createDeferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * One CONNECT tunnel, from dial to teardown.
 */
export class TunnelSession {
  readonly id = nextSessionId++;

  private currentState = TunnelState.DIALING;
  private targetSocket: Socket | null = null;
  private readonly done = createDeferred<TunnelStats>();

  constructor(readonly target: string) {}

  /** Settles once the session reaches {@link TunnelState.CLOSED} */
  get closed(): Promise<TunnelStats> {
    return this.done.promise;
  }

  get state(): TunnelState {
    return this.currentState;
  }

  /**
   * Dial the target. On failure the session closes.
   *
   * @throws TunnelDialError
   */
  async dial(): Promise<void> {
    if (this.currentState !== TunnelState.DIALING) {
      throw new Error(`tunnel ${this.id}: cannot dial in state ${this.currentState}`);
    }

    try {
      this.targetSocket = await dialTarget(this.target);
    } catch (err) {
      this.close({ bytesFromClient: 0, bytesFromTarget: 0 });
      throw err;
    }

    this.targetSocket.on('error', (err) => {
      if (!isPeerTeardown(err)) {
        console.error(`❌ Tunnel ${this.id} target socket error: ${err.message}`);
      }
    });
    this.currentState = TunnelState.ESTABLISHED;
  }

  /**
   * Start both copy tasks between the client connection and the target.
   * Bytes the client sent past the CONNECT head go to the target first.
   *
   * @param client - Raw client connection, exclusively owned from here on
   * @param head - Bytes already read past the request head
   * @returns Resolves with byte counts once both directions have exited
   */
  async relay(client: Duplex, head: Buffer = Buffer.alloc(0)): Promise<TunnelStats> {
    const target = this.targetSocket;
    if (this.currentState !== TunnelState.ESTABLISHED || !target) {
      throw new Error(`tunnel ${this.id}: cannot relay in state ${this.currentState}`);
    }
    this.currentState = TunnelState.RELAYING;

    if (head.length > 0) {
      target.write(head);
    }

    const [up, down] = await Promise.all([copyAndClose(client, target), copyAndClose(target, client)]);

    for (const [direction, result] of [['client→target', up], ['target→client', down]] as const) {
      if (result.error !== undefined && !isPeerTeardown(result.error)) {
        console.error(`❌ Tunnel ${this.id} ${direction} copy failed: ${describeError(result.error)}`);
      }
    }

    const stats = { bytesFromClient: head.length + up.bytes, bytesFromTarget: down.bytes };
    this.close(stats);
    return stats;
  }

  /**
   * Close the session without relaying (e.g. the client connection could
   * not be taken over).
   */
  abort(): void {
    this.targetSocket?.destroy();
    this.close({ bytesFromClient: 0, bytesFromTarget: 0 });
  }

  private close(stats: TunnelStats): void {
    if (this.currentState === TunnelState.CLOSED) return;
    this.currentState = TunnelState.CLOSED;
    this.targetSocket = null;
    this.done.resolve(stats);
  }
}
