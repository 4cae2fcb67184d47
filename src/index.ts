#!/usr/bin/env node
/**
 * http2socks - HTTP to SOCKS5 Forward Proxy
 *
 * Listens for HTTP proxy traffic, forwards plain requests through an
 * authenticated SOCKS5 proxy and tunnels CONNECT requests directly.
 */

import { realpathSync } from 'node:fs';
import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import { CommanderError } from 'commander';
import { loadConfig, type ProxyConfig } from './config/index.js';
import { describeError } from './logger/index.js';
import { startForwardProxy } from './proxy/index.js';

export interface Http2SocksServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  getConfig(): ProxyConfig;
}

export function createHttp2SocksServer(config: ProxyConfig): Http2SocksServer {
  let httpServer: Server | null = null;

  return {
    async start(): Promise<void> {
      console.log(`🧦 Forwarding through SOCKS5 proxy ${config.socksProxy} as ${config.socksProxyUser}`);
      httpServer = await startForwardProxy(config);
    },

    stop(): Promise<void> {
      console.log('🛑 Stopping http2socks...');
      const server = httpServer;
      httpServer = null;
      if (!server) return Promise.resolve();

      return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
    },

    getConfig: () => config,
  };
}

async function main(): Promise<void> {
  let config: ProxyConfig;
  try {
    config = loadConfig(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      // --help and --version print and exit 0; unknown flags already printed their error
      process.exit(err.exitCode);
    }
    console.error(`❌ ${describeError(err)}`);
    process.exit(1);
  }

  const server = createHttp2SocksServer(config);

  const shutdown = (): void => {
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error(`❌ Shutdown error: ${describeError(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await server.start();
  } catch (err) {
    console.error(`❌ ListenAndServe: ${describeError(err)}`);
    process.exit(1);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// CLI entry point
if (isEntryPoint()) {
  main().catch((err: unknown) => {
    console.error(`❌ ${describeError(err)}`);
    process.exit(1);
  });
}

export { loadConfig, validateConfig, ConfigError, type ProxyConfig } from './config/index.js';
export * from './proxy/index.js';
