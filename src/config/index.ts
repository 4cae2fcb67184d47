/**
 * http2socks Configuration
 *
 * Four string settings, each from a command-line flag, an environment
 * variable or a default (in that order of precedence). The result is
 * validated once at startup and frozen.
 */

import { isIP } from 'node:net';
import { Command, Option } from 'commander';
import { splitHostPort } from '../proxy/target.js';

export interface ProxyConfig {
  /** Listen address as given, ip:port */
  readonly httpAddress: string;
  /** Listen IP, brackets removed */
  readonly listenHost: string;
  readonly listenPort: number;
  /** SOCKS5 upstream, host:port */
  readonly socksProxy: string;
  readonly socksProxyUser: string;
  readonly socksProxyPassword: string;
}

/** Settings before validation; any of them may be missing */
export interface RawProxySettings {
  httpAddress?: string;
  socksProxy?: string;
  socksProxyUser?: string;
  socksProxyPassword?: string;
}

/** Environment variable read for each setting */
export const ENV_VARIABLES = {
  httpAddress: 'HTTP_ADDRESS',
  socksProxy: 'SOCKS_PROXY',
  socksProxyUser: 'SOCKS_PROXY_USER',
  socksProxyPassword: 'SOCKS_PROXY_PASSWORD',
} as const satisfies Record<keyof RawProxySettings, string>;

export const defaultSettings = {
  httpAddress: '0.0.0.0:8080',
} as const satisfies RawProxySettings;

/**
 * Invalid or missing setting. Fatal: the proxy does not start.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Check the settings and build the immutable configuration.
 *
 * @param raw - Settings from flags, environment and defaults
 * @returns Frozen configuration
 * @throws ConfigError naming the first setting that fails
 */
export function validateConfig(raw: RawProxySettings): ProxyConfig {
  const httpAddress = raw.httpAddress ?? defaultSettings.httpAddress;

  let listenHost: string;
  let listenPort: number;
  try {
    ({ host: listenHost, port: listenPort } = splitHostPort(httpAddress));
  } catch (err) {
    throw new ConfigError(`HTTP address must be a valid IP address and port: ${reasonOf(err)}`);
  }
  if (isIP(listenHost) === 0) {
    throw new ConfigError(
      `HTTP address must be a valid IP address and port: ParseAddr("${listenHost}"): not an IP address`
    );
  }

  const socksProxy = raw.socksProxy ?? '';
  if (socksProxy === '') {
    throw new ConfigError('SOCKS5 proxy must be set');
  }

  try {
    const { host } = splitHostPort(socksProxy);
    if (!host) {
      throw new Error(`address ${socksProxy}: missing host in address`);
    }
  } catch (err) {
    throw new ConfigError(`SOCKS5 proxy must be a valid host and port: ${reasonOf(err)}`);
  }

  const socksProxyUser = raw.socksProxyUser ?? '';
  if (socksProxyUser === '') {
    throw new ConfigError('SOCKS5 proxy user must be set when SOCKS5 proxy is set');
  }

  const socksProxyPassword = raw.socksProxyPassword ?? '';
  if (socksProxyPassword === '') {
    throw new ConfigError('SOCKS5 proxy password must be set when SOCKS5 proxy is set');
  }

  return Object.freeze({
    httpAddress,
    listenHost,
    listenPort,
    socksProxy,
    socksProxyUser,
    socksProxyPassword,
  });
}

/**
 * Build the command-line definition.
 * Each option falls back to its environment variable, then its default.
 */
export function createCommand(): Command {
  return new Command()
    .name('http2socks')
    .description('HTTP proxy that forwards requests through an authenticated SOCKS5 proxy')
    .addOption(
      new Option('--http-address <address>', 'address to listen on')
        .env(ENV_VARIABLES.httpAddress)
        .default(defaultSettings.httpAddress)
    )
    .addOption(new Option('--socks-proxy <address>', 'SOCKS5 proxy to use').env(ENV_VARIABLES.socksProxy))
    .addOption(
      new Option('--socks-proxy-user <user>', 'SOCKS5 proxy user').env(ENV_VARIABLES.socksProxyUser)
    )
    .addOption(
      new Option('--socks-proxy-password <password>', 'SOCKS5 proxy password').env(
        ENV_VARIABLES.socksProxyPassword
      )
    )
    .exitOverride();
}

/**
 * Load and validate configuration from the command line and environment.
 *
 * @param argv - Full argv, including the node binary and script path
 * @returns Frozen configuration
 * @throws ConfigError on invalid settings, CommanderError on unknown flags or --help
 */
export function loadConfig(argv: readonly string[] = process.argv): ProxyConfig {
  const command = createCommand();
  command.parse([...argv], { from: 'node' });
  return validateConfig(command.opts<RawProxySettings>());
}
