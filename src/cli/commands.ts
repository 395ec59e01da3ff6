/**
 * CLI commands
 *
 * Uses commander for subcommands; flags override the environment-derived
 * configuration for this run only.
 */

import { Command } from 'commander';
import { AppConfig, ConfigError, loadConfig, parseDuration } from '../config';
import { FetchResult } from '../types/prefixes';
import { configureLogger, LogFormat, LogLevel, LOG_FORMATS, LOG_LEVELS, logger } from '../observability/logger';
import { normalizeAsNumber } from '../api/format';
import { createWhoisFetcher, installShutdownHandlers, startServer, RunningServer } from '../server';

export const VERSION = '1.0.0';

/** Exit code for a failed fetch */
export const FETCH_FAILED_EXIT_CODE = 10;

export type GlobalOptions = {
  whoisHost?: string;
  whoisPort?: string;
  debug?: boolean;
  logFormat?: string;
  logLevel?: string;
};

export type ServeOptions = GlobalOptions & {
  listen?: string;
  port?: string;
  storageName?: string;
  storageTtl?: string;
};

export type FetchOptions = GlobalOptions & {
  ipv4?: boolean;
  ipv6?: boolean;
};

export interface CommandIO {
  stdout: (text: string) => void;
  env: Record<string, string | undefined>;
  serve: (config: AppConfig) => Promise<RunningServer>;
  setExitCode: (code: number) => void;
}

const defaultIO: CommandIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  env: process.env,
  serve: async (config) => {
    const running = await startServer(config);
    installShutdownHandlers(running);
    return running;
  },
  setExitCode: (code) => {
    process.exitCode = code;
  }
};

function parsePort(value: string, flag: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${flag} must be a port number (got "${value}")`);
  }
  return port;
}

function pickChoice<T extends string>(value: string, choices: readonly T[], flag: string): T {
  const choice = choices.find(c => c === value);
  if (!choice) {
    throw new ConfigError(`${flag} must be one of ${choices.join(', ')} (got "${value}")`);
  }
  return choice;
}

/**
 * Environment config with global flags applied
 */
export function resolveConfig(options: GlobalOptions, env: CommandIO['env']): AppConfig {
  const config = loadConfig(env);

  if (options.whoisHost) {
    config.whois.host = options.whoisHost;
  }
  if (options.whoisPort) {
    config.whois.port = parsePort(options.whoisPort, '--whois-port');
  }
  if (options.logFormat) {
    config.log.format = pickChoice<LogFormat>(options.logFormat, LOG_FORMATS, '--log-format');
  }
  if (options.logLevel) {
    config.log.level = pickChoice<LogLevel>(options.logLevel, LOG_LEVELS, '--log-level');
  }
  if (options.debug) {
    config.log.level = 'debug';
  }

  configureLogger(config.log);
  return config;
}

export function applyServeOptions(config: AppConfig, options: ServeOptions): AppConfig {
  if (options.listen) {
    config.listen.address = options.listen;
  }
  if (options.port) {
    config.listen.port = parsePort(options.port, '--port');
  }
  if (options.storageName !== undefined) {
    config.storage.name = options.storageName;
  }
  if (options.storageTtl) {
    const ttl = parseDuration(options.storageTtl);
    if (ttl === null) {
      throw new ConfigError(`--storage-ttl must be a duration like 30m or 24h (got "${options.storageTtl}")`);
    }
    config.storage.ttlMs = ttl;
  }
  return config;
}

/**
 * "AS<asn>" followed by one indented, comma-joined line per IP version
 */
export function formatFetchResult(result: FetchResult): string {
  const lines: string[] = [];
  for (const [asn, prefixes] of result) {
    lines.push(`AS${asn}`);
    lines.push(`  ${prefixes.ipv4.join(',')}`);
    lines.push(`  ${prefixes.ipv6.join(',')}`);
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export function createProgram(io: CommandIO = defaultIO): Command {
  const program = new Command()
    .name('asn-netblocks')
    .description('Map AS numbers to the IP networks they announce')
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('--whois-host <host>', 'WHOIS host to query (or set WHOIS_HOST)')
    .option('--whois-port <port>', 'WHOIS port to query (or set WHOIS_PORT)')
    .option('--debug', 'Show debug messages (or set DEBUG)')
    .option('--log-format <format>', 'Log format: plain, json (or set LOG_FORMAT)')
    .option('--log-level <level>', 'Log level: error, warn, info, debug (or set LOG_LEVEL)');

  program
    .command('serve')
    .aliases(['run', 'daemon'])
    .description('Run the HTTP lookup service')
    .option('--listen <address>', 'Listen address (or set LISTEN_ADDRESS)')
    .option('--port <port>', 'Listen port (or set LISTEN_PORT)')
    .option('--storage-name <name>', 'Cache backend (or set STORAGE_NAME)')
    .option('--storage-ttl <duration>', 'Cache ttl, e.g. 30m or 24h (or set STORAGE_TTL)')
    .action(async (_options: ServeOptions, command: Command) => {
      const options = command.optsWithGlobals<ServeOptions>();
      const config = applyServeOptions(resolveConfig(options, io.env), options);
      await io.serve(config);
    });

  program
    .command('fetch')
    .alias('get')
    .description('Fetch networks for the given AS numbers and exit')
    .argument('<asn...>', 'AS numbers, with or without the AS prefix')
    .option('--ipv4', 'Fetch ipv4 networks (default, or set FETCH_IPV4)')
    .option('--no-ipv4', 'Skip ipv4 networks')
    .option('--ipv6', 'Fetch ipv6 networks (default, or set FETCH_IPV6)')
    .option('--no-ipv6', 'Skip ipv6 networks')
    .action(async (tokens: string[], _options: FetchOptions, command: Command) => {
      const options = command.optsWithGlobals<FetchOptions>();
      const config = resolveConfig(options, io.env);

      const asNumbers: string[] = [];
      for (const token of tokens) {
        const asn = normalizeAsNumber(token);
        if (asn === null) {
          throw new ConfigError(`invalid AS number ${token}`);
        }
        asNumbers.push(asn);
      }

      const ipv4 = options.ipv4 ?? config.fetch.ipv4;
      const ipv6 = options.ipv6 ?? config.fetch.ipv6;

      try {
        const result = await createWhoisFetcher(config).fetch(ipv4, ipv6, asNumbers);
        io.stdout(formatFetchResult(result));
      } catch (err) {
        logger.error('fetch_failed', { ipv4, ipv6, error: err instanceof Error ? err : String(err) });
        io.setExitCode(FETCH_FAILED_EXIT_CODE);
      }
    });

  return program;
}
