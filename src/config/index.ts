/**
 * Service configuration
 * centralized config read from the environment (populated by dotenv);
 * the CLI layers its flags on top through loadConfig overrides
 */

import { BatchFailurePolicy, BATCH_FAILURE_POLICIES } from '../whois/fetcher';
import { VersionMergePolicy, VERSION_MERGE_POLICIES } from '../cache/cached-fetcher';
import { LogFormat, LogLevel, LOG_FORMATS, LOG_LEVELS } from '../observability/logger';

export interface AppConfig {
  whois: {
    host: string;
    port: number;
    connectTimeoutMs: number;
    readTimeoutMs: number;
    failurePolicy: BatchFailurePolicy;
  };
  listen: {
    address: string;
    port: number;
    baseUrl: string;
    requestTimeoutMs: number;
  };
  storage: {
    name: string;
    ttlMs: number;
    // 0 disables the background sweep
    sweepIntervalMs: number;
    versionMerge: VersionMergePolicy;
  };
  fetch: {
    ipv4: boolean;
    ipv6: boolean;
  };
  log: {
    level: LogLevel;
    format: LogFormat;
  };
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
};

/**
 * Parse "1500", "1500ms", "30s", "10m" or "24h" into milliseconds
 */
export function parseDuration(value: string): number | null {
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const unit = DURATION_UNITS[match[2] ?? 'ms'];
  return Math.round(parseFloat(match[1]) * unit);
}

function parseIntEnv(env: Env, key: string, defaultValue: number): number {
  const val = env[key];
  if (!val) {
    return defaultValue;
  }
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseBoolEnv(env: Env, key: string, defaultValue: boolean): boolean {
  const val = env[key];
  if (!val) {
    return defaultValue;
  }
  return val.toLowerCase() === 'true' || val === '1';
}

function parseDurationEnv(env: Env, key: string, defaultValue: string): number {
  const val = env[key];
  const parsed = val ? parseDuration(val) : null;
  if (parsed !== null) {
    return parsed;
  }
  // defaults are literals above; a bad one is a bug
  const fallback = parseDuration(defaultValue);
  if (fallback === null) {
    throw new ConfigError(`invalid default duration for ${key}: ${defaultValue}`);
  }
  return fallback;
}

function parseChoiceEnv<T extends string>(env: Env, key: string, choices: readonly T[], defaultValue: T): T {
  const val = env[key];
  if (!val) {
    return defaultValue;
  }
  const choice = choices.find(c => c === val.toLowerCase());
  if (!choice) {
    throw new ConfigError(`${key} must be one of ${choices.join(', ')} (got "${val}")`);
  }
  return choice;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const debug = parseBoolEnv(env, 'DEBUG', false);

  return {
    whois: {
      host: env.WHOIS_HOST || 'whois.radb.net',
      port: parseIntEnv(env, 'WHOIS_PORT', 43),
      connectTimeoutMs: parseDurationEnv(env, 'WHOIS_CONNECT_TIMEOUT', '10s'),
      readTimeoutMs: parseDurationEnv(env, 'WHOIS_READ_TIMEOUT', '30s'),
      failurePolicy: parseChoiceEnv(env, 'WHOIS_BATCH_POLICY', BATCH_FAILURE_POLICIES, 'fail-fast')
    },
    listen: {
      address: env.LISTEN_ADDRESS || '0.0.0.0',
      port: parseIntEnv(env, 'LISTEN_PORT', 8080),
      baseUrl: env.BASE_URL || '',
      requestTimeoutMs: parseDurationEnv(env, 'REQUEST_TIMEOUT', '60s')
    },
    storage: {
      name: env.STORAGE_NAME ?? '',
      ttlMs: parseDurationEnv(env, 'STORAGE_TTL', '24h'),
      sweepIntervalMs: parseDurationEnv(env, 'STORAGE_SWEEP_INTERVAL', '0'),
      versionMerge: parseChoiceEnv(env, 'CACHE_VERSION_MERGE', VERSION_MERGE_POLICIES, 'overwrite')
    },
    fetch: {
      ipv4: parseBoolEnv(env, 'FETCH_IPV4', true),
      ipv6: parseBoolEnv(env, 'FETCH_IPV6', true)
    },
    log: {
      // DEBUG wins over LOG_LEVEL
      level: debug ? 'debug' : parseChoiceEnv(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
      format: parseChoiceEnv(env, 'LOG_FORMAT', LOG_FORMATS, 'plain')
    }
  };
}

// singleton config instance
let configInstance: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
