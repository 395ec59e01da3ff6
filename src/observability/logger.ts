/**
 * Console logging
 *
 * One line per event, either plain ("[info] whois_connect host=... port=...")
 * or JSON for log shippers. Level and format are set once at startup.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'plain' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
export const LOG_FORMATS: readonly LogFormat[] = ['plain', 'json'];

export type LogFields = Record<string, unknown>;

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find(level => level === fromEnv) ?? 'info';
}

const settings: LoggerSettings = {
  level: initialLevel(),
  format: 'plain'
};

export function configureLogger(options: Partial<LoggerSettings>): void {
  if (options.level) {
    settings.level = options.level;
  }
  if (options.format) {
    settings.format = options.format;
  }
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(settings.level);
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

export function formatLogLine(level: LogLevel, event: string, fields: LogFields = {}): string {
  if (settings.format === 'json') {
    const normalized: LogFields = {};
    for (const [key, value] of Object.entries(fields)) {
      normalized[key] = value instanceof Error ? value.message : value;
    }
    return JSON.stringify({
      type: 'log',
      level,
      event,
      timestamp: new Date().toISOString(),
      ...normalized
    });
  }

  const pairs = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [`[${level}]`, event, ...pairs].join(' ');
}

function write(level: LogLevel, event: string, fields?: LogFields): void {
  if (!isLevelEnabled(level)) {
    return;
  }
  const line = formatLogLine(level, event, fields);
  if (level === 'error' || level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  debug: (event: string, fields?: LogFields) => write('debug', event, fields),
  info: (event: string, fields?: LogFields) => write('info', event, fields),
  warn: (event: string, fields?: LogFields) => write('warn', event, fields),
  error: (event: string, fields?: LogFields) => write('error', event, fields)
};
