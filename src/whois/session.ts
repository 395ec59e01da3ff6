/**
 * WHOIS query session
 *
 * Owns one TCP connection to the route registry: dial, switch it to
 * multi-command mode, run prefix queries strictly one after another, and
 * always say goodbye and release the socket.
 */

import { Socket, createConnection } from 'net';
import { IpVersion } from '../types/prefixes';
import { logger } from '../observability/logger';
import { metrics } from '../observability/metrics';
import { ConnectionError, TimeoutError } from './errors';
import { LineReader } from './line-reader';
import {
  ENABLE_MULTI_COMMAND,
  EXIT_COMMAND,
  ResponseParser,
  buildQueryCommand
} from './codec';

export interface SessionOptions {
  host: string;
  port: number;
  /** Deadline for establishing the TCP connection */
  connectTimeoutMs: number;
  /** Deadline for each line read and each write */
  readTimeoutMs: number;
}

/**
 * The part of a session the fetcher depends on
 */
export interface QuerySession {
  query(asn: string, version: IpVersion): Promise<string[]>;
  close(): Promise<void>;
}

export type SessionOpener = (options: SessionOptions) => Promise<QuerySession>;

function dial(options: SessionOptions): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({ host: options.host, port: options.port });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new TimeoutError(
        `failed to connect to ${options.host}:${options.port} within ${options.connectTimeoutMs}ms`,
        options.connectTimeoutMs
      ));
    }, options.connectTimeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(new ConnectionError(`failed to connect to ${options.host}:${options.port}: ${err.message}`, { cause: err }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

export class WhoisSession implements QuerySession {
  private readonly reader: LineReader;
  private closed = false;

  private constructor(
    private readonly socket: Socket,
    private readonly options: SessionOptions
  ) {
    this.reader = new LineReader(socket, options.readTimeoutMs);
  }

  /**
   * Connect and enable multi-command mode. The socket is released if
   * enabling fails.
   */
  static async open(options: SessionOptions): Promise<WhoisSession> {
    logger.debug('whois_connect', { host: options.host, port: options.port });
    const socket = await dial(options);
    const session = new WhoisSession(socket, options);
    metrics.incrementWhoisSessions();

    try {
      logger.debug('whois_enable_multi_command', { host: options.host, port: options.port });
      await session.write(ENABLE_MULTI_COMMAND);
    } catch (err) {
      await session.close();
      throw new ConnectionError('failed to enable multi-command mode', { cause: err });
    }

    return session;
  }

  /**
   * Issue one prefix query and collect the reply
   */
  async query(asn: string, version: IpVersion): Promise<string[]> {
    const command = buildQueryCommand(asn, version);
    const parser = new ResponseParser(asn, version);
    const start = Date.now();

    logger.debug('whois_query', { host: this.options.host, asn, version, cmd: command.trimEnd() });

    try {
      await this.write(command);
    } catch (err) {
      throw new ConnectionError(`failed to fetch ip addresses for ${asn}`, { cause: err });
    }

    try {
      let complete = false;
      while (!complete) {
        complete = parser.feed(await this.reader.readLine());
      }
    } finally {
      metrics.recordWhoisQueryLatency(Date.now() - start);
    }

    return parser.result();
  }

  /**
   * Best-effort "exit", then release the socket. Never throws.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    logger.debug('whois_close', { host: this.options.host, port: this.options.port });
    try {
      await this.write(EXIT_COMMAND);
    } catch (err) {
      logger.debug('whois_exit_failed', { host: this.options.host, error: err instanceof Error ? err : String(err) });
    } finally {
      this.socket.destroy();
    }
  }

  // for testing/observability
  get destroyed(): boolean {
    return this.socket.destroyed;
  }

  private write(data: string): Promise<void> {
    if (this.socket.destroyed) {
      return Promise.reject(new ConnectionError('connection already closed'));
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TimeoutError(`write not flushed within ${this.options.readTimeoutMs}ms`, this.options.readTimeoutMs));
      }, this.options.readTimeoutMs);

      this.socket.write(data, (err?: Error | null) => {
        clearTimeout(timer);
        if (err) {
          reject(new ConnectionError(`failed to write to connection: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });
  }
}

export const openWhoisSession: SessionOpener = (options) => WhoisSession.open(options);
