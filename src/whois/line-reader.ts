/**
 * Newline-delimited reader over a TCP socket.
 *
 * No length cap and no byte-count framing: lines end at "\n", a trailing "\r"
 * is dropped. Bytes after the last newline when the peer closes are discarded
 * and the pending read fails with ConnectionError.
 */

import { Socket } from 'net';
import { ConnectionError, TimeoutError } from './errors';

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class LineReader {
  private buffer = '';
  private readonly lines: string[] = [];
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  constructor(
    socket: Socket,
    private readonly timeoutMs: number
  ) {
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.push(chunk));
    socket.on('end', () => this.fail(new ConnectionError('connection closed by remote host')));
    socket.on('close', () => this.fail(new ConnectionError('connection closed')));
    socket.on('error', (err: Error) => {
      this.fail(new ConnectionError(`failed to read from connection: ${err.message}`, { cause: err }));
    });
  }

  /**
   * Resolve the next complete line, waiting at most timeoutMs for it
   */
  readLine(): Promise<string> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pending) {
      return Promise.reject(new Error('concurrent reads are not supported'));
    }

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TimeoutError(`no response within ${this.timeoutMs}ms`, this.timeoutMs));
      }, this.timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  private push(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      let line = this.buffer.slice(0, newline);
      if (line.endsWith('\r')) {
        line = line.slice(0, -1);
      }
      this.lines.push(line);
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf('\n');
    }

    this.deliver();
  }

  private deliver(): void {
    if (!this.pending) {
      return;
    }
    const line = this.lines.shift();
    if (line === undefined) {
      return;
    }
    const { resolve, timer } = this.pending;
    clearTimeout(timer);
    this.pending = null;
    resolve(line);
  }

  private fail(error: Error): void {
    // first failure wins; "close" always follows "end"/"error"
    if (this.failure) {
      return;
    }
    this.failure = error;

    if (this.pending) {
      const { reject, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      reject(error);
    }
  }
}
