/**
 * Newline-delimited transport over a readable/writable stream pair.
 *
 * The runner reads one line at a time and writes one JSON document per reply.
 * Input is paused while complete lines are queued and nobody is reading.
 */

import type { Readable, Writable } from 'node:stream';
import { TransportError } from '@bbo-plugin/contracts';

export interface LineTransport {
  /**
   * Next line without its terminator, or `null` at end-of-stream.
   */
  readLine(): Promise<string | null>;

  /**
   * Write `line` followed by a newline.
   */
  writeLine(line: string): Promise<void>;

  /**
   * Detach from the underlying streams.
   */
  close(): void;
}

export interface StreamLineTransportOptions {
  /** Input stream (default: process.stdin) */
  input?: Readable;
  /** Output stream (default: process.stdout) */
  output?: Writable;
}

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export class StreamLineTransport implements LineTransport {
  private readonly input: Readable;
  private readonly output: Writable;
  private buffer = '';
  private readonly lines: string[] = [];
  private pending: PendingRead | null = null;
  private ended = false;
  private closed = false;
  private failure: TransportError | null = null;
  private outputFailure: TransportError | null = null;

  constructor(options: StreamLineTransportOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;

    this.input.setEncoding('utf8');
    this.input.on('data', this.handleData);
    this.input.on('end', this.handleEnd);
    this.input.on('error', this.handleInputError);
    this.output.on('error', this.handleOutputError);
    this.input.pause();
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.ended || this.closed) {
      return Promise.resolve(null);
    }

    if (this.pending) {
      return Promise.reject(
        new TransportError('readLine() called while another read is pending', 'STREAM_ERROR')
      );
    }

    return new Promise<string | null>((resolve, reject) => {
      this.pending = { resolve, reject };
      this.input.resume();
    });
  }

  writeLine(line: string): Promise<void> {
    if (this.outputFailure) {
      return Promise.reject(this.outputFailure);
    }

    if (this.closed || this.output.destroyed || this.output.writableEnded) {
      return Promise.reject(new TransportError('Output stream is closed', 'STREAM_CLOSED'));
    }

    return new Promise<void>((resolve, reject) => {
      this.output.write(`${line}\n`, 'utf8', (error) => {
        if (error) {
          reject(
            new TransportError(`Failed to write to output: ${error.message}`, 'STREAM_ERROR', undefined, {
              cause: error,
            })
          );
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.input.off('data', this.handleData);
    this.input.off('end', this.handleEnd);
    this.input.off('error', this.handleInputError);
    this.output.off('error', this.handleOutputError);
    this.input.pause();

    if (this.pending) {
      const pending = this.pending;
      this.pending = null;
      pending.resolve(null);
    }
  }

  private readonly handleData = (chunk: string | Buffer): void => {
    this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');

    // Process all complete lines (newline-delimited)
    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf('\n')) !== -1) {
      this.lines.push(stripCarriageReturn(this.buffer.slice(0, newlineIndex)));
      this.buffer = this.buffer.slice(newlineIndex + 1);
    }

    this.deliver();
  };

  private readonly handleEnd = (): void => {
    if (this.buffer.length > 0) {
      this.lines.push(stripCarriageReturn(this.buffer));
      this.buffer = '';
    }
    this.ended = true;
    this.deliver();

    if (this.pending) {
      const pending = this.pending;
      this.pending = null;
      pending.resolve(null);
    }
  };

  private readonly handleInputError = (error: Error): void => {
    this.failure = new TransportError(`Failed to read input: ${error.message}`, 'STREAM_ERROR', undefined, {
      cause: error,
    });

    if (this.pending) {
      const pending = this.pending;
      this.pending = null;
      pending.reject(this.failure);
    }
  };

  private readonly handleOutputError = (error: Error): void => {
    this.outputFailure = new TransportError(`Output stream failed: ${error.message}`, 'STREAM_ERROR', undefined, {
      cause: error,
    });
  };

  private deliver(): void {
    if (this.pending && this.lines.length > 0) {
      const pending = this.pending;
      this.pending = null;
      const line = this.lines.shift();
      pending.resolve(line ?? null);
    }

    if (!this.pending && this.lines.length > 0 && !this.ended) {
      this.input.pause();
    }
  }
}
