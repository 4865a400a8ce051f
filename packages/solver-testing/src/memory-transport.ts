/**
 * In-memory line transport: scripted input lines, captured output lines.
 * Structurally compatible with the runtime's `LineTransport`.
 */

import { TransportError } from '@bbo-plugin/contracts';
import {
  decodeOutboundMessage,
  encodeMessage,
  type InboundMessage,
  type OutboundMessage,
} from '@bbo-plugin/protocol';

export class MemoryLineTransport {
  /** Lines written by the runner, without newlines */
  readonly written: string[] = [];
  /** `written.length` at the moment of each readLine() call */
  readonly writtenAtRead: number[] = [];
  private readonly input: string[];
  private closed = false;

  /**
   * @param lines - raw lines, or messages to encode; end-of-stream follows the last one
   */
  constructor(lines: Iterable<string | InboundMessage> = []) {
    this.input = Array.from(lines, (line) => (typeof line === 'string' ? line : encodeMessage(line)));
  }

  async readLine(): Promise<string | null> {
    this.writtenAtRead.push(this.written.length);
    if (this.closed) {
      return null;
    }
    return this.input.shift() ?? null;
  }

  async writeLine(line: string): Promise<void> {
    if (this.closed) {
      throw new TransportError('Output stream is closed', 'STREAM_CLOSED');
    }
    this.written.push(line);
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Input lines not read yet */
  get remaining(): number {
    return this.input.length;
  }

  /**
   * Decode everything written so far
   */
  outbound(): OutboundMessage[] {
    return this.written.map((line) => decodeOutboundMessage(line));
  }
}
