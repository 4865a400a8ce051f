/**
 * @module @bbo-plugin/protocol/codec
 * Line codec: closed tagged-union decode and single-line encode
 */

import { isInteger, isSafeNumber, parse, stringify } from 'lossless-json';
import type { z } from 'zod';
import { ProtocolError, TransportError } from '@bbo-plugin/contracts';
import {
  envelopeSchema,
  formatIssues,
  inboundMessageSchema,
  outboundMessageSchema,
} from './schema.js';
import {
  INBOUND_MESSAGE_TYPES,
  OUTBOUND_MESSAGE_TYPES,
  type InboundMessage,
  type OutboundMessage,
  type ProtocolMessage,
} from './types.js';

const MAX_LINE_PREVIEW = 200;

function preview(line: string): string {
  return line.length > MAX_LINE_PREVIEW ? `${line.slice(0, MAX_LINE_PREVIEW)}…` : line;
}

// Integers beyond 2^53 stay exact as bigint; everything else is a plain number
function parseExactNumber(value: string): number | bigint {
  return isInteger(value) && !isSafeNumber(value) ? BigInt(value) : parseFloat(value);
}

/**
 * Parse one protocol line as JSON.
 *
 * @throws TransportError MALFORMED_LINE when the line is not valid JSON
 */
export function parseJsonLine(line: string): unknown {
  try {
    return parse(line, null, parseExactNumber);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError(
      `Malformed protocol line: ${reason}`,
      'MALFORMED_LINE',
      { line: preview(line) },
      { cause: error }
    );
  }
}

function decodeWith<T>(
  line: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  knownTypes: readonly string[]
): T {
  const value = parseJsonLine(line);

  const envelope = envelopeSchema.safeParse(value);
  if (!envelope.success) {
    throw new ProtocolError(
      'Protocol message must be a JSON object with a string "type" field',
      'INVALID_MESSAGE',
      { line: preview(line), issues: formatIssues(envelope.error) }
    );
  }

  const type = envelope.data.type;
  if (!knownTypes.includes(type)) {
    throw new ProtocolError(`Unknown message type: ${type}`, 'UNKNOWN_MESSAGE_TYPE', {
      type,
      expected: [...knownTypes],
    });
  }

  const message = schema.safeParse(value);
  if (!message.success) {
    throw new ProtocolError(`Invalid ${type} message`, 'INVALID_MESSAGE', {
      type,
      issues: formatIssues(message.error),
    });
  }

  return message.data;
}

/**
 * Decode a host → plugin line into one of the four inbound variants.
 *
 * @throws TransportError when the line is not JSON
 * @throws ProtocolError on an unknown discriminant or invalid fields
 */
export function decodeInboundMessage(line: string): InboundMessage {
  return decodeWith(line, inboundMessageSchema, INBOUND_MESSAGE_TYPES);
}

/**
 * Decode a plugin → host line. Used by hosts and tests.
 */
export function decodeOutboundMessage(line: string): OutboundMessage {
  return decodeWith(line, outboundMessageSchema, OUTBOUND_MESSAGE_TYPES);
}

/**
 * Serialize a JSON value on one line. Bigints are written as exact integers.
 */
export function stringifyJson(value: unknown): string {
  const text = stringify(value);
  if (text === undefined) {
    throw new TypeError(`Value of type ${typeof value} has no JSON form`);
  }
  return text;
}

/**
 * Encode a message as a single JSON line (without the trailing newline)
 */
export function encodeMessage(message: ProtocolMessage): string {
  try {
    return stringifyJson(message);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProtocolError(`Cannot encode ${message.type} message: ${reason}`, 'INVALID_MESSAGE', {
      type: message.type,
    });
  }
}
