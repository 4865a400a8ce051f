/**
 * @module @bbo-plugin/protocol/__tests__/codec
 *
 * Tests for the line codec:
 * - Host → plugin: CREATE_SOLVER_CAST, DROP_SOLVER_CAST, ASK_CALL, TELL_CALL
 * - Plugin → host: SOLVER_SPEC_CAST, ASK_REPLY, TELL_REPLY
 */

import { describe, it, expect } from 'vitest';
import { ProtocolError, TransportError, createSolverSpec } from '@bbo-plugin/contracts';
import {
  decodeInboundMessage,
  decodeOutboundMessage,
  encodeMessage,
  parseJsonLine,
  stringifyJson,
  type InboundMessage,
  type OutboundMessage,
} from '../index.js';

const problem = {
  name: 'sphere',
  params_domain: [{ name: 'x', range: { type: 'CONTINUOUS', low: -5, high: 5 } }],
  values_domain: [{ name: 'y' }],
  steps: [1],
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('decodeInboundMessage', () => {
  it('should decode CREATE_SOLVER_CAST', () => {
    const line = JSON.stringify({ type: 'CREATE_SOLVER_CAST', solver_id: 1, random_seed: 42, problem });

    expect(decodeInboundMessage(line)).toEqual({
      type: 'CREATE_SOLVER_CAST',
      solver_id: 1n,
      random_seed: 42n,
      problem,
    });
  });

  it('should keep a full-range random seed exact', () => {
    const line = '{"type":"CREATE_SOLVER_CAST","solver_id":1,"random_seed":12345678901234567890,"problem":{}}';

    expect(decodeInboundMessage(line)).toEqual({
      type: 'CREATE_SOLVER_CAST',
      solver_id: 1n,
      random_seed: 12345678901234567890n,
      problem: {},
    });
  });

  it('should decode ASK_CALL', () => {
    const msg = decodeInboundMessage('{"type":"ASK_CALL","solver_id":1,"next_trial_id":100}');

    expect(msg).toEqual({ type: 'ASK_CALL', solver_id: 1n, next_trial_id: 100n });
  });

  it('should accept ids up to 2^64-1', () => {
    const msg = decodeInboundMessage(
      '{"type":"ASK_CALL","solver_id":18446744073709551615,"next_trial_id":18446744073709551614}'
    );

    expect(msg).toEqual({
      type: 'ASK_CALL',
      solver_id: 18446744073709551615n,
      next_trial_id: 18446744073709551614n,
    });
  });

  it('should strip unknown envelope fields', () => {
    const msg = decodeInboundMessage('{"type":"DROP_SOLVER_CAST","solver_id":3,"extra":true}');

    expect(msg).toEqual({ type: 'DROP_SOLVER_CAST', solver_id: 3n });
  });

  it('should pass trial payloads through untouched', () => {
    const trial = { id: 7, params: [0.5, null], values: [1.25], current_step: 1 };
    const msg = decodeInboundMessage(JSON.stringify({ type: 'TELL_CALL', solver_id: 0, trial }));

    expect(msg.type).toBe('TELL_CALL');
    if (msg.type === 'TELL_CALL') {
      expect(msg.trial).toEqual(trial);
    }
  });

  it('should keep large integers inside payloads exact', () => {
    const msg = decodeInboundMessage(
      '{"type":"TELL_CALL","solver_id":0,"trial":{"id":98765432109876543210,"values":[0.5]}}'
    );

    expect(msg).toEqual({
      type: 'TELL_CALL',
      solver_id: 0n,
      trial: { id: 98765432109876543210n, values: [0.5] },
    });
  });

  it('should reject lines that are not JSON', () => {
    const error = captureError(() => decodeInboundMessage('{"type":'));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: 'MALFORMED_LINE', details: { line: '{"type":' } });
  });

  it('should reject blank lines', () => {
    expect(captureError(() => decodeInboundMessage(''))).toMatchObject({ code: 'MALFORMED_LINE' });
  });

  it('should reject an unknown discriminant', () => {
    const error = captureError(() => decodeInboundMessage('{"type":"BOGUS"}'));

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({
      code: 'UNKNOWN_MESSAGE_TYPE',
      message: 'Unknown message type: BOGUS',
    });
  });

  it('should reject an outbound message sent inbound', () => {
    expect(captureError(() => decodeInboundMessage('{"type":"TELL_REPLY"}'))).toMatchObject({
      code: 'UNKNOWN_MESSAGE_TYPE',
    });
  });

  it('should reject non-object JSON and a missing discriminant', () => {
    expect(captureError(() => decodeInboundMessage('[1,2]'))).toMatchObject({ code: 'INVALID_MESSAGE' });
    expect(captureError(() => decodeInboundMessage('{"solver_id":1}'))).toMatchObject({
      code: 'INVALID_MESSAGE',
    });
    expect(captureError(() => decodeInboundMessage('{"type":5}'))).toMatchObject({ code: 'INVALID_MESSAGE' });
  });

  it('should report the offending field', () => {
    const error = captureError(() =>
      decodeInboundMessage('{"type":"ASK_CALL","solver_id":-1,"next_trial_id":0}')
    );

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({
      code: 'INVALID_MESSAGE',
      message: 'Invalid ASK_CALL message',
      details: { type: 'ASK_CALL', issues: [expect.stringMatching(/^solver_id: /)] },
    });
  });

  it('should reject fractional ids and ids beyond uint64', () => {
    expect(
      captureError(() => decodeInboundMessage('{"type":"DROP_SOLVER_CAST","solver_id":1.5}'))
    ).toMatchObject({ code: 'INVALID_MESSAGE' });
    expect(
      captureError(() => decodeInboundMessage('{"type":"DROP_SOLVER_CAST","solver_id":18446744073709551616}'))
    ).toMatchObject({ code: 'INVALID_MESSAGE' });
  });

  it('should require problem to be an object', () => {
    const line = '{"type":"CREATE_SOLVER_CAST","solver_id":1,"random_seed":1,"problem":[]}';

    expect(captureError(() => decodeInboundMessage(line))).toMatchObject({ code: 'INVALID_MESSAGE' });
  });
});

describe('decodeOutboundMessage', () => {
  it('should decode the handshake', () => {
    const line = '{"type":"SOLVER_SPEC_CAST","spec":{"name":"random","attrs":{"v":"1"},"capabilities":["CATEGORICAL"]}}';

    expect(decodeOutboundMessage(line)).toEqual({
      type: 'SOLVER_SPEC_CAST',
      spec: { name: 'random', attrs: { v: '1' }, capabilities: ['CATEGORICAL'] },
    });
  });

  it('should reject unknown capability names', () => {
    const line = '{"type":"SOLVER_SPEC_CAST","spec":{"name":"x","attrs":{},"capabilities":["TELEPORT"]}}';

    expect(captureError(() => decodeOutboundMessage(line))).toMatchObject({ code: 'INVALID_MESSAGE' });
  });
});

describe('round-trip', () => {
  const inbound: InboundMessage[] = [
    { type: 'CREATE_SOLVER_CAST', solver_id: 1n, random_seed: 12345678901234567890n, problem },
    { type: 'DROP_SOLVER_CAST', solver_id: 1n },
    { type: 'ASK_CALL', solver_id: 1n, next_trial_id: 100n },
    { type: 'TELL_CALL', solver_id: 1n, trial: { id: 100, values: [0.5], current_step: 1 } },
  ];

  const outbound: OutboundMessage[] = [
    { type: 'SOLVER_SPEC_CAST', spec: createSolverSpec('random', { attrs: { version: '1.0.0' } }) },
    { type: 'ASK_REPLY', trial: { id: 100, params: [1.5], next_step: 1 }, next_trial_id: 101n },
    { type: 'TELL_REPLY' },
  ];

  it.each(inbound)('should round-trip $type', (message) => {
    expect(decodeInboundMessage(encodeMessage(message))).toEqual(message);
  });

  it.each(outbound)('should round-trip $type', (message) => {
    expect(decodeOutboundMessage(encodeMessage(message))).toEqual(message);
  });
});

describe('encodeMessage', () => {
  it('should produce a single line', () => {
    const line = encodeMessage({ type: 'ASK_REPLY', trial: { note: 'a\nb' }, next_trial_id: 3n });

    expect(line).toBe('{"type":"ASK_REPLY","trial":{"note":"a\\nb"},"next_trial_id":3}');
    expect(line.includes('\n')).toBe(false);
  });

  it('should write ids near 2^64 as exact integers', () => {
    const line = encodeMessage({
      type: 'ASK_REPLY',
      trial: { id: 18446744073709551614n },
      next_trial_id: 18446744073709551615n,
    });

    expect(line).toBe(
      '{"type":"ASK_REPLY","trial":{"id":18446744073709551614},"next_trial_id":18446744073709551615}'
    );
  });

  it('should emit TELL_REPLY with only its discriminant', () => {
    expect(encodeMessage({ type: 'TELL_REPLY' })).toBe('{"type":"TELL_REPLY"}');
  });
});

describe('parseJsonLine', () => {
  it('should parse any JSON value', () => {
    expect(parseJsonLine('3')).toBe(3);
    expect(parseJsonLine('{"a":[true]}')).toEqual({ a: [true] });
  });

  it('should return bigint only for integers beyond the safe range', () => {
    expect(parseJsonLine('[9007199254740991, 9007199254740993, 2.5]')).toEqual([
      9007199254740991,
      9007199254740993n,
      2.5,
    ]);
  });
});

describe('stringifyJson', () => {
  it('should write bigint and number alike', () => {
    expect(stringifyJson({ a: 1n, b: 2, c: [12345678901234567890n] })).toBe(
      '{"a":1,"b":2,"c":[12345678901234567890]}'
    );
  });

  it('should reject values with no JSON form', () => {
    expect(() => stringifyJson(undefined)).toThrow(TypeError);
  });
});
