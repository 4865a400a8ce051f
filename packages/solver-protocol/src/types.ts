/**
 * Wire protocol between the benchmark host and a solver plugin
 *
 * One JSON document per line on stdin (host → plugin) and stdout
 * (plugin → host). A "cast" gets no reply; a "call" gets exactly one.
 * Ids, seeds and trial counters are uint64 on the wire and bigint here.
 */

import type { EvaluatedTrial, NextTrial, ProblemSpec, SolverSpec } from '@bbo-plugin/contracts';

export const MessageType = {
  SOLVER_SPEC_CAST: 'SOLVER_SPEC_CAST',
  CREATE_SOLVER_CAST: 'CREATE_SOLVER_CAST',
  DROP_SOLVER_CAST: 'DROP_SOLVER_CAST',
  ASK_CALL: 'ASK_CALL',
  ASK_REPLY: 'ASK_REPLY',
  TELL_CALL: 'TELL_CALL',
  TELL_REPLY: 'TELL_REPLY',
} as const;

export type MessageTypeName = (typeof MessageType)[keyof typeof MessageType];

/**
 * Host → plugin: create a solver instance under `solver_id`
 */
export interface CreateSolverCast {
  type: 'CREATE_SOLVER_CAST';
  solver_id: bigint;
  random_seed: bigint;
  problem: ProblemSpec;
}

/**
 * Host → plugin: forget a solver instance
 */
export interface DropSolverCast {
  type: 'DROP_SOLVER_CAST';
  solver_id: bigint;
}

/**
 * Host → plugin: propose the next trial.
 * `next_trial_id` is the first id the solver may use.
 */
export interface AskCall {
  type: 'ASK_CALL';
  solver_id: bigint;
  next_trial_id: bigint;
}

/**
 * Host → plugin: report an evaluated trial
 */
export interface TellCall {
  type: 'TELL_CALL';
  solver_id: bigint;
  trial: EvaluatedTrial;
}

/**
 * Union of messages from host to plugin
 */
export type InboundMessage = CreateSolverCast | DropSolverCast | AskCall | TellCall;

/**
 * Plugin → host: handshake, written once before any input is read
 */
export interface SolverSpecCast {
  type: 'SOLVER_SPEC_CAST';
  spec: SolverSpec;
}

/**
 * Plugin → host: answer to ASK_CALL.
 * `next_trial_id` is the first id not consumed by the solver.
 */
export interface AskReply {
  type: 'ASK_REPLY';
  trial: NextTrial;
  next_trial_id: bigint;
}

/**
 * Plugin → host: acknowledgement of TELL_CALL
 */
export interface TellReply {
  type: 'TELL_REPLY';
}

/**
 * Union of messages from plugin to host
 */
export type OutboundMessage = SolverSpecCast | AskReply | TellReply;

export type ProtocolMessage = InboundMessage | OutboundMessage;

export const INBOUND_MESSAGE_TYPES: ReadonlyArray<InboundMessage['type']> = [
  MessageType.CREATE_SOLVER_CAST,
  MessageType.DROP_SOLVER_CAST,
  MessageType.ASK_CALL,
  MessageType.TELL_CALL,
];

export const OUTBOUND_MESSAGE_TYPES: ReadonlyArray<OutboundMessage['type']> = [
  MessageType.SOLVER_SPEC_CAST,
  MessageType.ASK_REPLY,
  MessageType.TELL_REPLY,
];
