/**
 * @bbo-plugin/protocol
 *
 * Line-delimited JSON protocol spoken between a benchmark host and a
 * solver plugin.
 */

export type {
  MessageTypeName,
  CreateSolverCast,
  DropSolverCast,
  AskCall,
  TellCall,
  InboundMessage,
  SolverSpecCast,
  AskReply,
  TellReply,
  OutboundMessage,
  ProtocolMessage,
} from './types.js';
export { MessageType, INBOUND_MESSAGE_TYPES, OUTBOUND_MESSAGE_TYPES } from './types.js';

export {
  MAX_UINT64,
  uint64Schema,
  jsonValueSchema,
  jsonObjectSchema,
  capabilitiesSchema,
  solverSpecSchema,
  envelopeSchema,
  createSolverCastSchema,
  dropSolverCastSchema,
  askCallSchema,
  tellCallSchema,
  solverSpecCastSchema,
  askReplySchema,
  tellReplySchema,
  inboundMessageSchema,
  outboundMessageSchema,
  formatIssues,
} from './schema.js';

export {
  parseJsonLine,
  decodeInboundMessage,
  decodeOutboundMessage,
  encodeMessage,
  stringifyJson,
} from './codec.js';
