/**
 * @bbo-plugin/contracts
 *
 * Types and errors shared by the solver runtime, the wire protocol and
 * algorithm implementations. No runtime dependencies.
 */

// Payloads
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  ProblemSpec,
  NextTrial,
  EvaluatedTrial,
} from './json.js';

// Capabilities
export type { Capability, Capabilities, CapabilityFlags } from './capabilities.js';
export { CAPABILITY_NAMES, ALL_CAPABILITIES, capabilitiesOf } from './capabilities.js';

// Spec
export type { SolverSpec, SolverSpecOptions } from './spec.js';
export { createSolverSpec } from './spec.js';

// Solver / Factory
export type { Solver, SolverFactory, TrialIdSource, MaybePromise } from './solver.js';

// Errors
export {
  SolverPluginError,
  TransportError,
  ProtocolError,
  CapabilityError,
  ConfigError,
  ErrorCode,
  wrapError,
  toCapabilityError,
} from './errors.js';
export type {
  ErrorCodeType,
  TransportErrorCode,
  ProtocolErrorCode,
  CapabilityErrorCode,
} from './errors.js';
