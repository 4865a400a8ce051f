/**
 * Error types for the solver plugin runtime
 *
 * Every failure is terminal for the run. Codes let the host-facing boundary
 * report what went wrong without parsing messages.
 */

/**
 * Error codes enum for type safety
 */
export const ErrorCode = {
  // Transport
  MALFORMED_LINE: 'MALFORMED_LINE',
  STREAM_ERROR: 'STREAM_ERROR',
  STREAM_CLOSED: 'STREAM_CLOSED',
  // Protocol
  UNKNOWN_MESSAGE_TYPE: 'UNKNOWN_MESSAGE_TYPE',
  INVALID_MESSAGE: 'INVALID_MESSAGE',
  UNKNOWN_SOLVER: 'UNKNOWN_SOLVER',
  TRIAL_ID_OVERFLOW: 'TRIAL_ID_OVERFLOW',
  TRIAL_ID_GENERATOR_CLOSED: 'TRIAL_ID_GENERATOR_CLOSED',
  RUNNER_ALREADY_STARTED: 'RUNNER_ALREADY_STARTED',
  // Capability objects
  SPECIFICATION_FAILED: 'SPECIFICATION_FAILED',
  CREATE_FAILED: 'CREATE_FAILED',
  ASK_FAILED: 'ASK_FAILED',
  TELL_FAILED: 'TELL_FAILED',
  // Misc
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type TransportErrorCode =
  | typeof ErrorCode.MALFORMED_LINE
  | typeof ErrorCode.STREAM_ERROR
  | typeof ErrorCode.STREAM_CLOSED;

export type ProtocolErrorCode =
  | typeof ErrorCode.UNKNOWN_MESSAGE_TYPE
  | typeof ErrorCode.INVALID_MESSAGE
  | typeof ErrorCode.UNKNOWN_SOLVER
  | typeof ErrorCode.TRIAL_ID_OVERFLOW
  | typeof ErrorCode.TRIAL_ID_GENERATOR_CLOSED
  | typeof ErrorCode.RUNNER_ALREADY_STARTED;

export type CapabilityErrorCode =
  | typeof ErrorCode.SPECIFICATION_FAILED
  | typeof ErrorCode.CREATE_FAILED
  | typeof ErrorCode.ASK_FAILED
  | typeof ErrorCode.TELL_FAILED;

/**
 * Base solver plugin error class
 */
export class SolverPluginError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: ErrorCodeType;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCodeType,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SolverPluginError';
    this.code = code;
    this.details = details;

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Malformed input line or a failing stdin/stdout stream
 */
export class TransportError extends SolverPluginError {
  declare readonly code: TransportErrorCode;

  constructor(
    message: string,
    code: TransportErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, code, details, options);
    this.name = 'TransportError';
  }
}

/**
 * Well-formed JSON that breaks the protocol: unknown discriminant,
 * missing fields, reference to a solver that is not alive
 */
export class ProtocolError extends SolverPluginError {
  declare readonly code: ProtocolErrorCode;

  constructor(message: string, code: ProtocolErrorCode, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ProtocolError';
  }
}

/**
 * Failure raised by the injected factory or solver.
 * The original error is kept as `cause`.
 */
export class CapabilityError extends SolverPluginError {
  declare readonly code: CapabilityErrorCode;

  constructor(
    message: string,
    code: CapabilityErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, code, details, options);
    this.name = 'CapabilityError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends SolverPluginError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Wrap any error as a SolverPluginError
 */
export function wrapError(error: unknown, defaultCode: ErrorCodeType = ErrorCode.INTERNAL_ERROR): SolverPluginError {
  if (error instanceof SolverPluginError) {
    return error;
  }

  if (error instanceof Error) {
    return new SolverPluginError(
      error.message,
      defaultCode,
      { originalName: error.name },
      { cause: error }
    );
  }

  return new SolverPluginError(String(error), defaultCode);
}

/**
 * Wrap an error thrown by a factory or solver.
 * Errors already carrying a code pass through untouched.
 */
export function toCapabilityError(
  error: unknown,
  code: CapabilityErrorCode,
  details?: Record<string, unknown>
): SolverPluginError {
  if (error instanceof SolverPluginError) {
    return error;
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new CapabilityError(reason, code, details, { cause: error });
}
