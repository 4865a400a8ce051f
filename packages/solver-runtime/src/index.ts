/**
 * @bbo-plugin/runtime
 *
 * Host-facing control loop for solver plugins: line transport, solver
 * registry, trial id handoff and the protocol dispatcher.
 */

// Runner
export { SolverRunner } from './runner.js';
export type { RunnerState, SolverRunnerOptions, RunResult } from './runner.js';

// Bootstrap
export { runSolverPlugin, formatFailure } from './bootstrap.js';
export type { RunSolverPluginOptions } from './bootstrap.js';

// Registry
export { SolverRegistry } from './registry.js';

// Trial ids
export { TrialIdGenerator, withTrialIds } from './trial-id-generator.js';
export type { TrialIdAllocation, TrialIdResult } from './trial-id-generator.js';

// Transport
export { StreamLineTransport } from './transport/index.js';
export type { LineTransport, StreamLineTransportOptions } from './transport/index.js';

// Logging
export { createRuntimeLogger, noopLogger } from './logging.js';
export type { RuntimeLogger, RuntimeLoggerOptions, LogLevel, LogThreshold, LogFormat } from './logging.js';

// Config
export {
  loadRunnerConfig,
  DEFAULT_RUNNER_CONFIG,
  ENV_LOG_LEVEL,
  ENV_LOG_FORMAT,
} from './config/runner-config.js';
export type { RunnerConfig } from './config/runner-config.js';
