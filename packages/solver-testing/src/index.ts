/**
 * @module @bbo-plugin/testing
 * In-process fakes for testing solver plugins and the runtime
 */

export { FakeSolver, FakeSolverFactory } from './fake-solver.js';
export type { FakeSolverBehavior, FakeSolverFactoryOptions } from './fake-solver.js';

export { MemoryLineTransport } from './memory-transport.js';

export { createSolverCast, dropSolverCast, askCall, tellCall } from './messages.js';
export type { Uint64Input } from './messages.js';
