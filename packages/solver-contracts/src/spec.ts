import { ALL_CAPABILITIES, type Capabilities } from './capabilities.js';

/**
 * Solver specification announced to the host in the handshake
 */
export interface SolverSpec {
  /** Solver name shown in benchmark reports */
  readonly name: string;
  /** Free-form attributes (version, paper, repository, ...) */
  readonly attrs: Readonly<Record<string, string>>;
  /** Optional protocol features the solver supports */
  readonly capabilities: Capabilities;
}

export interface SolverSpecOptions {
  attrs?: Record<string, string>;
  capabilities?: Capabilities;
}

/**
 * Build a frozen `SolverSpec`.
 *
 * Defaults to no attributes and every known capability.
 */
export function createSolverSpec(name: string, options: SolverSpecOptions = {}): SolverSpec {
  return Object.freeze({
    name,
    attrs: Object.freeze({ ...(options.attrs ?? {}) }),
    capabilities: Object.freeze([...(options.capabilities ?? ALL_CAPABILITIES)]),
  });
}
