/**
 * @module @bbo-plugin/runtime/registry
 *
 * Live solver instances keyed by the host-assigned solver id.
 * Owned by a single SolverRunner; there is no shared instance.
 */

import {
  ProtocolError,
  toCapabilityError,
  type ProblemSpec,
  type Solver,
  type SolverFactory,
} from '@bbo-plugin/contracts';

export class SolverRegistry {
  private readonly solvers = new Map<bigint, Solver>();

  constructor(private readonly factory: SolverFactory) {}

  /**
   * Build a solver through the factory and store it under `solverId`.
   *
   * An existing entry with the same id is replaced. Nothing is stored when
   * the factory fails. `seed` is the signed 64-bit view of the host's seed.
   */
  async create(solverId: bigint, seed: bigint, problem: ProblemSpec): Promise<Solver> {
    let solver: Solver;
    try {
      solver = await this.factory.createSolver(seed, problem);
    } catch (error) {
      throw toCapabilityError(error, 'CREATE_FAILED', { solverId, seed });
    }

    this.solvers.set(solverId, solver);
    return solver;
  }

  /**
   * Remove a solver. Dropping an unknown id is a no-op.
   *
   * @returns whether an entry was removed
   */
  drop(solverId: bigint): boolean {
    return this.solvers.delete(solverId);
  }

  get(solverId: bigint): Solver | undefined {
    return this.solvers.get(solverId);
  }

  /**
   * Lookup for ask/tell.
   *
   * @throws ProtocolError UNKNOWN_SOLVER when the id was never created or already dropped
   */
  require(solverId: bigint): Solver {
    const solver = this.get(solverId);
    if (!solver) {
      throw new ProtocolError(`Unknown solver: ${solverId}`, 'UNKNOWN_SOLVER', {
        solverId,
        alive: this.ids(),
      });
    }
    return solver;
  }

  has(solverId: bigint): boolean {
    return this.solvers.has(solverId);
  }

  get size(): number {
    return this.solvers.size;
  }

  ids(): bigint[] {
    return Array.from(this.solvers.keys());
  }
}
