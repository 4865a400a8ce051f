/**
 * Scripted solver and factory for exercising the runtime without a real
 * optimization algorithm.
 */

import {
  createSolverSpec,
  type EvaluatedTrial,
  type NextTrial,
  type ProblemSpec,
  type Solver,
  type SolverFactory,
  type SolverSpec,
  type TrialIdSource,
} from '@bbo-plugin/contracts';

export interface FakeSolverBehavior {
  /** Ids minted per ask (default: 1) */
  idsPerAsk?: number;
  /** Thrown from ask() */
  askError?: Error;
  /** Thrown from tell() */
  tellError?: Error;
}

/**
 * Proposes `{ id, ids, params: [seed, askCount] }`, where `id` is the first
 * minted id (null when none was minted).
 */
export class FakeSolver implements Solver {
  readonly told: EvaluatedTrial[] = [];
  askCount = 0;

  constructor(
    readonly seed: bigint,
    readonly problem: ProblemSpec,
    private readonly behavior: FakeSolverBehavior = {}
  ) {}

  ask(idg: TrialIdSource): NextTrial {
    if (this.behavior.askError) {
      throw this.behavior.askError;
    }

    const ids: bigint[] = [];
    const count = this.behavior.idsPerAsk ?? 1;
    for (let i = 0; i < count; i++) {
      ids.push(idg.generate());
    }

    this.askCount += 1;
    return { id: ids[0] ?? null, ids, params: [this.seed, this.askCount] };
  }

  tell(trial: EvaluatedTrial): void {
    if (this.behavior.tellError) {
      throw this.behavior.tellError;
    }
    this.told.push(trial);
  }
}

export interface FakeSolverFactoryOptions {
  /** Spec announced in the handshake (default: `fake-solver` with all capabilities) */
  spec?: SolverSpec;
  /** Thrown from specification() */
  specError?: Error;
  /** Thrown from createSolver() */
  createError?: Error;
  /** Behavior of every created solver */
  behavior?: FakeSolverBehavior;
}

export class FakeSolverFactory implements SolverFactory {
  readonly created: FakeSolver[] = [];
  specificationCalls = 0;

  constructor(private readonly options: FakeSolverFactoryOptions = {}) {}

  specification(): SolverSpec {
    this.specificationCalls += 1;
    if (this.options.specError) {
      throw this.options.specError;
    }
    return this.options.spec ?? createSolverSpec('fake-solver', { attrs: { version: '0.0.0' } });
  }

  createSolver(seed: bigint, problem: ProblemSpec): FakeSolver {
    if (this.options.createError) {
      throw this.options.createError;
    }
    const solver = new FakeSolver(seed, problem, this.options.behavior);
    this.created.push(solver);
    return solver;
  }
}
