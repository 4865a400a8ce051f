/**
 * Capability interfaces implemented by an optimization algorithm.
 *
 * The runtime receives a `SolverFactory` at construction time and never
 * extends or inspects it beyond these methods.
 */

import type { EvaluatedTrial, NextTrial, ProblemSpec } from './json.js';
import type { SolverSpec } from './spec.js';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Id source handed to `Solver.ask`.
 *
 * Every call returns a fresh id; the trial returned from `ask` must carry
 * one of them.
 */
export interface TrialIdSource {
  generate(): bigint;
}

/**
 * A stateful optimizer instance
 */
export interface Solver {
  /**
   * Propose the next trial to evaluate.
   * Throwing aborts the run.
   */
  ask(idg: TrialIdSource): MaybePromise<NextTrial>;

  /**
   * Record the outcome of a previously proposed trial.
   */
  tell(trial: EvaluatedTrial): MaybePromise<void>;
}

/**
 * Declares the solver and manufactures instances
 */
export interface SolverFactory {
  /**
   * Called exactly once per run, before any instance exists.
   */
  specification(): MaybePromise<SolverSpec>;

  /**
   * Create an independent solver for one problem.
   *
   * @param seed - random seed chosen by the host, as a signed 64-bit integer
   */
  createSolver(seed: bigint, problem: ProblemSpec): MaybePromise<Solver>;
}
