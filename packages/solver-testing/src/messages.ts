/**
 * Builders for host → plugin messages
 */

import type { EvaluatedTrial, ProblemSpec } from '@bbo-plugin/contracts';
import type { AskCall, CreateSolverCast, DropSolverCast, TellCall } from '@bbo-plugin/protocol';

/** Ids and seeds may be given as plain numbers */
export type Uint64Input = number | bigint;

export function createSolverCast(
  solverId: Uint64Input,
  randomSeed: Uint64Input,
  problem: ProblemSpec = {}
): CreateSolverCast {
  return {
    type: 'CREATE_SOLVER_CAST',
    solver_id: BigInt(solverId),
    random_seed: BigInt(randomSeed),
    problem,
  };
}

export function dropSolverCast(solverId: Uint64Input): DropSolverCast {
  return { type: 'DROP_SOLVER_CAST', solver_id: BigInt(solverId) };
}

export function askCall(solverId: Uint64Input, nextTrialId: Uint64Input): AskCall {
  return { type: 'ASK_CALL', solver_id: BigInt(solverId), next_trial_id: BigInt(nextTrialId) };
}

export function tellCall(solverId: Uint64Input, trial: EvaluatedTrial): TellCall {
  return { type: 'TELL_CALL', solver_id: BigInt(solverId), trial };
}
