/**
 * @module @bbo-plugin/runtime/runner
 *
 * Protocol dispatcher. Announces the solver spec, then reads one message per
 * line and routes it to exactly one handler until end-of-stream (stopped) or
 * the first failure (failed).
 *
 * Every handler runs to completion before the next line is read.
 */

import {
  ProtocolError,
  toCapabilityError,
  wrapError,
  type NextTrial,
  type SolverFactory,
  type SolverSpec,
} from '@bbo-plugin/contracts';
import {
  decodeInboundMessage,
  encodeMessage,
  type AskCall,
  type CreateSolverCast,
  type DropSolverCast,
  type InboundMessage,
  type OutboundMessage,
  type TellCall,
} from '@bbo-plugin/protocol';
import { noopLogger, type RuntimeLogger } from './logging.js';
import { SolverRegistry } from './registry.js';
import { withTrialIds, type TrialIdResult } from './trial-id-generator.js';
import { StreamLineTransport, type LineTransport } from './transport/index.js';

export type RunnerState = 'idle' | 'running' | 'stopped' | 'failed';

export interface SolverRunnerOptions {
  /** Line transport (default: stdin/stdout) */
  transport?: LineTransport;
  /** Runtime logger (default: silent) */
  logger?: RuntimeLogger;
}

/**
 * Summary of a run that reached end-of-stream
 */
export interface RunResult {
  state: 'stopped';
  /** Input lines read and handled */
  linesProcessed: number;
  /** Solvers still registered when the input closed */
  solversAlive: number;
}

export class SolverRunner {
  private readonly registry: SolverRegistry;
  private readonly transport: LineTransport;
  private readonly logger: RuntimeLogger;
  private currentState: RunnerState = 'idle';
  private linesProcessed = 0;

  constructor(
    private readonly factory: SolverFactory,
    options: SolverRunnerOptions = {}
  ) {
    this.registry = new SolverRegistry(factory);
    this.transport = options.transport ?? new StreamLineTransport();
    this.logger = options.logger ?? noopLogger;
  }

  get state(): RunnerState {
    return this.currentState;
  }

  /**
   * Ids of the solvers currently alive
   */
  get solverIds(): bigint[] {
    return this.registry.ids();
  }

  /**
   * Run until end-of-stream.
   *
   * @throws SolverPluginError on the first transport, protocol or capability failure
   */
  async run(): Promise<RunResult> {
    if (this.currentState !== 'idle') {
      throw new ProtocolError('SolverRunner.run() can only be called once', 'RUNNER_ALREADY_STARTED', {
        state: this.currentState,
      });
    }

    this.currentState = 'running';

    try {
      await this.castSolverSpec();

      while (await this.runOnce()) {
        // next line
      }

      const result: RunResult = {
        state: 'stopped',
        linesProcessed: this.linesProcessed,
        solversAlive: this.registry.size,
      };
      this.currentState = 'stopped';
      this.logger.info('Input closed, solver runner stopped', {
        linesProcessed: result.linesProcessed,
        solversAlive: result.solversAlive,
      });
      return result;
    } catch (error) {
      this.currentState = 'failed';
      const failure = wrapError(error);
      // the caller prints the failure summary
      this.logger.debug('Solver runner failed', { code: failure.code, error: failure.message });
      throw failure;
    }
  }

  /**
   * Handle one input line.
   *
   * @returns false at end-of-stream
   */
  private async runOnce(): Promise<boolean> {
    const line = await this.transport.readLine();
    if (line === null) {
      return false;
    }

    this.linesProcessed += 1;
    const message = decodeInboundMessage(line);
    await this.dispatch(message);
    return true;
  }

  private async dispatch(message: InboundMessage): Promise<void> {
    switch (message.type) {
      case 'CREATE_SOLVER_CAST':
        return this.handleCreateSolverCast(message);
      case 'DROP_SOLVER_CAST':
        return this.handleDropSolverCast(message);
      case 'ASK_CALL':
        return this.handleAskCall(message);
      case 'TELL_CALL':
        return this.handleTellCall(message);
      default: {
        const unreachable: never = message;
        throw new ProtocolError('Unhandled message', 'UNKNOWN_MESSAGE_TYPE', { message: unreachable });
      }
    }
  }

  private async handleCreateSolverCast(message: CreateSolverCast): Promise<void> {
    const log = this.logger.child({ solverId: message.solver_id });

    if (this.registry.has(message.solver_id)) {
      log.debug('Replacing existing solver');
    }

    // the host's uint64 seed, reinterpreted as signed 64-bit
    const seed = BigInt.asIntN(64, message.random_seed);
    await this.registry.create(message.solver_id, seed, message.problem);
    log.debug('Solver created', { seed });
  }

  private async handleDropSolverCast(message: DropSolverCast): Promise<void> {
    const removed = this.registry.drop(message.solver_id);
    this.logger.debug(removed ? 'Solver dropped' : 'Drop of unknown solver ignored', {
      solverId: message.solver_id,
    });
  }

  private async handleAskCall(message: AskCall): Promise<void> {
    const solverId = message.solver_id;
    const solver = this.registry.require(solverId);

    let asked: TrialIdResult<NextTrial>;
    try {
      asked = await withTrialIds(message.next_trial_id, (idg) => solver.ask(idg));
    } catch (error) {
      throw toCapabilityError(error, 'ASK_FAILED', { solverId, nextTrialId: message.next_trial_id });
    }

    this.logger.debug('Trial proposed', {
      solverId,
      consumed: asked.consumed,
      nextTrialId: asked.nextId,
    });

    await this.send({ type: 'ASK_REPLY', trial: asked.value, next_trial_id: asked.nextId });
  }

  private async handleTellCall(message: TellCall): Promise<void> {
    const solverId = message.solver_id;
    const solver = this.registry.require(solverId);

    try {
      await solver.tell(message.trial);
    } catch (error) {
      throw toCapabilityError(error, 'TELL_FAILED', { solverId });
    }

    this.logger.debug('Trial told', { solverId });
    await this.send({ type: 'TELL_REPLY' });
  }

  private async castSolverSpec(): Promise<void> {
    let spec: SolverSpec;
    try {
      spec = await this.factory.specification();
    } catch (error) {
      throw toCapabilityError(error, 'SPECIFICATION_FAILED');
    }

    this.logger.debug('Announcing solver spec', { name: spec.name });
    await this.send({ type: 'SOLVER_SPEC_CAST', spec });
  }

  private async send(message: OutboundMessage): Promise<void> {
    await this.transport.writeLine(encodeMessage(message));
  }
}
