/**
 * @module @bbo-plugin/runtime/trial-id-generator
 *
 * Per-ask cursor over the host's global trial id counter.
 *
 * The host sends the first free id with every ASK_CALL; the solver mints
 * zero or more ids while building its trial; the first id left unused goes
 * back in ASK_REPLY so the host's counter stays authoritative across
 * solvers and calls.
 */

import { ProtocolError, type MaybePromise, type TrialIdSource } from '@bbo-plugin/contracts';
import { MAX_UINT64 } from '@bbo-plugin/protocol';

/**
 * Outcome of one ask call's id usage
 */
export interface TrialIdAllocation {
  /** Number of ids handed out */
  consumed: number;
  /** First id not handed out; echoed to the host */
  nextId: bigint;
}

/**
 * Value produced inside `withTrialIds`, plus the id allocation
 */
export type TrialIdResult<T> = TrialIdAllocation & { value: T };

export class TrialIdGenerator implements TrialIdSource {
  private readonly startId: bigint;
  private nextId: bigint;
  private closed = false;

  constructor(startingId: bigint) {
    if (startingId < 0n || startingId > MAX_UINT64) {
      throw new ProtocolError(`Invalid starting trial id: ${startingId}`, 'INVALID_MESSAGE', {
        startingId,
      });
    }
    this.startId = startingId;
    this.nextId = startingId;
  }

  /**
   * Hand out the current id and advance the counter.
   */
  generate(): bigint {
    if (this.closed) {
      throw new ProtocolError(
        'Trial id generator used after its ask call returned',
        'TRIAL_ID_GENERATOR_CLOSED',
        { nextId: this.nextId }
      );
    }

    // the successor must still fit in a uint64 reply
    if (this.nextId >= MAX_UINT64) {
      throw new ProtocolError('Trial id counter exhausted', 'TRIAL_ID_OVERFLOW', { nextId: this.nextId });
    }

    const id = this.nextId;
    this.nextId += 1n;
    return id;
  }

  get consumed(): number {
    return Number(this.nextId - this.startId);
  }

  close(): void {
    this.closed = true;
  }

  /**
   * Seal the generator and report its final state.
   */
  finish(): TrialIdAllocation {
    this.close();
    return { consumed: this.consumed, nextId: this.nextId };
  }
}

/**
 * Run `fn` with a generator seeded at `startingId`.
 *
 * The generator is sealed once `fn` settles, so a solver that keeps a
 * reference cannot mint ids outside its ask call.
 */
export async function withTrialIds<T>(
  startingId: bigint,
  fn: (idg: TrialIdSource) => MaybePromise<T>
): Promise<TrialIdResult<T>> {
  const generator = new TrialIdGenerator(startingId);
  try {
    const value = await fn(generator);
    return { value, ...generator.finish() };
  } finally {
    generator.close();
  }
}
