/**
 * @module @bbo-plugin/protocol/schema
 * Zod validation schemas for protocol messages
 */

import { z } from 'zod';
import { CAPABILITY_NAMES, type JsonValue } from '@bbo-plugin/contracts';

export const MAX_UINT64 = 2n ** 64n - 1n;

/**
 * Ids, seeds and trial counters: unsigned 64-bit integers.
 * Safe integers arrive as numbers, larger ones as bigints; both come out as bigint.
 */
export const uint64Schema = z
  .union([z.bigint(), z.number().int().max(Number.MAX_SAFE_INTEGER)])
  .transform((value) => BigInt(value))
  .pipe(z.bigint().nonnegative().lte(MAX_UINT64));

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.bigint(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/**
 * Opaque payload (problem, trial): any JSON object
 */
export const jsonObjectSchema = z.record(jsonValueSchema);

export const capabilitiesSchema = z.array(z.enum(CAPABILITY_NAMES));

export const solverSpecSchema = z.object({
  name: z.string(),
  attrs: z.record(z.string()),
  capabilities: capabilitiesSchema,
});

/**
 * Envelope check: a JSON object with a string discriminant
 */
export const envelopeSchema = z
  .object({
    type: z.string(),
  })
  .passthrough();

export const createSolverCastSchema = z.object({
  type: z.literal('CREATE_SOLVER_CAST'),
  solver_id: uint64Schema,
  random_seed: uint64Schema,
  problem: jsonObjectSchema,
});

export const dropSolverCastSchema = z.object({
  type: z.literal('DROP_SOLVER_CAST'),
  solver_id: uint64Schema,
});

export const askCallSchema = z.object({
  type: z.literal('ASK_CALL'),
  solver_id: uint64Schema,
  next_trial_id: uint64Schema,
});

export const tellCallSchema = z.object({
  type: z.literal('TELL_CALL'),
  solver_id: uint64Schema,
  trial: jsonObjectSchema,
});

export const solverSpecCastSchema = z.object({
  type: z.literal('SOLVER_SPEC_CAST'),
  spec: solverSpecSchema,
});

export const askReplySchema = z.object({
  type: z.literal('ASK_REPLY'),
  trial: jsonObjectSchema,
  next_trial_id: uint64Schema,
});

export const tellReplySchema = z.object({
  type: z.literal('TELL_REPLY'),
});

export const inboundMessageSchema = z.discriminatedUnion('type', [
  createSolverCastSchema,
  dropSolverCastSchema,
  askCallSchema,
  tellCallSchema,
]);

export const outboundMessageSchema = z.discriminatedUnion('type', [
  solverSpecCastSchema,
  askReplySchema,
  tellReplySchema,
]);

/**
 * Flatten zod issues into `path: message` strings for error details
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
