/**
 * JSON value types for the opaque payloads that cross the protocol.
 *
 * Integers outside the safe range decode to `bigint` and encode back as
 * exact JSON integers.
 */

export type JsonPrimitive = string | number | bigint | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Problem description handed to `SolverFactory.createSolver`.
 * The runtime never looks inside it.
 */
export type ProblemSpec = JsonObject;

/**
 * Trial proposed by `Solver.ask` (parameters plus an id minted from the generator).
 */
export type NextTrial = JsonObject;

/**
 * Previously proposed trial annotated with its observed outcome.
 */
export type EvaluatedTrial = JsonObject;
