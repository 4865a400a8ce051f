/**
 * Optional protocol features a solver can declare.
 *
 * Declaration only: the runtime forwards them to the host and never
 * branches on them.
 */

export const CAPABILITY_NAMES = [
  'UNIFORM_CONTINUOUS',
  'UNIFORM_DISCRETE',
  'LOG_UNIFORM_CONTINUOUS',
  'LOG_UNIFORM_DISCRETE',
  'CATEGORICAL',
  'CONDITIONAL',
  'MULTI_OBJECTIVE',
  'CONCURRENT',
] as const;

export type Capability = (typeof CAPABILITY_NAMES)[number];

/**
 * Wire form: the list of supported capability names
 */
export type Capabilities = readonly Capability[];

export type CapabilityFlags = Partial<Record<Capability, boolean>>;

/**
 * Every capability the protocol knows about
 */
export const ALL_CAPABILITIES: Capabilities = Object.freeze([...CAPABILITY_NAMES]);

/**
 * Convert boolean flags into the wire list, in declaration order.
 *
 * @example
 * ```typescript
 * capabilitiesOf({ CATEGORICAL: true, CONCURRENT: false });
 * // => ['CATEGORICAL']
 * ```
 */
export function capabilitiesOf(flags: CapabilityFlags): Capabilities {
  return Object.freeze(CAPABILITY_NAMES.filter((name) => flags[name] === true));
}
