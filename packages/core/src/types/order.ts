// =============================================================================
// CAPABILITIES
// =============================================================================

/**
 * Result of a three-way comparison.
 * @public
 */
export type Ordering = -1 | 0 | 1

/**
 * Equality capability for a state or symbol type.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 *
 * @public
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean
}

/**
 * Total order capability. `compare(a, b) === 0` must agree with `equals(a, b)`.
 *
 * Needed wherever states or symbols are sorted: closure, table building,
 * renaming and canonical enumeration of the transition relation.
 *
 * @public
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering
}

/**
 * The capabilities an automaton carries for its state and symbol types.
 * @public
 */
export interface DfaOrder<St, Sy> {
  readonly state: Ord<St>
  readonly symbol: Ord<Sy>
}
