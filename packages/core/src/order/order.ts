/**
 * Ready-made capability instances.
 * @packageDocumentation
 */

import type { DfaOrder, Ord, Ordering } from '../types'

/**
 * Values that JavaScript's relational operators order totally.
 * @public
 */
export type Primitive = string | number | bigint

/**
 * The built-in `<` / `>` order for strings, numbers or bigints.
 *
 * @public
 */
export function naturalOrder<A extends Primitive>(): Ord<A> {
  return {
    equals: (a, b) => a === b,
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  }
}

/**
 * Build an order from a comparator in the `Array.prototype.sort` convention
 * (negative, zero or positive).
 *
 * @public
 */
export function fromCompare<A>(compare: (a: A, b: A) => number): Ord<A> {
  const ordering = (a: A, b: A): Ordering => {
    const result = compare(a, b)
    return result < 0 ? -1 : result > 0 ? 1 : 0
  }
  return {
    equals: (a, b) => ordering(a, b) === 0,
    compare: ordering,
  }
}

/**
 * Lexicographic order on arrays, shorter prefix first.
 *
 * Used for set-valued states, which are kept as sorted arrays.
 *
 * @public
 */
export function lexicographicOrder<A>(element: Ord<A>): Ord<readonly A[]> {
  const compare = (a: readonly A[], b: readonly A[]): Ordering => {
    const shared = Math.min(a.length, b.length)
    for (let i = 0; i < shared; i++) {
      const result = element.compare(a[i], b[i])
      if (result !== 0) return result
    }
    return a.length < b.length ? -1 : a.length > b.length ? 1 : 0
  }
  return {
    equals: (a, b) => compare(a, b) === 0,
    compare,
  }
}

/**
 * Capabilities for an automaton whose states and symbols are both primitives.
 *
 * @example
 * ```ts
 * const dfa = createDfa(definition, primitiveOrder<number, string>())
 * ```
 *
 * @public
 */
export function primitiveOrder<St extends Primitive, Sy extends Primitive>(): DfaOrder<St, Sy> {
  return { state: naturalOrder<St>(), symbol: naturalOrder<Sy>() }
}
