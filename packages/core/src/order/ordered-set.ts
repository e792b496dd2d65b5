/**
 * List-as-set helpers parameterized by an explicit equality or order.
 * @packageDocumentation
 */

import type { Eq, Ord } from '../types'

/**
 * Sort and deduplicate. The canonical form used to detect a fixpoint.
 *
 * @public
 */
export function sortUnique<A>(values: Iterable<A>, ord: Ord<A>): A[] {
  const sorted = [...values].sort((a, b) => ord.compare(a, b))
  const result: A[] = []
  for (const value of sorted) {
    if (result.length === 0 || !ord.equals(result[result.length - 1], value)) {
      result.push(value)
    }
  }
  return result
}

/**
 * Deduplicate keeping the first occurrence of each value, in input order.
 *
 * @public
 */
export function uniqueBy<A>(values: Iterable<A>, eq: Eq<A>): A[] {
  const result: A[] = []
  for (const value of values) {
    if (!includesBy(result, value, eq)) {
      result.push(value)
    }
  }
  return result
}

/**
 * @public
 */
export function includesBy<A>(values: readonly A[], value: A, eq: Eq<A>): boolean {
  return values.some((candidate) => eq.equals(candidate, value))
}

/**
 * Elements of `values` not in `removed`, in the order of `values`.
 *
 * @public
 */
export function differenceBy<A>(values: readonly A[], removed: readonly A[], eq: Eq<A>): A[] {
  return values.filter((value) => !includesBy(removed, value, eq))
}

/**
 * Elements of `values` also in `kept`, in the order of `values`.
 *
 * @public
 */
export function intersectBy<A>(values: readonly A[], kept: readonly A[], eq: Eq<A>): A[] {
  return values.filter((value) => includesBy(kept, value, eq))
}

/**
 * Element-wise equality of two sequences.
 *
 * @public
 */
export function sameSequence<A>(a: readonly A[], b: readonly A[], eq: Eq<A>): boolean {
  return a.length === b.length && a.every((value, i) => eq.equals(value, b[i]))
}
