/**
 * Iterate-until-stable closure.
 * @packageDocumentation
 */

import type { FixpointOptions } from '../types'
import { AutomatonLimitError } from '../types'

/**
 * Default maximum number of step applications in {@link fixpoint}.
 *
 * @public
 */
export const DEFAULT_MAX_CLOSURE_ITERATIONS = 10_000

/**
 * Apply `step` repeatedly, starting from `seed`, until two consecutive values
 * are equal; return that value.
 *
 * `step` must be monotone (its result contains its argument) and keep values
 * in a canonical form, so that "no growth" shows up as equality. Over a finite
 * universe of elements the loop ends after at most `|universe|` applications.
 *
 * @param step - Monotone growth step
 * @param seed - Starting value
 * @param equals - Equality on canonical values
 * @param options - Iteration bound
 * @returns The stable value
 * @throws AutomatonLimitError if the value is still growing after `maxIterations` steps
 *
 * @public
 */
export function fixpoint<T>(
  step: (current: T) => T,
  seed: T,
  equals: (a: T, b: T) => boolean,
  options: FixpointOptions = {},
): T {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_CLOSURE_ITERATIONS

  let current = seed
  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const next = step(current)
    if (equals(current, next)) {
      return current
    }
    current = next
  }

  throw new AutomatonLimitError(
    `Closure did not stabilise within ${maxIterations} iterations. ` +
      `The reachable state set may be unbounded, or the iteration limit is too small.`,
    maxIterations,
    maxIterations + 1,
  )
}
