/**
 * Reachability over a transition rule.
 * @packageDocumentation
 */

import type { Dfa, Eq, FixpointOptions, Ord, TransitionFunction } from '../types'
import { sameSequence, sortUnique } from '../order'
import { fixpoint } from './fixpoint'

/**
 * The destinations of `origin`, one per symbol, in vocabulary order.
 * Repeated destinations are kept.
 *
 * @public
 */
export function destinationsFrom<St, Sy>(
  transition: TransitionFunction<St, Sy>,
  vocabulary: readonly Sy[],
  origin: St,
): St[] {
  return vocabulary.map((symbol) => transition(origin, symbol))
}

/**
 * The symbols on which `origin` moves to exactly `destination`, in
 * vocabulary order. Empty if there are none.
 *
 * @public
 */
export function transitionsFromTo<St, Sy>(
  transition: TransitionFunction<St, Sy>,
  vocabulary: readonly Sy[],
  origin: St,
  destination: St,
  eq: Eq<St>,
): Sy[] {
  return vocabulary.filter((symbol) => eq.equals(transition(origin, symbol), destination))
}

/**
 * Compute every state reachable from `origin` through any sequence of
 * symbols, `origin` included.
 *
 * The result is sorted and closed: every state in it maps, on every symbol,
 * to a state already in it.
 *
 * @param transition - Transition rule
 * @param vocabulary - Input alphabet
 * @param origin - State to start from
 * @param ord - Order on states
 * @param options - Iteration bound; pass `states.length + 1` when the state set is known
 * @returns Sorted reachable states
 * @throws AutomatonLimitError if the closure exceeds the iteration bound
 *
 * @public
 */
export function reachedStatesFrom<St, Sy>(
  transition: TransitionFunction<St, Sy>,
  vocabulary: readonly Sy[],
  origin: St,
  ord: Ord<St>,
  options: FixpointOptions = {},
): St[] {
  const step = (states: St[]): St[] =>
    sortUnique([...states, ...states.flatMap((state) => destinationsFrom(transition, vocabulary, state))], ord)

  const seed = sortUnique([origin, ...destinationsFrom(transition, vocabulary, origin)], ord)

  return fixpoint(step, seed, (a, b) => sameSequence(a, b, ord), options)
}

/**
 * The states reachable from an automaton's start state.
 *
 * @param dfa - The automaton
 * @param options - Iteration bound; defaults to `states.length + 1`, which is
 *   too small only when `states` was not fully enumerated
 *
 * @public
 */
export function reachableStates<St, Sy>(dfa: Dfa<St, Sy>, options?: FixpointOptions): St[] {
  return reachedStatesFrom(dfa.transition, dfa.vocabulary, dfa.start, dfa.order.state, closureBound(dfa, options))
}

/**
 * Iteration bound for closures over a declared state set.
 *
 * Each non-final step adds at least one state, so `|states| + 1`
 * applications always suffice.
 *
 * @internal
 */
export function closureBound<St, Sy>(dfa: Dfa<St, Sy>, options: FixpointOptions = {}): FixpointOptions {
  return { maxIterations: options.maxIterations ?? dfa.states.length + 1 }
}
