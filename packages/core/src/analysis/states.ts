/**
 * Properties of individual states.
 * @packageDocumentation
 */

import type { Eq, FixpointOptions, Ord, TabulatedDfa, TransitionFunction } from '../types'
import { walk, reachedStatesFrom, destinationsFrom } from '../automaton'
import { closureBound } from '../automaton/reachability'
import { includesBy, intersectBy } from '../order'

/**
 * Check whether a state is dead: no final state can be reached from it.
 *
 * @param transition - Transition rule
 * @param vocabulary - Input alphabet
 * @param finals - Accepting states
 * @param state - State to test
 * @param ord - Order on states
 * @param options - Iteration bound for the reachability closure
 *
 * @public
 */
export function isDead<St, Sy>(
  transition: TransitionFunction<St, Sy>,
  vocabulary: readonly Sy[],
  finals: readonly St[],
  state: St,
  ord: Ord<St>,
  options?: FixpointOptions,
): boolean {
  return intersectBy(reachedStatesFrom(transition, vocabulary, state, ord, options), finals, ord).length === 0
}

/**
 * Check whether a state is a sync (trap) state: not final, and every symbol
 * leads back to it.
 *
 * @public
 */
export function isSync<St, Sy>(
  transition: TransitionFunction<St, Sy>,
  vocabulary: readonly Sy[],
  finals: readonly St[],
  state: St,
  eq: Eq<St>,
): boolean {
  return (
    !includesBy(finals, state, eq) && vocabulary.every((symbol) => eq.equals(walk(transition, state, [symbol]), state))
  )
}

/**
 * The dead states of an automaton, in state order.
 *
 * @public
 */
export function deadStates<St, Sy>(dfa: TabulatedDfa<St, Sy>): St[] {
  const bound = closureBound(dfa)
  return dfa.states.filter((state) =>
    isDead(dfa.transition, dfa.vocabulary, dfa.finals, state, dfa.order.state, bound),
  )
}

/**
 * The sync states of an automaton, in state order.
 *
 * @public
 */
export function syncStates<St, Sy>(dfa: TabulatedDfa<St, Sy>): St[] {
  return dfa.states.filter((state) => isSync(dfa.transition, dfa.vocabulary, dfa.finals, state, dfa.order.state))
}

/**
 * Number of transitions, over the whole relation, that end in `destination`.
 *
 * @public
 */
export function incomingArrowCount<St, Sy>(
  transition: TransitionFunction<St, Sy>,
  vocabulary: readonly Sy[],
  states: readonly St[],
  destination: St,
  eq: Eq<St>,
): number {
  let count = 0
  for (const symbol of vocabulary) {
    for (const state of states) {
      if (eq.equals(transition(state, symbol), destination)) count++
    }
  }
  return count
}

/**
 * Number of transitions leaving `origin`: one per symbol.
 *
 * @public
 */
export function outgoingArrowCount<St, Sy>(
  transition: TransitionFunction<St, Sy>,
  vocabulary: readonly Sy[],
  origin: St,
): number {
  return destinationsFrom(transition, vocabulary, origin).length
}
