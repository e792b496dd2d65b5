/**
 * Structural comparison of automata.
 * @packageDocumentation
 */

import type { TabulatedDfa, TransitionTriple } from '../types'
import { sameSequence, sortUnique } from '../order'
import { beautify } from './rename'

/**
 * Check if two automata are identical as data: same vocabulary in the same
 * order, same states, start state, final states and transition relation.
 *
 * Uses the first automaton's capabilities for every comparison.
 *
 * @public
 */
export function structurallyEqual<St, Sy>(a: TabulatedDfa<St, Sy>, b: TabulatedDfa<St, Sy>): boolean {
  const { state, symbol } = a.order
  const tripleEq = {
    equals: (x: TransitionTriple<St, Sy>, y: TransitionTriple<St, Sy>) =>
      state.equals(x.origin, y.origin) && symbol.equals(x.symbol, y.symbol) && state.equals(x.destination, y.destination),
  }

  return (
    sameSequence(a.vocabulary, b.vocabulary, symbol) &&
    sameSequence(sortUnique(a.states, state), sortUnique(b.states, state), state) &&
    state.equals(a.start, b.start) &&
    sameSequence(sortUnique(a.finals, state), sortUnique(b.finals, state), state) &&
    sameSequence(a.triples, b.triples, tripleEq)
  )
}

/**
 * Check if two automata have the same reachable structure up to a renaming
 * of states.
 *
 * For minimized automata this decides language equivalence: minimize both,
 * then compare.
 *
 * @public
 */
export function areIsomorphic<A, B, Sy>(a: TabulatedDfa<A, Sy>, b: TabulatedDfa<B, Sy>): boolean {
  return structurallyEqual(beautify(a), beautify(b))
}
