/**
 * Acceptance: running an automaton over an input sequence.
 * @packageDocumentation
 */

import type { Dfa, TransitionFunction } from '../types'
import { includesBy } from '../order'

/**
 * Run the transition rule over `input` starting at `start` and return the
 * state reached once every symbol has been consumed.
 *
 * @param transition - Transition rule
 * @param start - State to start from
 * @param input - Input symbols; a string iterates over its characters
 * @returns The state after the last symbol, or `start` for empty input
 *
 * @public
 */
export function walk<St, Sy>(transition: TransitionFunction<St, Sy>, start: St, input: Iterable<Sy>): St {
  let state = start
  for (const symbol of input) {
    state = transition(state, symbol)
  }
  return state
}

/**
 * Test whether an automaton accepts an input sequence.
 *
 * @param dfa - The automaton
 * @param input - Input symbols
 * @returns true if the walk from the start state ends in a final state
 *
 * @public
 */
export function accepts<St, Sy>(dfa: Dfa<St, Sy>, input: Iterable<Sy>): boolean {
  return includesBy(dfa.finals, walk(dfa.transition, dfa.start, input), dfa.order.state)
}
