/**
 * Automaton emptiness checking and witness finding.
 * @packageDocumentation
 */

import type { Dfa, FixpointOptions } from '../types'
import { includesBy } from '../order'
import { closureBound } from '../automaton/reachability'
import { isDead } from './states'

/**
 * Check if an automaton's language is empty.
 *
 * Uses reachability analysis from the start state to any final state.
 *
 * @param dfa - The automaton to check
 * @param options - Iteration bound; defaults to `states.length + 1`
 * @returns true if the automaton accepts no input
 *
 * @public
 */
export function isEmpty<St, Sy>(dfa: Dfa<St, Sy>, options?: FixpointOptions): boolean {
  return isDead(dfa.transition, dfa.vocabulary, dfa.finals, dfa.start, dfa.order.state, closureBound(dfa, options))
}

/**
 * Find a shortest input accepted by the automaton.
 *
 * Breadth-first search from the start state, trying symbols in vocabulary
 * order, so among inputs of the shortest length the first in that order wins.
 *
 * @param dfa - The automaton to find a witness for
 * @returns An accepted input, or undefined if the language is empty
 *
 * @public
 */
export function findWitness<St, Sy>(dfa: Dfa<St, Sy>): Sy[] | undefined {
  interface SearchState {
    state: St
    input: Sy[]
  }

  const eq = dfa.order.state
  const visited: St[] = [dfa.start]
  const queue: SearchState[] = [{ state: dfa.start, input: [] }]

  for (let head = 0; head < queue.length; head++) {
    const { state, input } = queue[head]

    if (includesBy(dfa.finals, state, eq)) {
      return input
    }

    for (const symbol of dfa.vocabulary) {
      const next = dfa.transition(state, symbol)
      if (!includesBy(visited, next, eq)) {
        visited.push(next)
        queue.push({ state: next, input: [...input, symbol] })
      }
    }
  }

  return undefined // No final state is reachable
}
