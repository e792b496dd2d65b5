/**
 * DFA complement operation.
 * @packageDocumentation
 */

import type { ComputedDfa, Dfa, TabulatedDfa } from '../types'
import { differenceBy } from '../order'

/**
 * Complement a DFA by swapping accepting and non-accepting states.
 *
 * The complemented automaton accepts exactly the inputs over its vocabulary
 * that the original rejects, and vice versa. Vocabulary, states, start state
 * and transitions are shared with the input; the input is not modified.
 *
 * @param dfa - The automaton to complement
 * @returns Complemented automaton of the same variant
 *
 * @public
 */
export function complement<St, Sy>(dfa: TabulatedDfa<St, Sy>): TabulatedDfa<St, Sy>
export function complement<St, Sy>(dfa: ComputedDfa<St, Sy>): ComputedDfa<St, Sy>
export function complement<St, Sy>(dfa: Dfa<St, Sy>): Dfa<St, Sy>
export function complement<St, Sy>(dfa: Dfa<St, Sy>): Dfa<St, Sy> {
  // New accepting states are the old non-accepting states, in state order
  const finals = differenceBy(dfa.states, dfa.finals, dfa.order.state)

  return { ...dfa, finals }
}
