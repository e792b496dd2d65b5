/**
 * Renaming of automata whose states are sets of states.
 * @packageDocumentation
 */

import type { DeadSentinel, NumberedState, Ord, SentinelState, TabulatedDfa, TransitionTriple } from '../types'
import { MalformedAutomatonError } from '../types'
import { fromTable } from '../automaton'
import { sortUnique } from '../order'

/**
 * The state that stands for the empty state-set.
 *
 * @public
 */
export const DEAD_SENTINEL: DeadSentinel = { kind: 'dead' }

/**
 * Order on renamed states: numbered states by number, then the sentinel.
 *
 * @public
 */
export const sentinelOrder: Ord<SentinelState> = {
  equals: (a, b) => sentinelOrder.compare(a, b) === 0,
  compare: (a, b) => {
    if (a.kind === 'dead' || b.kind === 'dead') {
      return a.kind === b.kind ? 0 : a.kind === 'dead' ? 1 : -1
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
  },
}

/**
 * Rename an automaton whose states are sets of underlying states, such as
 * the output of a subset construction.
 *
 * Every non-empty state-set is numbered from 1 in the order of `states`.
 * The empty set is not numbered: it becomes {@link DEAD_SENTINEL}, listed
 * last among the states. The sentinel has no row in the resulting table;
 * its transition function sends it to itself on every symbol.
 *
 * @param dfa - Automaton over set-valued states (sets as sorted arrays)
 * @returns Automaton over numbered states and the dead sentinel
 * @throws MalformedAutomatonError if a transition reaches an undeclared non-empty set
 *
 * @public
 */
export function beautifyWithSentinel<St, Sy>(
  dfa: TabulatedDfa<readonly St[], Sy>,
): TabulatedDfa<SentinelState, Sy> {
  const eq = dfa.order.state
  const numbered = dfa.states.filter((set) => set.length > 0)

  const renamed = (set: readonly St[]): SentinelState => {
    if (set.length === 0) {
      return DEAD_SENTINEL
    }
    const index = numbered.findIndex((candidate) => eq.equals(candidate, set))
    if (index < 0) {
      throw new MalformedAutomatonError([
        { code: 'UNKNOWN_DESTINATION', message: `State set [${set.map(String).join(', ')}] is not declared` },
      ])
    }
    return numberedState(index + 1)
  }

  const triples: TransitionTriple<SentinelState, Sy>[] = numbered.flatMap((set, index) =>
    dfa.vocabulary.map((symbol) => ({
      origin: numberedState(index + 1),
      symbol,
      destination: renamed(dfa.transition(set, symbol)),
    })),
  )

  const order = { state: sentinelOrder, symbol: dfa.order.symbol }
  const table = fromTable(
    {
      vocabulary: dfa.vocabulary,
      states: [...numbered.map((_, index) => numberedState(index + 1)), DEAD_SENTINEL],
      start: renamed(dfa.start),
      finals: sortUnique(dfa.finals.map(renamed), sentinelOrder),
      triples,
    },
    order,
  )

  return {
    ...table,
    transition: (state, symbol) => (state.kind === 'dead' ? DEAD_SENTINEL : table.transition(state, symbol)),
  }
}

function numberedState(id: number): NumberedState {
  return { kind: 'state', id }
}
