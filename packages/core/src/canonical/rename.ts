/**
 * Canonical state renaming.
 * @packageDocumentation
 */

import type { CanonicalDfa, Eq, FixpointOptions, TabulatedDfa, TransitionTable, TransitionTriple } from '../types'
import { MalformedAutomatonError } from '../types'
import { fromTable, toTable } from '../automaton'
import { sortedVocabulary } from '../automaton/table'
import { includesBy, naturalOrder } from '../order'

/**
 * Rename the states of a DFA to consecutive integers in a way that depends
 * only on its reachable structure.
 *
 * The transition table is built from the start state; the start state gets
 * `initialId` and every other state gets the next integer the first time it
 * appears as a destination, reading the table row by row and each row in
 * sorted-vocabulary order. Two automata that differ only in the names of
 * their states therefore rename to the same automaton. This is the basis of
 * the equivalence test for minimized automata.
 *
 * Unreachable states are dropped. The vocabulary is sorted.
 *
 * @param dfa - The automaton to rename
 * @param initialId - Number given to the start state
 * @param options - Iteration bound for table building
 * @returns Automaton over the states `initialId, initialId + 1, ...`
 *
 * @public
 */
export function rename<St, Sy>(
  dfa: TabulatedDfa<St, Sy>,
  initialId: number,
  options?: FixpointOptions,
): CanonicalDfa<Sy> {
  const eq = dfa.order.state
  const vocabulary = sortedVocabulary(dfa)
  const table = toTable(dfa, options)
  const discovered = discoveryOrder(table, eq)

  const idOf = (state: St): number => {
    const index = discovered.findIndex((candidate) => eq.equals(candidate, state))
    if (index < 0) {
      // Only possible when the transition rule answers differently between calls
      throw new MalformedAutomatonError([
        { code: 'UNKNOWN_DESTINATION', message: `State ${String(state)} was not discovered from the start state` },
      ])
    }
    return initialId + index
  }

  const triples: TransitionTriple<number, Sy>[] = table.flatMap((row) =>
    row.destinations.map((destination, column) => ({
      origin: idOf(row.origin),
      symbol: vocabulary[column],
      destination: idOf(destination),
    })),
  )

  const finals = discovered
    .filter((state) => includesBy(dfa.finals, state, eq))
    .map(idOf)
    .sort((a, b) => a - b)

  return fromTable(
    {
      vocabulary,
      states: discovered.map((_, index) => initialId + index),
      start: initialId,
      finals,
      triples,
    },
    { state: naturalOrder<number>(), symbol: dfa.order.symbol },
  )
}

/**
 * Rename states to `1, 2, 3, ...`.
 *
 * @public
 */
export function beautify<St, Sy>(dfa: TabulatedDfa<St, Sy>, options?: FixpointOptions): CanonicalDfa<Sy> {
  return rename(dfa, 1, options)
}

/**
 * States in the order they are first seen: the first row's origin, then
 * each new destination reading rows left to right, top to bottom.
 */
function discoveryOrder<St>(table: TransitionTable<St>, eq: Eq<St>): St[] {
  const seen: St[] = []
  const see = (state: St): void => {
    if (!includesBy(seen, state, eq)) {
      seen.push(state)
    }
  }

  for (const row of table) {
    see(row.origin)
    row.destinations.forEach(see)
  }

  return seen
}
