/**
 * Plain-data views of automata for drawing and persistence sinks.
 * @packageDocumentation
 */

import type { Dfa, DfaExport, FixpointOptions, TableExport } from '../types'
import { fullTripleRelation, toTable, tableStates } from '../automaton'
import { sortedVocabulary } from '../automaton/table'
import { includesBy } from '../order'

/**
 * Export a whole automaton as plain data.
 *
 * Every declared state appears, reachable or not, and the transition
 * relation is listed in full.
 *
 * @public
 */
export function exportDfa<St, Sy>(dfa: Dfa<St, Sy>): DfaExport<St, Sy> {
  return {
    vocabulary: [...dfa.vocabulary],
    states: [...dfa.states],
    start: dfa.start,
    finals: [...dfa.finals],
    triples: fullTripleRelation(dfa),
  }
}

/**
 * Export the reachable part of an automaton as a transition table.
 *
 * @param dfa - The automaton to export
 * @param options - Iteration bound for table building; defaults to `states.length + 1`
 *
 * @public
 */
export function exportTable<St, Sy>(dfa: Dfa<St, Sy>, options?: FixpointOptions): TableExport<St, Sy> {
  const rows = toTable(dfa, options)

  return {
    vocabulary: sortedVocabulary(dfa),
    start: dfa.start,
    finals: tableStates(rows).filter((state) => includesBy(dfa.finals, state, dfa.order.state)),
    rows,
  }
}
