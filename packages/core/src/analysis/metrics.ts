/**
 * Size and complexity metrics of automata.
 * @packageDocumentation
 */

import type { NodesAndEdges, TabulatedDfa } from '../types'
import { fullTripleRelation } from '../automaton'
import { differenceBy, includesBy, uniqueBy } from '../order'
import { deadStates, syncStates } from './states'

/**
 * The size of an automaton: its number of states.
 *
 * @public
 */
export function size<St, Sy>(dfa: TabulatedDfa<St, Sy>): number {
  return dfa.states.length
}

/**
 * Number of states and number of transitions over the full relation.
 *
 * @public
 */
export function nodesAndEdges<St, Sy>(dfa: TabulatedDfa<St, Sy>): NodesAndEdges {
  return { nodes: dfa.states.length, edges: fullTripleRelation(dfa).length }
}

/**
 * Number of states and transitions, leaving out dead and sync states and
 * every transition into one. Measures the part of the automaton that can
 * still lead to acceptance.
 *
 * @public
 */
export function nodesAndEdgesExcludingTrapStates<St, Sy>(dfa: TabulatedDfa<St, Sy>): NodesAndEdges {
  const eq = dfa.order.state
  const traps = uniqueBy([...syncStates(dfa), ...deadStates(dfa)], eq)

  const nodes = differenceBy(dfa.states, traps, eq)
  const edges = fullTripleRelation(dfa).filter((triple) => !includesBy(traps, triple.destination, eq))

  return { nodes: nodes.length, edges: edges.length }
}

/**
 * Cyclomatic complexity `E - N + 2P` of the trap-free transition graph,
 * taking the graph as one connected component (`P = 1`).
 *
 * @public
 */
export function cyclomaticComplexity<St, Sy>(dfa: TabulatedDfa<St, Sy>): number {
  const components = 1
  const { nodes, edges } = nodesAndEdgesExcludingTrapStates(dfa)
  return edges - nodes + 2 * components
}
