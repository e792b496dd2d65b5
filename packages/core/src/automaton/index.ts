/**
 * Core automaton operations: construction, acceptance, reachability and
 * table conversion.
 * @packageDocumentation
 */

export { fixpoint, DEFAULT_MAX_CLOSURE_ITERATIONS } from './fixpoint'
export { createDfa } from './create'
export { walk, accepts } from './accept'
export { destinationsFrom, transitionsFromTo, reachedStatesFrom, reachableStates } from './reachability'
export {
  toTable,
  tableStates,
  tableDestinationStates,
  fullTripleRelation,
  fullTransitionTable,
  compareTriples,
  fromTable,
  tabulate,
  DEFAULT_MISSING_TRANSITION_POLICY,
} from './table'
export { complement } from './complement'
