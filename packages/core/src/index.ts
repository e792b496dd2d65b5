/**
 * Deterministic Finite Automaton Library
 *
 * Generic DFAs over any state and symbol types: acceptance, reachability,
 * transition tables, canonical renaming and structural metrics.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Capability types
  Ordering,
  Eq,
  Ord,
  DfaOrder,
  // Automaton types
  TransitionFunction,
  TransitionTriple,
  TransitionRow,
  TransitionTable,
  DfaDefinition,
  TableDfaDefinition,
  ComputedDfa,
  TabulatedDfa,
  Dfa,
  CanonicalDfa,
  SentinelState,
  NumberedState,
  DeadSentinel,
  DfaOptions,
  MissingTransitionPolicy,
  FromTableOptions,
  FixpointOptions,
  // Analysis types
  NodesAndEdges,
  DfaExport,
  TableExport,
  // Error types
  DfaErrorCode,
  DfaIssueCode,
  DfaIssue,
} from './types'
export { DfaError, MalformedAutomatonError, IncompleteTransitionTableError, AutomatonLimitError } from './types'

// =============================================================================
// Capabilities
// =============================================================================

export { naturalOrder, fromCompare, lexicographicOrder, primitiveOrder, type Primitive } from './order'

// =============================================================================
// Validation
// =============================================================================

export { validateDefinition, validateTableDefinition, validateDfa, isValidDfa } from './validate'

// =============================================================================
// Automaton Operations
// =============================================================================

export { fixpoint, DEFAULT_MAX_CLOSURE_ITERATIONS } from './automaton'
export { createDfa, walk, accepts, complement } from './automaton'
export { destinationsFrom, transitionsFromTo, reachedStatesFrom, reachableStates } from './automaton'
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
} from './automaton'

// =============================================================================
// Canonical Form
// =============================================================================

export { rename, beautify, beautifyWithSentinel, sentinelOrder, DEAD_SENTINEL } from './canonical'
export { structurallyEqual, areIsomorphic } from './canonical'

// =============================================================================
// Structural Analysis
// =============================================================================

export { isDead, isSync, deadStates, syncStates, incomingArrowCount, outgoingArrowCount } from './analysis'
export { size, nodesAndEdges, nodesAndEdgesExcludingTrapStates, cyclomaticComplexity } from './analysis'
export { isEmpty, findWitness } from './analysis'

// =============================================================================
// Export
// =============================================================================

export { exportDfa, exportTable } from './export'
