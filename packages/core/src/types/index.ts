/**
 * Type definitions for automata, capabilities and errors.
 * @packageDocumentation
 */

// Capability types
export type { Ordering, Eq, Ord, DfaOrder } from './order'

// Automaton types
export type {
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
} from './automaton'

// Analysis types
export type { NodesAndEdges, DfaExport, TableExport } from './analysis'

// Error types
export type { DfaErrorCode, DfaIssueCode, DfaIssue } from './errors'
export { DfaError, MalformedAutomatonError, IncompleteTransitionTableError, AutomatonLimitError } from './errors'
