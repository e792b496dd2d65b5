import type { DfaOrder } from './order'

// =============================================================================
// TRANSITIONS
// =============================================================================

/**
 * A total transition rule: one destination for every `(state, symbol)` pair.
 * @public
 */
export type TransitionFunction<St, Sy> = (state: St, symbol: Sy) => St

/**
 * One entry of the explicit transition relation.
 * @public
 */
export interface TransitionTriple<St, Sy> {
  readonly origin: St
  readonly symbol: Sy
  readonly destination: St
}

/**
 * A row of a transition table: the destinations of `origin`, one per
 * vocabulary symbol, in vocabulary order.
 * @public
 */
export interface TransitionRow<St> {
  readonly origin: St
  readonly destinations: readonly St[]
}

/**
 * An explicit transition table.
 *
 * Built incrementally by discovery from the start state, so row order is
 * discovery order rather than state order.
 *
 * @public
 */
export type TransitionTable<St> = readonly TransitionRow<St>[]

// =============================================================================
// AUTOMATA
// =============================================================================

/**
 * The five-tuple that defines a DFA with a callable transition rule.
 * @public
 */
export interface DfaDefinition<St, Sy> {
  /** Input alphabet, in the caller's order */
  readonly vocabulary: readonly Sy[]

  /** Finite set of states */
  readonly states: readonly St[]

  /** Start state */
  readonly start: St

  /** Accepting states */
  readonly finals: readonly St[]

  /** Total, closed transition rule */
  readonly transition: TransitionFunction<St, Sy>
}

/**
 * The tuple form accepted by {@link fromTable}: the transition rule given as
 * a list of triples.
 * @public
 */
export interface TableDfaDefinition<St, Sy> {
  readonly vocabulary: readonly Sy[]
  readonly states: readonly St[]
  readonly start: St
  readonly finals: readonly St[]
  readonly triples: readonly TransitionTriple<St, Sy>[]
}

interface DfaShape<St, Sy> extends DfaDefinition<St, Sy> {
  /** Equality and ordering for states and symbols */
  readonly order: DfaOrder<St, Sy>
}

/**
 * A DFA whose transition rule is an opaque function.
 *
 * The state type may be unbounded; only the states reachable from `start`
 * need to form a finite set for table building to terminate.
 *
 * @public
 */
export interface ComputedDfa<St, Sy> extends DfaShape<St, Sy> {
  readonly kind: 'computed'
}

/**
 * A DFA backed by an explicit transition relation.
 *
 * Operations that enumerate the whole automaton (structural metrics,
 * canonical renaming) require this variant.
 *
 * @public
 */
export interface TabulatedDfa<St, Sy> extends DfaShape<St, Sy> {
  readonly kind: 'tabulated'

  /** Transition relation, sorted by `(origin, symbol)` */
  readonly triples: readonly TransitionTriple<St, Sy>[]
}

/**
 * Either automaton variant.
 * @public
 */
export type Dfa<St, Sy> = ComputedDfa<St, Sy> | TabulatedDfa<St, Sy>

/**
 * A canonically renamed automaton: states are contiguous integers.
 * @public
 */
export type CanonicalDfa<Sy> = TabulatedDfa<number, Sy>

/**
 * State of an automaton renamed from set-valued states.
 *
 * Non-empty sets become numbered states; the empty set becomes the dead
 * sentinel, which never receives a number.
 *
 * @public
 */
export type SentinelState = NumberedState | DeadSentinel

/**
 * @public
 */
export interface NumberedState {
  readonly kind: 'state'
  readonly id: number
}

/**
 * @public
 */
export interface DeadSentinel {
  readonly kind: 'dead'
}

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Options for building an automaton from a transition rule.
 * @public
 */
export interface DfaOptions {
  /**
   * Check the structural invariants on construction and throw
   * `MalformedAutomatonError` if any fail. Disable for automata whose
   * `states` list is not fully enumerated.
   * @defaultValue true
   */
  validate?: boolean
}

/**
 * What a table-backed transition function does when no triple matches.
 *
 * - `'throw'`: raise `IncompleteTransitionTableError`.
 * - `'last-triple'`: return the destination of the last triple in the list.
 *
 * @public
 */
export type MissingTransitionPolicy = 'throw' | 'last-triple'

/**
 * Options for {@link fromTable}.
 * @public
 */
export interface FromTableOptions extends DfaOptions {
  /** @defaultValue 'throw' */
  onMissingTransition?: MissingTransitionPolicy
}

/**
 * Options for fixpoint-based computations.
 * @public
 */
export interface FixpointOptions {
  /**
   * Maximum number of step applications before giving up.
   * Callers that know the state set pass `states.length + 1`.
   * @defaultValue 10000
   */
  maxIterations?: number
}
