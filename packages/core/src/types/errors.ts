/**
 * Error codes for automaton failures.
 * @public
 */
export type DfaErrorCode =
  | 'MALFORMED_AUTOMATON' // Construction found one or more DfaIssues
  | 'INCOMPLETE_TRANSITION_TABLE' // No triple for a (state, symbol) lookup
  | 'CLOSURE_LIMIT' // Fixpoint iteration exceeded its bound

/**
 * Codes for individual validation findings.
 * @public
 */
export type DfaIssueCode =
  | 'UNKNOWN_START' // start not in states
  | 'UNKNOWN_FINAL' // final state not in states
  | 'DUPLICATE_STATE' // state listed twice
  | 'DUPLICATE_SYMBOL' // symbol listed twice in the vocabulary
  | 'UNKNOWN_DESTINATION' // transition leaves the state set
  | 'UNKNOWN_ORIGIN' // triple origin not in states
  | 'UNKNOWN_SYMBOL' // triple symbol not in the vocabulary
  | 'CONFLICTING_TRANSITION' // two triples for one (origin, symbol)

/**
 * A validation finding.
 * @public
 */
export interface DfaIssue {
  /** Issue classification code */
  readonly code: DfaIssueCode

  /** Human-readable description */
  readonly message: string
}

/**
 * Base class of every error thrown by this library.
 * @public
 */
export class DfaError extends Error {
  /** Error classification code */
  readonly code: DfaErrorCode

  constructor(code: DfaErrorCode, message: string) {
    super(message)
    this.name = 'DfaError'
    this.code = code
  }
}

/**
 * Thrown when an automaton breaks its structural invariants:
 * the start or a final state is undeclared, or a transition leaves the state set.
 *
 * @public
 */
export class MalformedAutomatonError extends DfaError {
  /** Every issue found, in discovery order */
  readonly issues: readonly DfaIssue[]

  constructor(issues: readonly DfaIssue[]) {
    const summary = issues.map((issue) => issue.message).join('; ')
    super('MALFORMED_AUTOMATON', `Malformed automaton: ${summary}`)
    this.name = 'MalformedAutomatonError'
    this.issues = issues
  }
}

/**
 * Thrown by a table-backed transition function when no triple matches the
 * requested `(state, symbol)` pair.
 *
 * Recoverable: rebuild the automaton with `onMissingTransition: 'last-triple'`
 * or complete the table.
 *
 * @public
 */
export class IncompleteTransitionTableError extends DfaError {
  /** State that was looked up */
  readonly state: unknown

  /** Symbol that was looked up */
  readonly symbol: unknown

  constructor(state: unknown, symbol: unknown) {
    super('INCOMPLETE_TRANSITION_TABLE', `No transition for state ${String(state)} on symbol ${String(symbol)}`)
    this.name = 'IncompleteTransitionTableError'
    this.state = state
    this.symbol = symbol
  }
}

/**
 * Thrown when a closure computation exceeds its iteration bound.
 *
 * This only happens when the state type can generate unboundedly many values
 * (for example set-valued states that keep growing) or when the bound passed
 * in is smaller than the number of reachable states.
 *
 * @public
 */
export class AutomatonLimitError extends DfaError {
  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(message: string, limit: number, actual: number) {
    super('CLOSURE_LIMIT', message)
    this.name = 'AutomatonLimitError'
    this.limit = limit
    this.actual = actual
  }
}
