/**
 * Conversion between transition rules and explicit transition tables.
 * @packageDocumentation
 */

import type {
  Dfa,
  DfaOptions,
  DfaOrder,
  Eq,
  FixpointOptions,
  FromTableOptions,
  MissingTransitionPolicy,
  Ordering,
  TableDfaDefinition,
  TabulatedDfa,
  TransitionFunction,
  TransitionRow,
  TransitionTable,
  TransitionTriple,
} from '../types'
import { IncompleteTransitionTableError, MalformedAutomatonError } from '../types'
import { differenceBy, uniqueBy } from '../order'
import { validateTableDefinition } from '../validate'
import { fixpoint } from './fixpoint'
import { closureBound, destinationsFrom } from './reachability'

/**
 * Default policy for table lookups that find no matching triple.
 *
 * @public
 */
export const DEFAULT_MISSING_TRANSITION_POLICY: MissingTransitionPolicy = 'throw'

// =============================================================================
// RULE -> TABLE
// =============================================================================

/**
 * Build the transition table of the part of an automaton reachable from its
 * start state.
 *
 * The table starts with the start state's row and grows, one round at a time,
 * by a row for every destination that has none yet, until no new destination
 * appears. Rows stay in discovery order and list one destination per symbol
 * of the sorted vocabulary.
 *
 * Only reachable states are visited, so this also works for automata whose
 * state type is unbounded as long as the reachable part is finite.
 *
 * @param dfa - The automaton
 * @param options - Iteration bound; defaults to `states.length + 1`
 * @returns Rows in discovery order
 * @throws AutomatonLimitError if discovery exceeds the iteration bound
 *
 * @public
 */
export function toTable<St, Sy>(dfa: Dfa<St, Sy>, options?: FixpointOptions): TransitionTable<St> {
  const eq = dfa.order.state
  const vocabulary = sortedVocabulary(dfa)

  const newRows = (origins: readonly St[]): TransitionRow<St>[] =>
    origins.map((origin) => ({ origin, destinations: destinationsFrom(dfa.transition, vocabulary, origin) }))

  const step = (table: TransitionTable<St>): TransitionTable<St> => {
    const pending = differenceBy(tableDestinationStates(table, eq), tableStates(table), eq)
    return pending.length === 0 ? table : [...table, ...newRows(pending)]
  }

  // Rows are only ever appended, so equal length means no growth.
  return fixpoint(step, newRows([dfa.start]), (a, b) => a.length === b.length, closureBound(dfa, options))
}

/**
 * The states that own a row, in row order.
 *
 * @public
 */
export function tableStates<St>(table: TransitionTable<St>): St[] {
  return table.map((row) => row.origin)
}

/**
 * Every state that appears as a destination, each once, in the order of first
 * appearance. Includes destinations that have no row yet while a table is
 * being built.
 *
 * @public
 */
export function tableDestinationStates<St>(table: TransitionTable<St>, eq: Eq<St>): St[] {
  return uniqueBy(
    table.flatMap((row) => row.destinations),
    eq,
  )
}

/**
 * The vocabulary in symbol order.
 *
 * @internal
 */
export function sortedVocabulary<St, Sy>(dfa: Dfa<St, Sy>): Sy[] {
  return [...dfa.vocabulary].sort((a, b) => dfa.order.symbol.compare(a, b))
}

// =============================================================================
// FULL ENUMERATION
// =============================================================================

/**
 * Enumerate the whole transition relation: every declared state on every
 * symbol, sorted by `(origin, symbol)`.
 *
 * Unlike {@link toTable} this does not follow reachability; it requires
 * `states` to be fully declared.
 *
 * @public
 */
export function fullTripleRelation<St, Sy>(dfa: Dfa<St, Sy>): TransitionTriple<St, Sy>[] {
  const triples = dfa.states.flatMap((origin) =>
    dfa.vocabulary.map((symbol) => ({ origin, symbol, destination: dfa.transition(origin, symbol) })),
  )
  return triples.sort(compareTriples(dfa.order))
}

/**
 * One row per declared state, sorted by state, with destinations in
 * vocabulary order.
 *
 * @public
 */
export function fullTransitionTable<St, Sy>(dfa: Dfa<St, Sy>): TransitionTable<St> {
  return [...dfa.states]
    .sort((a, b) => dfa.order.state.compare(a, b))
    .map((origin) => ({ origin, destinations: destinationsFrom(dfa.transition, dfa.vocabulary, origin) }))
}

/**
 * Comparator ordering triples by origin, then symbol.
 *
 * @public
 */
export function compareTriples<St, Sy>(
  order: DfaOrder<St, Sy>,
): (a: TransitionTriple<St, Sy>, b: TransitionTriple<St, Sy>) => Ordering {
  return (a, b) => {
    const byOrigin = order.state.compare(a.origin, b.origin)
    return byOrigin !== 0 ? byOrigin : order.symbol.compare(a.symbol, b.symbol)
  }
}

// =============================================================================
// TABLE -> RULE
// =============================================================================

/**
 * Reconstruct an automaton from its tuple form.
 *
 * The transition function scans `triples` in the order given and returns the
 * destination of the first triple matching `(state, symbol)`. When nothing
 * matches, `options.onMissingTransition` decides:
 *
 * - `'throw'` (default): throw `IncompleteTransitionTableError`.
 * - `'last-triple'`: return the destination of the last triple in the list.
 *   This reproduces older behaviour and silently hides gaps in the table;
 *   prefer completing the table.
 *
 * @param definition - Vocabulary, states, start, finals and triples
 * @param order - Equality and ordering for states and symbols
 * @param options - Validation and lookup policy
 * @returns A tabulated automaton
 * @throws MalformedAutomatonError if validation finds any issue
 *
 * @public
 */
export function fromTable<St, Sy>(
  definition: TableDfaDefinition<St, Sy>,
  order: DfaOrder<St, Sy>,
  options: FromTableOptions = {},
): TabulatedDfa<St, Sy> {
  if (options.validate ?? true) {
    const issues = validateTableDefinition(definition, order)
    if (issues.length > 0) {
      throw new MalformedAutomatonError(issues)
    }
  }

  const triples = [...definition.triples]
  const policy = options.onMissingTransition ?? DEFAULT_MISSING_TRANSITION_POLICY

  return {
    kind: 'tabulated',
    vocabulary: [...definition.vocabulary],
    states: [...definition.states],
    start: definition.start,
    finals: [...definition.finals],
    triples: [...triples].sort(compareTriples(order)),
    transition: lookupTransition(triples, order, policy),
    order,
  }
}

/**
 * Turn any automaton into the tabulated variant by enumerating its full
 * transition relation. A tabulated automaton is returned unchanged.
 *
 * @param dfa - The automaton; its `states` must be fully declared
 * @param options - Validation of the resulting table
 * @throws MalformedAutomatonError if a transition leaves the declared states
 *
 * @public
 */
export function tabulate<St, Sy>(dfa: Dfa<St, Sy>, options: DfaOptions = {}): TabulatedDfa<St, Sy> {
  if (dfa.kind === 'tabulated') {
    return dfa
  }

  return fromTable(
    {
      vocabulary: dfa.vocabulary,
      states: dfa.states,
      start: dfa.start,
      finals: dfa.finals,
      triples: fullTripleRelation(dfa),
    },
    dfa.order,
    options,
  )
}

function lookupTransition<St, Sy>(
  triples: readonly TransitionTriple<St, Sy>[],
  order: DfaOrder<St, Sy>,
  policy: MissingTransitionPolicy,
): TransitionFunction<St, Sy> {
  return (state, symbol) => {
    const match = triples.find(
      (triple) => order.state.equals(triple.origin, state) && order.symbol.equals(triple.symbol, symbol),
    )
    if (match) {
      return match.destination
    }

    const last = triples.at(-1)
    if (policy === 'last-triple' && last !== undefined) {
      return last.destination
    }

    throw new IncompleteTransitionTableError(state, symbol)
  }
}
