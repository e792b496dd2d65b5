/**
 * Automaton validation - checks the structural invariants of a DFA.
 * @packageDocumentation
 */

import type { Dfa, DfaDefinition, DfaIssue, DfaOrder, Ord, TableDfaDefinition } from '../types'
import { includesBy } from '../order'

interface Declarations<St, Sy> {
  readonly vocabulary: readonly Sy[]
  readonly states: readonly St[]
  readonly start: St
  readonly finals: readonly St[]
}

/**
 * Validate a DFA defined by a transition rule.
 *
 * Returns errors for:
 * - A start state or final state that is not declared
 * - Repeated states or symbols
 * - Transitions whose destination is not declared
 *
 * The transition rule is called once for every `(state, symbol)` pair.
 *
 * @param definition - The automaton to validate
 * @param order - Capabilities for its states and symbols
 * @returns Array of validation issues (empty if valid)
 *
 * @public
 */
export function validateDefinition<St, Sy>(
  definition: DfaDefinition<St, Sy>,
  order: DfaOrder<St, Sy>,
): readonly DfaIssue[] {
  const issues: DfaIssue[] = []

  validateDeclarations(definition, order, issues)

  for (const state of definition.states) {
    for (const symbol of definition.vocabulary) {
      const destination = definition.transition(state, symbol)
      if (!includesBy(definition.states, destination, order.state)) {
        issues.push({
          code: 'UNKNOWN_DESTINATION',
          message: `Transition from ${String(state)} on ${String(symbol)} leads to undeclared state ${String(destination)}`,
        })
      }
    }
  }

  return issues
}

/**
 * Validate the tuple form of a table-based DFA.
 *
 * Besides the declaration checks of {@link validateDefinition}, every triple
 * must use declared states and symbols, and no two triples may disagree on
 * the destination of the same `(origin, symbol)` pair. Missing pairs are not
 * reported here; they are the concern of the lookup policy.
 *
 * @param definition - The tuple to validate
 * @param order - Capabilities for its states and symbols
 * @returns Array of validation issues (empty if valid)
 *
 * @public
 */
export function validateTableDefinition<St, Sy>(
  definition: TableDfaDefinition<St, Sy>,
  order: DfaOrder<St, Sy>,
): readonly DfaIssue[] {
  const issues: DfaIssue[] = []

  validateDeclarations(definition, order, issues)

  definition.triples.forEach((triple, index) => {
    if (!includesBy(definition.states, triple.origin, order.state)) {
      issues.push({
        code: 'UNKNOWN_ORIGIN',
        message: `Triple ${index} starts at undeclared state ${String(triple.origin)}`,
      })
    }
    if (!includesBy(definition.vocabulary, triple.symbol, order.symbol)) {
      issues.push({
        code: 'UNKNOWN_SYMBOL',
        message: `Triple ${index} uses undeclared symbol ${String(triple.symbol)}`,
      })
    }
    if (!includesBy(definition.states, triple.destination, order.state)) {
      issues.push({
        code: 'UNKNOWN_DESTINATION',
        message: `Triple ${index} leads to undeclared state ${String(triple.destination)}`,
      })
    }

    const conflict = definition.triples
      .slice(0, index)
      .find(
        (earlier) =>
          order.state.equals(earlier.origin, triple.origin) &&
          order.symbol.equals(earlier.symbol, triple.symbol) &&
          !order.state.equals(earlier.destination, triple.destination),
      )
    if (conflict) {
      issues.push({
        code: 'CONFLICTING_TRANSITION',
        message: `Triple ${index} sends ${String(triple.origin)} on ${String(triple.symbol)} to ${String(triple.destination)}, an earlier triple to ${String(conflict.destination)}`,
      })
    }
  })

  return issues
}

/**
 * Validate an automaton value of either variant.
 *
 * Tabulated automata are checked through their triples, so their transition
 * function is never called.
 *
 * @public
 */
export function validateDfa<St, Sy>(dfa: Dfa<St, Sy>): readonly DfaIssue[] {
  return dfa.kind === 'tabulated' ? validateTableDefinition(dfa, dfa.order) : validateDefinition(dfa, dfa.order)
}

/**
 * Check if an automaton satisfies its structural invariants.
 *
 * @public
 */
export function isValidDfa<St, Sy>(dfa: Dfa<St, Sy>): boolean {
  return validateDfa(dfa).length === 0
}

function validateDeclarations<St, Sy>(
  declarations: Declarations<St, Sy>,
  order: DfaOrder<St, Sy>,
  issues: DfaIssue[],
): void {
  for (const state of findDuplicates(declarations.states, order.state)) {
    issues.push({ code: 'DUPLICATE_STATE', message: `State ${String(state)} is declared more than once` })
  }

  for (const symbol of findDuplicates(declarations.vocabulary, order.symbol)) {
    issues.push({ code: 'DUPLICATE_SYMBOL', message: `Symbol ${String(symbol)} is declared more than once` })
  }

  if (!includesBy(declarations.states, declarations.start, order.state)) {
    issues.push({ code: 'UNKNOWN_START', message: `Start state ${String(declarations.start)} is not declared` })
  }

  for (const final of declarations.finals) {
    if (!includesBy(declarations.states, final, order.state)) {
      issues.push({ code: 'UNKNOWN_FINAL', message: `Final state ${String(final)} is not declared` })
    }
  }
}

/**
 * Values that occur more than once, each reported once, in sorted order.
 */
function findDuplicates<A>(values: readonly A[], ord: Ord<A>): A[] {
  const sorted = [...values].sort((a, b) => ord.compare(a, b))
  const duplicates: A[] = []

  for (let i = 1; i < sorted.length; i++) {
    const repeated = ord.equals(sorted[i - 1], sorted[i])
    const alreadyReported = duplicates.length > 0 && ord.equals(duplicates[duplicates.length - 1], sorted[i])
    if (repeated && !alreadyReported) {
      duplicates.push(sorted[i])
    }
  }

  return duplicates
}
