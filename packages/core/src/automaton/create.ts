/**
 * Construction of rule-based automata.
 * @packageDocumentation
 */

import type { ComputedDfa, DfaDefinition, DfaOptions, DfaOrder } from '../types'
import { MalformedAutomatonError } from '../types'
import { validateDefinition } from '../validate'

/**
 * Create a DFA from a transition rule.
 *
 * By default the definition is validated eagerly: the start and final states
 * must be declared and every transition must stay inside `states`.
 *
 * @param definition - Vocabulary, states, start, finals and transition rule
 * @param order - Equality and ordering for states and symbols
 * @param options - Construction options
 * @returns The automaton
 * @throws MalformedAutomatonError if validation finds any issue
 *
 * @example
 * ```ts
 * const mod3 = createDfa(
 *   {
 *     vocabulary: ['0', '1'],
 *     states: [0, 1, 2],
 *     start: 0,
 *     finals: [0],
 *     transition: (state, bit) => (2 * state + Number(bit)) % 3,
 *   },
 *   primitiveOrder<number, string>(),
 * )
 * ```
 *
 * @public
 */
export function createDfa<St, Sy>(
  definition: DfaDefinition<St, Sy>,
  order: DfaOrder<St, Sy>,
  options: DfaOptions = {},
): ComputedDfa<St, Sy> {
  if (options.validate ?? true) {
    const issues = validateDefinition(definition, order)
    if (issues.length > 0) {
      throw new MalformedAutomatonError(issues)
    }
  }

  return {
    kind: 'computed',
    vocabulary: [...definition.vocabulary],
    states: [...definition.states],
    start: definition.start,
    finals: [...definition.finals],
    transition: definition.transition,
    order,
  }
}
