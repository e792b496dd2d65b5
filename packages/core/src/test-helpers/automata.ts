/**
 * Small automata shared by the test suites.
 */

import type { ComputedDfa, TabulatedDfa } from '../types'
import { createDfa, tabulate } from '../automaton'
import { primitiveOrder } from '../order'

/**
 * Binary strings (most significant bit first) whose value is divisible by 3.
 * State `i` means "value read so far is congruent to i mod 3".
 */
export function divisibleByThree(): ComputedDfa<number, string> {
  return createDfa(
    {
      vocabulary: ['0', '1'],
      states: [0, 1, 2],
      start: 0,
      finals: [0],
      transition: (state, bit) => (2 * state + Number(bit)) % 3,
    },
    primitiveOrder<number, string>(),
  )
}

const IDENTITY_NAMES = { A: 'A', B: 'B', D: 'D', T: 'T' } as const

/**
 * Four states over `{a, b}` accepting `a+`:
 *
 * ```
 *   A --a--> B    A --b--> D
 *   B --a--> B    B --b--> T
 *   D --a--> T    D --b--> D
 *   T --a--> T    T --b--> T
 * ```
 *
 * `B` is final. `D` and `T` are dead; only `T` is a sync state.
 */
export function trapAutomaton(
  names: Readonly<Record<'A' | 'B' | 'D' | 'T', string>> = IDENTITY_NAMES,
): ComputedDfa<string, string> {
  const { A, B, D, T } = names
  const rows = new Map<string, Record<string, string>>([
    [A, { a: B, b: D }],
    [B, { a: B, b: T }],
    [D, { a: T, b: D }],
    [T, { a: T, b: T }],
  ])

  return createDfa(
    {
      vocabulary: ['a', 'b'],
      states: [A, B, D, T],
      start: A,
      finals: [B],
      transition: (state, symbol) => rows.get(state)?.[symbol] ?? T,
    },
    primitiveOrder<string, string>(),
  )
}

export function tabulatedTrapAutomaton(): TabulatedDfa<string, string> {
  return tabulate(trapAutomaton())
}

/** Every input over `alphabet` of length at most `maxLength`, shortest first. */
export function allInputs<Sy>(alphabet: readonly Sy[], maxLength: number): Sy[][] {
  const result: Sy[][] = [[]]
  let frontier: Sy[][] = [[]]
  for (let length = 1; length <= maxLength; length++) {
    frontier = frontier.flatMap((prefix) => alphabet.map((symbol) => [...prefix, symbol]))
    result.push(...frontier)
  }
  return result
}
