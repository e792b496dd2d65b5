import { describe, it, expect } from 'vitest'
import {
  toTable,
  tableStates,
  tableDestinationStates,
  fullTripleRelation,
  fullTransitionTable,
  fromTable,
  tabulate,
  DEFAULT_MISSING_TRANSITION_POLICY,
} from './table'
import { accepts } from './accept'
import { createDfa } from './create'
import { naturalOrder, primitiveOrder } from '../order'
import { AutomatonLimitError, IncompleteTransitionTableError, MalformedAutomatonError } from '../types'
import type { TableDfaDefinition } from '../types'
import { allInputs, divisibleByThree, trapAutomaton } from '../test-helpers/automata'

const order = primitiveOrder<string, string>()

describe('toTable', () => {
  it('builds rows in discovery order', () => {
    const table = toTable(trapAutomaton())

    expect(table).toEqual([
      { origin: 'A', destinations: ['B', 'D'] },
      { origin: 'B', destinations: ['B', 'T'] },
      { origin: 'D', destinations: ['T', 'D'] },
      { origin: 'T', destinations: ['T', 'T'] },
    ])
  })

  it('uses the sorted vocabulary for columns', () => {
    const dfa = createDfa(
      {
        vocabulary: ['b', 'a'],
        states: ['p', 'q'],
        start: 'p',
        finals: [],
        transition: (state, symbol) => (symbol === 'a' ? 'q' : state),
      },
      order,
    )

    expect(toTable(dfa)).toEqual([
      { origin: 'p', destinations: ['q', 'p'] },
      { origin: 'q', destinations: ['q', 'q'] },
    ])
  })

  it('only visits states reachable from the start state', () => {
    const dfa = divisibleByThree()

    expect(toTable(dfa)).toEqual([
      { origin: 0, destinations: [0, 1] },
      { origin: 1, destinations: [2, 0] },
      { origin: 2, destinations: [1, 2] },
    ])

    const fromOne = createDfa({ ...dfa, start: 1, transition: (state) => (state === 0 ? 0 : 1) }, dfa.order)
    expect(tableStates(toTable(fromOne))).toEqual([1])
  })

  it('explores automata whose states are not declared up front', () => {
    const ring = createDfa(
      { vocabulary: ['step'], states: [0], start: 0, finals: [0], transition: (state) => (state + 1) % 4 },
      primitiveOrder<number, string>(),
      { validate: false },
    )

    expect(tableStates(toTable(ring, { maxIterations: 10 }))).toEqual([0, 1, 2, 3])
    expect(() => toTable(ring)).toThrow(AutomatonLimitError)
  })
})

describe('table helpers', () => {
  const table = toTable(trapAutomaton())

  it('tableStates lists row origins', () => {
    expect(tableStates(table)).toEqual(['A', 'B', 'D', 'T'])
  })

  it('tableDestinationStates lists distinct destinations in first-seen order', () => {
    expect(tableDestinationStates(table, naturalOrder<string>())).toEqual(['B', 'D', 'T'])
  })

  it('tableDestinationStates includes states without a row', () => {
    const partial = [{ origin: 'A', destinations: ['B', 'D'] }]
    expect(tableDestinationStates(partial, naturalOrder<string>())).toEqual(['B', 'D'])
  })
})

describe('fullTripleRelation', () => {
  it('enumerates every state and symbol, sorted by origin then symbol', () => {
    const dfa = createDfa({ ...trapAutomaton(), vocabulary: ['b', 'a'], states: ['T', 'A', 'D', 'B'] }, order)

    expect(fullTripleRelation(dfa)).toEqual([
      { origin: 'A', symbol: 'a', destination: 'B' },
      { origin: 'A', symbol: 'b', destination: 'D' },
      { origin: 'B', symbol: 'a', destination: 'B' },
      { origin: 'B', symbol: 'b', destination: 'T' },
      { origin: 'D', symbol: 'a', destination: 'T' },
      { origin: 'D', symbol: 'b', destination: 'D' },
      { origin: 'T', symbol: 'a', destination: 'T' },
      { origin: 'T', symbol: 'b', destination: 'T' },
    ])
  })

  it('includes unreachable states', () => {
    const dfa = createDfa(
      { vocabulary: ['a'], states: ['s', 'island'], start: 's', finals: [], transition: (state) => state },
      order,
    )

    expect(fullTripleRelation(dfa)).toEqual([
      { origin: 'island', symbol: 'a', destination: 'island' },
      { origin: 's', symbol: 'a', destination: 's' },
    ])
  })
})

describe('fullTransitionTable', () => {
  it('has one row per state, sorted by state, in vocabulary order', () => {
    const dfa = createDfa({ ...trapAutomaton(), vocabulary: ['b', 'a'], states: ['T', 'D', 'B', 'A'] }, order)

    expect(fullTransitionTable(dfa)).toEqual([
      { origin: 'A', destinations: ['D', 'B'] },
      { origin: 'B', destinations: ['T', 'B'] },
      { origin: 'D', destinations: ['D', 'T'] },
      { origin: 'T', destinations: ['T', 'T'] },
    ])
  })
})

describe('fromTable', () => {
  const gappy: TableDfaDefinition<string, string> = {
    vocabulary: ['a', 'b'],
    states: ['p', 'q'],
    start: 'p',
    finals: ['q'],
    triples: [
      { origin: 'p', symbol: 'a', destination: 'q' },
      { origin: 'p', symbol: 'b', destination: 'p' },
      { origin: 'q', symbol: 'a', destination: 'p' },
    ],
  }

  it('looks up transitions in the triples', () => {
    const dfa = fromTable(gappy, order)

    expect(dfa.kind).toBe('tabulated')
    expect(dfa.transition('p', 'a')).toBe('q')
    expect(dfa.transition('p', 'b')).toBe('p')
    expect(dfa.transition('q', 'a')).toBe('p')
  })

  it('throws IncompleteTransitionTableError for a missing pair by default', () => {
    const dfa = fromTable(gappy, order)

    expect(DEFAULT_MISSING_TRANSITION_POLICY).toBe('throw')
    expect(() => dfa.transition('q', 'b')).toThrow(IncompleteTransitionTableError)

    try {
      dfa.transition('q', 'b')
    } catch (error) {
      expect(error).toBeInstanceOf(IncompleteTransitionTableError)
      if (error instanceof IncompleteTransitionTableError) {
        expect(error.code).toBe('INCOMPLETE_TRANSITION_TABLE')
        expect(error.state).toBe('q')
        expect(error.symbol).toBe('b')
      }
    }
  })

  it("falls back to the last triple's destination under 'last-triple'", () => {
    const dfa = fromTable(gappy, order, { onMissingTransition: 'last-triple' })

    expect(dfa.transition('q', 'b')).toBe('p')
    expect(accepts(dfa, ['a', 'b', 'a'])).toBe(true)
  })

  it("still throws under 'last-triple' when there are no triples", () => {
    const dfa = fromTable({ ...gappy, triples: [] }, order, { onMissingTransition: 'last-triple' })

    expect(() => dfa.transition('p', 'a')).toThrow(IncompleteTransitionTableError)
  })

  it('stores the triples sorted by origin and symbol', () => {
    const dfa = fromTable({ ...gappy, triples: [...gappy.triples].reverse() }, order)

    expect(dfa.triples).toEqual(gappy.triples)
  })

  it('uses the first matching triple when validation is off', () => {
    const dfa = fromTable(
      {
        ...gappy,
        triples: [
          { origin: 'p', symbol: 'a', destination: 'p' },
          { origin: 'p', symbol: 'a', destination: 'q' },
        ],
      },
      order,
      { validate: false },
    )

    expect(dfa.transition('p', 'a')).toBe('p')
  })

  it('validates triples against the declarations', () => {
    const build = () =>
      fromTable(
        {
          ...gappy,
          triples: [
            { origin: 'p', symbol: 'a', destination: 'q' },
            { origin: 'p', symbol: 'a', destination: 'p' },
            { origin: 'r', symbol: 'c', destination: 'z' },
          ],
        },
        order,
      )

    expect(build).toThrow(MalformedAutomatonError)

    try {
      build()
    } catch (error) {
      if (error instanceof MalformedAutomatonError) {
        expect(error.issues.map((issue) => issue.code)).toEqual([
          'CONFLICTING_TRANSITION',
          'UNKNOWN_ORIGIN',
          'UNKNOWN_SYMBOL',
          'UNKNOWN_DESTINATION',
        ])
      }
    }
  })

  it('accepts the same inputs as the automaton its triples came from', () => {
    const original = divisibleByThree()
    const rebuilt = fromTable(
      {
        vocabulary: original.vocabulary,
        states: original.states,
        start: original.start,
        finals: original.finals,
        triples: fullTripleRelation(original),
      },
      original.order,
    )

    for (const input of allInputs(original.vocabulary, 6)) {
      expect(accepts(rebuilt, input), input.join('')).toBe(accepts(original, input))
    }
  })
})

describe('tabulate', () => {
  it('converts a computed automaton using its full relation', () => {
    const dfa = trapAutomaton()
    const tabulated = tabulate(dfa)

    expect(tabulated.kind).toBe('tabulated')
    expect(tabulated.triples).toEqual(fullTripleRelation(dfa))
    expect(tabulated.states).toEqual(dfa.states)
    expect(tabulated.transition('D', 'a')).toBe('T')
  })

  it('returns a tabulated automaton unchanged', () => {
    const tabulated = tabulate(trapAutomaton())
    expect(tabulate(tabulated)).toBe(tabulated)
  })

  it('rejects an automaton whose transitions leave its declared states', () => {
    const ring = createDfa(
      { vocabulary: ['step'], states: [0], start: 0, finals: [], transition: (state) => state + 1 },
      primitiveOrder<number, string>(),
      { validate: false },
    )

    expect(() => tabulate(ring)).toThrow(MalformedAutomatonError)
  })
})
