import { describe, it, expect } from 'vitest'
import { fixpoint, DEFAULT_MAX_CLOSURE_ITERATIONS } from './fixpoint'
import { naturalOrder, sameSequence, sortUnique } from '../order'
import { AutomatonLimitError } from '../types'

const ord = naturalOrder<number>()
const sameNumbers = (a: readonly number[], b: readonly number[]): boolean => sameSequence(a, b, ord)

describe('fixpoint', () => {
  it('returns the seed when it is already stable', () => {
    const result = fixpoint((xs: readonly number[]) => xs, [1, 2], sameNumbers)
    expect(result).toEqual([1, 2])
  })

  it('grows a set until it stops changing', () => {
    // successors modulo 5 starting from 3
    const step = (xs: readonly number[]): readonly number[] =>
      sortUnique([...xs, ...xs.map((x) => (x + 1) % 5)], ord)

    expect(fixpoint(step, [3], sameNumbers)).toEqual([0, 1, 2, 3, 4])
  })

  it('counts step applications against the limit', () => {
    let calls = 0
    const step = (xs: readonly number[]): readonly number[] => {
      calls++
      return sortUnique([...xs, Math.min(xs.length, 3)], ord)
    }

    // [0] -> [0,1] -> [0,1,2] -> [0,1,2,3] -> stable
    expect(fixpoint(step, [0], sameNumbers, { maxIterations: 4 })).toEqual([0, 1, 2, 3])
    expect(calls).toBe(4)
  })

  it('throws AutomatonLimitError for unbounded growth', () => {
    const step = (xs: readonly number[]): readonly number[] => [...xs, xs.length]

    expect(() => fixpoint(step, [0], sameNumbers, { maxIterations: 10 })).toThrow(AutomatonLimitError)

    try {
      fixpoint(step, [0], sameNumbers, { maxIterations: 10 })
    } catch (error) {
      expect(error).toBeInstanceOf(AutomatonLimitError)
      if (error instanceof AutomatonLimitError) {
        expect(error.code).toBe('CLOSURE_LIMIT')
        expect(error.limit).toBe(10)
        expect(error.actual).toBe(11)
      }
    }
  })

  it('has a sensible default limit', () => {
    expect(DEFAULT_MAX_CLOSURE_ITERATIONS).toBe(10_000)
  })
})
