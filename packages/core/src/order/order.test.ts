import { describe, it, expect } from 'vitest'
import { naturalOrder, fromCompare, lexicographicOrder, primitiveOrder } from './order'
import { sortUnique, uniqueBy, differenceBy, intersectBy, sameSequence, includesBy } from './ordered-set'

describe('naturalOrder', () => {
  it('orders numbers numerically', () => {
    const ord = naturalOrder<number>()
    expect(ord.compare(2, 10)).toBe(-1)
    expect(ord.compare(10, 2)).toBe(1)
    expect(ord.compare(3, 3)).toBe(0)
  })

  it('orders strings by code unit', () => {
    const ord = naturalOrder<string>()
    expect(ord.compare('S10', 'S2')).toBe(-1)
    expect(ord.equals('a', 'a')).toBe(true)
  })
})

describe('fromCompare', () => {
  it('normalizes comparator results to -1, 0 or 1', () => {
    const byLength = fromCompare<string>((a, b) => a.length - b.length)
    expect(byLength.compare('abc', 'a')).toBe(1)
    expect(byLength.compare('a', 'abc')).toBe(-1)
    expect(byLength.equals('ab', 'cd')).toBe(true)
  })
})

describe('lexicographicOrder', () => {
  const ord = lexicographicOrder(naturalOrder<number>())

  it('compares element by element', () => {
    expect(ord.compare([1, 2], [1, 3])).toBe(-1)
    expect(ord.compare([2], [1, 9])).toBe(1)
  })

  it('puts a prefix first', () => {
    expect(ord.compare([], [0])).toBe(-1)
    expect(ord.compare([1, 2], [1])).toBe(1)
    expect(ord.equals([1, 2], [1, 2])).toBe(true)
  })
})

describe('primitiveOrder', () => {
  it('provides state and symbol orders', () => {
    const order = primitiveOrder<number, string>()
    expect(order.state.compare(1, 2)).toBe(-1)
    expect(order.symbol.compare('b', 'a')).toBe(1)
  })
})

describe('ordered-set helpers', () => {
  const ord = naturalOrder<number>()

  it('sortUnique sorts and removes duplicates', () => {
    expect(sortUnique([3, 1, 2, 3, 1], ord)).toEqual([1, 2, 3])
    expect(sortUnique([], ord)).toEqual([])
  })

  it('uniqueBy keeps first occurrences in input order', () => {
    expect(uniqueBy([3, 1, 3, 2, 1], ord)).toEqual([3, 1, 2])
  })

  it('differenceBy and intersectBy keep the order of the first list', () => {
    expect(differenceBy([5, 4, 3, 2], [4, 2], ord)).toEqual([5, 3])
    expect(intersectBy([5, 4, 3, 2], [2, 5], ord)).toEqual([5, 2])
  })

  it('includesBy uses the given equality', () => {
    const setOrd = lexicographicOrder(ord)
    expect(includesBy([[1, 2], [3]], [1, 2], setOrd)).toBe(true)
    expect(includesBy([[1, 2], [3]], [2], setOrd)).toBe(false)
  })

  it('sameSequence compares length and elements', () => {
    expect(sameSequence([1, 2], [1, 2], ord)).toBe(true)
    expect(sameSequence([1, 2], [2, 1], ord)).toBe(false)
    expect(sameSequence([1], [1, 1], ord)).toBe(false)
  })
})
