import { describe, it, expect } from 'vitest'
import { compareBy, compareNumbers, compareStrings, reverseComparator } from '../src/compare.js'

describe('compareNumbers', () => {
  it('returns -1, 0 or 1', () => {
    expect(compareNumbers(1, 2)).toBe(-1)
    expect(compareNumbers(2, 1)).toBe(1)
    expect(compareNumbers(-0, 0)).toBe(0)
    expect(compareNumbers(-Infinity, -1e308)).toBe(-1)
  })

  it('orders NaN before every number', () => {
    expect(compareNumbers(Number.NaN, -Infinity)).toBe(-1)
    expect(compareNumbers(0, Number.NaN)).toBe(1)
    expect(compareNumbers(Number.NaN, Number.NaN)).toBe(0)
    expect([3, Number.NaN, 1].sort(compareNumbers)).toEqual([Number.NaN, 1, 3])
  })
})

describe('compareStrings', () => {
  it('compares by code unit, not locale', () => {
    expect(compareStrings('B', 'a')).toBe(-1)
    expect(compareStrings('a', 'B')).toBe(1)
    expect(compareStrings('abc', 'abc')).toBe(0)
    expect(compareStrings('ab', 'abc')).toBe(-1)
  })
})

describe('compareBy', () => {
  it('compares selected keys and normalizes the sign', () => {
    const byLength = compareBy((s: string) => s.length, (a: number, b: number) => a - b)

    expect(byLength('aaaa', 'b')).toBe(1)
    expect(byLength('a', 'bbbb')).toBe(-1)
    expect(byLength('ab', 'cd')).toBe(0)
  })
})

describe('reverseComparator', () => {
  it('reverses the order', () => {
    const descending = reverseComparator(compareNumbers)

    expect(descending(1, 2)).toBe(1)
    expect(descending(2, 1)).toBe(-1)
    expect(descending(2, 2)).toBe(0)
    expect([1, 3, 2].sort(descending)).toEqual([3, 2, 1])
  })
})
