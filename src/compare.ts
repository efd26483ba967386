import type { Comparator } from './types.js'

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0
}

/**
 * Numeric three-way comparison. NaN sorts before every number and equals itself.
 */
export function compareNumbers(a: number, b: number): number {
  const aNaN = Number.isNaN(a)
  const bNaN = Number.isNaN(b)
  if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? -1 : 1
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * String comparison by UTF-16 code units (not locale aware).
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function compareBy<T, K>(selector: (value: T) => K, compare: Comparator<K>): Comparator<T> {
  return (a, b) => sign(compare(selector(a), selector(b)))
}

export function reverseComparator<T>(compare: Comparator<T>): Comparator<T> {
  return (a, b) => sign(compare(b, a))
}
