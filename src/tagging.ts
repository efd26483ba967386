import type { Comparator, Pair, PairComparator } from './types.js'

/** Element carried through the merge together with the position of its source */
export interface Indexed {
  readonly index: number
}

export interface IndexedValue<T> extends Indexed {
  readonly value: T
}

export interface IndexedPair<K, V> extends Indexed {
  readonly key: K
  readonly value: V
}

export function* tagSource<T>(index: number, source: Iterable<T>): Generator<IndexedValue<T>, void, undefined> {
  for (const value of source) {
    yield { index, value }
  }
}

export function* tagPairSource<K, V>(
  index: number,
  source: Iterable<Pair<K, V>>,
): Generator<IndexedPair<K, V>, void, undefined> {
  for (const [key, value] of source) {
    yield { index, key, value }
  }
}

export async function* tagSourceAsync<T>(
  index: number,
  source: AsyncIterable<T> | Iterable<T>,
): AsyncGenerator<IndexedValue<T>, void, undefined> {
  if (Symbol.asyncIterator in source) {
    for await (const value of source) yield { index, value }
  } else {
    for (const value of source) yield { index, value }
  }
}

export async function* tagPairSourceAsync<K, V>(
  index: number,
  source: AsyncIterable<Pair<K, V>> | Iterable<Pair<K, V>>,
): AsyncGenerator<IndexedPair<K, V>, void, undefined> {
  if (Symbol.asyncIterator in source) {
    for await (const [key, value] of source) yield { index, key, value }
  } else {
    for (const [key, value] of source) yield { index, key, value }
  }
}

/**
 * Compare tagged values by value only; the source index is left to the frontier's tie-break.
 */
export function tagCompare<T>(compare: Comparator<T>): Comparator<IndexedValue<T>> {
  return (a, b) => compare(a.value, b.value)
}

export function tagComparePairs<K, V>(compare: PairComparator<K, V>): Comparator<IndexedPair<K, V>> {
  return (a, b) => compare(a.key, a.value, b.key, b.value)
}
