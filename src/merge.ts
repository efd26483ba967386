import type { AsyncSource, Comparator, Pair, PairComparator, Source } from './types.js'
import type { IndexedPair, IndexedValue } from './tagging.js'
import { mergeIndexed, mergeIndexedAsync } from './engine.js'
import {
  tagCompare,
  tagComparePairs,
  tagPairSource,
  tagPairSourceAsync,
  tagSource,
  tagSourceAsync,
} from './tagging.js'
import { assertComparator } from './util.js'

const EMPTY: Iterable<never> = Object.freeze([])

const EMPTY_ASYNC: AsyncIterable<never> = Object.freeze({
  async *[Symbol.asyncIterator](): AsyncGenerator<never, void, undefined> {},
})

function isPresent<S>(source: S | null | undefined): source is S {
  return source !== null && source !== undefined
}

function* unwrapValues<T>(merged: Iterable<IndexedValue<T>>): Generator<T, void, undefined> {
  for (const item of merged) yield item.value
}

function* unwrapPairs<K, V>(merged: Iterable<IndexedPair<K, V>>): Generator<[K, V], void, undefined> {
  for (const item of merged) yield [item.key, item.value]
}

async function* unwrapValuesAsync<T>(merged: AsyncIterable<IndexedValue<T>>): AsyncGenerator<T, void, undefined> {
  for await (const item of merged) yield item.value
}

async function* unwrapPairsAsync<K, V>(
  merged: AsyncIterable<IndexedPair<K, V>>,
): AsyncGenerator<[K, V], void, undefined> {
  for await (const item of merged) yield [item.key, item.value]
}

/**
 * Lazily merge sources that are each sorted by `compare` into one sorted sequence.
 *
 * The merge is stable: elements that compare equal come out in the order of the sources they
 * came from. `null` and `undefined` sources are treated as empty.
 *
 * Every iteration of the result starts a new merge and pulls from the sources on demand, holding
 * at most one pending element per source. Stopping early (`break`, `return`, a throw) closes
 * every source that is still open and pulls nothing further.
 *
 * Sources that are not sorted by `compare` produce every element exactly once, in an unspecified
 * order.
 *
 * @throws TypeError when `compare` is not a function
 */
export function merge<T>(compare: Comparator<T>, ...sources: Source<T>[]): Iterable<T> {
  assertComparator(compare, 'merge')
  if (!sources.some(isPresent)) return EMPTY

  const tagged = tagCompare(compare)
  return {
    [Symbol.iterator]: () => unwrapValues(
      mergeIndexed(tagged, sources.map((source, i) => isPresent(source) ? tagSource(i, source) : undefined)),
    ),
  }
}

/**
 * Key/value form of {@link merge}. `compare` receives both components of both elements.
 */
export function mergePairs<K, V>(
  compare: PairComparator<K, V>,
  ...sources: Source<Pair<K, V>>[]
): Iterable<[K, V]> {
  assertComparator(compare, 'mergePairs')
  if (!sources.some(isPresent)) return EMPTY

  const tagged = tagComparePairs(compare)
  return {
    [Symbol.iterator]: () => unwrapPairs(
      mergeIndexed(tagged, sources.map((source, i) => isPresent(source) ? tagPairSource(i, source) : undefined)),
    ),
  }
}

/**
 * {@link merge} over async (or sync) sources. Pulls are awaited one at a time, so at most one
 * source is being read at any moment.
 */
export function mergeAsync<T>(compare: Comparator<T>, ...sources: AsyncSource<T>[]): AsyncIterable<T> {
  assertComparator(compare, 'mergeAsync')
  if (!sources.some(isPresent)) return EMPTY_ASYNC

  const tagged = tagCompare(compare)
  return {
    [Symbol.asyncIterator]: () => unwrapValuesAsync(
      mergeIndexedAsync(tagged, sources.map((source, i) => isPresent(source) ? tagSourceAsync(i, source) : undefined)),
    ),
  }
}

export function mergePairsAsync<K, V>(
  compare: PairComparator<K, V>,
  ...sources: AsyncSource<Pair<K, V>>[]
): AsyncIterable<[K, V]> {
  assertComparator(compare, 'mergePairsAsync')
  if (!sources.some(isPresent)) return EMPTY_ASYNC

  const tagged = tagComparePairs(compare)
  return {
    [Symbol.asyncIterator]: () => unwrapPairsAsync(
      mergeIndexedAsync(
        tagged,
        sources.map((source, i) => isPresent(source) ? tagPairSourceAsync(i, source) : undefined),
      ),
    ),
  }
}
