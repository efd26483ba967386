import type { Comparator } from './types.js'
import type { Indexed } from './tagging.js'
import { FrontierHeap } from './frontier.js'

/*
 * Both engines keep one pull handle per source, indexed by source position, and look the handle up
 * through the emitted element's `index`. A handle is cleared once its source is exhausted, so the
 * handles still set at exit are exactly the ones that have to be returned.
 */

/*
 * Every open handle is returned even when an earlier `return()` fails; the first failure is rethrown
 * afterwards. When the merge is already unwinding from an error, that error wins and close failures
 * are dropped, the same way `for...of` treats a failing `return()`.
 */

function releasePulls<E>(pulls: (Iterator<E> | undefined)[], unwinding: boolean): void {
  let failure: { error: unknown } | undefined
  for (let i = pulls.length - 1; i >= 0; i -= 1) {
    const pull = pulls[i]
    pulls[i] = undefined
    try {
      pull?.return?.()
    } catch (error) {
      failure ??= { error }
    }
  }
  if (failure && !unwinding) throw failure.error
}

async function releasePullsAsync<E>(pulls: (AsyncIterator<E> | undefined)[], unwinding: boolean): Promise<void> {
  let failure: { error: unknown } | undefined
  for (let i = pulls.length - 1; i >= 0; i -= 1) {
    const pull = pulls[i]
    pulls[i] = undefined
    try {
      await pull?.return?.()
    } catch (error) {
      failure ??= { error }
    }
  }
  if (failure && !unwinding) throw failure.error
}

/**
 * Merge tagged sources whose elements carry their own position in `sources`.
 *
 * Nothing is pulled until the first `next()`. After that each source is pulled once up front and
 * then once per element it contributes, right after that element has been consumed.
 */
export function* mergeIndexed<E extends Indexed>(
  compare: Comparator<E>,
  sources: readonly (Iterable<E> | undefined)[],
): Generator<E, void, undefined> {
  const pulls: (Iterator<E> | undefined)[] = sources.map(() => undefined)
  let unwinding = false

  try {
    const initial: E[] = []
    for (let i = 0; i < sources.length; i += 1) {
      const source = sources[i]
      if (!source) continue

      const pull = source[Symbol.iterator]()
      pulls[i] = pull
      const first = pull.next()
      if (first.done) {
        pulls[i] = undefined
        continue
      }
      initial.push(first.value)
    }

    const frontier = new FrontierHeap(compare, initial)
    for (let min = frontier.pop(); min !== undefined; min = frontier.pop()) {
      yield min

      const pull = pulls[min.index]
      if (!pull) continue
      const next = pull.next()
      if (next.done) pulls[min.index] = undefined
      else frontier.push(next.value)
    }
  } catch (e) {
    unwinding = true
    throw e
  } finally {
    releasePulls(pulls, unwinding)
  }
}

/**
 * Async counterpart of {@link mergeIndexed}. Pulls are awaited one at a time.
 */
export async function* mergeIndexedAsync<E extends Indexed>(
  compare: Comparator<E>,
  sources: readonly (AsyncIterable<E> | undefined)[],
): AsyncGenerator<E, void, undefined> {
  const pulls: (AsyncIterator<E> | undefined)[] = sources.map(() => undefined)
  let unwinding = false

  try {
    const initial: E[] = []
    for (let i = 0; i < sources.length; i += 1) {
      const source = sources[i]
      if (!source) continue

      const pull = source[Symbol.asyncIterator]()
      pulls[i] = pull
      const first = await pull.next()
      if (first.done) {
        pulls[i] = undefined
        continue
      }
      initial.push(first.value)
    }

    const frontier = new FrontierHeap(compare, initial)
    for (let min = frontier.pop(); min !== undefined; min = frontier.pop()) {
      yield min

      const pull = pulls[min.index]
      if (!pull) continue
      const next = await pull.next()
      if (next.done) pulls[min.index] = undefined
      else frontier.push(next.value)
    }
  } catch (e) {
    unwinding = true
    throw e
  } finally {
    await releasePullsAsync(pulls, unwinding)
  }
}
