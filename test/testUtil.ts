import { Readable } from 'node:stream'

export async function collectToString(stream: AsyncIterable<Buffer | string>): Promise<string> {
  return (await collectToBuffer(stream)).toString('utf8')
}

export async function collectToBuffer(stream: AsyncIterable<Buffer | string>): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks)
}

/** Readable emitting `parts` as separate Buffer chunks */
export function readableOf(...parts: (string | Uint8Array)[]): Readable {
  return Readable.from(parts.map((part) => (typeof part === 'string' ? Buffer.from(part, 'utf8') : Buffer.from(part))))
}

export async function collectAsync<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = []
  for await (const value of source) out.push(value)
  return out
}

export function take<T>(source: Iterable<T>, count: number): T[] {
  const out: T[] = []
  if (count <= 0) return out
  for (const value of source) {
    out.push(value)
    if (out.length >= count) break
  }
  return out
}

export type PullLog = {
  /** Number of next() calls made on the source's iterators */
  pulls: number
  /** Number of return() calls made on the source's iterators */
  returns: number
}

/**
 * Array-backed source that records how the merge pulls from it.
 * With `closeError`, every return() call is recorded and then throws that error.
 */
export function trackedSource<T>(values: readonly T[], closeError?: Error): { source: Iterable<T>; log: PullLog } {
  const log: PullLog = { pulls: 0, returns: 0 }
  const source: Iterable<T> = {
    [Symbol.iterator]() {
      let position = 0
      return {
        next(): IteratorResult<T, undefined> {
          log.pulls += 1
          const value = values[position]
          if (position >= values.length || value === undefined) return { done: true, value: undefined }
          position += 1
          return { done: false, value }
        },
        return(): IteratorResult<T, undefined> {
          log.returns += 1
          if (closeError) throw closeError
          return { done: true, value: undefined }
        },
      }
    },
  }
  return { source, log }
}

/** Async view of {@link trackedSource}; every pull resolves on a later microtask */
export function trackedAsyncSource<T>(
  values: readonly T[],
  closeError?: Error,
): { source: AsyncIterable<T>; log: PullLog } {
  const tracked = trackedSource(values, closeError)
  const source: AsyncIterable<T> = {
    [Symbol.asyncIterator]() {
      const it = tracked.source[Symbol.iterator]()
      return {
        async next(): Promise<IteratorResult<T, undefined>> {
          return it.next()
        },
        async return(): Promise<IteratorResult<T, undefined>> {
          return it.return?.() ?? { done: true, value: undefined }
        },
      }
    },
  }
  return { source, log: tracked.log }
}
