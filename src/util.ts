import type { Writable } from 'node:stream'
import type { InputSource, MergeOptions, MergeOptionsProgress } from './types.js'
import { once } from 'node:events'
import { pipeline, Readable, Transform } from 'node:stream'
import { ReadableStream } from 'node:stream/web'

const PACKAGE_LABEL = '[sorted-merge-streams]'

export function assertNonEmptyArray<T>(inputs: T[], label: string): asserts inputs is [T, ...T[]] {
  if (!Array.isArray(inputs) || inputs.length === 0)
    throw new Error(`[${label}] inputs must be a non-empty array`)
}

export function assertComparator(compare: unknown, label: string): void {
  if (typeof compare !== 'function')
    throw new TypeError(`[${label}] comparator must be a function`)
}

export function throwIfAborted(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) throw new Error(`[${label}] Aborted`)
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value)
}

function toNodeReadable(body: unknown, label: string): Readable {
  if (!body)
    throw new Error(`${label} fetch response body is empty`)

  if (body instanceof Readable) return body
  if (body instanceof ReadableStream) return Readable.fromWeb(body)

  throw new Error(`${label} Unsupported fetch response body`)
}

export async function openUrlAsReadable(
  url: string,
  signal?: AbortSignal,
  label = PACKAGE_LABEL,
): Promise<Readable> {
  if (!isHttpUrl(url)) {
    throw new Error(`${label} Expected http(s) URL but got: ${url}`)
  }

  if (typeof fetch !== 'function') {
    throw new Error(`${label} fetch is not available`)
  }

  const res = await fetch(url, { method: 'GET', redirect: 'follow', signal })
  if (!res.ok) throw new Error(`${label} Failed to fetch '${url}': ${res.status} ${res.statusText}`)

  const body = toNodeReadable(res.body, label)

  // Sources are pulled on demand; keep the body paused until the merge reads from it.
  body.pause()

  return body
}

export async function writeToWritable(output: Writable, chunk: string | Buffer): Promise<void> {
  if (output.destroyed) throw new Error(`${PACKAGE_LABEL} output is destroyed`)
  const ok = output.write(chunk)
  if (!ok) await once(output, 'drain')
}

export async function endWritable(output: Writable): Promise<void> {
  if (output.writableEnded || output.writableFinished) return

  const done = Promise.race([
    once(output, 'finish'),
    once(output, 'close'),
    once(output, 'error').then(([e]) => {
      throw e
    }),
  ])
  output.end()
  await done
}

export async function* readUtf8Lines(src: Readable): AsyncGenerator<string, void, undefined> {
  src.setEncoding('utf8')

  let carry = ''
  for await (const chunk of src) {
    carry += String(chunk)

    while (true) {
      const lf = carry.indexOf('\n')
      if (lf === -1) break

      let line = carry.slice(0, lf)
      if (line.endsWith('\r')) line = line.slice(0, -1)
      yield line
      carry = carry.slice(lf + 1)
    }
  }

  if (carry.length > 0) {
    if (carry.endsWith('\r')) carry = carry.slice(0, -1)
    yield carry
  }
}

/**
 * Normalize input sources to readable streams.
 * Supports: Readable, sync factory, async factory
 */
export async function resolveInputStream(source: InputSource): Promise<Readable> {
  if (source instanceof Readable) {
    return source
  }
  if (typeof source === 'function') {
    return await source()
  }
  throw new Error(`${PACKAGE_LABEL} Invalid input source`)
}

/** Pass-through stream that reports the size of every chunk it forwards */
export function createByteCounter(onBytes: (n: number) => void): Transform {
  return new Transform({
    transform(chunk: Buffer | string, _encoding, callback) {
      onBytes(typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.length)
      callback(null, chunk)
    },
  })
}

/**
 * Pipe `src` through a byte counter. Destroying the returned stream (for example when the merge
 * stops pulling from it) also destroys `src`, and errors on `src` surface on the returned stream.
 */
export function countBytes(src: Readable, onBytes: (n: number) => void): Readable {
  // Failures reach the reader of the returned stream, which pipeline destroys with the error.
  return pipeline(src, createByteCounter(onBytes), () => {})
}

type ProgressOptions = Pick<MergeOptions<unknown>, 'inputs' | 'onProgress' | 'progressIntervalMs'>

/**
 * Accumulates byte and row counts and reports them through `onProgress`, at most once per
 * `progressIntervalMs` (every update when 0). `flush` always reports.
 */
export class ProgressTracker {
  private readonly progress: MergeOptionsProgress
  private readonly onProgress: ((progress: MergeOptionsProgress) => void) | undefined
  private readonly intervalMs: number
  private lastEmitAt: number

  constructor(options: ProgressOptions) {
    this.progress = {
      totalInputs: options.inputs.length,
      inputBytes: 0,
      mergedBytes: 0,
      mergedRows: 0,
    }
    this.onProgress = options.onProgress
    this.intervalMs = Math.max(0, options.progressIntervalMs ?? 1000)
    this.lastEmitAt = Date.now()
  }

  public addBytes(inputBytes: number, mergedBytes: number): void {
    this.progress.inputBytes += inputBytes
    this.progress.mergedBytes += mergedBytes
    this.maybeEmit()
  }

  public addRow(): void {
    this.progress.mergedRows += 1
    this.maybeEmit()
  }

  public snapshot(): MergeOptionsProgress {
    return { ...this.progress }
  }

  public flush(): void {
    this.emit(Date.now())
  }

  private maybeEmit(): void {
    if (!this.onProgress) return
    const now = Date.now()
    if (this.intervalMs === 0 || now - this.lastEmitAt >= this.intervalMs) this.emit(now)
  }

  private emit(now: number): void {
    this.lastEmitAt = now
    this.onProgress?.(this.snapshot())
  }
}
