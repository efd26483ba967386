import type { Readable, Writable } from 'node:stream'

/** Three-way comparison: negative if a < b, zero if equal, positive if a > b */
export type Comparator<T> = (a: T, b: T) => number

/** Three-way comparison over two key/value elements */
export type PairComparator<K, V> = (k1: K, v1: V, k2: K, v2: V) => number

/** Sorted input sequence; null or undefined is an exhausted source */
export type Source<T> = Iterable<T> | null | undefined

/** Sorted input sequence for the async merge */
export type AsyncSource<T> = AsyncIterable<T> | Iterable<T> | null | undefined

/** Key/value element of a paired source */
export type Pair<K, V> = readonly [K, V]

/** Input source types */
export type InputSource = Readable | (() => Readable) | (() => Promise<Readable>)

/** Format types */
export type MergeFormat = 'ARROW_STREAM' | 'CSV' | 'JSON_ARRAY'

/** Parsed element of a JSON array input */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue }

/** Decoded row of an Arrow IPC input */
export type ArrowRow = Record<string, unknown>

/** Options types */
export type MergeOptions<Row> = {
  /** Input sources, each sorted by `compare` */
  inputs: InputSource[]
  /** Output writable stream */
  output: Writable
  /** Row ordering shared by all inputs */
  compare: Comparator<Row>
  /** Optional abort signal */
  signal?: AbortSignal
  /** Optional progress callback */
  onProgress?: (progress: MergeOptionsProgress) => void
  /** Progress callback interval in milliseconds (default: 1000, 0 = emit on every update) */
  progressIntervalMs?: number
}

export type ArrowMergeOptions = MergeOptions<ArrowRow> & {
  /** Rows per output record batch (default: 1024) */
  batchSize?: number
}

/** Progress callback parameter types */
export type MergeOptionsProgress = {
  /** Total number of inputs */
  totalInputs: number
  /** Total number of bytes read from all inputs so far */
  inputBytes: number
  /** Total number of bytes written to output so far */
  mergedBytes: number
  /** Total number of rows written to output so far */
  mergedRows: number
}

/** URL-based options types */
export type MergeUrlsOptions<Row> = Omit<MergeOptions<Row>, 'inputs'> & {
  urls: string[]
}

export type ArrowMergeUrlsOptions = Omit<ArrowMergeOptions, 'inputs'> & {
  urls: string[]
}
