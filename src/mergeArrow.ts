import type { Builder, Schema } from 'apache-arrow'
import type { ArrowMergeOptions, ArrowRow, InputSource } from './types.js'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import { makeBuilder, makeData, RecordBatch, RecordBatchReader, RecordBatchStreamWriter, Struct } from 'apache-arrow'
import { mergeAsync } from './merge.js'
import {
  assertComparator,
  assertNonEmptyArray,
  countBytes,
  createByteCounter,
  ProgressTracker,
  resolveInputStream,
  throwIfAborted,
} from './util.js'

const DEFAULT_BATCH_SIZE = 1024

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

function fieldNames(schema: Schema): string {
  return schema.fields.map((field) => field.name).join(',')
}

/**
 * Encode rows as one record batch with the given schema.
 */
export function rowsToRecordBatch(schema: Schema, rows: readonly ArrowRow[]): RecordBatch {
  const children = schema.fields.map((field) => {
    const builder: Builder = makeBuilder({ type: field.type, nullValues: [null, undefined] })
    for (const row of rows) builder.append(row[field.name])
    return builder.finish().flush()
  })

  return new RecordBatch(
    schema,
    makeData({ type: new Struct(schema.fields), length: rows.length, nullCount: 0, children }),
  )
}

/**
 * Merge multiple sorted Apache Arrow IPC streams into one sorted IPC stream.
 *
 * - Decodes each input batch by batch and merges its rows with `compare`
 * - Re-encodes the merged rows into record batches of `batchSize` rows
 * - Output schema is the first input's schema; every input must have the same field names
 * - Rows that compare equal keep input order
 */
export async function mergeArrow(options: ArrowMergeOptions): Promise<void> {
  const { inputs, output, compare, signal } = options
  assertNonEmptyArray(inputs, 'mergeArrow')
  assertComparator(compare, 'mergeArrow')

  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
  if (!Number.isInteger(batchSize) || batchSize < 1)
    throw new Error(`[mergeArrow] batchSize must be a positive integer, got ${batchSize}`)

  const tracker = new ProgressTracker(options)
  let schema: Schema | undefined

  async function* rows(input: InputSource, index: number): AsyncGenerator<ArrowRow, void, undefined> {
    throwIfAborted(signal, 'mergeArrow')
    const src = await resolveInputStream(input)
    const reader = await RecordBatchReader.from(countBytes(src, (n) => tracker.addBytes(n, 0)))
    await reader.open()

    const inputSchema: Schema | null = reader.schema ?? null
    if (!inputSchema) return
    if (!schema) schema = inputSchema
    else if (fieldNames(schema) !== fieldNames(inputSchema))
      throw new Error(`[mergeArrow] Schema mismatch in input ${index}: expected [${fieldNames(schema)}] but got [${fieldNames(inputSchema)}]`)

    for await (const batch of reader) {
      for (let i = 0; i < batch.numRows; i += 1) {
        const row = batch.get(i)
        if (row) yield row.toJSON()
      }
    }
  }

  // Aborted with the pipeline's error once the output side fails.
  const outputFailed = new AbortController()

  async function* batches(): AsyncGenerator<RecordBatch, void, undefined> {
    let pending: ArrowRow[] = []
    let written = 0

    for await (const row of mergeAsync(compare, ...inputs.map(rows))) {
      throwIfAborted(signal, 'mergeArrow')
      outputFailed.signal.throwIfAborted()
      pending.push(row)
      tracker.addRow()

      if (schema && pending.length >= batchSize) {
        yield rowsToRecordBatch(schema, pending)
        written += pending.length
        pending = []
      }
    }

    // An empty batch still carries the schema into the output.
    if (schema && (pending.length > 0 || written === 0)) yield rowsToRecordBatch(schema, pending)
  }

  const writer = new RecordBatchStreamWriter({ autoDestroy: true })
  // Node's adapter settles every pending read when the stream is destroyed.
  const encoded = Readable.from(writer, { objectMode: false })
  const outputCounter = createByteCounter((n) => tracker.addBytes(0, n))

  const pipePromise = pipeline(encoded, outputCounter, output).catch((e: unknown) => {
    outputFailed.abort(e)
    throw e
  })

  const writeAllPromise = (async () => {
    try {
      await writer.writeAll(batches())
    } catch (e) {
      encoded.destroy(toError(e))
      throw e
    }
  })()

  const [pipeResult, writeResult] = await Promise.allSettled([pipePromise, writeAllPromise])
  if (writeResult.status === 'rejected') throw writeResult.reason
  if (pipeResult.status === 'rejected') throw pipeResult.reason
  tracker.flush()
}
