import type { InputSource, MergeOptions } from './types.js'
import { mergeAsync } from './merge.js'
import {
  assertComparator,
  assertNonEmptyArray,
  countBytes,
  endWritable,
  ProgressTracker,
  readUtf8Lines,
  resolveInputStream,
  throwIfAborted,
  writeToWritable,
} from './util.js'

/**
 * Merge multiple sorted CSV streams into a single sorted CSV stream.
 *
 * Behavior:
 * - Rows are whole lines (without the line terminator) ordered by `compare`
 * - Writes the first line (header) of the first non-empty input
 * - Skips the first line of later inputs if it matches that header
 * - Rows that compare equal keep input order; every line ends with '\n'
 * - Inputs are opened lazily and read one row ahead at most
 */
export async function mergeCsv(options: MergeOptions<string>): Promise<void> {
  const { inputs, output, compare, signal } = options
  assertNonEmptyArray(inputs, 'mergeCsv')
  assertComparator(compare, 'mergeCsv')

  const tracker = new ProgressTracker(options)

  const openLines = async (input: InputSource) => {
    throwIfAborted(signal, 'mergeCsv')
    const src = await resolveInputStream(input)
    return readUtf8Lines(countBytes(src, (n) => tracker.addBytes(n, 0)))
  }

  const write = async (chunk: string) => {
    await writeToWritable(output, chunk)
    tracker.addBytes(0, Buffer.byteLength(chunk))
  }

  let header: string | undefined

  async function* rows(input: InputSource): AsyncGenerator<string, void, undefined> {
    let isFirst = true
    for await (const line of await openLines(input)) {
      if (isFirst) {
        isFirst = false
        // Inputs get their first pull in order, so the first non-empty one supplies the header.
        if (header === undefined) {
          header = line
          await write(`${header}\n`)
          continue
        }
        // Headerless chunks start with data; repeated headers are dropped.
        if (line === header) continue
      }
      yield line
    }
  }

  for await (const row of mergeAsync(compare, ...inputs.map(rows))) {
    throwIfAborted(signal, 'mergeCsv')
    await write(`${row}\n`)
    tracker.addRow()
  }

  tracker.flush()
  await endWritable(output)
}
