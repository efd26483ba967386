import type { Readable } from 'node:stream'
import type { InputSource, JsonValue, MergeOptions } from './types.js'
import { compareBy } from './compare.js'
import { mergeAsync } from './merge.js'
import {
  assertComparator,
  assertNonEmptyArray,
  countBytes,
  endWritable,
  ProgressTracker,
  resolveInputStream,
  throwIfAborted,
  writeToWritable,
} from './util.js'

function isWhitespaceChar(value: string): boolean {
  return value === ' ' || value === '\n' || value === '\r' || value === '\t'
}

/** One top-level array element: its parsed value and its source text, as written */
export interface JsonArrayElement {
  value: JsonValue
  text: string
}

function parseElement(text: string): JsonArrayElement {
  try {
    return { value: JSON.parse(text), text }
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    throw new Error(`[mergeJson] Invalid array element: ${reason}`)
  }
}

/**
 * Stream the top-level elements of one JSON array, parsing each element as soon as its closing
 * delimiter has been read. Element text is kept without surrounding whitespace.
 */
export async function* readJsonArrayElements(src: Readable): AsyncGenerator<JsonArrayElement, void, undefined> {
  src.setEncoding('utf8')

  let started = false
  let finished = false
  let depth = 0
  let inString = false
  let escape = false
  let afterComma = false
  let buffer = ''

  for await (const chunk of src) {
    const text = String(chunk)

    for (let i = 0; i < text.length; i += 1) {
      const ch = text.charAt(i)

      if (!started) {
        if (isWhitespaceChar(ch)) continue
        if (ch !== '[') throw new Error('[mergeJson] Expected JSON array input')
        started = true
        depth = 1
        continue
      }

      if (finished) {
        if (!isWhitespaceChar(ch)) {
          throw new Error('[mergeJson] Unexpected data after JSON array end')
        }
        continue
      }

      if (inString) {
        buffer += ch
        if (escape) {
          escape = false
        } else if (ch === '\\') {
          escape = true
        } else if (ch === '"') {
          inString = false
        }
        continue
      }

      if (ch === '"') {
        inString = true
        buffer += ch
      } else if (ch === '[' || ch === '{') {
        depth += 1
        buffer += ch
      } else if (ch === ']' || ch === '}') {
        depth -= 1
        if (depth > 0) {
          buffer += ch
        } else if (ch === '}') {
          throw new Error('[mergeJson] Unbalanced object in JSON array')
        } else {
          finished = true
          const element = buffer.trim()
          buffer = ''
          if (element) yield parseElement(element)
          else if (afterComma) throw new Error('[mergeJson] Unexpected \']\' after \',\'')
        }
      } else if (ch === ',' && depth === 1) {
        const element = buffer.trim()
        buffer = ''
        if (!element) throw new Error('[mergeJson] Unexpected \',\' in JSON array')
        afterComma = true
        yield parseElement(element)
      } else {
        buffer += ch
      }
    }
  }

  if (!started) throw new Error('[mergeJson] Empty input')
  if (!finished || depth !== 0) throw new Error('[mergeJson] Unterminated JSON array')
}

/**
 * Merge multiple sorted JSON array streams into a single sorted JSON array stream.
 *
 * Behavior:
 * - Each input is one JSON array whose elements are sorted by `compare`
 * - Elements are parsed one at a time and merged lazily; equal elements keep input order
 * - Writes '[' once, then the merged elements as their original text, then ']'
 */
export async function mergeJson(options: MergeOptions<JsonValue>): Promise<void> {
  const { inputs, output, compare, signal } = options
  assertNonEmptyArray(inputs, 'mergeJson')
  assertComparator(compare, 'mergeJson')

  const tracker = new ProgressTracker(options)
  const byValue = compareBy((element: JsonArrayElement) => element.value, compare)

  async function* elements(input: InputSource): AsyncGenerator<JsonArrayElement, void, undefined> {
    throwIfAborted(signal, 'mergeJson')
    const src = await resolveInputStream(input)
    yield* readJsonArrayElements(countBytes(src, (n) => tracker.addBytes(n, 0)))
  }

  const write = async (chunk: string) => {
    await writeToWritable(output, chunk)
    tracker.addBytes(0, Buffer.byteLength(chunk))
  }

  await write('[')
  let separator = ''
  for await (const element of mergeAsync(byValue, ...inputs.map(elements))) {
    throwIfAborted(signal, 'mergeJson')
    await write(`${separator}${element.text}`)
    tracker.addRow()
    separator = ','
  }
  await write(']')

  tracker.flush()
  await endWritable(output)
}
