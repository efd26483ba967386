import type {
  ArrowMergeOptions,
  ArrowMergeUrlsOptions,
  InputSource,
  JsonValue,
  MergeOptions,
  MergeUrlsOptions,
} from './types.js'
import { mergeArrow } from './mergeArrow.js'
import { mergeCsv } from './mergeCsv.js'
import { mergeJson } from './mergeJson.js'
import { isHttpUrl, openUrlAsReadable } from './util.js'

/** Format paired with the options of its merger; the comparator's row type follows the format */
export type MergeStreamsArgs =
  | [format: 'ARROW_STREAM', options: ArrowMergeOptions]
  | [format: 'CSV', options: MergeOptions<string>]
  | [format: 'JSON_ARRAY', options: MergeOptions<JsonValue>]

export type MergeStreamsFromUrlsArgs =
  | [format: 'ARROW_STREAM', options: ArrowMergeUrlsOptions]
  | [format: 'CSV', options: MergeUrlsOptions<string>]
  | [format: 'JSON_ARRAY', options: MergeUrlsOptions<JsonValue>]

/**
 * Unified entry point for merging multiple sorted data streams into a single sorted output stream.
 */
export async function mergeStreams(...args: MergeStreamsArgs): Promise<void> {
  switch (args[0]) {
    case 'ARROW_STREAM':
      return mergeArrow(args[1])
    case 'CSV':
      return mergeCsv(args[1])
    case 'JSON_ARRAY':
      return mergeJson(args[1])
    default: {
      const neverFormat: never = args[0]
      throw new Error(`[mergeStreams] Unsupported format: ${String(neverFormat)}`)
    }
  }
}

/**
 * Unified entry point for merging multiple sorted data files from URLs into a single output stream.
 *
 * Convenience wrapper around mergeStreams that fetches from http(s) URLs. Each URL is fetched
 * when the merge first pulls from it.
 */
export async function mergeStreamsFromUrls(...args: MergeStreamsFromUrlsArgs): Promise<void> {
  const [format, { urls, signal }] = args
  if (!Array.isArray(urls) || urls.length === 0)
    throw new Error('[mergeStreamsFromUrls] urls must be a non-empty array')

  for (const url of urls) {
    if (!isHttpUrl(url)) throw new Error(`[mergeStreamsFromUrls] Expected http(s) URL but got: ${url}`)
  }

  const inputs: InputSource[] = urls.map(url => () => openUrlAsReadable(url, signal, `[mergeStreams:${format}]`))

  switch (args[0]) {
    case 'ARROW_STREAM':
      return mergeArrow({ ...args[1], inputs })
    case 'CSV':
      return mergeCsv({ ...args[1], inputs })
    case 'JSON_ARRAY':
      return mergeJson({ ...args[1], inputs })
    default: {
      const neverFormat: never = args[0]
      throw new Error(`[mergeStreamsFromUrls] Unsupported format: ${String(neverFormat)}`)
    }
  }
}
