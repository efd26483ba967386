// Types
export type {
  ArrowMergeOptions,
  ArrowMergeUrlsOptions,
  ArrowRow,
  AsyncSource,
  Comparator,
  InputSource,
  JsonValue,
  MergeFormat,
  MergeOptions,
  MergeOptionsProgress,
  MergeUrlsOptions,
  Pair,
  PairComparator,
  Source,
} from './types.js'
export type { Indexed, IndexedPair, IndexedValue } from './tagging.js'
export type { MergeStreamsArgs, MergeStreamsFromUrlsArgs } from './mergeStreams.js'

// Core k-way merge (lazy sequences)
export { merge, mergeAsync, mergePairs, mergePairsAsync } from './merge.js'
export { mergeIndexed, mergeIndexedAsync } from './engine.js'
export { FrontierHeap } from './frontier.js'
export {
  tagCompare,
  tagComparePairs,
  tagPairSource,
  tagPairSourceAsync,
  tagSource,
  tagSourceAsync,
} from './tagging.js'

// Comparators
export { compareBy, compareNumbers, compareStrings, reverseComparator } from './compare.js'

// Sorted stream merging
export { mergeArrow, rowsToRecordBatch } from './mergeArrow.js'
export { mergeCsv } from './mergeCsv.js'
export { mergeJson, readJsonArrayElements } from './mergeJson.js'
export type { JsonArrayElement } from './mergeJson.js'

// Unified API
export { mergeStreams, mergeStreamsFromUrls } from './mergeStreams.js'

// Utilities
export { openUrlAsReadable, isHttpUrl } from './util.js'
