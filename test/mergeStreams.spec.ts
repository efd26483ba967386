import { PassThrough } from 'node:stream'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import type { JsonValue } from '../src/types.js'
import { compareBy, compareNumbers, compareStrings } from '../src/compare.js'
import { mergeStreams, mergeStreamsFromUrls } from '../src/mergeStreams.js'
import { collectToString, readableOf } from './testUtil.js'

const byNumber = compareBy((value: JsonValue) => Number(value), compareNumbers)

/** In-process stand-in for the http(s) sources */
function stubFetch(routes: Map<string, string>) {
  const fetchMock = vi.fn(async (input: string | URL) => {
    const body = routes.get(String(input))
    return body === undefined
      ? new Response('not found', { status: 404, statusText: 'Not Found' })
      : new Response(body, { status: 200 })
  })
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

describe('mergeStreams', () => {
  it('dispatches CSV inputs to the CSV merger', async () => {
    const pass = new PassThrough()
    const outPromise = collectToString(pass)

    await mergeStreams('CSV', {
      inputs: [readableOf('v\nb\nd\n'), readableOf('v\na\nc\n')],
      output: pass,
      compare: compareStrings,
    })

    expect(await outPromise).toBe('v\na\nb\nc\nd\n')
  })

  it('dispatches JSON_ARRAY inputs to the JSON merger', async () => {
    const pass = new PassThrough()
    const outPromise = collectToString(pass)

    await mergeStreams('JSON_ARRAY', {
      inputs: [readableOf('[5]'), readableOf('[1,7]')],
      output: pass,
      compare: byNumber,
    })

    expect(await outPromise).toBe('[1,5,7]')
  })
})

describe('mergeStreamsFromUrls', () => {
  const base = 'http://shard.test'
  let fetchMock: ReturnType<typeof stubFetch>

  beforeEach(() => {
    fetchMock = stubFetch(new Map([
      [`${base}/c0.csv`, 'id\n1\n4\n'],
      [`${base}/c1.csv`, 'id\n2\n3\n'],
      [`${base}/j0.json`, '[1,3]'],
      [`${base}/j1.json`, '[2]'],
    ]))
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('merges csv chunks fetched from urls', async () => {
    const pass = new PassThrough()
    const outPromise = collectToString(pass)

    await mergeStreamsFromUrls('CSV', {
      urls: [`${base}/c0.csv`, `${base}/c1.csv`],
      output: pass,
      compare: compareBy((line: string) => Number(line), compareNumbers),
    })

    expect(await outPromise).toBe('id\n1\n2\n3\n4\n')
    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(fetchMock.mock.calls.map(([url]) => String(url))).toEqual([`${base}/c0.csv`, `${base}/c1.csv`])
  })

  it('merges json arrays fetched from urls', async () => {
    const pass = new PassThrough()
    const outPromise = collectToString(pass)

    await mergeStreamsFromUrls('JSON_ARRAY', {
      urls: [`${base}/j0.json`, `${base}/j1.json`],
      output: pass,
      compare: byNumber,
    })

    expect(await outPromise).toBe('[1,2,3]')
  })

  it('reports failed responses', async () => {
    await expect(
      mergeStreamsFromUrls('JSON_ARRAY', { urls: [`${base}/missing.json`], output: new PassThrough(), compare: byNumber }),
    ).rejects.toThrow(`[mergeStreams:JSON_ARRAY] Failed to fetch '${base}/missing.json': 404 Not Found`)
  })

  it('rejects non-http inputs', async () => {
    await expect(
      mergeStreamsFromUrls('CSV', { urls: ['file:///tmp/a.csv'], output: new PassThrough(), compare: compareStrings }),
    ).rejects.toThrow(/Expected http\(s\) URL/)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('rejects an empty url list', async () => {
    await expect(
      mergeStreamsFromUrls('CSV', { urls: [], output: new PassThrough(), compare: compareStrings }),
    ).rejects.toThrow('[mergeStreamsFromUrls] urls must be a non-empty array')
  })
})
