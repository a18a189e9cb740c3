import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { EventSource } from './event-source.js'
import { CacheMissError, ConfigError, MalformedRecordError, NetworkError, PersistError } from './errors.js'
import { SIX_EVENTS, makeTempDir, rawEvent, sampleCache, silentLogger } from '../test-helpers.js'

const FEED_URL = 'http://example.com/feed/'
const NOW = new Date('2016-07-16T18:32:13Z')

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

describe('EventSource', () => {
  let dir: string
  let mockFetch: jest.Mock<typeof fetch>

  const source = (options: { filepath?: string; url?: string } = {}) =>
    new EventSource({ ...options, fetch: mockFetch, now: () => NOW, logger: silentLogger() })

  beforeEach(async () => {
    dir = await makeTempDir()
    mockFetch = jest.fn<typeof fetch>()
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('load', () => {
    it('should read a valid cache file', async () => {
      const path = join(dir, 'events.json')
      await writeFile(path, JSON.stringify(sampleCache()))

      const ds = source({ filepath: path })
      const cache = await ds.load()

      expect(cache).toEqual(sampleCache())
      expect(ds.cache).toEqual(sampleCache())
    })

    it('should report a missing file as a cache miss', async () => {
      const ds = source({ filepath: join(dir, 'missing.json') })

      await expect(ds.load()).rejects.toBeInstanceOf(CacheMissError)
      await expect(ds.load()).rejects.toMatchObject({ reason: 'not-found' })
    })

    it('should report invalid JSON as a cache miss', async () => {
      const path = join(dir, 'events.json')
      await writeFile(path, '{"retrieved": ')

      await expect(source({ filepath: path }).load()).rejects.toMatchObject({ reason: 'malformed' })
    })

    it('should report a cache without data as a cache miss', async () => {
      const path = join(dir, 'events.json')
      await writeFile(path, JSON.stringify({ retrieved: '2016-07-16T18:32:13' }))

      await expect(source({ filepath: path }).load()).rejects.toMatchObject({ reason: 'malformed' })
    })

    it('should report a missing path as a cache miss', async () => {
      await expect(source().load()).rejects.toMatchObject({ reason: 'no-path' })
    })
  })

  describe('fetch', () => {
    it('should request the fixed window with a cache buster', async () => {
      mockFetch.mockResolvedValue(jsonResponse(SIX_EVENTS))

      const ds = source({ url: FEED_URL })
      const cache = await ds.fetch()

      expect(mockFetch).toHaveBeenCalledTimes(1)
      const requested = new URL(String(mockFetch.mock.calls[0]?.[0]))
      expect(requested.origin + requested.pathname).toBe(FEED_URL)
      expect(requested.searchParams.get('start')).toBe('2016-07-27')
      expect(requested.searchParams.get('end')).toBe('2016-08-01')
      expect(requested.searchParams.get('_')).toBe('1468693933')
      expect(cache).toEqual({ retrieved: '2016-07-16T18:32:13', data: SIX_EVENTS })
    })

    it('should send the XHR headers the feed expects', async () => {
      mockFetch.mockResolvedValue(jsonResponse([]))

      await source({ url: FEED_URL }).fetch()

      const init = mockFetch.mock.calls[0]?.[1]
      expect(init?.headers).toMatchObject({ 'X-Requested-With': 'XMLHttpRequest' })
    })

    it('should use a configured window', async () => {
      mockFetch.mockResolvedValue(jsonResponse([]))

      const ds = new EventSource({
        url: FEED_URL,
        window: { start: '2017-07-26', end: '2017-07-31' },
        fetch: mockFetch,
        logger: silentLogger(),
      })
      await ds.fetch()

      const requested = new URL(String(mockFetch.mock.calls[0]?.[0]))
      expect(requested.searchParams.get('start')).toBe('2017-07-26')
      expect(requested.searchParams.get('end')).toBe('2017-07-31')
    })

    it('should wrap transport failures in NetworkError', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'))

      await expect(source({ url: FEED_URL }).fetch()).rejects.toThrow(NetworkError)
      await expect(source({ url: FEED_URL }).fetch()).rejects.toThrow('Feed request failed: fetch failed')
    })

    it('should treat an HTTP error status as a NetworkError', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ error: 'nope' }, 503))

      await expect(source({ url: FEED_URL }).fetch()).rejects.toThrow('Feed request failed with HTTP 503')
    })

    it('should reject a body that is not a list', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ events: [] }))

      await expect(source({ url: FEED_URL }).fetch()).rejects.toThrow(NetworkError)
    })

    it('should require a feed URL', async () => {
      await expect(source().fetch()).rejects.toThrow(ConfigError)
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('persist', () => {
    it('should write the cache so that it reads back unchanged', async () => {
      const path = join(dir, 'events.json')
      const ds = source({ filepath: path })
      ds.cache = sampleCache()

      const result = await ds.persist()

      expect(result).toEqual({ success: true, path })
      expect(await readFile(path, 'utf-8')).toBe(JSON.stringify(sampleCache(), null, 4))
      expect(await source({ filepath: path }).load()).toEqual(sampleCache())
    })

    it('should return a failure instead of throwing when the path is unwritable', async () => {
      const ds = source({ filepath: join(dir, 'no-such-dir', 'events.json') })
      ds.cache = sampleCache()

      const result = await ds.persist()

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.error).toBeInstanceOf(PersistError)
      }
    })

    it('should fail without a path or without data', async () => {
      const noPath = source()
      noPath.cache = sampleCache()

      expect((await noPath.persist()).success).toBe(false)
      expect((await source({ filepath: join(dir, 'events.json') }).persist()).success).toBe(false)
    })
  })

  describe('get', () => {
    it('should use the cache file without fetching', async () => {
      const path = join(dir, 'events.json')
      await writeFile(path, JSON.stringify(sampleCache()))

      const cache = await source({ filepath: path, url: FEED_URL }).get()

      expect(cache).toEqual(sampleCache())
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should fetch once and persist when there is no cache file', async () => {
      const path = join(dir, 'events.json')
      mockFetch.mockResolvedValue(jsonResponse(SIX_EVENTS))

      const ds = source({ filepath: path, url: FEED_URL })
      const cache = await ds.get()

      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(cache.data).toEqual(SIX_EVENTS)
      expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual(cache)
    })

    it('should still return fetched data when persisting fails', async () => {
      mockFetch.mockResolvedValue(jsonResponse(SIX_EVENTS))

      const cache = await source({ url: FEED_URL }).get()

      expect(mockFetch).toHaveBeenCalledTimes(1)
      expect(cache.data).toEqual(SIX_EVENTS)
    })

    it('should propagate network failures', async () => {
      mockFetch.mockRejectedValue(new Error('ECONNREFUSED'))

      await expect(source({ filepath: join(dir, 'events.json'), url: FEED_URL }).get()).rejects.toThrow(NetworkError)
    })

    it('should keep the in-memory cache when the file goes away', async () => {
      mockFetch.mockResolvedValue(jsonResponse(SIX_EVENTS))
      const ds = source({ url: FEED_URL })

      await ds.get()
      await ds.get()

      expect(mockFetch).toHaveBeenCalledTimes(1)
    })
  })

  describe('refresh', () => {
    it('should fetch and rewrite an existing cache file', async () => {
      const path = join(dir, 'events.json')
      await writeFile(path, JSON.stringify({ retrieved: 'old', data: [] }))
      mockFetch.mockResolvedValue(jsonResponse(SIX_EVENTS))

      await source({ filepath: path, url: FEED_URL }).refresh()

      expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({ retrieved: '2016-07-16T18:32:13', data: SIX_EVENTS })
    })

    it('should throw when the refreshed cache cannot be written', async () => {
      mockFetch.mockResolvedValue(jsonResponse(SIX_EVENTS))

      await expect(source({ filepath: join(dir, 'missing', 'events.json'), url: FEED_URL }).refresh()).rejects.toThrow(
        PersistError
      )
    })
  })

  describe('calendars', () => {
    it('should group the cached events by venue', async () => {
      const path = join(dir, 'events.json')
      await writeFile(path, JSON.stringify(sampleCache()))

      const calendars = await source({ filepath: path }).calendars()

      expect(calendars.size).toBe(2)
      expect(calendars.get('venue1')?.size).toBe(3)
      expect(calendars.get('venue2')?.size).toBe(3)
      expect(calendars.get('venue1')?.name).toBe('UMS - venue1')
    })

    it('should filter to one venue', async () => {
      const path = join(dir, 'events.json')
      await writeFile(path, JSON.stringify(sampleCache()))

      const calendars = await source({ filepath: path }).calendars('venue1')

      expect([...calendars.keys()]).toEqual(['venue1'])
    })

    it('should fail on a malformed record', async () => {
      const path = join(dir, 'events.json')
      const { url: _omitted, ...broken } = rawEvent()
      await writeFile(path, JSON.stringify({ retrieved: '2016-07-16T18:32:13', data: [rawEvent(), broken] }))

      await expect(source({ filepath: path }).calendars()).rejects.toThrow(MalformedRecordError)
      await expect(source({ filepath: path }).calendars()).rejects.toMatchObject({ index: 1 })
    })
  })
})
