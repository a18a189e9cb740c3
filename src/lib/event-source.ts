import { readFile, writeFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { DateTime } from 'luxon'
import type { Logger } from 'pino'
import { z } from 'zod'
import { Event, groupByVenue, DEFAULT_LABELS, type Calendar, type CalendarLabels } from './calendar.js'
import type { FeedWindow } from './config.js'
import { CacheMissError, ConfigError, NetworkError, PersistError, errorMessage, isErrnoException } from './errors.js'
import { logger as defaultLogger } from './logger.js'
import type { EventCache, PersistResult, RawRecord } from '../types/events.js'

export const DEFAULT_FEED_WINDOW: FeedWindow = { start: '2016-07-27', end: '2016-08-01' }

// フィード側がブラウザからのXHRを想定しているため、それらしいヘッダーを付ける
const FEED_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0',
  Accept: 'application/json, text/javascript, */*; q=0.01',
  'Accept-Language': 'en-US,en;q=0.5',
  Referer: 'http://theums.com/calendar',
  'X-Requested-With': 'XMLHttpRequest',
}

const recordSchema = z.record(z.string(), z.unknown())

const cacheSchema = z.object({
  retrieved: z.string(),
  data: z.array(recordSchema),
})

const feedSchema = z.array(recordSchema)

export interface EventSourceOptions {
  readonly filepath?: string
  readonly url?: string
  readonly window?: FeedWindow
  readonly labels?: CalendarLabels
  readonly fetch?: typeof fetch
  readonly now?: () => Date
  readonly logger?: Logger
}

/** キャッシュ優先でイベントデータを取得する。キャッシュがなければフィードから取得して保存する */
export class EventSource {
  readonly filepath: string | undefined
  readonly url: string | undefined
  readonly window: FeedWindow
  cache: EventCache | null = null

  private readonly labels: CalendarLabels
  private readonly fetchImpl: typeof fetch
  private readonly now: () => Date
  private readonly log: Logger

  constructor(options: EventSourceOptions = {}) {
    this.filepath = options.filepath ? resolve(options.filepath) : undefined
    this.url = options.url
    this.window = options.window ?? DEFAULT_FEED_WINDOW
    this.labels = options.labels ?? DEFAULT_LABELS
    this.fetchImpl = options.fetch ?? fetch
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? defaultLogger
  }

  /** キャッシュファイルを読み込む。使えない場合は CacheMissError */
  async load(): Promise<EventCache> {
    if (!this.filepath) {
      throw new CacheMissError('no-path', 'No datasource path configured')
    }

    let text: string
    try {
      text = await readFile(this.filepath, 'utf-8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new CacheMissError('not-found', `Cache file not found: ${this.filepath}`, { cause: err })
      }
      throw new CacheMissError('unreadable', `Cache file unreadable: ${this.filepath}`, { cause: err })
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (err) {
      throw new CacheMissError('malformed', `Cache file is not valid JSON: ${this.filepath}`, { cause: err })
    }

    const parsed = cacheSchema.safeParse(json)
    if (!parsed.success) {
      throw new CacheMissError('malformed', `Cache file has an unexpected shape: ${this.filepath}`, {
        cause: parsed.error,
      })
    }

    this.cache = parsed.data
    this.log.debug({ path: this.filepath, records: parsed.data.data.length }, 'Loaded event cache')
    return parsed.data
  }

  /** フィードから取得期間分のイベントを取得する。リトライはしない */
  async fetch(): Promise<EventCache> {
    if (!this.url) {
      throw new ConfigError('Feed URL not set, cannot fetch')
    }

    const now = this.now()
    const requestUrl = new URL(this.url)
    requestUrl.searchParams.set('start', this.window.start)
    requestUrl.searchParams.set('end', this.window.end)
    requestUrl.searchParams.set('_', String(Math.floor(now.getTime() / 1000)))

    let response: Response
    try {
      response = await this.fetchImpl(requestUrl.toString(), { headers: FEED_HEADERS })
    } catch (err) {
      throw new NetworkError(`Feed request failed: ${errorMessage(err)}`, { cause: err })
    }
    if (!response.ok) {
      throw new NetworkError(`Feed request failed with HTTP ${response.status}`)
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (err) {
      throw new NetworkError(`Feed response is not valid JSON: ${errorMessage(err)}`, { cause: err })
    }
    const parsed = feedSchema.safeParse(body)
    if (!parsed.success) {
      throw new NetworkError('Feed response is not a list of event records', { cause: parsed.error })
    }

    const cache: EventCache = {
      retrieved: DateTime.fromJSDate(now, { zone: 'utc' }).toFormat("yyyy-MM-dd'T'HH:mm:ss"),
      data: parsed.data,
    }
    this.cache = cache
    this.log.info({ url: this.url, records: cache.data.length }, 'Fetched event feed')
    return cache
  }

  /** キャッシュをファイルに書き出す。失敗しても例外にせず結果として返す */
  async persist(): Promise<PersistResult> {
    const failure = (error: PersistError): PersistResult => {
      this.log.warn({ err: error, path: this.filepath }, 'Could not persist event cache')
      return { success: false, error }
    }

    if (!this.filepath) {
      return failure(new PersistError('No datasource path configured'))
    }
    if (!this.cache) {
      return failure(new PersistError('No event data to persist'))
    }

    try {
      await writeFile(this.filepath, JSON.stringify(this.cache, null, 4), 'utf-8')
    } catch (err) {
      return failure(new PersistError(`Failed to write cache file: ${errorMessage(err)}`, { cause: err }))
    }
    this.log.debug({ path: this.filepath }, 'Persisted event cache')
    return { success: true, path: this.filepath }
  }

  /** 強制再取得。明示的な書き換え要求なので保存失敗はエラーにする */
  async refresh(): Promise<EventCache> {
    const cache = await this.fetch()
    const result = await this.persist()
    if (!result.success) {
      throw result.error
    }
    return cache
  }

  async get(): Promise<EventCache> {
    try {
      return await this.load()
    } catch (err) {
      if (!(err instanceof CacheMissError)) throw err
      this.log.debug({ reason: err.reason }, err.message)
    }

    if (this.cache) {
      return this.cache
    }
    const cache = await this.fetch()
    await this.persist()
    return cache
  }

  /** 会場名 → カレンダー のMapを生成する。呼ばれるたびに作り直す */
  async calendars(venue = 'all'): Promise<Map<string, Calendar>> {
    const cache = await this.get()
    const events = cache.data.map((record: RawRecord, index) => Event.fromRecord(record, index))
    return groupByVenue(events, this.labels, venue)
  }
}
