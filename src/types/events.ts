import type { PersistError } from '../lib/errors.js'

/** フィードおよびキャッシュ内の1イベント分のレコード */
export interface RawEventRecord {
  readonly start: string           // YYYY-MM-DDTHH:MM:SS+0000
  readonly end: string
  readonly venue_artist: string
  readonly url: string
  readonly venue_name: string
  readonly venue_url: string
  readonly description: string     // 会場住所
}

/** 検証前のレコード。キャッシュにはフィードの内容をそのまま保存する */
export type RawRecord = Readonly<Record<string, unknown>>

export interface EventCache {
  readonly retrieved: string       // YYYY-MM-DDTHH:MM:SS (UTC, オフセットなし)
  readonly data: readonly RawRecord[]
}

export type PersistResult =
  | { readonly success: true; readonly path: string }
  | { readonly success: false; readonly error: PersistError }

export interface WriteOptions {
  readonly flatten: boolean
}

export interface WriteResult {
  readonly written: readonly string[]
  readonly skipped: readonly string[]
}
