/** このツールが意図的に投げるエラーの基底クラス */
export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConfigError extends AppError {}

export type CacheMissReason = 'no-path' | 'not-found' | 'unreadable' | 'malformed'

/** ローカルキャッシュが使えない。呼び出し側はフェッチにフォールバックする */
export class CacheMissError extends AppError {
  readonly reason: CacheMissReason

  constructor(reason: CacheMissReason, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.reason = reason
  }
}

export class NetworkError extends AppError {}

export class PersistError extends AppError {}

export class MalformedRecordError extends AppError {
  readonly index: number | undefined

  constructor(message: string, index?: number, options?: { cause?: unknown }) {
    super(message, options)
    this.index = index
  }
}

export class EmptyCalendarError extends AppError {
  constructor(readonly calendarName: string) {
    super(`Calendar "${calendarName}" has no events to write`)
  }
}

/** リモート反映の途中で失敗した。反映済みの変更はロールバックしない */
export class RemotePartialFailureError extends AppError {
  constructor(
    readonly calendarName: string,
    readonly insertedCount: number,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause)
    super(
      `Failed while importing into calendar "${calendarName}" after ${insertedCount} events: ${reason}`,
      options
    )
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** fs 由来のエラーか判定する。Jest の VM コンテキストでは instanceof Error が成り立たないため形で見る */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
}
