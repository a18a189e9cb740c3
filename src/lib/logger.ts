import pino, { type DestinationStream, type Logger } from 'pino'

// pinoレベル → severity マッピング
const SEVERITY_MAP: Record<number, string> = {
  10: 'DEBUG',     // trace
  20: 'DEBUG',     // debug
  30: 'INFO',      // info
  40: 'WARNING',   // warn
  50: 'ERROR',     // error
  60: 'CRITICAL',  // fatal
}

export interface LoggerOptions {
  readonly level?: string
  readonly serviceName?: string
}

/** 共通設定の pino ロガーを生成する。destination 省略時は stderr */
export function createLogger(
  options: LoggerOptions = {},
  destination: DestinationStream = pino.destination(2)
): Logger {
  return pino(
    {
      level: options.level || process.env.LOG_LEVEL || 'info',
      formatters: {
        level(_label, number) {
          return {
            severity: SEVERITY_MAP[number] || 'DEFAULT',
          }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      // pinoデフォルトの"pid","hostname"を除外
      base: {
        'service.name': options.serviceName || process.env.SERVICE_NAME || 'venue-calendars',
      },
      messageKey: 'message',
    },
    destination
  )
}

export const logger = createLogger()
