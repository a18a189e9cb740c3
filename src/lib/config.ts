import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { ConfigError } from './errors.js'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

/** "true"/"1"/"yes" などの環境変数をbooleanに変換する */
const envFlag = z
  .preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['true', 'false', '1', '0', 'yes', 'no', '']).default('false')
  )
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

/** 先頭の ~ をホームディレクトリに展開する */
export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return path
}

const optionalPath = z
  .string()
  .optional()
  .transform((value) => (value ? expandHome(value) : undefined))

const configSchema = z
  .object({
    DATASOURCE_PATH: z.string().min(1).default('events.json').transform(expandHome),
    FEED_URL: z.string().url().default('http://theums.com/myfeed/'),
    FEED_WINDOW_START: z.string().regex(ISO_DATE, 'expected YYYY-MM-DD').default('2016-07-27'),
    FEED_WINDOW_END: z.string().regex(ISO_DATE, 'expected YYYY-MM-DD').default('2016-08-01'),
    FORCE_REFRESH: envFlag,
    VENUE: z.string().min(1).default('all'),
    FLATTEN: envFlag,
    SILENTLY_DESTROY_DATA: envFlag,
    QUIET: envFlag,
    CSV_OUTPUT: optionalPath,
    ICAL_OUTPUT: optionalPath,
    GCAL_ENABLED: envFlag,
    GOOGLE_CREDENTIALS_PATH: optionalPath,
    CALENDAR_LABEL: z.string().min(1).default('UMS'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  })
  .refine((env) => env.FEED_WINDOW_START <= env.FEED_WINDOW_END, {
    message: 'FEED_WINDOW_START must not be after FEED_WINDOW_END',
    path: ['FEED_WINDOW_START'],
  })

export interface FeedWindow {
  readonly start: string
  readonly end: string
}

export interface AppConfig {
  readonly datasourcePath: string
  readonly feedUrl: string
  readonly feedWindow: FeedWindow
  readonly forceRefresh: boolean
  readonly venue: string
  readonly flatten: boolean
  readonly silentlyDestroyData: boolean
  readonly quiet: boolean
  readonly csvOutput: string | undefined
  readonly icalOutput: string | undefined
  readonly gcalEnabled: boolean
  readonly googleCredentialsPath: string | undefined
  readonly calendarLabel: string
  readonly logLevel: string
}

/** 環境変数から設定を読み込み、検証する */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`, { cause: parsed.error })
  }

  const c = parsed.data
  return {
    datasourcePath: c.DATASOURCE_PATH,
    feedUrl: c.FEED_URL,
    feedWindow: { start: c.FEED_WINDOW_START, end: c.FEED_WINDOW_END },
    forceRefresh: c.FORCE_REFRESH,
    venue: c.VENUE,
    flatten: c.FLATTEN,
    silentlyDestroyData: c.SILENTLY_DESTROY_DATA,
    quiet: c.QUIET,
    csvOutput: c.CSV_OUTPUT,
    icalOutput: c.ICAL_OUTPUT,
    gcalEnabled: c.GCAL_ENABLED,
    googleCredentialsPath: c.GOOGLE_CREDENTIALS_PATH,
    calendarLabel: c.CALENDAR_LABEL,
    logLevel: c.LOG_LEVEL,
  }
}
