import type { Logger } from 'pino'
import { calendarLabels } from './calendar.js'
import type { AppConfig } from './config.js'
import type { ConfirmationGate } from './confirm.js'
import { EventSource } from './event-source.js'
import { logger as defaultLogger } from './logger.js'
import type { WriteResult } from '../types/events.js'
import type { RemoteCalendarService } from '../types/google-calendar.js'
import { CsvWriter } from '../writers/csv-writer.js'
import { GoogleCalendarWriter } from '../writers/google-calendar-writer.js'
import { IcalWriter } from '../writers/ical-writer.js'
import { StdoutWriter } from '../writers/stdout-writer.js'
import type { Writer } from '../writers/writer.js'

export interface ExportDeps {
  readonly gate: ConfirmationGate
  /** GCAL_ENABLED のときだけ呼ばれる */
  readonly createRemoteService: (config: AppConfig) => RemoteCalendarService
  readonly fetch?: typeof fetch
  readonly stdout?: NodeJS.WritableStream
  readonly logger?: Logger
}

export interface WriterReport {
  readonly writer: string
  readonly result: WriteResult
}

export interface ExportSummary {
  readonly calendars: number
  readonly events: number
  readonly reports: readonly WriterReport[]
}

/** 設定で有効になっている出力先を順に組み立てる */
export function buildWriters(config: AppConfig, deps: ExportDeps): Writer[] {
  const labels = calendarLabels(config.calendarLabel)
  const log = deps.logger ?? defaultLogger
  const shared = {
    gate: deps.gate,
    silentlyDestroyData: config.silentlyDestroyData,
    labels,
    logger: log,
  }

  const writers: Writer[] = []
  if (!config.quiet) {
    writers.push(new StdoutWriter({ output: deps.stdout, labels }))
  }
  if (config.gcalEnabled) {
    writers.push(new GoogleCalendarWriter({ ...shared, service: deps.createRemoteService(config) }))
  }
  if (config.csvOutput) {
    writers.push(new CsvWriter({ ...shared, output: config.csvOutput }))
  }
  if (config.icalOutput) {
    writers.push(new IcalWriter({ ...shared, output: config.icalOutput }))
  }
  return writers
}

/** データ取得から全出力先への書き出しまでを実行する */
export async function runExport(config: AppConfig, deps: ExportDeps): Promise<ExportSummary> {
  const log = deps.logger ?? defaultLogger
  const source = new EventSource({
    filepath: config.datasourcePath,
    url: config.feedUrl,
    window: config.feedWindow,
    labels: calendarLabels(config.calendarLabel),
    fetch: deps.fetch,
    logger: log,
  })

  if (config.forceRefresh) {
    await source.refresh()
  }

  const calendars = await source.calendars(config.venue)
  if (calendars.size === 0) {
    log.info({ venue: config.venue }, 'No events')
    return { calendars: 0, events: 0, reports: [] }
  }

  const selected = [...calendars.values()]
  const events = selected.reduce((sum, calendar) => sum + calendar.size, 0)
  const reports: WriterReport[] = []
  for (const writer of buildWriters(config, deps)) {
    const result = await writer.write(selected, { flatten: config.flatten })
    log.info({ writer: writer.name, written: result.written.length, skipped: result.skipped.length }, 'Writer finished')
    reports.push({ writer: writer.name, result })
  }

  return { calendars: selected.length, events, reports }
}
