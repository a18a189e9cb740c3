import { mkdir, stat } from 'node:fs/promises'
import { join } from 'node:path'
import type { Logger } from 'pino'
import { DEFAULT_LABELS, flatten, type Calendar, type CalendarLabels } from '../lib/calendar.js'
import type { ConfirmationGate } from '../lib/confirm.js'
import { isErrnoException } from '../lib/errors.js'
import { logger as defaultLogger } from '../lib/logger.js'
import type { WriteOptions, WriteResult } from '../types/events.js'
import type { Writer } from './writer.js'

export interface FileWriterOptions {
  /** flatten時はファイルパス、それ以外はディレクトリ */
  readonly output: string
  readonly gate: ConfirmationGate
  readonly silentlyDestroyData?: boolean
  readonly labels?: CalendarLabels
  readonly logger?: Logger
}

export type FileWriteOutcome = 'written' | 'skipped'

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return false
    throw err
  }
}

/** ファイル形式の出力。既存ファイルの上書きは確認を挟む */
export abstract class FileWriter implements Writer {
  abstract readonly name: string
  abstract readonly extension: string

  readonly output: string
  readonly silentlyDestroyData: boolean
  protected readonly gate: ConfirmationGate
  protected readonly labels: CalendarLabels
  protected readonly log: Logger

  constructor(options: FileWriterOptions) {
    this.output = options.output
    this.silentlyDestroyData = options.silentlyDestroyData ?? false
    this.gate = options.gate
    this.labels = options.labels ?? DEFAULT_LABELS
    this.log = options.logger ?? defaultLogger
  }

  /** 1カレンダー分を path に書き出す */
  protected abstract writeFile(path: string, calendar: Calendar): Promise<void>

  /** "UMS - Hi-Dive (Upstairs)" → "ums - hi-dive upstairs.csv" */
  calendarFilename(calendar: Calendar): string {
    const base = calendar.name.toLowerCase().replace(/[()]/g, '').replace(/@/g, 'at')
    return `${base}.${this.extension}`
  }

  async toFile(calendar: Calendar, path: string = this.output): Promise<FileWriteOutcome> {
    if (!this.silentlyDestroyData && (await pathExists(path))) {
      const confirmed = await this.gate.confirm(`Delete existing file at ${path}?`)
      if (!confirmed) {
        this.log.info({ path }, 'Kept existing file, skipping write')
        return 'skipped'
      }
    }

    await this.writeFile(path, calendar)
    this.log.info({ path, events: calendar.size }, `Wrote ${this.name} file`)
    return 'written'
  }

  /** output ディレクトリにカレンダーごとに1ファイルずつ書き出す */
  async toDirectory(calendars: Iterable<Calendar>): Promise<WriteResult> {
    await mkdir(this.output, { recursive: true })
    const written: string[] = []
    const skipped: string[] = []
    for (const calendar of calendars) {
      const path = join(this.output, this.calendarFilename(calendar))
      const outcome = await this.toFile(calendar, path)
      ;(outcome === 'written' ? written : skipped).push(path)
    }
    return { written, skipped }
  }

  async write(calendars: Iterable<Calendar>, options: WriteOptions): Promise<WriteResult> {
    if (options.flatten) {
      const outcome = await this.toFile(flatten(calendars, this.labels.flat))
      return outcome === 'written'
        ? { written: [this.output], skipped: [] }
        : { written: [], skipped: [this.output] }
    }
    return this.toDirectory(calendars)
  }
}
