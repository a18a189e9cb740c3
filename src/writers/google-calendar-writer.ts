import type { Logger } from 'pino'
import { DEFAULT_LABELS, flatten, type Calendar, type CalendarLabels, type Event } from '../lib/calendar.js'
import type { ConfirmationGate } from '../lib/confirm.js'
import { RemotePartialFailureError } from '../lib/errors.js'
import { logger as defaultLogger } from '../lib/logger.js'
import type { WriteOptions, WriteResult } from '../types/events.js'
import type {
  GoogleCalendarEventBody,
  RemoteCalendarEntry,
  RemoteCalendarService,
} from '../types/google-calendar.js'
import type { Writer } from './writer.js'

// フィードの時刻は会場のローカル時刻（MDT）として扱う
const LOCAL_OFFSET = '-06:00'
const LOCAL_DATETIME = "yyyy-MM-dd'T'HH:mm:ss"

export interface GoogleCalendarWriterOptions {
  readonly service: RemoteCalendarService
  readonly gate: ConfirmationGate
  readonly silentlyDestroyData?: boolean
  readonly labels?: CalendarLabels
  readonly logger?: Logger
}

/**
 * 1回の write() の間だけ有効なリモートカレンダー一覧。
 * 最初に必要になった時点で一度だけ取得する。
 */
class RemoteCalendarIndex {
  private entries: Map<string, RemoteCalendarEntry> | null = null

  constructor(private readonly service: RemoteCalendarService) {}

  async find(summary: string): Promise<RemoteCalendarEntry | undefined> {
    if (!this.entries) {
      const list = await this.service.listCalendars()
      this.entries = new Map(list.map((entry) => [entry.summary, entry]))
    }
    return this.entries.get(summary)
  }

  forget(summary: string): void {
    this.entries?.delete(summary)
  }
}

/** Google Calendar に会場ごとのカレンダーを作り直してイベントを登録する */
export class GoogleCalendarWriter implements Writer {
  readonly name = 'Google Calendar'
  readonly silentlyDestroyData: boolean
  private readonly service: RemoteCalendarService
  private readonly gate: ConfirmationGate
  private readonly labels: CalendarLabels
  private readonly log: Logger

  constructor(options: GoogleCalendarWriterOptions) {
    this.service = options.service
    this.gate = options.gate
    this.silentlyDestroyData = options.silentlyDestroyData ?? false
    this.labels = options.labels ?? DEFAULT_LABELS
    this.log = options.logger ?? defaultLogger
  }

  static toGcal(event: Event): GoogleCalendarEventBody {
    return {
      start: { dateTime: `${event.start.toFormat(LOCAL_DATETIME)}${LOCAL_OFFSET}` },
      end: { dateTime: `${event.end.toFormat(LOCAL_DATETIME)}${LOCAL_OFFSET}` },
      location: event.address,
      description: event.linkDescription(),
      summary: event.artist,
    }
  }

  /** 同名カレンダーがあれば削除する。削除を断られたら false */
  private async deleteExisting(name: string, index: RemoteCalendarIndex): Promise<boolean> {
    const existing = await index.find(name)
    if (!existing) return true

    if (!this.silentlyDestroyData) {
      const confirmed = await this.gate.confirm(`About to delete existing google calendar "${existing.summary}". Ok?`)
      if (!confirmed) return false
    }

    await this.service.deleteCalendar(existing.id)
    index.forget(name)
    this.log.info({ calendar: name, calendarId: existing.id }, 'Deleted existing calendar')
    return true
  }

  private async addCalendar(calendar: Calendar, index: RemoteCalendarIndex): Promise<boolean> {
    if (!(await this.deleteExisting(calendar.name, index))) {
      this.log.info({ calendar: calendar.name }, 'Kept existing calendar, skipping import')
      return false
    }

    this.log.info(`Importing ${calendar.size} events into calendar ${calendar.name}`)
    const created = await this.service.insertCalendar(calendar.name)

    let inserted = 0
    for (const event of calendar) {
      try {
        await this.service.insertEvent(created.id, GoogleCalendarWriter.toGcal(event))
      } catch (err) {
        throw new RemotePartialFailureError(calendar.name, inserted, { cause: err })
      }
      inserted++
    }
    return true
  }

  async write(calendars: Iterable<Calendar>, options: WriteOptions): Promise<WriteResult> {
    const targets = options.flatten ? [flatten(calendars, this.labels.flat)] : [...calendars]
    const index = new RemoteCalendarIndex(this.service)

    const written: string[] = []
    const skipped: string[] = []
    for (const calendar of targets) {
      const added = await this.addCalendar(calendar, index)
      ;(added ? written : skipped).push(calendar.name)
    }
    return { written, skipped }
  }
}
