import { DateTime } from 'luxon'
import { z } from 'zod'
import { MalformedRecordError } from './errors.js'
import type { RawEventRecord } from '../types/events.js'

const FEED_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'+0000'"

const rawEventSchema = z.object({
  start: z.string(),
  end: z.string(),
  venue_artist: z.string(),
  url: z.string(),
  venue_name: z.string(),
  venue_url: z.string(),
  description: z.string(),
})

function parseFeedDate(value: string, field: 'start' | 'end', index?: number): DateTime {
  const parsed = DateTime.fromFormat(value, FEED_DATE_FORMAT, { zone: 'utc', locale: 'en-US' })
  if (!parsed.isValid) {
    throw new MalformedRecordError(`Invalid ${field} "${value}": ${parsed.invalidExplanation ?? 'unparsable'}`, index)
  }
  return parsed
}

/** 1公演分のイベント。生成後は変更しない */
export class Event {
  private constructor(
    readonly start: DateTime,
    readonly end: DateTime,
    readonly artist: string,
    readonly artistUrl: string,
    readonly venue: string,
    readonly venueUrl: string,
    readonly address: string
  ) {}

  /** 生レコードを検証してEventを生成する。index はエラーメッセージ用 */
  static fromRecord(record: unknown, index?: number): Event {
    const parsed = rawEventSchema.safeParse(record)
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')
      const where = index === undefined ? 'Event record' : `Event record #${index}`
      throw new MalformedRecordError(`${where} is missing or has invalid fields: ${fields}`, index, {
        cause: parsed.error,
      })
    }
    const raw: RawEventRecord = parsed.data
    return new Event(
      parseFeedDate(raw.start, 'start', index),
      parseFeedDate(raw.end, 'end', index),
      raw.venue_artist.trim(),
      raw.url,
      raw.venue_name,
      raw.venue_url,
      raw.description
    )
  }

  /** "(Thu 09:00 PM - 09:40 PM): artist" */
  describe(): string {
    return `(${this.start.toFormat('ccc hh:mm a')} - ${this.end.toFormat('hh:mm a')}): ${this.artist}`
  }

  describeWithVenue(): string {
    return `${this.describe()} @ ${this.venue}`
  }

  /** "[artist](url) @ [venue](url)" 形式のリンク */
  linkDescription(): string {
    return `[${this.artist}](${this.artistUrl}) @ [${this.venue}](${this.venueUrl})`
  }
}

/** 開始時刻順に並んだ名前付きイベント列。同時刻は入力順を保つ */
export class Calendar implements Iterable<Event> {
  readonly events: readonly Event[]

  constructor(readonly name: string, events: Iterable<Event> = []) {
    // Array.prototype.sort は安定ソート
    this.events = [...events].sort((a, b) => a.start.toMillis() - b.start.toMillis())
  }

  get size(): number {
    return this.events.length
  }

  [Symbol.iterator](): Iterator<Event> {
    return this.events[Symbol.iterator]()
  }
}

export interface CalendarLabels {
  readonly flat: string
  venue(venue: string): string
}

export function calendarLabels(label: string): CalendarLabels {
  return {
    flat: label,
    venue: (venue) => `${label} - ${venue}`,
  }
}

export const DEFAULT_LABELS = calendarLabels('UMS')

/** 複数カレンダーを1つに統合し、開始時刻順に並べ直す */
export function flatten(calendars: Iterable<Calendar>, name: string = DEFAULT_LABELS.flat): Calendar {
  const events: Event[] = []
  for (const calendar of calendars) {
    events.push(...calendar.events)
  }
  return new Calendar(name, events)
}

/**
 * 開始時刻順のイベント列を会場ごとのカレンダーに分割する。
 * Mapの順序は最初に現れた会場の順。venue が 'all' 以外ならその会場のみ。
 */
export function groupByVenue(
  events: readonly Event[],
  labels: CalendarLabels = DEFAULT_LABELS,
  venue = 'all'
): Map<string, Calendar> {
  const sorted = [...events].sort((a, b) => a.start.toMillis() - b.start.toMillis())
  const byVenue = new Map<string, Event[]>()
  for (const event of sorted) {
    if (venue !== 'all' && venue !== event.venue) continue
    const bucket = byVenue.get(event.venue)
    if (bucket) {
      bucket.push(event)
    } else {
      byVenue.set(event.venue, [event])
    }
  }

  const calendars = new Map<string, Calendar>()
  for (const [name, bucket] of byVenue) {
    calendars.set(name, new Calendar(labels.venue(name), bucket))
  }
  return calendars
}
