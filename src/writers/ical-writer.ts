import { createHash } from 'node:crypto'
import { writeFile } from 'node:fs/promises'
import { DateTime } from 'luxon'
import type { Calendar, Event } from '../lib/calendar.js'
import { FileWriter, type FileWriterOptions } from './file-writer.js'

const PRODID = '-//venue-calendars//schedule export//EN'
const ICAL_DATETIME = "yyyyMMdd'T'HHmmss"
const ICAL_UTC_DATETIME = "yyyyMMdd'T'HHmmss'Z'"
const UID_DOMAIN = 'venue-calendars'
const MAX_LINE_OCTETS = 75

/** iCalendar の TEXT 値をエスケープする */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n')
}

/** 75オクテットを超える行を折り返す（継続行は先頭に空白1つ） */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) return line

  const parts: string[] = []
  let current = ''
  let currentOctets = 0
  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf-8')
    const limit = parts.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1
    if (currentOctets + octets > limit) {
      parts.push(current)
      current = ''
      currentOctets = 0
    }
    current += char
    currentOctets += octets
  }
  parts.push(current)
  return parts.join('\r\n ')
}

export interface IcalWriterOptions extends FileWriterOptions {
  /** DTSTAMP に使う時刻 */
  readonly now?: () => Date
}

export class IcalWriter extends FileWriter {
  readonly name = 'iCal'
  readonly extension = 'ical'

  private readonly now: () => Date

  constructor(options: IcalWriterOptions) {
    super(options)
    this.now = options.now ?? (() => new Date())
  }

  /** 会場・開始時刻・出演者から決まる UID。再出力しても同じ値になる */
  static eventUid(event: Event): string {
    const digest = createHash('sha1')
      .update([event.venue, event.start.toISO() ?? '', event.artist].join('\n'))
      .digest('hex')
    return `${digest}@${UID_DOMAIN}`
  }

  static eventLines(event: Event, stamp: DateTime): string[] {
    return [
      'BEGIN:VEVENT',
      `UID:${IcalWriter.eventUid(event)}`,
      `DTSTAMP:${stamp.toUTC().toFormat(ICAL_UTC_DATETIME)}`,
      `DTSTART:${event.start.toFormat(ICAL_DATETIME)}`,
      `DTEND:${event.end.toFormat(ICAL_DATETIME)}`,
      `SUMMARY:${escapeICalText(event.artist)}`,
      `LOCATION:${escapeICalText(`${event.venue}: ${event.address}`)}`,
      `DESCRIPTION:${escapeICalText(event.linkDescription())}`,
      'END:VEVENT',
    ]
  }

  static render(calendar: Calendar, stamp: DateTime = DateTime.utc()): string {
    const lines = [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      `PRODID:${PRODID}`,
      `NAME:${escapeICalText(calendar.name)}`,
      `X-WR-CALNAME:${escapeICalText(calendar.name)}`,
    ]
    for (const event of calendar) {
      lines.push(...IcalWriter.eventLines(event, stamp))
    }
    lines.push('END:VCALENDAR')
    return lines.map(foldLine).join('\r\n') + '\r\n'
  }

  protected async writeFile(path: string, calendar: Calendar): Promise<void> {
    await writeFile(path, IcalWriter.render(calendar, DateTime.fromJSDate(this.now(), { zone: 'utc' })), 'utf-8')
  }
}
