import { writeFile } from 'node:fs/promises'
import type { Calendar, Event } from '../lib/calendar.js'
import { EmptyCalendarError } from '../lib/errors.js'
import { FileWriter } from './file-writer.js'

/** Google Calendar のCSVインポート形式 */
export const CSV_COLUMNS = [
  'Location',
  'Description',
  'Start Date',
  'Start Time',
  'End Date',
  'End Time',
  'All Day Event',
  'Subject',
  'Private',
] as const

export type CsvColumn = (typeof CSV_COLUMNS)[number]
export type CsvRow = Record<CsvColumn, string>

const DATE_FORMAT = 'MM/dd/yyyy'
const TIME_FORMAT = 'hh:mm a'

/** カンマ・ダブルクォート・改行を含むセルのみクォートする */
export function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

export class CsvWriter extends FileWriter {
  readonly name = 'CSV'
  readonly extension = 'csv'

  static toCsvRow(event: Event): CsvRow {
    return {
      Location: event.address,
      Description: event.venue,
      'Start Date': event.start.toFormat(DATE_FORMAT),
      'Start Time': event.start.toFormat(TIME_FORMAT),
      'End Date': event.end.toFormat(DATE_FORMAT),
      'End Time': event.end.toFormat(TIME_FORMAT),
      'All Day Event': 'False',
      Subject: event.artist,
      Private: 'False',
    }
  }

  static render(calendar: Calendar): string {
    if (calendar.size === 0) {
      throw new EmptyCalendarError(calendar.name)
    }
    const lines = [CSV_COLUMNS.map(csvCell).join(',')]
    for (const event of calendar) {
      const row = CsvWriter.toCsvRow(event)
      lines.push(CSV_COLUMNS.map((column) => csvCell(row[column])).join(','))
    }
    return `${lines.join('\n')}\n`
  }

  protected async writeFile(path: string, calendar: Calendar): Promise<void> {
    await writeFile(path, CsvWriter.render(calendar), 'utf-8')
  }
}
