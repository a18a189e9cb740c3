import { DEFAULT_LABELS, flatten, type Calendar, type CalendarLabels } from '../lib/calendar.js'
import type { WriteOptions, WriteResult } from '../types/events.js'
import type { Writer } from './writer.js'

export interface StdoutWriterOptions {
  readonly output?: NodeJS.WritableStream
  readonly labels?: CalendarLabels
}

/** 取得したイベントを一覧表示する */
export class StdoutWriter implements Writer {
  readonly name = 'stdout'
  private readonly output: NodeJS.WritableStream
  private readonly labels: CalendarLabels

  constructor(options: StdoutWriterOptions = {}) {
    this.output = options.output ?? process.stdout
    this.labels = options.labels ?? DEFAULT_LABELS
  }

  formatCalendar(calendar: Calendar, flattened: boolean): string {
    const lines = [`${calendar.name}:`]
    for (const event of calendar) {
      lines.push(`\t${flattened ? event.describeWithVenue() : event.describe()}`)
    }
    return `${lines.join('\n')}\n\n`
  }

  async write(calendars: Iterable<Calendar>, options: WriteOptions): Promise<WriteResult> {
    const targets = options.flatten ? [flatten(calendars, this.labels.flat)] : [...calendars]
    for (const calendar of targets) {
      this.output.write(this.formatCalendar(calendar, options.flatten))
    }
    return { written: targets.map((calendar) => calendar.name), skipped: [] }
  }
}
