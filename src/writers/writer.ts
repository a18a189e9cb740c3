import type { Calendar } from '../lib/calendar.js'
import type { WriteOptions, WriteResult } from '../types/events.js'

/** カレンダー群を何らかの出力先に書き出す */
export interface Writer {
  readonly name: string
  write(calendars: Iterable<Calendar>, options: WriteOptions): Promise<WriteResult>
}
