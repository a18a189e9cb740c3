/** Google Calendar API の events.insert に渡すイベント本体 */
export interface GoogleCalendarEventBody {
  readonly start: { readonly dateTime: string }
  readonly end: { readonly dateTime: string }
  readonly location: string
  readonly description: string
  readonly summary: string
}

export interface RemoteCalendarEntry {
  readonly id: string
  readonly summary: string
}

/** 書き込み先のカレンダーサービス。認証やAPIクライアントの詳細は実装側に閉じる */
export interface RemoteCalendarService {
  listCalendars(): Promise<readonly RemoteCalendarEntry[]>
  insertCalendar(summary: string): Promise<RemoteCalendarEntry>
  insertEvent(calendarId: string, body: GoogleCalendarEventBody): Promise<void>
  deleteCalendar(calendarId: string): Promise<void>
}
