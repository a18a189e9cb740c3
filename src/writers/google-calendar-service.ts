import { google } from 'googleapis'
import type { GoogleCalendarEventBody, RemoteCalendarEntry, RemoteCalendarService } from '../types/google-calendar.js'

const CALENDAR_SCOPE = 'https://www.googleapis.com/auth/calendar'

export interface GoogleCalendarServiceOptions {
  /** サービスアカウント等の鍵ファイル。省略時はADCを使う */
  readonly keyFile?: string
}

/** googleapis の Calendar v3 クライアントを RemoteCalendarService に適合させる */
export function createGoogleCalendarService(options: GoogleCalendarServiceOptions = {}): RemoteCalendarService {
  const auth = new google.auth.GoogleAuth({
    keyFile: options.keyFile,
    scopes: [CALENDAR_SCOPE],
  })
  const cal = google.calendar({ version: 'v3', auth })

  return {
    async listCalendars(): Promise<RemoteCalendarEntry[]> {
      const entries: RemoteCalendarEntry[] = []
      let pageToken: string | undefined
      do {
        const response = await cal.calendarList.list({ pageToken })
        for (const item of response.data.items ?? []) {
          if (item.id && item.summary) {
            entries.push({ id: item.id, summary: item.summary })
          }
        }
        pageToken = response.data.nextPageToken ?? undefined
      } while (pageToken)
      return entries
    },

    async insertCalendar(summary: string): Promise<RemoteCalendarEntry> {
      const response = await cal.calendars.insert({ requestBody: { summary } })
      const id = response.data.id
      if (!id) {
        throw new Error(`Calendar creation returned no id for calendar: ${summary}`)
      }
      return { id, summary }
    },

    async insertEvent(calendarId: string, body: GoogleCalendarEventBody): Promise<void> {
      await cal.events.insert({ calendarId, requestBody: body })
    },

    async deleteCalendar(calendarId: string): Promise<void> {
      await cal.calendars.delete({ calendarId })
    },
  }
}
