import { mkdtemp } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import pino, { type Logger } from 'pino'
import type { EventCache, RawEventRecord } from './types/events.js'

/** テスト用の生レコードを作る */
export function rawEvent(overrides: Partial<RawEventRecord> = {}): RawEventRecord {
  return {
    start: '2016-07-28T21:00:00+0000',
    end: '2016-07-28T21:40:00+0000',
    venue_artist: 'artist1',
    url: 'http://example.com/artists/artist1',
    venue_name: 'venue1',
    venue_url: 'http://example.com/venues/venue1',
    description: '123 Fake Lane, Denver, CO',
    ...overrides,
  }
}

function slot(hour: number, artist: number, venue: 1 | 2): RawEventRecord {
  return rawEvent({
    start: `2016-07-28T${hour}:00:00+0000`,
    end: `2016-07-28T${hour}:40:00+0000`,
    venue_artist: `artist${artist}`,
    url: `http://example.com/artists/artist${artist}`,
    venue_name: `venue${venue}`,
    venue_url: `http://example.com/venues/venue${venue}`,
    description: venue === 1 ? '123 Fake Lane, Denver, CO' : '321 Fake Lane, Denver, CO',
  })
}

/** 2会場 × 3公演 */
export const SIX_EVENTS: readonly RawEventRecord[] = [
  slot(21, 1, 1),
  slot(22, 2, 1),
  slot(23, 3, 1),
  slot(21, 4, 2),
  slot(22, 5, 2),
  slot(23, 6, 2),
]

export function sampleCache(): EventCache {
  return {
    retrieved: '2016-07-16T18:32:13',
    data: SIX_EVENTS.map((record) => ({ ...record })),
  }
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}

export function makeTempDir(prefix = 'venue-calendars-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}
