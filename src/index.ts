#!/usr/bin/env node
import 'dotenv/config'
import { loadConfig } from './lib/config.js'
import { openConfirmationSession } from './lib/confirm.js'
import { runExport } from './lib/export.js'
import { createLogger } from './lib/logger.js'
import { createGoogleCalendarService } from './writers/google-calendar-service.js'

async function main(): Promise<void> {
  const config = loadConfig()
  const logger = createLogger({ level: config.logLevel })
  const session = openConfirmationSession(process.stdin, process.stdout)

  try {
    const summary = await runExport(config, {
      gate: session.gate,
      createRemoteService: (c) => createGoogleCalendarService({ keyFile: c.googleCredentialsPath }),
      logger,
    })
    logger.info({ calendars: summary.calendars, events: summary.events }, 'Export completed')
  } finally {
    session.close()
  }
}

main().catch((error: unknown) => {
  createLogger().fatal({ err: error }, 'Export failed')
  process.exitCode = 1
})
