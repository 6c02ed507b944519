import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseConnection, createOcatDatabase, createUsintDatabase } from '@usint/db'
import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { serverLog } from './lib/log.js'
import { createMailer } from './services/emailing.js'

const config = loadConfig()
const usint = createUsintDatabase(config.usintDatabaseUrl)
const ocat = createOcatDatabase(config.ocatDatabaseUrl)

await checkDatabaseConnection(usint.pool)
serverLog.info(`Connected to the usint database (${config.revVersion})`)

const app = createApp({
  db: usint.db,
  ocat: ocat.db,
  mailer: createMailer(config),
  config,
})

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  serverLog.info(`Usint (${config.name}) listening on http://localhost:${info.port}`)
  if (config.testNotifications) {
    serverLog.info('Test notifications on: emails are logged, not sent')
  }
})

function shutdown(signal: string) {
  serverLog.info(`${signal} received, shutting down`)
  server.close()
  Promise.all([usint.pool.end(), ocat.pool.end()])
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      serverLog.error('Failed to close database pools', error)
      process.exit(1)
    })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
