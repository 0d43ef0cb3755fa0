import { serve } from '@hono/node-server'
import { processRecurringBills } from './bills'
import { loadConfig } from './config'
import { createConnectionFactory } from './db'
import { createHttpApp } from './http'
import { diagnosticsEnabled, initDiagnostics } from './lib/diagnostics'
import { configureLogger, logger } from './lib/logger'
import { initSchema } from './schema'

const config = loadConfig(process.env)

configureLogger({ level: config.logLevel })
initDiagnostics({ dsn: config.sentryDsn, environment: config.environment })
if (diagnosticsEnabled()) {
  logger.info('Error reporting enabled')
}

const connect = createConnectionFactory(config.database)
initSchema(connect)
processRecurringBills(connect)

if (config.localUsers.length === 0) {
  logger.warn('No LOCAL_USERS configured; nobody will be able to log in.')
}

const app = createHttpApp({ config, connect })

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(`Homie listening on http://localhost:${info.port}`)
})

const shutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down`)
  server.close()
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
