import { env } from './config/env'
import { buildApp } from './app'
import { logger } from './logger'
import { closeDb } from './db/sqlite'
import { getDocumentStore } from './db/store'
import { createDrainManager } from './lifecycle/drain-manager'

async function main() {
  // Touch the store early to surface migration issues fast
  if (!getDocumentStore()) {
    logger.warn('DATABASE_PATH not set; quiz and resume routes will report the store as not configured')
  }

  const app = buildApp()
  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, 'Career Coach API listening')
  })

  const { drain } = createDrainManager(server, env.DRAIN_TIMEOUT_MS)

  const shutdown = async (reason: string) => {
    logger.info({ reason }, 'Shutting down Career Coach API')
    await drain()
    closeDb()
    process.exit(0)
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

main().catch((error) => {
  logger.error({ err: error }, 'Failed to start Career Coach API')
  process.exit(1)
})
