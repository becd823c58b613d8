import type { Server } from 'node:http'
import { createDatabase } from './database/create-database.js'
import { createChainEventsRepository } from './database/repositories/chain-events.js'
import { loadConfig } from './shared/config.js'
import { logger } from './shared/logger.js'
import { createNetworkConnection } from './network/connection.js'
import {
  DEFAULT_SUBSCRIPTIONS,
  createCursorStore,
  openCursorBackend,
  startSupervisor,
} from './event-listener/index.js'
import type { CursorBackend, SupervisorHandle } from './event-listener/index.js'
import type { Database } from './database/types.js'
import { startApiServer, stopApiServer } from './api/server.js'

const main = async () => {
  logger.info('Starting chain event relay...')

  let db: Database | null = null
  let cursorBackend: CursorBackend | null = null
  let supervisor: SupervisorHandle | null = null
  let server: Server | null = null

  const releaseResources = async () => {
    if (server) await stopApiServer(server)
    if (supervisor) await supervisor.stop()
    if (cursorBackend) await cursorBackend.close()
    if (db) await db.close()
  }

  try {
    const config = loadConfig()
    logger.info(`Configuration loaded: ${config.networks.length} networks (${config.networks.map((n) => n.name).join(', ')})`)

    logger.info(`Initializing ${config.database.type} database...`)
    const database = await createDatabase(config.database)
    db = database
    logger.info('Running database migrations...')
    await database.migrate()

    const backend = openCursorBackend(config, database)
    cursorBackend = backend

    const activeSupervisor = await startSupervisor({
      networks: config.networks,
      connect: (network) => createNetworkConnection(network, config.providers),
      cursorStore: createCursorStore(backend.cache),
      offchainStore: createChainEventsRepository(database),
      subscriptions: DEFAULT_SUBSCRIPTIONS,
      excludedRegistries: config.listener.excludedRegistries,
      pollIntervalMs: config.listener.pollIntervalMs,
      backoffIntervalMs: config.listener.backoffIntervalMs,
      dedupRetentionBlocks: config.listener.dedupRetentionBlocks,
    })
    supervisor = activeSupervisor

    server = await startApiServer(
      () => activeSupervisor.listeners.map((listener) => listener.status()),
      config.api
    )

    logger.info('System initialization complete! Listening for events...')

    let shuttingDown = false
    const shutdown = async () => {
      if (shuttingDown) return
      shuttingDown = true
      logger.info('Shutting down gracefully...')
      try {
        await releaseResources()
        logger.info('All components stopped. Exiting.')
        process.exit(0)
      } catch (error) {
        logger.error('Error during shutdown:', error)
        process.exit(1)
      }
    }

    process.on('SIGINT', () => void shutdown())
    process.on('SIGTERM', () => void shutdown())
  } catch (error) {
    logger.error('Failed to start system:', error)
    await releaseResources().catch((e: unknown) => logger.error('Error releasing resources during main catch:', e))
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error at main execution level:', error)
  process.exit(1)
})
