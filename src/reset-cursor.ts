import { z } from 'zod'
import { createDatabase } from './database/create-database.js'
import { loadNetworkNames, loadServiceConfig } from './shared/config.js'
import { logger } from './shared/logger.js'
import { createCursorStore, openCursorBackend, resetNetworkCursor } from './event-listener/index.js'

// Usage: node dist/reset-cursor.js <network> <block>
const argsSchema = z.tuple([
  z.string().regex(/^[A-Za-z0-9_-]+$/, 'network names may only contain letters, digits, - and _'),
  z.string().regex(/^\d+$/, 'block must be a non-negative integer').transform((value) => BigInt(value)),
])

const main = async () => {
  const parsedArgs = argsSchema.safeParse(process.argv.slice(2))
  if (!parsedArgs.success) {
    logger.error(`Usage: reset-cursor <network> <block> (${parsedArgs.error.issues.map((i) => i.message).join('; ')})`)
    process.exit(1)
  }
  const [network, block] = parsedArgs.data

  const config = loadServiceConfig()
  const networkNames = loadNetworkNames(config.providers.networksConfigPath)
  const db = await createDatabase(config.database)
  await db.migrate()
  const backend = openCursorBackend(config, db)

  try {
    const key = await resetNetworkCursor(createCursorStore(backend.cache), network, block, networkNames)
    logger.info(`Cursor ${key} set to ${block}; the ${network} listener resumes from block ${block + 1n} on next start`)
  } finally {
    await backend.close()
    await db.close()
  }
}

main().catch((error: unknown) => {
  logger.error('Cursor reset failed:', error)
  process.exit(1)
})
