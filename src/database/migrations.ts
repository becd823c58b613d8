import type { DatabaseConnection } from './types.js'
import { logger } from '../shared/logger.js'

type Migration = {
  version: number
  name: string
  up: (db: DatabaseConnection) => Promise<void>
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'cursor_state',
    up: async (db) => {
      await db.query(`
        CREATE TABLE IF NOT EXISTS cursor_state (
          key TEXT PRIMARY KEY,
          value TEXT NOT NULL,
          updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
        )
      `)
    }
  },
  {
    version: 2,
    name: 'chain_events',
    up: async (db) => {
      await db.query(`
        CREATE TABLE IF NOT EXISTS chain_events (
          network TEXT NOT NULL,
          tx_hash TEXT NOT NULL,
          log_index INTEGER NOT NULL,
          block_number INTEGER NOT NULL,
          contract_address TEXT NOT NULL,
          event_name TEXT NOT NULL,
          args_json TEXT NOT NULL,
          recorded_at TIMESTAMP NOT NULL,
          PRIMARY KEY (network, tx_hash, log_index)
        )
      `)

      await db.query(`
        CREATE INDEX IF NOT EXISTS idx_chain_events_block ON chain_events(network, block_number)
      `)
    }
  }
]

export const runMigrations = async (db: DatabaseConnection): Promise<void> => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `)
  
  const result = await db.query<{ version: number }>('SELECT version FROM migrations')
  const appliedVersions = new Set(result.rows.map(r => r.version))
  
  for (const migration of migrations) {
    if (!appliedVersions.has(migration.version)) {
      logger.info(`[DB] Applying migration ${migration.version}: ${migration.name}`)
      
      await db.transaction(async (tx) => {
        await migration.up(tx)
        await tx.query(
          'INSERT INTO migrations (version, name) VALUES (?, ?)',
          [migration.version, migration.name]
        )
      })
      
      logger.info(`[DB] Migration ${migration.version} applied successfully`)
    }
  }
}
