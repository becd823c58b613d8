import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createDatabase } from '../database/create-database.js'
import type { Database } from '../database/types.js'
import { openCursorBackend } from './cursor-backend.js'
import { createCursorStore } from './cursor-store.js'

describe('openCursorBackend', () => {
  let db: Database

  beforeEach(async () => {
    db = await createDatabase({ type: 'sqlite', sqlitePath: ':memory:' })
    await db.migrate()
  })

  afterEach(async () => {
    await db.close()
  })

  it('keeps cursors in the cursor_state table when configured for sqlite', async () => {
    const backend = openCursorBackend({ cursorStore: { backend: 'sqlite' }, redis: { url: 'redis://unused.test:6379' } }, db)
    const store = createCursorStore(backend.cache)

    await store.save('fuji_all_contracts', 4321n)

    expect(await backend.cache.get('fuji_all_contracts')).toBe('4321')
    const rows = await db.query<{ key: string; value: string }>('SELECT key, value FROM cursor_state')
    expect(rows.rows).toEqual([{ key: 'fuji_all_contracts', value: '4321' }])
    expect(await store.load('fuji_all_contracts', 0n)).toBe(4321n)
  })

  it('closes without touching the shared database', async () => {
    const backend = openCursorBackend({ cursorStore: { backend: 'sqlite' }, redis: { url: 'redis://unused.test:6379' } }, db)

    await backend.close()

    await backend.cache.set('sepolia_all_contracts', '7')
    expect(await backend.cache.get('sepolia_all_contracts')).toBe('7')
  })
})
