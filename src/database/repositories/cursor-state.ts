import type { Database } from '../types.js'

// Key/value rows backing the sqlite cursor store. Values are stored as text
// so that parsing (and rejecting garbage) stays with the cursor store.
export const createCursorStateRepository = (db: Database) => {
  const get = async (key: string): Promise<string | null> => {
    const result = await db.query<{ value: string }>(
      'SELECT value FROM cursor_state WHERE key = ?',
      [key]
    )
    return result.rows[0]?.value ?? null
  }
  
  const set = async (key: string, value: string): Promise<void> => {
    await db.query(
      `INSERT INTO cursor_state (key, value) 
       VALUES (?, ?) 
       ON CONFLICT (key) 
       DO UPDATE SET value = excluded.value, updated_at = CURRENT_TIMESTAMP`,
      [key, value]
    )
  }
  
  return {
    get,
    set
  }
}
