import { Redis } from 'ioredis'
import type { Config } from '../shared/config.js'
import type { Database } from '../database/types.js'
import type { KeyValueCache } from './types.js'
import { createCursorStateRepository } from '../database/repositories/cursor-state.js'
import { logger } from '../shared/logger.js'

export type CursorBackend = {
  cache: KeyValueCache
  close: () => Promise<void>
}

/** Opens the cache the cursor store writes through, per CURSOR_STORE. */
export const openCursorBackend = (config: Pick<Config, 'cursorStore' | 'redis'>, db: Database): CursorBackend => {
  if (config.cursorStore.backend === 'sqlite') {
    logger.info('[CursorStore] Using SQLite cursor_state table')
    return { cache: createCursorStateRepository(db), close: async () => {} }
  }

  const redisClient = new Redis(config.redis.url, { maxRetriesPerRequest: 3 })
  redisClient.on('connect', () => logger.info('[CursorStore] Connected to Redis.'))
  redisClient.on('error', (err) => logger.error('[CursorStore] Redis connection error:', err))

  return {
    cache: redisClient,
    close: async () => {
      await redisClient.quit()
      logger.info('[CursorStore] Redis client disconnected.')
    },
  }
}
