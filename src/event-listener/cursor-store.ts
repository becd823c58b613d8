import type { KeyValueCache } from './types.js'
import { ConfigError, PersistenceError, describeError } from '../shared/errors.js'
import { logger } from '../shared/logger.js'

export type CursorStore = {
  load: (key: string, fallback: bigint) => Promise<bigint>
  save: (key: string, value: bigint) => Promise<void>
  reset: (key: string, value: bigint) => Promise<void>
}

export const cursorKey = (network: string): string => `${network}_all_contracts`

const parseCursor = (raw: string): bigint | null => {
  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed)) return null
  return BigInt(trimmed)
}

/**
 * Block cursors over a string cache. Reads degrade to the caller's fallback
 * and regular writes are best-effort; only `reset` reports failure.
 */
export const createCursorStore = (cache: KeyValueCache): CursorStore => {
  const load = async (key: string, fallback: bigint): Promise<bigint> => {
    let raw: string | null
    try {
      raw = await cache.get(key)
    } catch (error) {
      logger.warn(`[CursorStore] Failed to read cursor ${key}, using ${fallback}: ${describeError(error)}`)
      return fallback
    }

    if (raw === null) return fallback

    const value = parseCursor(raw)
    if (value === null) {
      logger.warn(`[CursorStore] Ignoring unparsable cursor ${key}=${JSON.stringify(raw)}, using ${fallback}`)
      return fallback
    }
    return value
  }

  const write = async (key: string, value: bigint): Promise<void> => {
    if (value < 0n) {
      throw new PersistenceError('write', new RangeError(`Cursor must be non-negative, got ${value}`), { key })
    }
    try {
      await cache.set(key, value.toString())
    } catch (error) {
      throw new PersistenceError('write', error, { key, value: value.toString() })
    }
  }

  const save = async (key: string, value: bigint): Promise<void> => {
    try {
      await write(key, value)
    } catch (error) {
      logger.error(`[CursorStore] Failed to save cursor ${key}=${value}: ${describeError(error)}`)
    }
  }

  // Administrative override: may move the cursor backwards
  const reset = async (key: string, value: bigint): Promise<void> => {
    await write(key, value)
    logger.warn(`[CursorStore] Cursor ${key} reset to ${value}`)
  }

  return { load, save, reset }
}

/**
 * Operator entry point: moves a configured network's cursor to `block`.
 * Unknown names are refused so a typo cannot write a key nothing reads.
 */
export const resetNetworkCursor = async (
  store: CursorStore,
  network: string,
  block: bigint,
  configuredNetworks: string[]
): Promise<string> => {
  if (!configuredNetworks.includes(network)) {
    throw new ConfigError(`Unknown network '${network}'; configured networks: ${configuredNetworks.join(', ')}`, { network })
  }
  const key = cursorKey(network)
  await store.reset(key, block)
  return key
}
