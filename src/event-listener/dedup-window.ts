import type { EventIdentity } from './types.js'

export type DedupWindowOptions = {
  // Keep identities this many blocks behind the eviction point; unset keeps everything
  retentionBlocks?: number
}

export const identityKey = (identity: EventIdentity): string =>
  `${identity.network}:${identity.transactionHash.toLowerCase()}:${identity.logIndex}`

/**
 * Event identities already dispatched by one listener during this run. Lives
 * only in memory: across restarts the persisted cursor is what prevents
 * redelivery.
 */
export const createDedupWindow = (options: DedupWindowOptions = {}) => {
  // identity key -> block the log was emitted in
  const seen = new Map<string, bigint>()

  const has = (identity: EventIdentity): boolean => seen.has(identityKey(identity))

  /** Marks the identity as seen; false when it already was. */
  const admit = (identity: EventIdentity, blockNumber: bigint): boolean => {
    const key = identityKey(identity)
    if (seen.has(key)) return false
    seen.set(key, blockNumber)
    return true
  }

  /**
   * Called with the new cursor after each sweep. Logs at or below the cursor
   * are never fetched again in this run, so only the retention margin is kept.
   */
  const advance = (cursor: bigint): number => {
    if (options.retentionBlocks === undefined) return 0
    const threshold = cursor - BigInt(options.retentionBlocks) + 1n
    let evicted = 0
    for (const [key, blockNumber] of seen) {
      if (blockNumber < threshold) {
        seen.delete(key)
        evicted++
      }
    }
    return evicted
  }

  return {
    has,
    admit,
    advance,
    size: () => seen.size,
  }
}

export type DedupWindow = ReturnType<typeof createDedupWindow>
