import type {
  ChainReader,
  ListenerHandle,
  ListenerState,
  ListenerStatus,
  OffchainStore,
  RegistryContract,
} from './types.js'
import { type CursorStore, cursorKey } from './cursor-store.js'
import { createDedupWindow, identityKey } from './dedup-window.js'
import { createLogFetcher } from './log-fetcher.js'
import { HandlerError, ProviderError, PrunedRangeError, RelayError, describeError } from '../shared/errors.js'
import { logger } from '../shared/logger.js'
import { sleep } from '../shared/sleep.js'

export const DEFAULT_POLL_INTERVAL_MS = 3000
export const DEFAULT_BACKOFF_INTERVAL_MS = 5000

export type ListenerOptions = {
  network: string
  reader: ChainReader
  contracts: RegistryContract[]
  cursorStore: CursorStore
  offchainStore: OffchainStore
  pollIntervalMs?: number
  backoffIntervalMs?: number
  dedupRetentionBlocks?: number
}

export type TickOutcome =
  | { kind: 'idle'; head: bigint }
  | {
      kind: 'advanced'
      fromBlock: bigint
      toBlock: bigint
      dispatched: number
      duplicates: number
      prunedRegistries: string[]
    }

/**
 * Per-network polling loop. Each tick fetches every subscribed event of every
 * registry over `[cursor + 1, head]`, dispatches logs not seen before in this
 * run, and only then advances and persists the cursor. Any error aborts the
 * tick with the cursor untouched; the loop backs off and tries again.
 */
export const createListener = (options: ListenerOptions) => {
  const {
    network,
    reader,
    contracts,
    cursorStore,
    offchainStore,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    backoffIntervalMs = DEFAULT_BACKOFF_INTERVAL_MS,
  } = options
  const tag = `[Listener:${network}]`
  const key = cursorKey(network)
  const fetcher = createLogFetcher(network, reader)
  const dedup = createDedupWindow({ retentionBlocks: options.dedupRetentionBlocks })

  let state: ListenerState = 'connecting'
  let cursor: bigint | null = null
  let lastHead: bigint | null = null
  let ticks = 0
  let lastError: string | null = null

  const readHead = async (): Promise<bigint> => {
    try {
      const head = await reader.getBlockNumber()
      lastHead = head
      return head
    } catch (error) {
      throw new ProviderError(`Failed to read block height: ${describeError(error)}`, { network }, { cause: error })
    }
  }

  /** Loads the starting cursor, defaulting to one block below the current head. */
  const initialize = async (): Promise<bigint> => {
    const head = await readHead()
    const fallback = head > 0n ? head - 1n : 0n
    const loaded = await cursorStore.load(key, fallback)
    cursor = loaded
    return loaded
  }

  const runTick = async (): Promise<TickOutcome> => {
    if (cursor === null) {
      throw new RelayError(`${tag} Tick requested before the cursor was loaded`, { network })
    }
    const previous = cursor
    ticks++

    const head = await readHead()
    if (head <= previous) {
      return { kind: 'idle', head }
    }

    const fromBlock = previous + 1n
    let dispatched = 0
    let duplicates = 0
    const prunedRegistries: string[] = []

    for (const contract of contracts) {
      for (const { eventName, handler } of contract.subscriptions) {
        const result = await fetcher.fetch(contract, eventName, fromBlock, head)
        if (!result.ok) {
          if (result.error instanceof PrunedRangeError) {
            // The range is gone for this registry; its other events would hit the same wall
            logger.warn(`${tag} Pruned block range ${fromBlock}-${head} on ${contract.name}; skipping to ${head}`)
            prunedRegistries.push(contract.name)
            break
          }
          throw result.error
        }

        for (const event of result.value) {
          if (!dedup.admit(event, event.blockNumber)) {
            duplicates++
            continue
          }
          try {
            await handler(event, offchainStore)
          } catch (error) {
            // Already admitted: once a later tick advances past this block the event is gone
            logger.warn(`${tag} Dropping ${identityKey(event)} (block ${event.blockNumber}) after ${eventName} handler failure; it will not be redelivered`)
            throw new HandlerError(eventName, error, {
              network,
              registry: contract.name,
              transactionHash: event.transactionHash,
              logIndex: event.logIndex,
            })
          }
          dispatched++
        }
      }
    }

    cursor = head
    await cursorStore.save(key, head)
    dedup.advance(head)

    return { kind: 'advanced', fromBlock, toBlock: head, dispatched, duplicates, prunedRegistries }
  }

  const connect = async (signal: AbortSignal): Promise<void> => {
    while (!signal.aborted && cursor === null) {
      try {
        const loaded = await initialize()
        lastError = null
        logger.info(`${tag} Listening to ${contracts.length} contracts from block ${loaded + 1n}`)
      } catch (error) {
        lastError = describeError(error)
        logger.error(`${tag} Failed to load starting block, retrying in ${backoffIntervalMs}ms: ${lastError}`)
        await sleep(backoffIntervalMs, signal)
      }
    }
  }

  const run = async (signal: AbortSignal): Promise<void> => {
    state = 'connecting'
    await connect(signal)

    while (!signal.aborted) {
      state = 'polling'
      try {
        const outcome = await runTick()
        lastError = null
        if (outcome.kind === 'advanced') {
          const message = `${tag} Processed blocks ${outcome.fromBlock} to ${outcome.toBlock}: ${outcome.dispatched} dispatched, ${outcome.duplicates} duplicates skipped`
          if (outcome.dispatched > 0 || outcome.prunedRegistries.length > 0) {
            logger.info(message, { prunedRegistries: outcome.prunedRegistries })
          } else {
            logger.debug(message)
          }
        } else {
          logger.debug(`${tag} Waiting for new blocks... (cursor: ${cursor}, head: ${outcome.head})`)
        }
        await sleep(pollIntervalMs, signal)
      } catch (error) {
        state = 'backoff'
        lastError = describeError(error)
        const context = error instanceof RelayError ? error.context : {}
        logger.error(`${tag} Listener error, backing off ${backoffIntervalMs}ms: ${lastError}`, context)
        await sleep(backoffIntervalMs, signal)
      }
    }

    state = 'stopped'
    logger.info(`${tag} Listener stopped at block ${cursor ?? 'unknown'}`)
  }

  const status = (): ListenerStatus => ({
    network,
    state,
    cursor,
    lastHead,
    ticks,
    dedupSize: dedup.size(),
    lastError,
  })

  return { initialize, runTick, run, status }
}

export type Listener = ReturnType<typeof createListener>

/** Starts the loop on its own task; `stop()` resolves once it has exited. */
export const startListener = (options: ListenerOptions): ListenerHandle => {
  const listener = createListener(options)
  const abortController = new AbortController()

  const done = listener.run(abortController.signal).catch((error: unknown) => {
    logger.error(`[Listener:${options.network}] Listener loop crashed: ${describeError(error)}`)
  })

  return {
    network: options.network,
    status: listener.status,
    stop: async () => {
      abortController.abort()
      await done
    },
    done,
  }
}
