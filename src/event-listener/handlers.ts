import type { EventSubscription, HandlerFn } from './types.js'
import { logger } from '../shared/logger.js'

/**
 * Records a proof posted to a registry. The store ignores an event it already
 * holds, so a redelivery after restart is harmless.
 */
export const handlePostProof: HandlerFn = async (event, store) => {
  const inserted = await store.recordEvent({
    network: event.network,
    transactionHash: event.transactionHash,
    logIndex: event.logIndex,
    blockNumber: event.blockNumber,
    contractAddress: event.address,
    eventName: event.eventName,
    args: event.args,
    recordedAt: new Date(),
  })

  if (inserted) {
    logger.info(`[Handlers] Recorded ${event.eventName} from ${event.address} on ${event.network}`, {
      transactionHash: event.transactionHash,
      logIndex: event.logIndex,
      blockNumber: event.blockNumber.toString(),
    })
  } else {
    logger.debug(`[Handlers] ${event.eventName} ${event.transactionHash}:${event.logIndex} already recorded`)
  }
}

export const DEFAULT_SUBSCRIPTIONS: EventSubscription[] = [
  { eventName: 'PostProof', handler: handlePostProof },
]
