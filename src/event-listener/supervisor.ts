import type { Abi, Address } from 'viem'
import type { NetworkConfig } from '../shared/config.js'
import type { NetworkConnection } from '../network/connection.js'
import type { CursorStore } from './cursor-store.js'
import type { EventSubscription, ListenerHandle, OffchainStore, RegistryContract } from './types.js'
import { startListener } from './listener.js'
import { describeError } from '../shared/errors.js'
import { logger } from '../shared/logger.js'

export const DEFAULT_EXCLUDED_REGISTRIES = ['ValidatorRegistry']

export type SupervisorOptions = {
  networks: NetworkConfig[]
  connect: (network: NetworkConfig) => NetworkConnection
  cursorStore: CursorStore
  offchainStore: OffchainStore
  subscriptions: EventSubscription[]
  excludedRegistries?: string[]
  pollIntervalMs?: number
  backoffIntervalMs?: number
  dedupRetentionBlocks?: number
}

export type SupervisorHandle = {
  listeners: ListenerHandle[]
  stop: () => Promise<void>
}

const abiHasEvent = (abi: Abi, eventName: string): boolean =>
  abi.some((item) => item.type === 'event' && item.name === eventName)

/**
 * Turns a network's registry map into the contracts its listener polls.
 * Excluded registries are dropped, as are subscriptions whose event the
 * registry's ABI does not declare.
 */
export const resolveRegistryContracts = (
  network: NetworkConfig,
  subscriptions: EventSubscription[],
  excludedRegistries: string[] = DEFAULT_EXCLUDED_REGISTRIES
): RegistryContract[] => {
  const contracts: RegistryContract[] = []

  for (const [name, registry] of Object.entries(network.registries)) {
    if (excludedRegistries.includes(name)) continue

    const address: Address = registry.address
    const abi: Abi = registry.abi
    const supported = subscriptions.filter(({ eventName }) => {
      if (abiHasEvent(abi, eventName)) return true
      logger.warn(`[Supervisor] ${network.name}/${name} ABI has no ${eventName} event; not subscribing`)
      return false
    })

    if (supported.length === 0) continue
    contracts.push({ name, address, abi, subscriptions: supported })
  }

  return contracts
}

/**
 * Starts one independent listener per configured network. If a network fails
 * to connect, the listeners already started are stopped before the error is
 * rethrown.
 */
export const startSupervisor = async (options: SupervisorOptions): Promise<SupervisorHandle> => {
  const listeners: ListenerHandle[] = []

  const stop = async (): Promise<void> => {
    logger.info(`[Supervisor] Stopping ${listeners.length} listeners...`)
    await Promise.all(listeners.map((listener) => listener.stop()))
    logger.info('[Supervisor] All listeners stopped.')
  }

  for (const network of options.networks) {
    const tag = `[Supervisor] [${network.name.toUpperCase()}]`
    logger.info(`${tag} Connecting...`)
    let connection: NetworkConnection
    try {
      connection = options.connect(network)
    } catch (error) {
      logger.error(`${tag} Failed to connect: ${describeError(error)}`)
      await stop()
      throw error
    }
    logger.info(`${tag} Connected to ${connection.endpoint} as ${connection.account.address}`)

    const contracts = resolveRegistryContracts(network, options.subscriptions, options.excludedRegistries)

    listeners.push(startListener({
      network: network.name,
      reader: connection.reader,
      contracts,
      cursorStore: options.cursorStore,
      offchainStore: options.offchainStore,
      pollIntervalMs: options.pollIntervalMs,
      backoffIntervalMs: options.backoffIntervalMs,
      dedupRetentionBlocks: options.dedupRetentionBlocks,
    }))
  }

  return { listeners, stop }
}
