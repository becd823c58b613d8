import type { Abi, Address, Hash } from 'viem'
import type { ChainEventRecord } from '../database/repositories/chain-events.js'

/** One emitted log as handed to handlers. */
export type RawLogEvent = {
  network: string
  address: Address
  eventName: string
  args: unknown
  transactionHash: Hash
  logIndex: number
  blockNumber: bigint
}

/** Uniquely identifies one log within a network's history. */
export type EventIdentity = {
  network: string
  transactionHash: Hash
  logIndex: number
}

/** Downstream persistence handed to every handler. */
export type OffchainStore = {
  recordEvent: (event: ChainEventRecord) => Promise<boolean>
}

export type HandlerFn = (event: RawLogEvent, store: OffchainStore) => Promise<void> | void

export type EventSubscription = {
  eventName: string
  handler: HandlerFn
}

export type RegistryContract = {
  name: string
  address: Address
  abi: Abi
  subscriptions: EventSubscription[]
}

// Log shape returned by ChainReader.getContractEvents
export type ContractEventLog = {
  address: Address
  args: unknown
  transactionHash: Hash
  logIndex: number
  blockNumber: bigint
}

/** The slice of an RPC client the listener needs. */
export type ChainReader = {
  getBlockNumber: () => Promise<bigint>
  getContractEvents: (params: {
    address: Address
    abi: Abi
    eventName: string
    fromBlock: bigint
    toBlock: bigint
  }) => Promise<ContractEventLog[]>
}

/** Minimal string cache; an ioredis client satisfies it as-is. */
export type KeyValueCache = {
  get: (key: string) => Promise<string | null>
  set: (key: string, value: string) => Promise<unknown>
}

export type ListenerState = 'connecting' | 'polling' | 'backoff' | 'stopped'

export type ListenerStatus = {
  network: string
  state: ListenerState
  cursor: bigint | null
  lastHead: bigint | null
  ticks: number
  dedupSize: number
  lastError: string | null
}

export type ListenerHandle = {
  network: string
  status: () => ListenerStatus
  stop: () => Promise<void>
  done: Promise<void>
}
