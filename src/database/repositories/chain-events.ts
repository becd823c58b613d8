import { z } from 'zod'
import type { Address, Hash } from 'viem'
import type { Database } from '../types.js'
import { toJson } from '../../shared/json-utils.js'

export type ChainEventRecord = {
  network: string
  transactionHash: Hash
  logIndex: number
  blockNumber: bigint
  contractAddress: Address
  eventName: string
  args: unknown
  recordedAt: Date
}

export type ChainEventKey = Pick<ChainEventRecord, 'network' | 'transactionHash' | 'logIndex'>

const rowSchema = z.object({
  network: z.string(),
  tx_hash: z.string(),
  log_index: z.number().int(),
  block_number: z.number().int(),
  contract_address: z.string(),
  event_name: z.string(),
  args_json: z.string(),
  recorded_at: z.string(),
})

const isHash = (value: string): value is Hash => /^0x[0-9a-f]{64}$/.test(value)
const isAddressText = (value: string): value is Address => /^0x[0-9a-f]{40}$/.test(value)

const toRecord = (raw: unknown): ChainEventRecord => {
  const row = rowSchema.parse(raw)
  if (!isHash(row.tx_hash) || !isAddressText(row.contract_address)) {
    throw new Error(`Malformed chain_events row for ${row.network}:${row.tx_hash}:${row.log_index}`)
  }
  const args: unknown = JSON.parse(row.args_json)
  return {
    network: row.network,
    transactionHash: row.tx_hash,
    logIndex: row.log_index,
    blockNumber: BigInt(row.block_number),
    contractAddress: row.contract_address,
    eventName: row.event_name,
    args,
    recordedAt: new Date(row.recorded_at),
  }
}

/**
 * The offchain store. Rows are keyed by (network, tx hash, log index), so
 * recording the same event twice leaves the first row untouched.
 */
export const createChainEventsRepository = (db: Database) => {
  const recordEvent = async (event: ChainEventRecord): Promise<boolean> => {
    const result = await db.query(
      `INSERT INTO chain_events (
        network, tx_hash, log_index, block_number,
        contract_address, event_name, args_json, recorded_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (network, tx_hash, log_index) DO NOTHING`,
      [
        event.network,
        event.transactionHash.toLowerCase(),
        event.logIndex,
        Number(event.blockNumber),
        event.contractAddress.toLowerCase(),
        event.eventName,
        toJson(event.args),
        event.recordedAt.toISOString(),
      ]
    )
    return result.rowCount > 0
  }

  const findByIdentity = async (key: ChainEventKey): Promise<ChainEventRecord | null> => {
    const result = await db.query<unknown>(
      'SELECT * FROM chain_events WHERE network = ? AND tx_hash = ? AND log_index = ?',
      [key.network, key.transactionHash.toLowerCase(), key.logIndex]
    )

    if (result.rows.length === 0) return null
    return toRecord(result.rows[0])
  }

  const countByNetwork = async (network: string): Promise<number> => {
    const result = await db.query<{ total: number }>(
      'SELECT COUNT(*) AS total FROM chain_events WHERE network = ?',
      [network]
    )
    return result.rows[0]?.total ?? 0
  }

  return {
    recordEvent,
    findByIdentity,
    countByNetwork
  }
}

export type ChainEventsRepository = ReturnType<typeof createChainEventsRepository>
