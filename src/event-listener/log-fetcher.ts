import { BaseError, InvalidInputRpcError } from 'viem'
import type { ChainReader, RawLogEvent, RegistryContract } from './types.js'
import { ProviderError, PrunedRangeError, describeError } from '../shared/errors.js'
import { type Result, Ok, Err } from '../shared/result.js'

// Providers answer eth_getLogs on history they no longer keep with -32000
// (mapped by viem to InvalidInputRpcError) or with one of these messages.
const PRUNED_MESSAGE = /block (?:is )?out of range|history (?:has been )?pruned|pruned (?:block|history)/i

const errorCode = (error: unknown): number | undefined =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number'
    ? error.code
    : undefined

const signalsPrunedRange = (error: unknown): boolean => {
  if (errorCode(error) === InvalidInputRpcError.code) return true
  if (!(error instanceof Error)) return false
  const details = error instanceof BaseError ? `${error.shortMessage} ${error.details}` : error.message
  return PRUNED_MESSAGE.test(details)
}

export const isPrunedRangeError = (error: unknown): boolean => {
  if (error instanceof BaseError) {
    return error.walk(signalsPrunedRange) !== null
  }
  let current: unknown = error
  while (current instanceof Error) {
    if (signalsPrunedRange(current)) return true
    current = current.cause
  }
  return signalsPrunedRange(current)
}

export const createLogFetcher = (network: string, reader: ChainReader) => {
  const fetch = async (
    contract: RegistryContract,
    eventName: string,
    fromBlock: bigint,
    toBlock: bigint
  ): Promise<Result<RawLogEvent[], ProviderError>> => {
    const context = { network, registry: contract.name, eventName, fromBlock: fromBlock.toString(), toBlock: toBlock.toString() }
    try {
      const logs = await reader.getContractEvents({
        address: contract.address,
        abi: contract.abi,
        eventName,
        fromBlock,
        toBlock,
      })
      return Ok(logs.map((log) => ({
        network,
        address: log.address,
        eventName,
        args: log.args,
        transactionHash: log.transactionHash,
        logIndex: log.logIndex,
        blockNumber: log.blockNumber,
      })))
    } catch (error) {
      if (isPrunedRangeError(error)) {
        return Err(new PrunedRangeError(fromBlock, toBlock, context, { cause: error }))
      }
      return Err(new ProviderError(
        `Failed to fetch ${eventName} logs from ${contract.name}: ${describeError(error)}`,
        context,
        { cause: error }
      ))
    }
  }

  return { fetch }
}

export type LogFetcher = ReturnType<typeof createLogFetcher>
