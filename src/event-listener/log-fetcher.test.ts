import { describe, it, expect } from 'vitest'
import { HttpRequestError, InvalidInputRpcError } from 'viem'
import { createLogFetcher, isPrunedRangeError } from './log-fetcher.js'
import type { RegistryContract } from './types.js'
import { ProviderError, PrunedRangeError } from '../shared/errors.js'
import { PROOF_REGISTRY, REGISTRY_ABI, createFakeChain, makeLog, txHash } from '../testing/fakes.js'

const registry: RegistryContract = {
  name: 'ProofRegistry',
  address: PROOF_REGISTRY,
  abi: REGISTRY_ABI,
  subscriptions: [],
}

describe('isPrunedRangeError', () => {
  it('recognises the -32000 invalid input RPC error', () => {
    expect(isPrunedRangeError(new InvalidInputRpcError(new Error('header not found')))).toBe(true)
  })

  it('recognises a raw RPC error object carrying code -32000', () => {
    expect(isPrunedRangeError({ code: -32000, message: 'missing trie node' })).toBe(true)
  })

  it('follows the cause chain of plain errors', () => {
    const error = new Error('request failed', { cause: { code: -32000 } })
    expect(isPrunedRangeError(error)).toBe(true)
  })

  it('recognises providers that only say "block out of range"', () => {
    expect(isPrunedRangeError(new Error('eth_getLogs: block out of range'))).toBe(true)
  })

  it('does not treat transport failures as pruned history', () => {
    expect(isPrunedRangeError(new HttpRequestError({ url: 'http://localhost:8545', details: 'fetch failed' }))).toBe(false)
    expect(isPrunedRangeError(new Error('socket hang up'))).toBe(false)
  })
})

describe('createLogFetcher', () => {
  it('returns the logs as raw events in provider order', async () => {
    const chain = createFakeChain(100n)
    chain.respond(PROOF_REGISTRY, 'PostProof', () => [
      makeLog({ transactionHash: txHash('b'), logIndex: 4, blockNumber: 90n }),
      makeLog({ transactionHash: txHash('c'), logIndex: 1, blockNumber: 91n }),
    ])
    const fetcher = createLogFetcher('fuji', chain.reader)

    const result = await fetcher.fetch(registry, 'PostProof', 90n, 100n)

    expect(chain.calls).toEqual([
      { address: PROOF_REGISTRY, eventName: 'PostProof', fromBlock: 90n, toBlock: 100n },
    ])
    expect(result).toEqual({
      ok: true,
      value: [
        {
          network: 'fuji',
          address: PROOF_REGISTRY,
          eventName: 'PostProof',
          args: { assetId: 1n },
          transactionHash: txHash('b'),
          logIndex: 4,
          blockNumber: 90n,
        },
        {
          network: 'fuji',
          address: PROOF_REGISTRY,
          eventName: 'PostProof',
          args: { assetId: 1n },
          transactionHash: txHash('c'),
          logIndex: 1,
          blockNumber: 91n,
        },
      ],
    })
  })

  it('reports pruned history as PrunedRangeError', async () => {
    const chain = createFakeChain(100n)
    chain.respond(PROOF_REGISTRY, 'PostProof', () => {
      throw new InvalidInputRpcError(new Error('block out of range'))
    })
    const fetcher = createLogFetcher('fuji', chain.reader)

    const result = await fetcher.fetch(registry, 'PostProof', 10n, 100n)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(PrunedRangeError)
    expect(result.error).toMatchObject({ fromBlock: 10n, toBlock: 100n })
    expect(result.error.context).toEqual({
      network: 'fuji',
      registry: 'ProofRegistry',
      eventName: 'PostProof',
      fromBlock: '10',
      toBlock: '100',
    })
  })

  it('wraps other failures in ProviderError', async () => {
    const chain = createFakeChain(100n)
    const cause = new Error('socket hang up')
    chain.respond(PROOF_REGISTRY, 'PostProof', () => {
      throw cause
    })
    const fetcher = createLogFetcher('fuji', chain.reader)

    const result = await fetcher.fetch(registry, 'PostProof', 10n, 100n)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(ProviderError)
    expect(result.error).not.toBeInstanceOf(PrunedRangeError)
    expect(result.error.message).toBe('Failed to fetch PostProof logs from ProofRegistry: socket hang up')
    expect(result.error.cause).toBe(cause)
  })
})
