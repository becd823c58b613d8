import { describe, it, expect, vi } from 'vitest'
import { avalancheFuji, sepolia } from 'viem/chains'
import { privateKeyToAccount } from 'viem/accounts'
import { networkSchema, type NetworkConfig } from '../shared/config.js'
import type { NetworkConnection } from '../network/connection.js'
import { createCursorStore } from './cursor-store.js'
import { sleep } from '../shared/sleep.js'
import { resolveRegistryContracts, startSupervisor } from './supervisor.js'
import type { EventSubscription, OffchainStore } from './types.js'
import {
  AUDIT_REGISTRY,
  PROOF_REGISTRY,
  REGISTRY_ABI,
  TEST_PRIVATE_KEY,
  VALIDATOR_ABI,
  VALIDATOR_REGISTRY,
  createFakeChain,
  createMemoryCache,
} from '../testing/fakes.js'

const onPostProof = vi.fn()
const onRevoked = vi.fn()
const subscriptions: EventSubscription[] = [
  { eventName: 'PostProof', handler: onPostProof },
  { eventName: 'ProofRevoked', handler: onRevoked },
]

const network = (name: string, chain: 'avalancheFuji' | 'sepolia'): NetworkConfig =>
  networkSchema.parse({
    name,
    chain,
    privateKey: TEST_PRIVATE_KEY,
    registries: {
      ProofRegistry: { address: PROOF_REGISTRY, abi: REGISTRY_ABI },
      AuditRegistry: { address: AUDIT_REGISTRY, abi: REGISTRY_ABI },
      ValidatorRegistry: { address: VALIDATOR_REGISTRY, abi: VALIDATOR_ABI },
    },
  })

const offchainStore: OffchainStore = { recordEvent: async () => true }

describe('resolveRegistryContracts', () => {
  it('drops the validator registry by default', () => {
    const contracts = resolveRegistryContracts(network('fuji', 'avalancheFuji'), subscriptions)

    expect(contracts.map((contract) => [contract.name, contract.address])).toEqual([
      ['ProofRegistry', PROOF_REGISTRY],
      ['AuditRegistry', AUDIT_REGISTRY],
    ])
    expect(contracts[0]?.subscriptions.map((subscription) => subscription.eventName)).toEqual(['PostProof', 'ProofRevoked'])
  })

  it('honours a custom exclusion list', () => {
    const contracts = resolveRegistryContracts(network('fuji', 'avalancheFuji'), subscriptions, ['AuditRegistry'])

    expect(contracts.map((contract) => contract.name)).toEqual(['ProofRegistry'])
  })

  it('skips subscriptions whose event the ABI does not declare', () => {
    const validatorSubscription: EventSubscription = { eventName: 'ValidatorRegistered', handler: vi.fn() }

    const contracts = resolveRegistryContracts(network('fuji', 'avalancheFuji'), [...subscriptions, validatorSubscription], [])

    expect(contracts.map((contract) => [contract.name, contract.subscriptions.map((s) => s.eventName)])).toEqual([
      ['ProofRegistry', ['PostProof', 'ProofRevoked']],
      ['AuditRegistry', ['PostProof', 'ProofRevoked']],
      ['ValidatorRegistry', ['ValidatorRegistered']],
    ])
  })

  it('leaves out registries with nothing to listen to', () => {
    expect(resolveRegistryContracts(network('fuji', 'avalancheFuji'), subscriptions, [])).toHaveLength(2)
  })
})

describe('startSupervisor', () => {
  it('runs one independent listener per network and stops them all', async () => {
    const chains = {
      fuji: createFakeChain(500n),
      sepolia: createFakeChain(9000n),
    }
    const memory = createMemoryCache({ sepolia_all_contracts: '8990' })
    const connected: string[] = []

    const connect = (config: NetworkConfig): NetworkConnection => {
      connected.push(config.name)
      const chain = config.name === 'fuji' ? chains.fuji : chains.sepolia
      return {
        network: config.name,
        chain: config.chain === 'avalancheFuji' ? avalancheFuji : sepolia,
        endpoint: `https://${config.name}.rpc.test`,
        account: privateKeyToAccount(config.privateKey),
        reader: chain.reader,
      }
    }

    const supervisor = await startSupervisor({
      networks: [network('fuji', 'avalancheFuji'), network('sepolia', 'sepolia')],
      connect,
      cursorStore: createCursorStore(memory.cache),
      offchainStore,
      subscriptions,
      pollIntervalMs: 5,
      backoffIntervalMs: 5,
    })

    expect(connected).toEqual(['fuji', 'sepolia'])
    expect(supervisor.listeners.map((listener) => listener.network)).toEqual(['fuji', 'sepolia'])

    await vi.waitFor(() => {
      expect(memory.data.get('sepolia_all_contracts')).toBe('9000')
      expect(memory.data.get('fuji_all_contracts')).toBe('500')
    })

    // A failing provider on one network does not hold up the other
    chains.fuji.failNextHeadReads(...Array.from({ length: 50 }, () => new Error('fuji down')))
    chains.sepolia.setHead(9005n)
    await vi.waitFor(() => expect(memory.data.get('sepolia_all_contracts')).toBe('9005'))

    await supervisor.stop()

    expect(supervisor.listeners.map((listener) => listener.status().state)).toEqual(['stopped', 'stopped'])
    expect(chains.sepolia.calls.every((call) => call.address !== VALIDATOR_REGISTRY)).toBe(true)
  })

  it('stops the listeners it already started when a later network fails to connect', async () => {
    const fuji = createFakeChain(500n)
    const memory = createMemoryCache()

    const connect = (config: NetworkConfig): NetworkConnection => {
      if (config.name === 'sepolia') throw new Error('no RPC endpoint for sepolia')
      return {
        network: config.name,
        chain: avalancheFuji,
        endpoint: 'https://fuji.rpc.test',
        account: privateKeyToAccount(config.privateKey),
        reader: fuji.reader,
      }
    }

    await expect(startSupervisor({
      networks: [network('fuji', 'avalancheFuji'), network('sepolia', 'sepolia')],
      connect,
      cursorStore: createCursorStore(memory.cache),
      offchainStore,
      subscriptions,
      pollIntervalMs: 5,
      backoffIntervalMs: 5,
    })).rejects.toThrow('no RPC endpoint for sepolia')

    // The fuji listener has exited: new blocks are never swept
    const savedBefore = memory.data.get('fuji_all_contracts')
    fuji.setHead(600n)
    await sleep(50)
    expect(memory.data.get('fuji_all_contracts')).toBe(savedBefore)
    expect(fuji.calls.some((call) => call.toBlock === 600n)).toBe(false)
  })
})
