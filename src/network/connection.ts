import { createPublicClient, http, type Chain, type PublicClient } from 'viem'
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts'
import type { NetworkConfig } from '../shared/config.js'
import type { ChainReader } from '../event-listener/types.js'
import { ConfigError } from '../shared/errors.js'
import { CHAINS } from './chains.js'

export type ProviderCredentials = {
  alchemyApiKey?: string
}

export type NetworkConnection = {
  network: string
  chain: Chain
  endpoint: string
  account: PrivateKeyAccount
  reader: ChainReader
}

/**
 * An explicit rpcUrl wins, then Alchemy when a key is configured, then the
 * chain's public endpoint.
 */
export const resolveEndpoint = (network: Pick<NetworkConfig, 'name' | 'chain' | 'rpcUrl'>, credentials: ProviderCredentials): string => {
  if (network.rpcUrl) return network.rpcUrl

  const entry = CHAINS[network.chain]
  if (credentials.alchemyApiKey) {
    return `https://${entry.alchemySubdomain}.g.alchemy.com/v2/${credentials.alchemyApiKey}`
  }

  const publicUrl = entry.chain.rpcUrls.default.http[0]
  if (!publicUrl) {
    throw new ConfigError(`No RPC endpoint available for network ${network.name}`, { chain: network.chain })
  }
  return publicUrl
}

// Strips the API key from Alchemy URLs before they reach the logs
export const redactEndpoint = (endpoint: string): string =>
  endpoint.replace(/(\/v2\/)[^/?#]+/, '$1***')

export const createChainReader = (client: PublicClient): ChainReader => ({
  getBlockNumber: () => client.getBlockNumber({ cacheTime: 0 }),
  getContractEvents: async ({ address, abi, eventName, fromBlock, toBlock }) => {
    const logs = await client.getContractEvents({
      address,
      abi,
      eventName,
      fromBlock,
      toBlock,
      strict: false,
    })
    return logs.map((log) => ({
      address: log.address,
      args: log.args,
      transactionHash: log.transactionHash,
      logIndex: log.logIndex,
      blockNumber: log.blockNumber,
    }))
  },
})

/** Builds the RPC client and signing account a network's listener runs on. */
export const createNetworkConnection = (network: NetworkConfig, credentials: ProviderCredentials): NetworkConnection => {
  const { chain } = CHAINS[network.chain]
  const endpoint = resolveEndpoint(network, credentials)

  const client: PublicClient = createPublicClient({
    chain,
    transport: http(endpoint, {
      retryCount: 3,
      retryDelay: 1000,
    }),
  })
  const account = privateKeyToAccount(network.privateKey)

  return {
    network: network.name,
    chain,
    endpoint: redactEndpoint(endpoint),
    account,
    reader: createChainReader(client),
  }
}
