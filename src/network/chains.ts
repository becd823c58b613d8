import type { Chain } from 'viem'
import {
  arbitrum,
  arbitrumSepolia,
  avalanche,
  avalancheFuji,
  base,
  baseSepolia,
  mainnet,
  optimism,
  optimismSepolia,
  polygon,
  polygonAmoy,
  sepolia,
} from 'viem/chains'

export const SUPPORTED_CHAIN_KEYS = [
  'mainnet',
  'sepolia',
  'avalanche',
  'avalancheFuji',
  'polygon',
  'polygonAmoy',
  'arbitrum',
  'arbitrumSepolia',
  'base',
  'baseSepolia',
  'optimism',
  'optimismSepolia',
] as const

export type SupportedChainKey = (typeof SUPPORTED_CHAIN_KEYS)[number]

type ChainEntry = {
  chain: Chain
  // Subdomain of g.alchemy.com serving this chain
  alchemySubdomain: string
}

export const CHAINS: Record<SupportedChainKey, ChainEntry> = {
  mainnet: { chain: mainnet, alchemySubdomain: 'eth-mainnet' },
  sepolia: { chain: sepolia, alchemySubdomain: 'eth-sepolia' },
  avalanche: { chain: avalanche, alchemySubdomain: 'avax-mainnet' },
  avalancheFuji: { chain: avalancheFuji, alchemySubdomain: 'avax-fuji' },
  polygon: { chain: polygon, alchemySubdomain: 'polygon-mainnet' },
  polygonAmoy: { chain: polygonAmoy, alchemySubdomain: 'polygon-amoy' },
  arbitrum: { chain: arbitrum, alchemySubdomain: 'arb-mainnet' },
  arbitrumSepolia: { chain: arbitrumSepolia, alchemySubdomain: 'arb-sepolia' },
  base: { chain: base, alchemySubdomain: 'base-mainnet' },
  baseSepolia: { chain: baseSepolia, alchemySubdomain: 'base-sepolia' },
  optimism: { chain: optimism, alchemySubdomain: 'opt-mainnet' },
  optimismSepolia: { chain: optimismSepolia, alchemySubdomain: 'opt-sepolia' },
}
