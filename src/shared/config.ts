import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import dotenv from 'dotenv'
import { Abi as abiSchema } from 'abitype/zod'
import { isAddress, isHex, type Address, type Hex } from 'viem'
import { SUPPORTED_CHAIN_KEYS } from '../network/chains.js'
import { ConfigError } from './errors.js'

// Load environment variables
dotenv.config()

const addressSchema = z
  .string()
  .refine((value): value is Address => isAddress(value, { strict: false }), { message: 'Invalid contract address' })

const privateKeySchema = z
  .string({ required_error: 'Signing private key is not set' })
  .refine((value): value is Hex => isHex(value, { strict: true }) && value.length === 66, {
    message: 'Private key must be a 0x-prefixed 32-byte hex string',
  })

// Shape of the networks file before ABI paths and key variables are resolved
const registryFileSchema = z.object({
  address: z.string(),
  abi: z.union([z.string().min(1), z.array(z.unknown())]),
})

const networkFileSchema = z.object({
  chain: z.enum(SUPPORTED_CHAIN_KEYS),
  rpcUrl: z.string().url().optional(),
  privateKeyEnv: z.string().min(1).optional(),
  registries: z.record(z.string().min(1), registryFileSchema),
})

const networksFileSchema = z
  .record(z.string().regex(/^[A-Za-z0-9_-]+$/, 'Network names may only contain letters, digits, - and _'), networkFileSchema)
  .refine((networks) => Object.keys(networks).length > 0, { message: 'At least one network must be configured' })

const registrySchema = z.object({
  address: addressSchema,
  abi: abiSchema,
})

export const networkSchema = z.object({
  name: z.string().min(1),
  chain: z.enum(SUPPORTED_CHAIN_KEYS),
  rpcUrl: z.string().url().optional(),
  privateKey: privateKeySchema,
  registries: z.record(z.string().min(1), registrySchema),
})

export type NetworkConfig = z.infer<typeof networkSchema>
export type RegistryConfig = z.infer<typeof registrySchema>

const loggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  filePath: z.string().optional(),
  maxSizeMB: z.number().positive().optional(),
  maxFiles: z.number().int().positive().optional(),
})

const configSchema = z.object({
  // Offchain store
  database: z.object({
    type: z.literal('sqlite').default('sqlite'),
    sqlitePath: z.string().min(1).default('./data/chain-event-relay.db'),
  }),

  // Where block cursors live
  cursorStore: z.object({
    backend: z.enum(['redis', 'sqlite']).default('redis'),
  }),

  redis: z.object({
    url: z.string().default('redis://localhost:6379'),
  }),

  // Providers
  providers: z.object({
    alchemyApiKey: z.string().min(1).optional(),
    networksConfigPath: z.string().min(1).default('./config/networks.json'),
  }),

  listener: z.object({
    pollIntervalMs: z.number().int().positive().default(3000),
    backoffIntervalMs: z.number().int().positive().default(5000),
    dedupRetentionBlocks: z.number().int().positive().optional(),
    excludedRegistries: z.array(z.string().min(1)).default(['ValidatorRegistry']),
  }),

  // API Server
  api: z.object({
    port: z.number().int().nonnegative().default(8000),
    host: z.string().default('0.0.0.0'),
  }),

  logging: loggingSchema,
})

export type ServiceConfig = z.infer<typeof configSchema>

export type Config = ServiceConfig & {
  networks: NetworkConfig[]
}

export type LoggingConfig = z.infer<typeof loggingSchema>

const parseEnvNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isNaN(parsed) ? undefined : parsed
}

const parseEnvList = (value: string | undefined): string[] | undefined => {
  if (value === undefined) return undefined
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)

const readAbi = (abi: string | unknown[], baseDir: string): unknown => {
  if (typeof abi !== 'string') return abi

  const abiPath = path.resolve(baseDir, abi)
  let artifact: unknown
  try {
    artifact = JSON.parse(fs.readFileSync(abiPath, 'utf-8'))
  } catch (error) {
    throw new ConfigError(`Unable to read ABI file ${abiPath}`, { cause: String(error) })
  }

  // Compiler artifacts (forge, hardhat) wrap the ABI in an `abi` field
  if (typeof artifact === 'object' && artifact !== null && !Array.isArray(artifact) && 'abi' in artifact) {
    return artifact.abi
  }
  return artifact
}

/**
 * Validates the parsed contents of a networks file. ABI paths are resolved
 * against `baseDir` and each network's signing key is read from `env`
 * (`privateKeyEnv`, falling back to PRIVATE_KEY).
 */
export const parseNetworks = (raw: unknown, baseDir: string, env: NodeJS.ProcessEnv = process.env): NetworkConfig[] => {
  const parsed = networksFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError('Networks configuration is invalid', { issues: formatIssues(parsed.error) })
  }

  return Object.entries(parsed.data).map(([name, network]) => {
    const keyVariable = network.privateKeyEnv ?? 'PRIVATE_KEY'
    const registries = Object.fromEntries(
      Object.entries(network.registries).map(([registryName, registry]) => [
        registryName,
        { address: registry.address, abi: readAbi(registry.abi, baseDir) },
      ]),
    )

    const result = networkSchema.safeParse({
      name,
      chain: network.chain,
      rpcUrl: network.rpcUrl,
      privateKey: env[keyVariable],
      registries,
    })
    if (!result.success) {
      throw new ConfigError(`Configuration for network '${name}' is invalid`, {
        keyVariable,
        issues: formatIssues(result.error),
      })
    }
    return result.data
  })
}

const readNetworksFile = (resolved: string): unknown => {
  try {
    return JSON.parse(fs.readFileSync(resolved, 'utf-8'))
  } catch (error) {
    throw new ConfigError(`Unable to read networks file ${resolved}`, { cause: String(error) })
  }
}

export const loadNetworksFile = (filePath: string, env: NodeJS.ProcessEnv = process.env): NetworkConfig[] => {
  const resolved = path.resolve(filePath)
  return parseNetworks(readNetworksFile(resolved), path.dirname(resolved), env)
}

/** Network names declared in the networks file; needs neither ABIs nor signing keys. */
export const loadNetworkNames = (filePath: string): string[] => {
  const parsed = networksFileSchema.safeParse(readNetworksFile(path.resolve(filePath)))
  if (!parsed.success) {
    throw new ConfigError('Networks configuration is invalid', { issues: formatIssues(parsed.error) })
  }
  return Object.keys(parsed.data)
}

export const loadLoggingConfig = (env: NodeJS.ProcessEnv = process.env): LoggingConfig => {
  const result = loggingSchema.safeParse({
    level: env['LOG_LEVEL'] || undefined,
    filePath: env['LOG_FILE_PATH'] || undefined,
    maxSizeMB: parseEnvNumber(env['LOG_MAX_SIZE_MB']),
    maxFiles: parseEnvNumber(env['LOG_MAX_FILES']),
  })
  if (!result.success) {
    throw new ConfigError('Logging configuration is invalid', { issues: formatIssues(result.error) })
  }
  return result.data
}

/** Everything except the networks file. */
export const loadServiceConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const rawConfig = {
    database: {
      type: 'sqlite',
      sqlitePath: env['SQLITE_PATH'] || undefined,
    },
    cursorStore: {
      backend: env['CURSOR_STORE'] || undefined,
    },
    redis: {
      url: env['REDIS_URL'] || undefined,
    },
    providers: {
      alchemyApiKey: env['ALCHEMY_API_KEY'] || undefined,
      networksConfigPath: env['NETWORKS_CONFIG_PATH'] || undefined,
    },
    listener: {
      pollIntervalMs: parseEnvNumber(env['POLL_INTERVAL_MS']),
      backoffIntervalMs: parseEnvNumber(env['BACKOFF_INTERVAL_MS']),
      dedupRetentionBlocks: parseEnvNumber(env['DEDUP_RETENTION_BLOCKS']),
      excludedRegistries: parseEnvList(env['EXCLUDED_REGISTRIES']),
    },
    api: {
      port: parseEnvNumber(env['PORT']),
      host: env['HOST'] || undefined,
    },
    logging: {
      level: env['LOG_LEVEL'] || undefined,
      filePath: env['LOG_FILE_PATH'] || undefined,
      maxSizeMB: parseEnvNumber(env['LOG_MAX_SIZE_MB']),
      maxFiles: parseEnvNumber(env['LOG_MAX_FILES']),
    },
  }

  const result = configSchema.safeParse(rawConfig)
  if (!result.success) {
    const issues = formatIssues(result.error)
    console.error('Configuration validation error:', JSON.stringify(issues, null, 2))
    throw new ConfigError('Configuration validation failed', { issues })
  }
  return result.data
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const serviceConfig = loadServiceConfig(env)
  const networks = loadNetworksFile(serviceConfig.providers.networksConfigPath, env)
  return { ...serviceConfig, networks }
}
