/**
 * Base error for everything the relay raises on purpose. `context` carries
 * structured fields that end up in the log line's metadata.
 */
export class RelayError extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'RelayError'
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context)
    this.name = 'ConfigError'
  }
}

/** Transport or RPC failure while talking to a network's provider. */
export class ProviderError extends RelayError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, context, options)
    this.name = 'ProviderError'
  }
}

/**
 * The provider no longer serves the requested block range. The listener skips
 * forward instead of retrying.
 */
export class PrunedRangeError extends ProviderError {
  constructor(
    public readonly fromBlock: bigint,
    public readonly toBlock: bigint,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(`Block range ${fromBlock}-${toBlock} is no longer available from the provider`, context, options)
    this.name = 'PrunedRangeError'
  }
}

export class HandlerError extends RelayError {
  constructor(eventName: string, cause: unknown, context: Record<string, unknown> = {}) {
    super(`Handler for ${eventName} failed: ${describeError(cause)}`, context, { cause })
    this.name = 'HandlerError'
  }
}

export class PersistenceError extends RelayError {
  constructor(operation: string, cause: unknown, context: Record<string, unknown> = {}) {
    super(`Persistence ${operation} failed: ${describeError(cause)}`, context, { cause })
    this.name = 'PersistenceError'
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
