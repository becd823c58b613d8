import { describe, it, expect } from 'vitest'
import { createCursorStore, cursorKey, resetNetworkCursor } from './cursor-store.js'
import { ConfigError, PersistenceError } from '../shared/errors.js'
import { createMemoryCache } from '../testing/fakes.js'

describe('cursorKey', () => {
  it('scopes the cursor to all contracts of a network', () => {
    expect(cursorKey('fuji')).toBe('fuji_all_contracts')
  })
})

describe('createCursorStore', () => {
  it('returns the fallback when no cursor is stored', async () => {
    const { cache } = createMemoryCache()
    const store = createCursorStore(cache)

    expect(await store.load('fuji_all_contracts', 99n)).toBe(99n)
  })

  it('returns the stored cursor', async () => {
    const { cache } = createMemoryCache({ fuji_all_contracts: '4242' })
    const store = createCursorStore(cache)

    expect(await store.load('fuji_all_contracts', 99n)).toBe(4242n)
  })

  it.each(['abc', '-5', '12.5', ''])('falls back when the stored value is %j', async (raw) => {
    const { cache } = createMemoryCache({ fuji_all_contracts: raw })
    const store = createCursorStore(cache)

    expect(await store.load('fuji_all_contracts', 7n)).toBe(7n)
  })

  it('falls back when the cache cannot be read', async () => {
    const memory = createMemoryCache({ fuji_all_contracts: '10' })
    memory.setFailReads(true)
    const store = createCursorStore(memory.cache)

    await expect(store.load('fuji_all_contracts', 3n)).resolves.toBe(3n)
  })

  it('saves cursors as decimal strings', async () => {
    const memory = createMemoryCache()
    const store = createCursorStore(memory.cache)

    await store.save('fuji_all_contracts', 123456789012345678901234567890n)

    expect(memory.data.get('fuji_all_contracts')).toBe('123456789012345678901234567890')
    expect(await store.load('fuji_all_contracts', 0n)).toBe(123456789012345678901234567890n)
  })

  it('swallows save failures and a fresh run then sees the default', async () => {
    const memory = createMemoryCache()
    memory.setFailWrites(true)
    const store = createCursorStore(memory.cache)

    await expect(store.save('fuji_all_contracts', 42n)).resolves.toBeUndefined()

    memory.setFailWrites(false)
    const freshStore = createCursorStore(memory.cache)
    expect(await freshStore.load('fuji_all_contracts', 99n)).toBe(99n)
  })

  it('reset may move the cursor backwards', async () => {
    const memory = createMemoryCache({ fuji_all_contracts: '500' })
    const store = createCursorStore(memory.cache)

    await store.reset('fuji_all_contracts', 100n)

    expect(await store.load('fuji_all_contracts', 0n)).toBe(100n)
  })

  it('reset reports write failures', async () => {
    const memory = createMemoryCache()
    memory.setFailWrites(true)
    const store = createCursorStore(memory.cache)

    await expect(store.reset('fuji_all_contracts', 5n)).rejects.toBeInstanceOf(PersistenceError)
  })

  it('reset refuses negative cursors', async () => {
    const memory = createMemoryCache()
    const store = createCursorStore(memory.cache)

    await expect(store.reset('fuji_all_contracts', -1n)).rejects.toThrow('Cursor must be non-negative, got -1')
    expect(memory.data.size).toBe(0)
  })
})

describe('resetNetworkCursor', () => {
  it('resets the cursor of a configured network', async () => {
    const memory = createMemoryCache({ fuji_all_contracts: '500' })

    const key = await resetNetworkCursor(createCursorStore(memory.cache), 'fuji', 120n, ['fuji', 'sepolia'])

    expect(key).toBe('fuji_all_contracts')
    expect(memory.data.get('fuji_all_contracts')).toBe('120')
  })

  it('refuses a network that is not configured', async () => {
    const memory = createMemoryCache()

    const reset = resetNetworkCursor(createCursorStore(memory.cache), 'fjui', 120n, ['fuji', 'sepolia'])

    await expect(reset).rejects.toBeInstanceOf(ConfigError)
    await expect(reset).rejects.toThrow("Unknown network 'fjui'; configured networks: fuji, sepolia")
    expect(memory.data.size).toBe(0)
  })
})
