import { describe, it, expect } from 'vitest'
import { sleep } from './sleep.js'

describe('sleep', () => {
  it('waits for the given time', async () => {
    const started = Date.now()
    await sleep(20)
    expect(Date.now() - started).toBeGreaterThanOrEqual(15)
  })

  it('returns as soon as the signal aborts', async () => {
    const controller = new AbortController()
    const started = Date.now()
    const pending = sleep(10_000, controller.signal)

    controller.abort()
    await pending

    expect(Date.now() - started).toBeLessThan(1000)
  })

  it('returns immediately on an already aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(sleep(10_000, controller.signal)).resolves.toBeUndefined()
  })
})
