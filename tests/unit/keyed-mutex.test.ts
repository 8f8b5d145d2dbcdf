import { describe, it, expect } from 'vitest'
import { KeyedMutex } from '../../src/storage/keyed-mutex'

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

describe('KeyedMutex', () => {
  it('should run tasks on the same key in call order', async () => {
    const mutex = new KeyedMutex()
    const order: string[] = []

    await Promise.all([
      mutex.runExclusive('chess', async () => {
        await delay(20)
        order.push('first')
      }),
      mutex.runExclusive('chess', async () => {
        order.push('second')
      })
    ])

    expect(order).toEqual(['first', 'second'])
  })

  it('should not block tasks on other keys', async () => {
    const mutex = new KeyedMutex()
    const order: string[] = []

    await Promise.all([
      mutex.runExclusive('chess', async () => {
        await delay(20)
        order.push('chess')
      }),
      mutex.runExclusive('drama', async () => {
        order.push('drama')
      })
    ])

    expect(order).toEqual(['drama', 'chess'])
  })

  it('should propagate a failure and keep serving the key', async () => {
    const mutex = new KeyedMutex()

    const failing = mutex.runExclusive('chess', async () => {
      throw new Error('boom')
    })
    const next = mutex.runExclusive('chess', async () => 'ok')

    await expect(failing).rejects.toThrow('boom')
    await expect(next).resolves.toBe('ok')
  })

  it('should forget a key once its queue drains', async () => {
    const mutex = new KeyedMutex()

    const pending = mutex.runExclusive('chess', async () => 42)
    expect(mutex.size).toBe(1)

    await expect(pending).resolves.toBe(42)
    expect(mutex.size).toBe(0)
  })
})
