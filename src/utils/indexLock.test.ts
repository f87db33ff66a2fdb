import { describe, expect, it } from 'vitest'
import { IndexLock } from './indexLock'

const tick = () => new Promise(resolve => setTimeout(resolve, 5))

describe('IndexLock', () => {
  it('runs callers one at a time in arrival order', async () => {
    const lock = new IndexLock()
    const events: string[] = []

    const task = (name: string) => lock.runExclusive(async () => {
      events.push(`${name}:start`)
      await tick()
      events.push(`${name}:end`)
      return name
    })

    const results = await Promise.all([task('a'), task('b'), task('c')])

    expect(results).toEqual(['a', 'b', 'c'])
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end'])
    expect(lock.isLocked).toBe(false)
  })

  it('releases the lock when the callback throws', async () => {
    const lock = new IndexLock()

    await expect(lock.runExclusive(async () => {
      throw new Error('boom')
    })).rejects.toThrow('boom')

    expect(lock.isLocked).toBe(false)
    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next')
  })

  it('reports queued callers while held', async () => {
    const lock = new IndexLock()
    let release: () => void = () => {}
    const held = lock.runExclusive(() => new Promise<void>(resolve => {
      release = resolve
    }))
    const queued = lock.runExclusive(async () => 'queued')

    await tick()
    expect(lock.isLocked).toBe(true)
    expect(lock.pending).toBe(1)

    release()
    await held
    await expect(queued).resolves.toBe('queued')
    expect(lock.pending).toBe(0)
  })
})
