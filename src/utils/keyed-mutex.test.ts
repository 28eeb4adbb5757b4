import { describe, it, expect } from 'vitest'
import { KeyedMutex } from './keyed-mutex.js'

function deferred() {
    let resolve: () => void = () => {}
    const promise = new Promise<void>(r => { resolve = r })
    return { promise, resolve }
}

describe('KeyedMutex', () => {
    it('runs work for the same key in submission order, one at a time', async () => {
        const mutex = new KeyedMutex()
        const log: string[] = []
        const gate = deferred()

        const first = mutex.run('c1', async () => {
            log.push('first:start')
            await gate.promise
            log.push('first:end')
        })
        const second = mutex.run('c1', async () => {
            log.push('second')
        })

        await Promise.resolve()
        expect(log).toEqual(['first:start'])

        gate.resolve()
        await Promise.all([first, second])
        expect(log).toEqual(['first:start', 'first:end', 'second'])
    })

    it('does not block other keys', async () => {
        const mutex = new KeyedMutex()
        const gate = deferred()
        const log: string[] = []

        const blocked = mutex.run('c1', async () => { await gate.promise; log.push('c1') })
        expect(mutex.size).toBe(1)
        await mutex.run('c2', async () => { log.push('c2') })

        expect(log).toEqual(['c2'])
        gate.resolve()
        await blocked
        expect(log).toEqual(['c2', 'c1'])
    })

    it('keeps the chain alive after a failure and drops idle keys', async () => {
        const mutex = new KeyedMutex()

        await expect(mutex.run('c1', async () => { throw new Error('boom') })).rejects.toThrow('boom')
        await expect(mutex.run('c1', async () => 42)).resolves.toBe(42)

        await new Promise(resolve => setTimeout(resolve, 0))
        expect(mutex.size).toBe(0)
    })
})
