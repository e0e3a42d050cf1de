import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { formatRecord } from '../engine-worker/executionLog.js'
import { CompletionWatcher, type WatcherEvent } from './CompletionWatcher.js'

function engineLine(text: string, stream: 'out' | 'err' = 'out'): string {
    return formatRecord({
        ts: '2026-01-01T00:00:00.000Z',
        boxId: 'box1',
        verb: 'engine',
        args: JSON.stringify(text),
        outcome: stream,
    })
}

function commandLine(verb: string, args: unknown): string {
    return formatRecord({
        ts: '2026-01-01T00:00:00.000Z',
        boxId: 'box1',
        verb,
        args: JSON.stringify(args),
        outcome: 'ok',
    })
}

describe('CompletionWatcher', () => {
    let dir: string
    let file: string
    let events: WatcherEvent[]
    let watcher: CompletionWatcher

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'watcher-'))
        file = path.join(dir, 'box1.log')
        events = []
        watcher = new CompletionWatcher(
            { pollIntervalMs: 60_000, completeMarker: 'protocol complete', failedMarker: 'protocol failed' },
            { publish: (e) => { events.push(e) } }
        )
    })

    afterEach(async () => {
        watcher.stop()
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('ignores markers written before the start offset', async () => {
        const before = engineLine('Protocol complete') + commandLine('start', { serialLocator: 'EMU' })
        await fs.writeFile(file, before)
        watcher.watch('box1', file, Buffer.byteLength(before))

        await watcher.pollOnce('box1')
        expect(events).toEqual([])
        expect(watcher.isWatching('box1')).toBe(true)

        await fs.appendFile(file, engineLine('trial 1 done') + engineLine('PROTOCOL COMPLETE'))
        await watcher.pollOnce('box1')

        expect(events).toMatchObject([{ kind: 'protocol-completed', boxId: 'box1', line: 'PROTOCOL COMPLETE' }])
        expect(watcher.isWatching('box1')).toBe(false)
    })

    it('only matches engine output records', async () => {
        await fs.writeFile(file, '')
        watcher.watch('box1', file, 0)
        await fs.appendFile(file, commandLine('runProtocol', { protocol: 'protocol complete' }))

        await watcher.pollOnce('box1')
        expect(events).toEqual([])
    })

    it('captures the failure text', async () => {
        await fs.writeFile(file, '')
        watcher.watch('box1', file, 0)
        await fs.appendFile(file, engineLine('Protocol FAILED: valve timeout', 'err'))

        await watcher.pollOnce('box1')
        expect(events).toMatchObject([{ kind: 'protocol-failed', boxId: 'box1', error: 'valve timeout' }])
    })

    it('waits for the rest of a partial line', async () => {
        await fs.writeFile(file, '')
        watcher.watch('box1', file, 0)
        const line = engineLine('protocol complete')
        await fs.appendFile(file, line.slice(0, 20))

        await watcher.pollOnce('box1')
        expect(events).toEqual([])

        await fs.appendFile(file, line.slice(20))
        await watcher.pollOnce('box1')
        expect(events.map(e => e.kind)).toEqual(['protocol-completed'])
    })

    it('restarts from zero when the file shrinks', async () => {
        const big = engineLine('x'.repeat(200))
        await fs.writeFile(file, big)
        watcher.watch('box1', file, Buffer.byteLength(big))

        await fs.writeFile(file, engineLine('protocol complete'))
        await watcher.pollOnce('box1')

        expect(events.map(e => e.kind)).toEqual(['log-rotated', 'protocol-completed'])
        expect(events[0]).toMatchObject({ reason: 'truncated' })
    })

    it('reports an unreadable log once per outage', async () => {
        watcher.watch('box1', file, 0)

        await watcher.pollOnce('box1')
        await watcher.pollOnce('box1')
        expect(events.map(e => e.kind)).toEqual(['log-unreadable'])

        await fs.writeFile(file, '')
        await watcher.pollOnce('box1')
        expect(events.map(e => e.kind)).toEqual(['log-unreadable', 'log-recovered'])
        expect(watcher.isWatching('box1')).toBe(true)
    })

    it('keeps boxes independent', async () => {
        const other = path.join(dir, 'box2.log')
        await fs.writeFile(other, '')
        watcher.watch('box1', file, 0)
        watcher.watch('box2', other, 0)

        await watcher.pollOnce('box1')
        await fs.appendFile(other, engineLine('protocol complete'))
        await watcher.pollOnce('box2')

        expect(events.map(e => `${e.kind}:${e.boxId}`)).toEqual(['log-unreadable:box1', 'protocol-completed:box2'])
        expect(watcher.isWatching('box1')).toBe(true)
    })
})
