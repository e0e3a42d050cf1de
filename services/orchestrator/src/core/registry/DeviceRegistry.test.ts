import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DeviceRegistry, type RegistryEvent } from './DeviceRegistry.js'
import { formatCsv, parseCsv } from './csv.js'

function collector() {
    const events: RegistryEvent[] = []
    return { events, sink: { publish: (e: RegistryEvent) => { events.push(e) } } }
}

describe('csv', () => {
    it('parses quoted fields and CRLF', () => {
        expect(parseCsv('a,"b,""c"""\r\nd,e')).toEqual([
            ['a', 'b,"c"'],
            ['d', 'e'],
        ])
    })

    it('quotes fields that need it', () => {
        expect(formatCsv([['box1', 'A,1']])).toBe('box1,"A,1"\r\n')
        expect(formatCsv([])).toBe('')
    })
})

describe('DeviceRegistry', () => {
    let dir: string
    let file: string

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-'))
        file = path.join(dir, 'Academy', 'AcademyConfig.csv')
    })

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('creates an empty store when the file is missing', async () => {
        const { sink } = collector()
        const reg = new DeviceRegistry(file, sink)
        const report = await reg.load()
        expect(report).toEqual({ loaded: 0, skipped: [], created: true })
        expect(await fs.readFile(file, 'utf8')).toBe('')
    })

    it('round-trips add, save and load', async () => {
        const { sink } = collector()
        const reg = new DeviceRegistry(file, sink)
        await reg.load()
        await reg.add('box1', 'A123')
        await reg.add('box2', 'EMU')

        expect(await fs.readFile(file, 'utf8')).toBe('box1,A123\r\nbox2,EMU\r\n')

        const again = new DeviceRegistry(file, sink)
        const report = await again.load()
        expect(report.loaded).toBe(2)
        expect(again.list()).toEqual([
            { boxId: 'box1', serialLocator: 'A123' },
            { boxId: 'box2', serialLocator: 'EMU' },
        ])
        await expect(fs.stat(file + '.tmp')).rejects.toMatchObject({ code: 'ENOENT' })
    })

    it('skips malformed rows and keeps the rest', async () => {
        await fs.mkdir(path.dirname(file), { recursive: true })
        await fs.writeFile(file, 'box1,A1\nbad\nbox1,A2\n,X\nbox2,B2,extra\nbox3,"B,3"\n\n', 'utf8')

        const { sink, events } = collector()
        const reg = new DeviceRegistry(file, sink)
        const report = await reg.load()

        expect(report.loaded).toBe(2)
        expect(report.skipped).toEqual([
            { line: 2, reason: 'expected 2 columns, got 1' },
            { line: 3, reason: 'duplicate box id "box1"' },
            { line: 4, reason: 'empty field' },
            { line: 5, reason: 'expected 2 columns, got 3' },
        ])
        expect(reg.get('box1')).toEqual({ boxId: 'box1', serialLocator: 'A1' })
        expect(reg.get('box3')).toEqual({ boxId: 'box3', serialLocator: 'B,3' })
        expect(events.filter(e => e.kind === 'registry-row-skipped')).toHaveLength(4)
    })

    it('rejects duplicates, unknown boxes and busy boxes', async () => {
        const { sink } = collector()
        const reg = new DeviceRegistry(file, sink)
        await reg.load()
        await reg.add('box1', 'A1')

        await expect(reg.add('box1', 'A2')).rejects.toMatchObject({ code: 'DuplicateBoxId' })
        await expect(reg.add('bad id', 'A2')).rejects.toMatchObject({ code: 'BadRequest' })
        await expect(reg.remove('nope')).rejects.toMatchObject({ code: 'UnknownDevice' })
        await expect(reg.remove('box1', () => true)).rejects.toMatchObject({ code: 'DeviceBusy' })
        await expect(reg.changeLocator('box1', 'B1', () => true)).rejects.toMatchObject({ code: 'DeviceBusy' })
        expect(reg.get('box1')?.serialLocator).toBe('A1')
    })

    it('changes a locator and removes a box', async () => {
        const { sink, events } = collector()
        const reg = new DeviceRegistry(file, sink)
        await reg.load()
        await reg.add('box1', 'A1')
        await reg.add('box2', 'A2')

        await reg.changeLocator('box1', 'Z9')
        await reg.remove('box2')

        expect(await fs.readFile(file, 'utf8')).toBe('box1,Z9\r\n')
        expect(events.map(e => e.kind)).toContain('registry-locator-changed')
        expect(events.map(e => e.kind)).toContain('registry-device-removed')
    })

    it('keeps memory and disk in step under concurrent changes', async () => {
        const { sink } = collector()
        const reg = new DeviceRegistry(file, sink)
        await reg.load()
        await reg.add('keep', 'SN-K')
        await reg.add('gone', 'SN-G')

        const ids = Array.from({ length: 8 }, (_, i) => `B${i}`)
        const results = await Promise.allSettled([
            ...ids.map((id, i) => reg.add(id, `SN-${i}`)),
            reg.remove('gone'),
            reg.changeLocator('keep', 'SN-K2'),
        ])
        expect(results.every((r) => r.status === 'fulfilled')).toBe(true)

        const expected = [{ boxId: 'keep', serialLocator: 'SN-K2' }, ...ids.map((id, i) => ({ boxId: id, serialLocator: `SN-${i}` }))]
        expect(reg.list()).toEqual(expected)

        const again = new DeviceRegistry(file, sink)
        await again.load()
        expect(again.list()).toEqual(expected)
        expect(await fs.readdir(path.dirname(file))).toEqual(['AcademyConfig.csv'])
    })
})
