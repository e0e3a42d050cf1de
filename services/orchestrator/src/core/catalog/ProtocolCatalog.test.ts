import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { FileProtocolCatalog, isSafeName } from './ProtocolCatalog.js'

describe('FileProtocolCatalog', () => {
    let dir: string
    let catalog: FileProtocolCatalog

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-'))
        await fs.mkdir(path.join(dir, 'Protocols', 'Lever'), { recursive: true })
        await fs.writeFile(path.join(dir, 'Protocols', 'Lever', 'Lever.m'), '% test\n')
        await fs.mkdir(path.join(dir, 'Data', 'mouse7', 'Lever', 'Session Settings'), { recursive: true })
        await fs.writeFile(path.join(dir, 'Data', 'mouse7', 'Lever', 'Session Settings', 'DefaultSettings.mat'), '')
        await fs.mkdir(path.join(dir, 'Calibration Files'), { recursive: true })
        await fs.writeFile(path.join(dir, 'Calibration Files', 'LiquidCalibration_box1.mat'), '')
        catalog = new FileProtocolCatalog(dir)
    })

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('finds protocols, subjects and settings', async () => {
        expect(await catalog.hasProtocol('Lever')).toBe(true)
        expect(await catalog.hasProtocol('Nose')).toBe(false)
        expect(await catalog.hasSubject('mouse7', 'Lever')).toBe(true)
        expect(await catalog.hasSubject('mouse8', 'Lever')).toBe(false)
        expect(await catalog.hasSettings('mouse7', 'Lever', 'DefaultSettings')).toBe(true)
        expect(await catalog.hasSettings('mouse7', 'Lever', 'DefaultSettings.mat')).toBe(true)
        expect(await catalog.hasSettings('mouse7', 'Lever', 'Other')).toBe(false)
    })

    it('reports calibration per box', async () => {
        expect(await catalog.calibrationStatus('box1')).toBe('present')
        expect(await catalog.calibrationStatus('box2')).toBe('missing')
        expect(await catalog.calibrationStatus('../box1')).toBe('unknown')
    })

    it('treats traversal names as unknown', async () => {
        expect(isSafeName('..')).toBe(false)
        expect(isSafeName('a/b')).toBe(false)
        expect(await catalog.hasProtocol('../Protocols')).toBe(false)
    })
})
