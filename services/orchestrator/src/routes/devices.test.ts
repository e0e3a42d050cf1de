import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { buildApp } from '../app.js'
import { buildAcademyConfigFromEnv } from '../core/config.js'

describe('device routes', () => {
    let dir: string
    let app: FastifyInstance

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'academy-rest-'))
        await fs.mkdir(path.join(dir, 'Academy'), { recursive: true })
        await fs.writeFile(path.join(dir, 'Academy', 'AcademyConfig.csv'), 'box1,EMU\r\nbox2,/dev/ttyACM3\r\n', 'utf8')

        const config = buildAcademyConfigFromEnv({ RIG_DATA_DIR: dir })
        app = buildApp({
            academy: {
                config,
                portLister: {
                    list: async () => [
                        { path: '/dev/ttyACM3', manufacturer: 'Arduino (www.arduino.cc)', serialNumber: 'SN-TEST-1' },
                        { path: '/dev/ttyS0', manufacturer: undefined, serialNumber: undefined },
                    ],
                },
            },
        })
        await app.ready()
    })

    afterEach(async () => {
        await app.close()
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('lists every registered box in file order', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/devices' })
        expect(res.statusCode).toBe(200)
        const body = res.json()
        expect(body.ok).toBe(true)
        expect(body.devices.map((d: { device: { boxId: string } }) => d.device.boxId)).toEqual(['box1', 'box2'])
    })

    it('returns one box or a 404', async () => {
        const hit = await app.inject({ method: 'GET', url: '/api/devices/box2' })
        expect(hit.statusCode).toBe(200)
        expect(hit.json()).toEqual({
            ok: true,
            snapshot: {
                seq: 1,
                device: {
                    boxId: 'box2',
                    serialLocator: '/dev/ttyACM3',
                    state: 'Stopped',
                    guiVisible: false,
                    lastError: null,
                    calibration: 'unknown',
                },
                activeSession: null,
                lastSession: null,
            },
        })

        const miss = await app.inject({ method: 'GET', url: '/api/devices/box9' })
        expect(miss.statusCode).toBe(404)
        expect(miss.json()).toMatchObject({ ok: false, error: { code: 'UnknownDevice', message: 'unknown box "box9"' } })
    })

    it('lists candidate ports by manufacturer hint', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/ports' })
        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({
            ok: true,
            ports: [{ path: '/dev/ttyACM3', manufacturer: 'Arduino (www.arduino.cc)', serialNumber: 'SN-TEST-1' }],
        })
    })

    it('reports readiness once the registry is loaded', async () => {
        const res = await app.inject({ method: 'GET', url: '/ready' })
        expect(res.statusCode).toBe(200)
        expect(res.json()).toMatchObject({ ready: true, status: 'ready', devices: 2, clients: 0, relay: null })
    })

    it('answers 503 on relay routes when no relay is configured', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/sync' })
        expect(res.statusCode).toBe(503)
        expect(res.json()).toMatchObject({
            ok: false,
            error: { code: 'PortUnavailable', message: 'sync relay is not configured (SYNC_RELAY_PATH)' },
        })
    })
})
