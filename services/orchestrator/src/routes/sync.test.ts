import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { buildApp } from '../app.js'
import { buildAcademyConfigFromEnv } from '../core/config.js'
import { EmulatorTransport, RelayEmulator } from '../devices/sync-relay/RelayEmulator.js'

describe('sync relay routes', () => {
    let dir: string
    let app: FastifyInstance
    let emu: RelayEmulator

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'academy-sync-'))
        const config = buildAcademyConfigFromEnv({ RIG_DATA_DIR: dir, SYNC_RELAY_ACK_TIMEOUT_MS: '500' })
        emu = new RelayEmulator()
        app = buildApp({
            academy: { config, portLister: { list: async () => [] } },
            relay: { transport: new EmulatorTransport(emu) },
        })
        await app.ready()
    })

    afterEach(async () => {
        await app.close()
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('opens the relay on boot', async () => {
        const res = await app.inject({ method: 'GET', url: '/api/sync' })
        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({
            ok: true,
            status: { open: true, connected: false, activeChannels: [], pendingEvents: 0 },
        })
    })

    it('records input edges on a started channel and drains them', async () => {
        expect((await app.inject({ method: 'POST', url: '/api/sync/connect' })).json()).toEqual({ ok: true })
        expect(emu.isConnected).toBe(true)

        const started = await app.inject({ method: 'POST', url: '/api/sync/channels/3/start' })
        expect(started.json()).toEqual({ ok: true })

        emu.advance(150)
        emu.setInput(3, 1)

        const status = (await app.inject({ method: 'GET', url: '/api/sync' })).json()
        expect(status.status).toEqual({ open: true, connected: true, activeChannels: [3], pendingEvents: 1 })

        const taken = await app.inject({ method: 'POST', url: '/api/sync/channels/3/take' })
        expect(taken.statusCode).toBe(200)
        expect(taken.json().events).toMatchObject([{ channel: 3, level: 1, elapsed: 150 }])

        const again = await app.inject({ method: 'POST', url: '/api/sync/channels/3/take' })
        expect(again.json()).toEqual({ ok: true, events: [] })

        emu.advance(50)
        const stopped = await app.inject({ method: 'POST', url: '/api/sync/channels/3/stop' })
        expect(stopped.json()).toEqual({ ok: true, elapsed: 200 })
    })

    it('keeps edges at or after the cutoff queued', async () => {
        await app.inject({ method: 'POST', url: '/api/sync/connect' })
        await app.inject({ method: 'POST', url: '/api/sync/channels/0/start' })
        emu.setInput(0, 1)

        const none = await app.inject({ method: 'POST', url: '/api/sync/channels/0/take?before=0' })
        expect(none.json()).toEqual({ ok: true, events: [] })

        const all = await app.inject({ method: 'POST', url: '/api/sync/channels/0/take' })
        expect(all.json().events).toHaveLength(1)
    })

    it('maps relay errors to HTTP statuses', async () => {
        const notConnected = await app.inject({ method: 'POST', url: '/api/sync/channels/3/start' })
        expect(notConnected.statusCode).toBe(409)
        expect(notConnected.json()).toMatchObject({ error: { code: 'InvalidState', message: 'relay is not connected' } })

        const outOfRange = await app.inject({ method: 'POST', url: '/api/sync/channels/13/start' })
        expect(outOfRange.statusCode).toBe(400)
        expect(outOfRange.json()).toMatchObject({ error: { code: 'BadRequest', message: 'relay channel must be 0..12' } })

        const junk = await app.inject({ method: 'POST', url: '/api/sync/channels/x/start' })
        expect(junk.statusCode).toBe(400)
        expect(junk.json()).toMatchObject({ error: { code: 'BadRequest', message: 'invalid relay channel "x"' } })

        const badCutoff = await app.inject({ method: 'POST', url: '/api/sync/channels/3/take?before=soon' })
        expect(badCutoff.statusCode).toBe(400)
        expect(badCutoff.json()).toMatchObject({ error: { code: 'BadRequest', message: 'before must be epoch milliseconds' } })
    })

    it('reboots only while disconnected', async () => {
        await app.inject({ method: 'POST', url: '/api/sync/connect' })
        const refused = await app.inject({ method: 'POST', url: '/api/sync/reboot' })
        expect(refused.statusCode).toBe(409)
        expect(emu.rebootCount).toBe(0)

        await app.inject({ method: 'POST', url: '/api/sync/disconnect' })
        const ok = await app.inject({ method: 'POST', url: '/api/sync/reboot' })
        expect(ok.json()).toEqual({ ok: true })
        expect(emu.rebootCount).toBe(1)
    })
})
