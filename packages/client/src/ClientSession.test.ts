import { once } from 'node:events'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { WebSocketServer, type RawData, type WebSocket } from 'ws'
import {
    AcademyError,
    parseClientMessage,
    type ClientMessage,
    type DeviceSnapshot,
    type DeviceState,
    type ServerMessage,
} from '@rig-academy/protocol'
import { ClientSession, type ClientSessionOptions } from './ClientSession.js'

function snap(boxId: string, seq: number, state: DeviceState = 'Stopped'): DeviceSnapshot {
    return {
        seq,
        device: { boxId, serialLocator: 'EMU', state, guiVisible: false, lastError: null, calibration: 'unknown' },
        activeSession: null,
        lastSession: null,
    }
}

/** Loopback stand-in for the academy server: greets, records, and sends on demand. */
class FakeAcademy {
    readonly sockets: WebSocket[] = []
    readonly received: ClientMessage[][] = []
    answerPings = true
    fleet: DeviceSnapshot[] = [snap('box1', 1), snap('box2', 1)]

    private constructor(private readonly wss: WebSocketServer) {
        wss.on('connection', (ws: WebSocket) => {
            const index = this.sockets.length
            this.sockets.push(ws)
            this.received.push([])

            ws.on('message', (data: RawData) => {
                const parsed = parseClientMessage(data.toString())
                if (!parsed.ok) return
                this.received[index].push(parsed.value)
                if (parsed.value.type === 'ping' && this.answerPings) {
                    this.send(index, { type: 'pong', ts: parsed.value.ts ?? 0 })
                }
            })

            this.send(index, { type: 'welcome', serverTime: 'now', connectionId: `conn-${index}`, role: 'Local' })
            this.send(index, { type: 'fleet.snapshot', devices: this.fleet })
        })
    }

    static async start(): Promise<FakeAcademy> {
        const wss = new WebSocketServer({ port: 0, host: '127.0.0.1' })
        await once(wss, 'listening')
        return new FakeAcademy(wss)
    }

    get url(): string {
        const addr = this.wss.address()
        if (typeof addr === 'string') throw new Error('expected a TCP address')
        return `ws://127.0.0.1:${addr.port}`
    }

    send(index: number, msg: ServerMessage): void {
        this.sockets[index].send(JSON.stringify(msg))
    }

    commands(index: number): ClientMessage[] {
        return this.received[index].filter((m) => m.type === 'command')
    }

    async close(): Promise<void> {
        for (const ws of this.sockets) ws.terminate()
        await new Promise<void>((resolve, reject) => {
            this.wss.close((err) => (err ? reject(err) : resolve()))
        })
    }
}

async function failure(p: Promise<unknown>): Promise<AcademyError> {
    try {
        await p
    } catch (err) {
        if (err instanceof AcademyError) return err
        throw err
    }
    throw new Error('expected the command to fail')
}

describe('ClientSession', () => {
    let server: FakeAcademy
    let session: ClientSession

    const FAST_RECONNECT: ClientSessionOptions = {
        reconnect: { minDelayMs: 20, maxDelayMs: 20, jitter: 0 },
    }

    async function open(opts: ClientSessionOptions = FAST_RECONNECT): Promise<ClientSession> {
        session = new ClientSession(server.url, opts)
        session.connect()
        await vi.waitFor(() => {
            expect(session.id).toBe('conn-0')
        })
        return session
    }

    beforeEach(async () => {
        server = await FakeAcademy.start()
    })

    afterEach(async () => {
        session?.close()
        await server.close()
    })

    it('keeps the fleet view by full replacement', async () => {
        await open()
        await vi.waitFor(() => {
            expect(session.devices().map((d) => d.device.boxId)).toEqual(['box1', 'box2'])
        })
        expect(session.connectionRole).toBe('Local')

        server.send(0, { type: 'device.snapshot', snapshot: snap('box1', 2, 'Starting') })
        server.send(0, { type: 'device.snapshot', snapshot: snap('box3', 1) })
        server.send(0, { type: 'device.removed', device: 'box2' })
        await vi.waitFor(() => {
            expect(session.devices().map((d) => d.device.boxId)).toEqual(['box1', 'box3'])
        })
        expect(session.device('box1')).toEqual(snap('box1', 2, 'Starting'))

        server.send(0, { type: 'fleet.snapshot', devices: [snap('box2', 4, 'Idle')] })
        await vi.waitFor(() => {
            expect(session.devices()).toEqual([snap('box2', 4, 'Idle')])
        })
    })

    it('resolves commands with their acks', async () => {
        await open()

        const started = session.command('box1', 'start')
        await vi.waitFor(() => {
            expect(server.commands(0)).toHaveLength(1)
        })
        expect(server.commands(0)[0]).toEqual({ type: 'command', requestId: 'r1', device: 'box1', verb: 'start', args: {} })
        server.send(0, { type: 'command.ack', requestId: 'r1', ok: true, result: { pid: 7 } })
        await expect(started).resolves.toEqual({ pid: 7 })

        const run = failure(session.command('box1', 'runProtocol', { protocol: 'Lever', subject: 'mouse7' }))
        await vi.waitFor(() => {
            expect(server.commands(0)).toHaveLength(2)
        })
        server.send(0, {
            type: 'command.ack',
            requestId: 'r2',
            ok: false,
            error: { code: 'InvalidState', message: 'runProtocol is not allowed while Starting' },
        })
        const err = await run
        expect(err.code).toBe('InvalidState')
        expect(err.message).toBe('runProtocol is not allowed while Starting')
    })

    it('fails commands at once while disconnected', async () => {
        session = new ClientSession(server.url, FAST_RECONNECT)
        const err = await failure(session.command('box1', 'start'))
        expect(err.code).toBe('Disconnected')
        expect(err.message).toBe('not connected')
    })

    it('times out commands nobody acknowledges', async () => {
        await open({ ...FAST_RECONNECT, commandTimeoutMs: 50 })
        const err = await failure(session.command('box1', 'calibrate'))
        expect(err.code).toBe('Timeout')
        expect(err.message).toBe('no ack for calibrate within 50 ms')
    })

    it('rejects pending commands on a drop and resubscribes after reconnecting', async () => {
        await open()
        const pending = failure(session.command('box1', 'start'))
        await vi.waitFor(() => {
            expect(server.commands(0)).toHaveLength(1)
        })

        server.sockets[0].terminate()
        const err = await pending
        expect(err.code).toBe('Disconnected')

        await vi.waitFor(() => {
            expect(server.received[1]).toContainEqual({ type: 'subscribe' })
        })
        expect(server.received[0]).not.toContainEqual({ type: 'subscribe' })
        await vi.waitFor(() => {
            expect(session.id).toBe('conn-1')
        })
    })

    it('drops a link whose pings go unanswered', async () => {
        server.answerPings = false
        await open({ ...FAST_RECONNECT, heartbeat: { intervalMs: 30, timeoutMs: 50 } })

        await vi.waitFor(() => {
            expect(server.sockets).toHaveLength(2)
        })
        expect(server.received[0].some((m) => m.type === 'ping')).toBe(true)
    })

    it('keeps an answered link open', async () => {
        await open({ ...FAST_RECONNECT, heartbeat: { intervalMs: 20, timeoutMs: 100 } })
        await vi.waitFor(() => {
            expect(server.received[0].filter((m) => m.type === 'ping').length).toBeGreaterThanOrEqual(3)
        })
        expect(server.sockets).toHaveLength(1)
    })
})
