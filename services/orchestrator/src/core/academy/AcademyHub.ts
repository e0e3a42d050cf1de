// services/orchestrator/src/core/academy/AcademyHub.ts
import { randomUUID } from 'node:crypto'
import {
    parseClientMessage,
    type ClientMessage,
    type CommandAck,
    type ConnectionRole,
    type DeviceSnapshot,
    type ServerMessage,
    type WireLogEntry,
} from '@rig-academy/protocol'
import type { FleetStateStore } from '../state.js'
import type { CommandOutcome, CommandRequest } from '../router/CommandRouter.js'

/** The parts of a `ws` WebSocket the hub uses. */
export interface HubSocket {
    readonly readyState: number
    readonly bufferedAmount: number
    send(data: string): void
    close(code?: number, reason?: string): void
}

const WS_OPEN = 1

export interface CommandHandler {
    handle(req: CommandRequest): Promise<CommandOutcome>
}

export interface AcademyHubOptions {
    /** Per-client bound on unsent bytes before broadcasts to it are dropped. */
    maxBufferedBytes: number
    resyncCheckMs: number
    /** Log history sent right after the fleet snapshot; empty = none. */
    logHistory?: () => WireLogEntry[]
}

export type HubEvent =
    | { kind: 'client-connected'; at: number; connectionId: string; role: ConnectionRole; clients: number }
    | { kind: 'client-disconnected'; at: number; connectionId: string; clients: number }
    | { kind: 'client-lagging'; at: number; connectionId: string; bufferedAmount: number }
    | { kind: 'client-resynced'; at: number; connectionId: string }
    | { kind: 'bad-message'; at: number; connectionId: string; error: string }
    | { kind: 'send-failed'; at: number; connectionId: string; error: string }

export interface HubEventSink {
    publish(evt: HubEvent): void
}

type Connection = {
    id: string
    role: ConnectionRole
    connectedAt: number
    socket: HubSocket
    lagging: boolean
}

/**
 * Fan-out point between clients and the router.
 *
 * - on attach: welcome → fleet.snapshot → logs.history, then live broadcasts
 * - every snapshot the store emits goes to every connection
 * - command acks go only to the sender and are never dropped
 * - a connection over its buffer bound is "lagging": broadcasts skip it until
 *   its buffer drains, then it gets a fresh fleet.snapshot
 */
export class AcademyHub {
    private readonly connections = new Map<string, Connection>()
    private readonly resyncTimer: NodeJS.Timeout
    private closed = false

    private readonly onDevice = (snapshot: DeviceSnapshot) => {
        this.broadcast({ type: 'device.snapshot', snapshot })
    }
    private readonly onRemoved = (boxId: string) => {
        this.broadcast({ type: 'device.removed', device: boxId })
    }

    constructor(
        private readonly router: CommandHandler,
        private readonly store: FleetStateStore,
        private readonly opts: AcademyHubOptions,
        private readonly events: HubEventSink
    ) {
        store.on('device', this.onDevice)
        store.on('device:removed', this.onRemoved)
        this.resyncTimer = setInterval(() => this.checkLagging(), opts.resyncCheckMs)
        this.resyncTimer.unref()
    }

    get size(): number {
        return this.connections.size
    }

    attach(socket: HubSocket, role: ConnectionRole): string {
        const conn: Connection = { id: randomUUID(), role, connectedAt: Date.now(), socket, lagging: false }
        this.connections.set(conn.id, conn)

        this.sendTo(conn, { type: 'welcome', serverTime: new Date().toISOString(), connectionId: conn.id, role }, true)
        this.sendTo(conn, { type: 'fleet.snapshot', devices: this.store.listDevices() }, true)
        const history = this.opts.logHistory?.() ?? []
        if (history.length > 0) this.sendTo(conn, { type: 'logs.history', entries: history }, true)

        this.events.publish({
            kind: 'client-connected',
            at: Date.now(),
            connectionId: conn.id,
            role,
            clients: this.connections.size,
        })
        return conn.id
    }

    /** Disconnects cancel nothing; in-flight commands still run and broadcast. */
    detach(connectionId: string): void {
        if (!this.connections.delete(connectionId)) return
        this.events.publish({
            kind: 'client-disconnected',
            at: Date.now(),
            connectionId,
            clients: this.connections.size,
        })
    }

    /** Never rejects. */
    async handleMessage(connectionId: string, text: string): Promise<void> {
        const conn = this.connections.get(connectionId)
        if (!conn) return

        const parsed = parseClientMessage(text)
        if (!parsed.ok) {
            this.events.publish({ kind: 'bad-message', at: Date.now(), connectionId, error: parsed.error })
            const requestId = requestIdOf(text)
            if (requestId) {
                this.sendTo(conn, {
                    type: 'command.ack',
                    requestId,
                    ok: false,
                    error: { code: 'BadRequest', message: parsed.error },
                }, true)
            }
            return
        }

        await this.dispatch(conn, parsed.value)
    }

    private async dispatch(conn: Connection, msg: ClientMessage): Promise<void> {
        switch (msg.type) {
            case 'ping':
                this.sendTo(conn, { type: 'pong', ts: msg.ts ?? Date.now() }, true)
                return

            case 'subscribe':
                conn.lagging = false
                this.sendTo(conn, { type: 'fleet.snapshot', devices: this.store.listDevices() }, true)
                return

            case 'command': {
                const outcome = await this.router.handle({
                    requestId: `${conn.id}:${msg.requestId}`,
                    boxId: msg.device,
                    verb: msg.verb,
                    args: msg.args,
                    origin: { connectionId: conn.id, role: conn.role },
                })
                const ack: CommandAck = outcome.ok
                    ? { type: 'command.ack', requestId: msg.requestId, ok: true, result: outcome.result }
                    : { type: 'command.ack', requestId: msg.requestId, ok: false, error: outcome.error }
                // the sender may have gone while the command ran
                const live = this.connections.get(conn.id)
                if (live) this.sendTo(live, ack, true)
                return
            }
        }
    }

    broadcast(msg: ServerMessage): void {
        if (this.closed) return
        const payload = JSON.stringify(msg)
        for (const conn of this.connections.values()) this.deliver(conn, payload, false)
    }

    /** Re-admits drained lagging connections with a full snapshot. */
    checkLagging(): void {
        for (const conn of this.connections.values()) {
            if (!conn.lagging || conn.socket.readyState !== WS_OPEN) continue
            if (conn.socket.bufferedAmount > 0) continue
            conn.lagging = false
            this.sendTo(conn, { type: 'fleet.snapshot', devices: this.store.listDevices() }, true)
            this.events.publish({ kind: 'client-resynced', at: Date.now(), connectionId: conn.id })
        }
    }

    isLagging(connectionId: string): boolean {
        return this.connections.get(connectionId)?.lagging ?? false
    }

    /** Tells every client the server is going away and stops listening to the store. */
    close(): void {
        if (this.closed) return
        const payload = JSON.stringify({ type: 'server.closing' } satisfies ServerMessage)
        for (const conn of this.connections.values()) this.deliver(conn, payload, true)
        this.closed = true
        clearInterval(this.resyncTimer)
        this.store.off('device', this.onDevice)
        this.store.off('device:removed', this.onRemoved)
        this.connections.clear()
    }

    private sendTo(conn: Connection, msg: ServerMessage, force: boolean): void {
        this.deliver(conn, JSON.stringify(msg), force)
    }

    private deliver(conn: Connection, payload: string, force: boolean): void {
        const { socket } = conn
        if (socket.readyState !== WS_OPEN) return

        if (!force) {
            if (conn.lagging) return
            if (socket.bufferedAmount > this.opts.maxBufferedBytes) {
                conn.lagging = true
                this.events.publish({
                    kind: 'client-lagging',
                    at: Date.now(),
                    connectionId: conn.id,
                    bufferedAmount: socket.bufferedAmount,
                })
                return
            }
        }

        try {
            socket.send(payload)
        } catch (err) {
            // treated like a full buffer: skipped until the resync check
            conn.lagging = true
            this.events.publish({
                kind: 'send-failed',
                at: Date.now(),
                connectionId: conn.id,
                error: err instanceof Error ? err.message : String(err),
            })
        }
    }
}

function requestIdOf(text: string): string | null {
    try {
        const v: unknown = JSON.parse(text)
        if (v !== null && typeof v === 'object' && 'requestId' in v && typeof v.requestId === 'string') {
            return v.requestId
        }
    } catch {
        return null
    }
    return null
}
