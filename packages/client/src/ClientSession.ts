// packages/client/src/ClientSession.ts
import { EventEmitter } from 'node:events'
import {
    AcademyError,
    type CommandAck,
    type CommandVerb,
    type ConnectionRole,
    type DeviceSnapshot,
    type ServerMessage,
    type WireLogEntry,
} from '@rig-academy/protocol'
import { WSClient, type WSClientOptions } from './WSClient.js'

export interface ClientSessionOptions extends WSClientOptions {
    /** Rejects a command with `Timeout` when no ack arrives in time. */
    commandTimeoutMs?: number
}

export interface ClientSessionEvents {
    welcome: (info: { connectionId: string; role: ConnectionRole }) => void
    /** The whole view was replaced. */
    fleet: (devices: DeviceSnapshot[]) => void
    device: (snapshot: DeviceSnapshot) => void
    removed: (boxId: string) => void
    logs: (entries: WireLogEntry[]) => void
    closing: () => void
}

type EventNames = keyof ClientSessionEvents

type Pending = {
    resolve: (result: unknown) => void
    reject: (err: AcademyError) => void
    timer: NodeJS.Timeout
}

const DEFAULT_COMMAND_TIMEOUT_MS = 60_000

/**
 * One client's view of the academy: a fleet map kept by last-write-wins
 * replacement, and commands that resolve with their acks.
 *
 * On every reconnect the session asks for a fresh `fleet.snapshot`; commands
 * still waiting when the link drops are rejected with `Disconnected`.
 */
export class ClientSession extends EventEmitter {
    readonly client: WSClient
    private readonly fleet = new Map<string, DeviceSnapshot>()
    private readonly pending = new Map<string, Pending>()
    private readonly commandTimeoutMs: number
    private requestSeq = 0
    private opened = false
    private connectionId: string | null = null
    private role: ConnectionRole | null = null

    constructor(
        private readonly url: string,
        opts: ClientSessionOptions = {}
    ) {
        super()
        this.commandTimeoutMs = opts.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS
        this.client = new WSClient(opts)

        this.client.on('open', () => {
            if (this.opened) this.client.send({ type: 'subscribe' })
            this.opened = true
        })
        this.client.on('message', (msg) => this.apply(msg))
        this.client.on('close', () => {
            this.connectionId = null
            this.rejectAll('connection closed before the command was acknowledged')
        })
    }

    override on<T extends EventNames>(event: T, listener: ClientSessionEvents[T]): this {
        return super.on(event, listener)
    }
    override off<T extends EventNames>(event: T, listener: ClientSessionEvents[T]): this {
        return super.off(event, listener)
    }
    override emit<T extends EventNames>(event: T, ...args: Parameters<ClientSessionEvents[T]>): boolean {
        return super.emit(event, ...args)
    }

    connect(): void {
        this.client.connect(this.url)
    }

    close(): void {
        this.client.shutdown()
        this.rejectAll('session closed')
    }

    get id(): string | null {
        return this.connectionId
    }

    get connectionRole(): ConnectionRole | null {
        return this.role
    }

    devices(): DeviceSnapshot[] {
        return [...this.fleet.values()]
    }

    device(boxId: string): DeviceSnapshot | undefined {
        return this.fleet.get(boxId)
    }

    /** Resolves with the ack's result; rejects with the ack's error as an AcademyError. */
    command(device: string, verb: CommandVerb, args: Record<string, unknown> = {}): Promise<unknown> {
        const requestId = `r${++this.requestSeq}`
        return new Promise<unknown>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.pending.delete(requestId)
                reject(new AcademyError('Timeout', `no ack for ${verb} within ${this.commandTimeoutMs} ms`))
            }, this.commandTimeoutMs)
            this.pending.set(requestId, { resolve, reject, timer })

            if (!this.client.send({ type: 'command', requestId, device, verb, args })) {
                this.settle(requestId, (p) => p.reject(new AcademyError('Disconnected', 'not connected')))
            }
        })
    }

    // ---- internals ---------------------------------------------------------

    private apply(msg: ServerMessage): void {
        switch (msg.type) {
            case 'welcome':
                this.connectionId = msg.connectionId
                this.role = msg.role
                this.emit('welcome', { connectionId: msg.connectionId, role: msg.role })
                return

            case 'fleet.snapshot':
                this.fleet.clear()
                for (const snap of msg.devices) this.fleet.set(snap.device.boxId, snap)
                this.emit('fleet', this.devices())
                return

            case 'device.snapshot':
                this.fleet.set(msg.snapshot.device.boxId, msg.snapshot)
                this.emit('device', msg.snapshot)
                return

            case 'device.removed':
                if (this.fleet.delete(msg.device)) this.emit('removed', msg.device)
                return

            case 'command.ack':
                this.ack(msg)
                return

            case 'logs.history':
            case 'logs.append':
                if (msg.entries.length > 0) this.emit('logs', msg.entries)
                return

            case 'server.closing':
                this.emit('closing')
                return

            case 'pong':
                return
        }
    }

    private ack(msg: CommandAck): void {
        this.settle(msg.requestId, (p) => {
            if (msg.ok) p.resolve(msg.result)
            else p.reject(new AcademyError(msg.error.code, msg.error.message))
        })
    }

    private settle(requestId: string, fn: (p: Pending) => void): void {
        const p = this.pending.get(requestId)
        if (!p) return
        this.pending.delete(requestId)
        clearTimeout(p.timer)
        fn(p)
    }

    private rejectAll(message: string): void {
        for (const requestId of [...this.pending.keys()]) {
            this.settle(requestId, (p) => p.reject(new AcademyError('Disconnected', message)))
        }
    }
}
