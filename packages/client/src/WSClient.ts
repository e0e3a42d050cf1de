// packages/client/src/WSClient.ts
import { EventEmitter } from 'node:events'
import { WebSocket, type RawData } from 'ws'
import { parseServerMessage, type ClientMessage, type ServerMessage } from '@rig-academy/protocol'

export type ReconnectOptions = {
    enabled?: boolean
    minDelayMs?: number
    maxDelayMs?: number
    factor?: number
    jitter?: number
}

export type HeartbeatOptions = {
    intervalMs?: number
    timeoutMs?: number
}

export type WSClientOptions = {
    heartbeat?: HeartbeatOptions
    reconnect?: ReconnectOptions
}

export type WSStatus =
    | { state: 'connected' }
    | { state: 'disconnected'; code: number; reason: string }
    | { state: 'reconnecting'; delayMs: number; attempts: number }

export interface WSClientEvents {
    open: () => void
    message: (msg: ServerMessage) => void
    /** A frame that is not a valid server message. */
    invalid: (error: string) => void
    close: (code: number, reason: string) => void
    error: (err: Error) => void
    status: (status: WSStatus) => void
}

type EventNames = keyof WSClientEvents

const DEFAULT_HEARTBEAT_INTERVAL = 10_000
const DEFAULT_HEARTBEAT_TIMEOUT = 5_000
const DEFAULT_RC_MIN = 1_000
const DEFAULT_RC_MAX = 15_000
const DEFAULT_RC_FACTOR = 1.8
const DEFAULT_RC_JITTER = 0.2

function rawToText(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
    return data.toString('utf8')
}

/**
 * WebSocket client for the academy server.
 *
 * - heartbeat: `ping` every interval; no `pong` within the timeout closes the socket
 * - reconnect: exponential backoff with jitter until `shutdown()`
 */
export class WSClient extends EventEmitter {
    private ws: WebSocket | null = null
    private url: string | null = null

    // heartbeat
    private hbTimer: NodeJS.Timeout | null = null
    private pongTimer: NodeJS.Timeout | null = null
    private readonly hbIntervalMs: number
    private readonly hbTimeoutMs: number

    // reconnect
    private readonly reconnectEnabled: boolean
    private reconnectTimer: NodeJS.Timeout | null = null
    private readonly backoffMin: number
    private readonly backoffMax: number
    private readonly backoffFactor: number
    private readonly backoffJitter: number
    private attempts = 0
    private shouldReconnect = true

    constructor(opts: WSClientOptions = {}) {
        super()
        const hb = opts.heartbeat ?? {}
        const rc = opts.reconnect ?? {}

        this.hbIntervalMs = hb.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL
        this.hbTimeoutMs = hb.timeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT

        this.reconnectEnabled = rc.enabled ?? true
        this.backoffMin = rc.minDelayMs ?? DEFAULT_RC_MIN
        this.backoffMax = rc.maxDelayMs ?? DEFAULT_RC_MAX
        this.backoffFactor = rc.factor ?? DEFAULT_RC_FACTOR
        this.backoffJitter = rc.jitter ?? DEFAULT_RC_JITTER
    }

    override on<T extends EventNames>(event: T, listener: WSClientEvents[T]): this {
        return super.on(event, listener)
    }
    override off<T extends EventNames>(event: T, listener: WSClientEvents[T]): this {
        return super.off(event, listener)
    }
    override emit<T extends EventNames>(event: T, ...args: Parameters<WSClientEvents[T]>): boolean {
        return super.emit(event, ...args)
    }

    get isOpen(): boolean {
        return this.ws?.readyState === WebSocket.OPEN
    }

    connect(url: string): void {
        this.url = url
        this.shouldReconnect = true
        this.openSocket()
    }

    /** False when the socket is not open; nothing is queued. */
    send(msg: ClientMessage): boolean {
        if (!this.ws || this.ws.readyState !== WebSocket.OPEN) return false
        this.ws.send(JSON.stringify(msg))
        return true
    }

    /** Stop heartbeats and auto-reconnect; closes the socket. */
    shutdown(): void {
        this.shouldReconnect = false
        this.clearHeartbeat()
        this.clearReconnectTimer()
        this.ws?.close(1000, 'client shutdown')
    }

    // ---- internals ---------------------------------------------------------

    private openSocket(): void {
        if (!this.url) return
        this.dropSocket()

        const ws = new WebSocket(this.url)
        this.ws = ws

        ws.on('open', () => {
            // reset backoff
            this.attempts = 0
            this.scheduleHeartbeat()
            this.emit('open')
            this.emit('status', { state: 'connected' })
        })

        ws.on('message', (data: RawData) => {
            const parsed = parseServerMessage(rawToText(data))
            if (!parsed.ok) {
                this.emit('invalid', parsed.error)
                return
            }
            // heartbeat reply
            if (parsed.value.type === 'pong') {
                this.clearPongTimeout()
                return
            }
            this.emit('message', parsed.value)
        })

        ws.on('close', (code: number, reason: Buffer) => {
            if (this.ws !== ws) return
            this.ws = null
            this.clearHeartbeat()
            const why = reason.toString('utf8')
            this.emit('close', code, why)
            this.emit('status', { state: 'disconnected', code, reason: why })
            this.maybeScheduleReconnect()
        })

        ws.on('error', (err: Error) => {
            // close follows and drives reconnect
            if (this.listenerCount('error') > 0) this.emit('error', err)
        })
    }

    /** Detaches the current socket so its late close does not trigger a reconnect. */
    private dropSocket(): void {
        const old = this.ws
        if (!old) return
        this.ws = null
        if (old.readyState === WebSocket.CONNECTING) old.terminate()
        else old.close()
    }

    private scheduleHeartbeat(): void {
        this.clearHeartbeat()
        this.hbTimer = setTimeout(() => this.doHeartbeat(), Math.min(1000, this.hbIntervalMs))
    }

    private doHeartbeat(): void {
        const ws = this.ws
        if (!ws || ws.readyState !== WebSocket.OPEN) return
        this.send({ type: 'ping', ts: Date.now() })

        // wait for pong
        this.clearPongTimeout()
        this.pongTimer = setTimeout(() => {
            // server did not respond in time -> force close, reconnect follows
            ws.terminate()
        }, this.hbTimeoutMs)

        this.hbTimer = setTimeout(() => this.doHeartbeat(), this.hbIntervalMs)
    }

    private clearHeartbeat(): void {
        if (this.hbTimer !== null) {
            clearTimeout(this.hbTimer)
            this.hbTimer = null
        }
        this.clearPongTimeout()
    }

    private clearPongTimeout(): void {
        if (this.pongTimer !== null) {
            clearTimeout(this.pongTimer)
            this.pongTimer = null
        }
    }

    private maybeScheduleReconnect(): void {
        if (!this.reconnectEnabled || !this.shouldReconnect || !this.url) return
        this.clearReconnectTimer()
        const delay = this.nextBackoffDelay()
        this.emit('status', { state: 'reconnecting', delayMs: delay, attempts: this.attempts + 1 })
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null
            this.attempts += 1
            this.openSocket()
        }, delay)
    }

    private clearReconnectTimer(): void {
        if (this.reconnectTimer !== null) {
            clearTimeout(this.reconnectTimer)
            this.reconnectTimer = null
        }
    }

    private nextBackoffDelay(): number {
        const pow = Math.max(0, this.attempts)
        const base = Math.min(this.backoffMax, this.backoffMin * Math.pow(this.backoffFactor, pow))
        const jitterRange = base * this.backoffJitter
        const jitter = (Math.random() * 2 - 1) * jitterRange // [-j, +j]
        return Math.max(this.backoffMin, Math.min(this.backoffMax, Math.round(base + jitter)))
    }
}
