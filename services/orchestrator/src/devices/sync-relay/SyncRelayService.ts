// services/orchestrator/src/devices/sync-relay/SyncRelayService.ts
import { AcademyError } from '@rig-academy/protocol'
import { encodeCommand, RelayFrameDecoder } from './codec.js'
import {
    RELAY_CHANNELS,
    type RelayCommand,
    type RelayEventSink,
    type RelayFrame,
    type RelayStatus,
    type RelayTransport,
    type SyncEvent,
    type SyncRelayConfig,
} from './types.js'

type Waiter = {
    match: (frame: RelayFrame) => boolean
    resolve: (frame: RelayFrame) => void
}

export interface SyncRelayDeps {
    transport: RelayTransport
    events: RelayEventSink
    /** Host clock used to stamp received edges. */
    now?: () => number
}

/**
 * Host-side driver for the timestamping relay.
 *
 * Each command waits for the board's echo (bounded by `ackTimeoutMs`).
 * Input edges are kept per channel with the host receive time until
 * `takeSyncTimes` drains them.
 */
export class SyncRelayService {
    private readonly decoder = new RelayFrameDecoder()
    private readonly waiters = new Set<Waiter>()
    private readonly active = new Set<number>()
    private readonly edges = new Map<number, SyncEvent[]>()
    private readonly now: () => number
    private unsubscribe: (() => void) | null = null
    private connected = false

    constructor(
        private readonly cfg: SyncRelayConfig,
        private readonly deps: SyncRelayDeps
    ) {
        this.now = deps.now ?? Date.now
    }

    async open(): Promise<void> {
        if (this.unsubscribe) return
        await this.deps.transport.open()
        this.unsubscribe = this.deps.transport.onData((chunk) => this.handleChunk(chunk))
        this.deps.events.publish({ kind: 'relay-opened', at: Date.now(), transport: this.deps.transport.description })
    }

    async close(): Promise<void> {
        if (!this.unsubscribe) return
        this.unsubscribe()
        this.unsubscribe = null
        this.decoder.reset()
        this.connected = false
        this.active.clear()
        await this.deps.transport.close()
        this.deps.events.publish({ kind: 'relay-closed', at: Date.now(), transport: this.deps.transport.description })
    }

    status(): RelayStatus {
        let pendingEvents = 0
        for (const list of this.edges.values()) pendingEvents += list.length
        return {
            open: this.unsubscribe !== null,
            connected: this.connected,
            activeChannels: [...this.active].sort((a, b) => a - b),
            pendingEvents,
        }
    }

    async connect(): Promise<void> {
        await this.request({ op: 'connect' }, (f) => f.kind === 'connected', 'connect')
    }

    async disconnect(): Promise<void> {
        await this.request({ op: 'disconnect' }, (f) => f.kind === 'disconnected', 'disconnect')
    }

    /** Only honoured by the board while disconnected; it sends no reply. */
    async reboot(): Promise<void> {
        if (this.connected) throw new AcademyError('InvalidState', 'relay must be disconnected before a reboot')
        await this.write({ op: 'reboot' })
    }

    async startChannel(channel: number): Promise<void> {
        assertChannel(channel)
        if (!this.connected) throw new AcademyError('InvalidState', 'relay is not connected')
        await this.request(
            { op: 'start', channel },
            (f) => f.kind === 'started' && f.channel === channel,
            `start channel ${channel}`
        )
    }

    /** Resolves with the ticks the channel ran for. */
    async stopChannel(channel: number): Promise<number> {
        assertChannel(channel)
        if (!this.connected) throw new AcademyError('InvalidState', 'relay is not connected')
        const frame = await this.request(
            { op: 'stop', channel },
            (f) => f.kind === 'stopped' && f.channel === channel,
            `stop channel ${channel}`
        )
        return frame.kind === 'stopped' ? frame.elapsed : 0
    }

    /** Removes and returns the channel's edges received strictly before `beforeHostTime`. */
    takeSyncTimes(channel: number, beforeHostTime = Number.POSITIVE_INFINITY): SyncEvent[] {
        assertChannel(channel)
        const list = this.edges.get(channel) ?? []
        const taken = list.filter((e) => e.hostTime < beforeHostTime)
        this.edges.set(channel, list.filter((e) => e.hostTime >= beforeHostTime))
        return taken
    }

    private async write(cmd: RelayCommand): Promise<void> {
        if (!this.unsubscribe) throw new AcademyError('InvalidState', 'relay link is not open')
        await this.deps.transport.write(encodeCommand(cmd))
    }

    private async request(
        cmd: RelayCommand,
        match: (frame: RelayFrame) => boolean,
        label: string
    ): Promise<RelayFrame> {
        const pending: { waiter?: Waiter; timer?: NodeJS.Timeout } = {}

        // registered before writing: the emulator answers synchronously
        const reply = new Promise<RelayFrame>((resolve, reject) => {
            const w: Waiter = { match, resolve }
            pending.waiter = w
            this.waiters.add(w)
            pending.timer = setTimeout(() => {
                this.waiters.delete(w)
                reject(new AcademyError('Timeout', `relay did not acknowledge ${label} within ${this.cfg.ackTimeoutMs} ms`))
            }, this.cfg.ackTimeoutMs)
        })

        try {
            await this.write(cmd)
            return await reply
        } finally {
            clearTimeout(pending.timer)
            if (pending.waiter) this.waiters.delete(pending.waiter)
        }
    }

    private handleChunk(chunk: Uint8Array): void {
        const hostTime = this.now()
        for (const frame of this.decoder.push(chunk)) {
            this.apply(frame, hostTime)
            for (const w of this.waiters) {
                if (!w.match(frame)) continue
                this.waiters.delete(w)
                w.resolve(frame)
                break
            }
        }
    }

    private apply(frame: RelayFrame, hostTime: number): void {
        const at = Date.now()
        switch (frame.kind) {
            case 'connected':
                this.connected = true
                this.deps.events.publish({ kind: 'relay-connected', at })
                return

            case 'disconnected':
                this.connected = false
                this.active.clear()
                this.deps.events.publish({ kind: 'relay-disconnected', at })
                return

            case 'started':
                this.active.add(frame.channel)
                this.edges.set(frame.channel, [])
                this.deps.events.publish({ kind: 'relay-channel-started', at, channel: frame.channel })
                return

            case 'stopped':
                this.active.delete(frame.channel)
                this.deps.events.publish({
                    kind: 'relay-channel-stopped',
                    at,
                    channel: frame.channel,
                    elapsed: frame.elapsed,
                })
                return

            case 'ttl': {
                const list = this.edges.get(frame.channel) ?? []
                list.push({ channel: frame.channel, level: frame.state, elapsed: frame.elapsed, hostTime })
                this.edges.set(frame.channel, list)
                this.deps.events.publish({
                    kind: 'relay-ttl',
                    at,
                    channel: frame.channel,
                    level: frame.state,
                    elapsed: frame.elapsed,
                })
                return
            }

            case 'unknown':
                this.deps.events.publish({
                    kind: 'relay-unexpected',
                    at,
                    detail: `unknown byte 0x${frame.byte.toString(16).padStart(2, '0')}`,
                })
                return
        }
    }
}

function assertChannel(channel: number): void {
    if (!Number.isInteger(channel) || channel < 0 || channel >= RELAY_CHANNELS) {
        throw new AcademyError('BadRequest', `relay channel must be 0..${RELAY_CHANNELS - 1}`)
    }
}
