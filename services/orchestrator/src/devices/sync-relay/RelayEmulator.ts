// services/orchestrator/src/devices/sync-relay/RelayEmulator.ts
import { encodeChannelFrame, encodeStatusByte, RELAY_TAGS } from './codec.js'
import { RELAY_CHANNELS, type RelayTransport } from './types.js'

type OutputListener = (bytes: Buffer) => void

/**
 * Model of the timestamping relay firmware, driven by an explicit tick clock.
 *
 * - `A` turns the board on and echoes `A`; `Z` echoes `Z` and clears every channel
 * - `S ch` starts a channel and replies with state 1, elapsed 0
 * - `E ch` stops it and replies with state 0 and the ticks since its `S`
 * - each input edge on a started channel emits `T ch level elapsed`
 * - until `A`, only `A` and `Y` (reboot) are acted on
 */
export class RelayEmulator {
    private connected = false
    private now = 0
    private reboots = 0
    private pending: number[] = []
    private readonly started = new Map<number, number>()
    private readonly inputs: number[] = new Array<number>(RELAY_CHANNELS).fill(0)
    private readonly listeners = new Set<OutputListener>()

    onOutput(listener: OutputListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    get isConnected(): boolean {
        return this.connected
    }

    get rebootCount(): number {
        return this.reboots
    }

    get ticks(): number {
        return this.now
    }

    advance(ticks: number): void {
        this.now += ticks
    }

    /** Feeds host bytes; returns everything emitted in response. */
    receive(bytes: Uint8Array): Buffer {
        this.pending.push(...bytes)
        const out: Buffer[] = []

        while (this.pending.length > 0) {
            const tag = this.pending[0]
            const needsChannel = tag === RELAY_TAGS.start || tag === RELAY_TAGS.stop
            if (needsChannel && this.pending.length < 3) break

            const consumed = needsChannel ? this.pending.splice(0, 3) : this.pending.splice(0, 1)
            const reply = this.execute(tag, needsChannel ? consumed[1] | (consumed[2] << 8) : -1)
            if (reply) out.push(reply)
        }

        const emitted = Buffer.concat(out)
        if (emitted.length > 0) this.emit(emitted)
        return emitted
    }

    /** Drives one input line; an edge on a started channel emits a `T` frame. */
    setInput(channel: number, level: number): Buffer {
        if (channel < 0 || channel >= RELAY_CHANNELS) return Buffer.alloc(0)
        const next = level ? 1 : 0
        if (this.inputs[channel] === next) return Buffer.alloc(0)
        this.inputs[channel] = next

        const startedAt = this.started.get(channel)
        if (!this.connected || startedAt === undefined) return Buffer.alloc(0)

        const frame = encodeChannelFrame('ttl', channel, next, this.now - startedAt)
        this.emit(frame)
        return frame
    }

    private execute(tag: number, channel: number): Buffer | null {
        if (tag === RELAY_TAGS.connect) {
            this.connected = true
            return encodeStatusByte('connected')
        }
        if (tag === RELAY_TAGS.reboot) {
            if (this.connected) return null
            this.reboots++
            this.now = 0
            this.started.clear()
            return null
        }
        if (!this.connected) return null

        switch (tag) {
            case RELAY_TAGS.disconnect:
                this.connected = false
                this.started.clear()
                return encodeStatusByte('disconnected')

            case RELAY_TAGS.start:
                if (channel >= RELAY_CHANNELS) return null
                this.started.set(channel, this.now)
                return encodeChannelFrame('started', channel, 1, 0)

            case RELAY_TAGS.stop: {
                if (channel >= RELAY_CHANNELS) return null
                const startedAt = this.started.get(channel)
                this.started.delete(channel)
                return encodeChannelFrame('stopped', channel, 0, startedAt === undefined ? 0 : this.now - startedAt)
            }

            default:
                return null
        }
    }

    private emit(bytes: Buffer): void {
        for (const l of this.listeners) l(bytes)
    }
}

/** In-process transport backed by a RelayEmulator. */
export class EmulatorTransport implements RelayTransport {
    readonly description = 'emulator'
    private opened = false

    constructor(readonly emulator: RelayEmulator = new RelayEmulator()) {}

    async open(): Promise<void> {
        this.opened = true
    }

    async write(bytes: Uint8Array): Promise<void> {
        if (!this.opened) throw new Error('emulator transport is not open')
        this.emulator.receive(bytes)
    }

    onData(listener: (chunk: Uint8Array) => void): () => void {
        return this.emulator.onOutput((bytes) => {
            if (this.opened) listener(bytes)
        })
    }

    async close(): Promise<void> {
        this.opened = false
    }
}
