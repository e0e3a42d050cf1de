// services/orchestrator/src/devices/sync-relay/codec.ts
import { CHANNEL_FRAME_BYTES, type ChannelFrameKind, type RelayCommand, type RelayFrame } from './types.js'

const TAG = {
    connect: 0x41, // A
    disconnect: 0x5a, // Z
    start: 0x53, // S
    stop: 0x45, // E
    ttl: 0x54, // T
    reboot: 0x59, // Y
} as const

const CHANNEL_TAGS: Partial<Record<number, ChannelFrameKind>> = {
    [TAG.start]: 'started',
    [TAG.stop]: 'stopped',
    [TAG.ttl]: 'ttl',
}

export function encodeCommand(cmd: RelayCommand): Buffer {
    switch (cmd.op) {
        case 'connect':
            return Buffer.from([TAG.connect])
        case 'disconnect':
            return Buffer.from([TAG.disconnect])
        case 'reboot':
            return Buffer.from([TAG.reboot])
        case 'start':
        case 'stop': {
            const buf = Buffer.alloc(3)
            buf[0] = cmd.op === 'start' ? TAG.start : TAG.stop
            buf.writeUInt16LE(cmd.channel, 1)
            return buf
        }
    }
}

/** Firmware side: S / E / T replies carry channel, state and elapsed ticks. */
export function encodeChannelFrame(kind: ChannelFrameKind, channel: number, state: number, elapsed: number): Buffer {
    const buf = Buffer.alloc(CHANNEL_FRAME_BYTES)
    buf[0] = kind === 'started' ? TAG.start : kind === 'stopped' ? TAG.stop : TAG.ttl
    buf.writeUInt16LE(channel, 1)
    buf.writeUInt8(state, 3)
    buf.writeUInt32LE(elapsed >>> 0, 4)
    return buf
}

export function encodeStatusByte(kind: 'connected' | 'disconnected'): Buffer {
    return Buffer.from([kind === 'connected' ? TAG.connect : TAG.disconnect])
}

/**
 * Incremental decoder for the relay's reply stream. Frames may arrive split
 * across chunks; a partial channel frame is held until the rest arrives.
 */
export class RelayFrameDecoder {
    private pending: Buffer = Buffer.alloc(0)

    push(chunk: Uint8Array): RelayFrame[] {
        this.pending = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk])

        const frames: RelayFrame[] = []
        let pos = 0
        while (pos < this.pending.length) {
            const tag = this.pending[pos]

            if (tag === TAG.connect) {
                frames.push({ kind: 'connected' })
                pos += 1
                continue
            }
            if (tag === TAG.disconnect) {
                frames.push({ kind: 'disconnected' })
                pos += 1
                continue
            }

            const kind = CHANNEL_TAGS[tag]
            if (kind === undefined) {
                frames.push({ kind: 'unknown', byte: tag })
                pos += 1
                continue
            }

            if (this.pending.length - pos < CHANNEL_FRAME_BYTES) break
            frames.push({
                kind,
                channel: this.pending.readUInt16LE(pos + 1),
                state: this.pending.readUInt8(pos + 3),
                elapsed: this.pending.readUInt32LE(pos + 4),
            })
            pos += CHANNEL_FRAME_BYTES
        }

        this.pending = this.pending.subarray(pos)
        return frames
    }

    reset(): void {
        this.pending = Buffer.alloc(0)
    }
}

export const RELAY_TAGS = TAG
