// services/orchestrator/src/devices/sync-relay/types.ts

/** Inputs 0..12 on the relay board. */
export const RELAY_CHANNELS = 13

/** Tag byte + channel (u16 LE) + state (u8) + elapsed ticks (u32 LE). */
export const CHANNEL_FRAME_BYTES = 8

export type RelayCommand =
    | { op: 'connect' }
    | { op: 'disconnect' }
    | { op: 'start'; channel: number }
    | { op: 'stop'; channel: number }
    | { op: 'reboot' }

export type ChannelFrameKind = 'started' | 'stopped' | 'ttl'

export type RelayFrame =
    | { kind: 'connected' }
    | { kind: 'disconnected' }
    | { kind: ChannelFrameKind; channel: number; state: number; elapsed: number }
    | { kind: 'unknown'; byte: number }

/** One decoded input edge, stamped with the host clock when it arrived. */
export interface SyncEvent {
    channel: number
    level: number
    /** Relay ticks since the channel was started. */
    elapsed: number
    /** Host epoch ms at receipt. */
    hostTime: number
}

export interface RelayStatus {
    open: boolean
    connected: boolean
    activeChannels: number[]
    pendingEvents: number
}

/**
 * Byte pipe to the relay. The serial implementation wraps `serialport`;
 * tests and `SYNC_RELAY_PATH=EMU` use the in-process emulator.
 */
export interface RelayTransport {
    readonly description: string
    open(): Promise<void>
    write(bytes: Uint8Array): Promise<void>
    /** Returns an unsubscribe function. */
    onData(listener: (chunk: Uint8Array) => void): () => void
    close(): Promise<void>
}

export interface SyncRelayConfig {
    ackTimeoutMs: number
}

export type RelayEvent =
    | { kind: 'relay-opened'; at: number; transport: string }
    | { kind: 'relay-closed'; at: number; transport: string }
    | { kind: 'relay-connected'; at: number }
    | { kind: 'relay-disconnected'; at: number }
    | { kind: 'relay-channel-started'; at: number; channel: number }
    | { kind: 'relay-channel-stopped'; at: number; channel: number; elapsed: number }
    | { kind: 'relay-ttl'; at: number; channel: number; level: number; elapsed: number }
    | { kind: 'relay-unexpected'; at: number; detail: string }

export interface RelayEventSink {
    publish(evt: RelayEvent): void
}
