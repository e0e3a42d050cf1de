// services/orchestrator/src/core/state.ts
import { EventEmitter } from 'node:events'
import type {
    DeviceSnapshot,
    DeviceView,
    ProtocolSessionView,
} from '@rig-academy/protocol'

/**
 * In-memory fleet state. The CommandRouter is the only writer; everything
 * else (WebSocket hub, REST routes) reads snapshots or listens for events.
 */
export type FleetState = {
    meta: { startedAt: string; status: 'booting' | 'ready' | 'closing' }
    devices: DeviceSnapshot[]
}

export interface FleetStateEvents {
    'device': (snapshot: DeviceSnapshot) => void
    'device:removed': (boxId: string) => void
}

/** Minimal typed EventEmitter */
type EventNames = keyof FleetStateEvents
class TypedEmitter extends EventEmitter {
    override on<T extends EventNames>(event: T, listener: FleetStateEvents[T]): this { return super.on(event, listener) }
    override off<T extends EventNames>(event: T, listener: FleetStateEvents[T]): this { return super.off(event, listener) }
    override emit<T extends EventNames>(event: T, ...args: Parameters<FleetStateEvents[T]>): boolean {
        return super.emit(event, ...args)
    }
}

function clone<T>(v: T): T {
    return structuredClone(v)
}

export class FleetStateStore extends TypedEmitter {
    private readonly startedAt = new Date().toISOString()
    private status: FleetState['meta']['status'] = 'booting'

    // Insertion order follows the registry file.
    private readonly devices = new Map<string, DeviceSnapshot>()
    private readonly seqs = new Map<string, number>()

    getSnapshot(): FleetState {
        return {
            meta: { startedAt: this.startedAt, status: this.status },
            devices: this.listDevices(),
        }
    }

    getDevice(boxId: string): DeviceSnapshot | undefined {
        const snap = this.devices.get(boxId)
        return snap ? clone(snap) : undefined
    }

    listDevices(): DeviceSnapshot[] {
        return Array.from(this.devices.values(), clone)
    }

    setStatus(status: FleetState['meta']['status']): void {
        this.status = status
    }

    /**
     * Replace the whole view of one device and notify listeners.
     * Returns the stored snapshot (with its new sequence number).
     */
    putDevice(
        device: DeviceView,
        activeSession: ProtocolSessionView | null,
        lastSession: ProtocolSessionView | null
    ): DeviceSnapshot {
        const seq = (this.seqs.get(device.boxId) ?? 0) + 1
        this.seqs.set(device.boxId, seq)

        const snapshot: DeviceSnapshot = clone({ seq, device, activeSession, lastSession })
        this.devices.set(device.boxId, snapshot)
        this.emit('device', clone(snapshot))
        return snapshot
    }

    removeDevice(boxId: string): boolean {
        if (!this.devices.delete(boxId)) return false
        this.seqs.delete(boxId)
        this.emit('device:removed', boxId)
        return true
    }
}
