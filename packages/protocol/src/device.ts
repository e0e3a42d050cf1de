// packages/protocol/src/device.ts

export const DEVICE_STATES = ['Stopped', 'Starting', 'Idle', 'RunningProtocol', 'Error'] as const
export type DeviceState = (typeof DEVICE_STATES)[number]

/** Whether a liquid calibration file exists for the box (checked when the engine starts). */
export type CalibrationStatus = 'present' | 'missing' | 'unknown'

export interface DeviceView {
    boxId: string
    serialLocator: string
    state: DeviceState
    guiVisible: boolean
    lastError: string | null
    calibration: CalibrationStatus
}

export const SESSION_STATUSES = ['Running', 'Completed', 'Failed', 'StoppedByUser', 'UnknownStatus'] as const
export type ProtocolSessionStatus = (typeof SESSION_STATUSES)[number]

export interface ProtocolSessionView {
    boxId: string
    protocol: string
    subject: string
    settingsFile: string
    /** ISO timestamp */
    startedAt: string
    endedAt: string | null
    status: ProtocolSessionStatus
    error: string | null
}

/**
 * Full per-device view pushed to every client. Clients replace their copy
 * wholesale; `seq` only grows for a given box id.
 */
export interface DeviceSnapshot {
    seq: number
    device: DeviceView
    activeSession: ProtocolSessionView | null
    lastSession: ProtocolSessionView | null
}

export function isDeviceState(v: unknown): v is DeviceState {
    return typeof v === 'string' && (DEVICE_STATES as readonly string[]).includes(v)
}

export function isSessionStatus(v: unknown): v is ProtocolSessionStatus {
    return typeof v === 'string' && (SESSION_STATUSES as readonly string[]).includes(v)
}
