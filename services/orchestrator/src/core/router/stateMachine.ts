// services/orchestrator/src/core/router/stateMachine.ts
import type { CommandVerb, DeviceState, ErrorCode } from '@rig-academy/protocol'

/** Verbs that act on a device's engine session (the rest touch the registry). */
export const DEVICE_VERBS = [
    'start',
    'stop',
    'setConsoleVisible',
    'calibrate',
    'runProtocol',
    'stopProtocol',
] as const satisfies readonly CommandVerb[]

export type DeviceVerb = (typeof DEVICE_VERBS)[number]

export function isDeviceVerb(verb: CommandVerb): verb is DeviceVerb {
    return (DEVICE_VERBS as readonly CommandVerb[]).includes(verb)
}

export type Legality = { ok: true } | { ok: false; code: ErrorCode; message: string }

const LEGAL: Record<DeviceVerb, readonly DeviceState[]> = {
    start: ['Stopped'],
    stop: ['Starting', 'Idle', 'RunningProtocol', 'Error'],
    setConsoleVisible: ['Idle'],
    calibrate: ['Idle'],
    runProtocol: ['Idle'],
    stopProtocol: ['RunningProtocol'],
}

/**
 *   Stopped --start--> Starting --ready--> Idle --runProtocol--> RunningProtocol
 *   RunningProtocol --(completion | stopProtocol)--> Idle
 *   any started state --stop--> Stopped, any failure --> Error
 */
const TRANSITIONS: Record<DeviceState, readonly DeviceState[]> = {
    Stopped: ['Starting'],
    Starting: ['Idle', 'Error', 'Stopped'],
    Idle: ['RunningProtocol', 'Stopped', 'Error'],
    RunningProtocol: ['Idle', 'Stopped', 'Error'],
    Error: ['Stopped'],
}

export function checkVerb(state: DeviceState, verb: DeviceVerb): Legality {
    if (LEGAL[verb].includes(state)) return { ok: true }

    if (verb === 'stop') {
        return { ok: false, code: 'AlreadyStopped', message: 'device is already stopped' }
    }
    if (verb === 'stopProtocol' && state !== 'Stopped') {
        return { ok: false, code: 'NotRunning', message: `no protocol is running (device is ${state})` }
    }
    return { ok: false, code: 'InvalidState', message: `${verb} is not allowed while ${state}` }
}

/** Same-state updates (console visibility, calibration, session status) are allowed. */
export function canTransition(from: DeviceState, to: DeviceState): boolean {
    return from === to || TRANSITIONS[from].includes(to)
}
