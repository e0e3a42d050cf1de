// packages/protocol/src/messages.ts
import { isCommandVerb, type CommandVerb, type ConnectionRole } from './commands.js'
import {
    isDeviceState,
    isSessionStatus,
    type DeviceSnapshot,
    type ProtocolSessionView,
} from './device.js'
import { isErrorCode, type WireError } from './errors.js'

/* -------------------------------------------------------------------------- */
/*  Client -> server                                                          */
/* -------------------------------------------------------------------------- */

export interface CommandMessage {
    type: 'command'
    requestId: string
    device: string
    verb: CommandVerb
    args: Record<string, unknown>
}

export type ClientMessage =
    | CommandMessage
    | { type: 'subscribe' }
    | { type: 'ping'; ts?: number }

/* -------------------------------------------------------------------------- */
/*  Server -> client                                                          */
/* -------------------------------------------------------------------------- */

export interface WireLogEntry {
    ts: number
    channel: string
    emoji: string
    color: string
    level: string
    message: string
}

export type CommandAck =
    | { type: 'command.ack'; requestId: string; ok: true; result?: unknown }
    | { type: 'command.ack'; requestId: string; ok: false; error: WireError }

export type ServerMessage =
    | { type: 'welcome'; serverTime: string; connectionId: string; role: ConnectionRole }
    | { type: 'fleet.snapshot'; devices: DeviceSnapshot[] }
    | { type: 'device.snapshot'; snapshot: DeviceSnapshot }
    | { type: 'device.removed'; device: string }
    | CommandAck
    | { type: 'logs.history'; entries: WireLogEntry[] }
    | { type: 'logs.append'; entries: WireLogEntry[] }
    | { type: 'pong'; ts: number }
    | { type: 'server.closing' }

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string }

/* -------------------------------------------------------------------------- */
/*  Minimal validation helpers                                                */
/* -------------------------------------------------------------------------- */

function isObject(x: unknown): x is Record<string, unknown> {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}

function nonEmptyString(v: unknown): string | null {
    if (typeof v !== 'string') return null
    const s = v.trim()
    return s.length > 0 ? s : null
}

function stringOrNull(v: unknown): string | null {
    return typeof v === 'string' ? v : null
}

function parseJson(text: string): ParseResult<unknown> {
    try {
        return { ok: true, value: JSON.parse(text) }
    } catch (err) {
        return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` }
    }
}

export function parseClientMessage(text: string): ParseResult<ClientMessage> {
    const json = parseJson(text)
    if (!json.ok) return json
    const msg = json.value
    if (!isObject(msg)) return { ok: false, error: 'message must be an object' }

    switch (msg.type) {
        case 'subscribe':
            return { ok: true, value: { type: 'subscribe' } }

        case 'ping':
            return {
                ok: true,
                value: typeof msg.ts === 'number' ? { type: 'ping', ts: msg.ts } : { type: 'ping' },
            }

        case 'command': {
            const requestId = nonEmptyString(msg.requestId)
            if (!requestId) return { ok: false, error: 'command.requestId (string) required' }
            if (!isCommandVerb(msg.verb)) {
                return { ok: false, error: `command.verb unknown: ${String(msg.verb)}` }
            }
            // listPorts is fleet-wide; every other verb addresses a box
            const device = nonEmptyString(msg.device) ?? ''
            if (!device && msg.verb !== 'listPorts') {
                return { ok: false, error: 'command.device (string) required' }
            }
            const args = msg.args === undefined ? {} : msg.args
            if (!isObject(args)) return { ok: false, error: 'command.args must be an object' }
            return {
                ok: true,
                value: { type: 'command', requestId, device, verb: msg.verb, args },
            }
        }

        default:
            return { ok: false, error: `unknown message type: ${String(msg.type)}` }
    }
}

/* -------------------------------------------------------------------------- */
/*  Server message coercion (client side)                                     */
/* -------------------------------------------------------------------------- */

function coerceSession(v: unknown): ProtocolSessionView | null {
    if (!isObject(v)) return null
    const boxId = nonEmptyString(v.boxId)
    const protocol = nonEmptyString(v.protocol)
    const subject = nonEmptyString(v.subject)
    const settingsFile = nonEmptyString(v.settingsFile)
    const startedAt = nonEmptyString(v.startedAt)
    if (!boxId || !protocol || !subject || !settingsFile || !startedAt) return null
    if (!isSessionStatus(v.status)) return null
    return {
        boxId,
        protocol,
        subject,
        settingsFile,
        startedAt,
        endedAt: stringOrNull(v.endedAt),
        status: v.status,
        error: stringOrNull(v.error),
    }
}

export function coerceDeviceSnapshot(v: unknown): DeviceSnapshot | null {
    if (!isObject(v) || typeof v.seq !== 'number' || !isObject(v.device)) return null
    const d = v.device
    const boxId = nonEmptyString(d.boxId)
    if (!boxId || typeof d.serialLocator !== 'string' || !isDeviceState(d.state)) return null
    const calibration =
        d.calibration === 'present' || d.calibration === 'missing' ? d.calibration : 'unknown'
    return {
        seq: v.seq,
        device: {
            boxId,
            serialLocator: d.serialLocator,
            state: d.state,
            guiVisible: d.guiVisible === true,
            lastError: stringOrNull(d.lastError),
            calibration,
        },
        activeSession: coerceSession(v.activeSession),
        lastSession: coerceSession(v.lastSession),
    }
}

function coerceLogEntries(v: unknown): WireLogEntry[] {
    if (!Array.isArray(v)) return []
    const out: WireLogEntry[] = []
    for (const e of v) {
        if (!isObject(e) || typeof e.message !== 'string') continue
        out.push({
            ts: typeof e.ts === 'number' ? e.ts : 0,
            channel: String(e.channel ?? ''),
            emoji: String(e.emoji ?? ''),
            color: String(e.color ?? ''),
            level: String(e.level ?? 'info'),
            message: e.message,
        })
    }
    return out
}

export function parseServerMessage(text: string): ParseResult<ServerMessage> {
    const json = parseJson(text)
    if (!json.ok) return json
    const msg = json.value
    if (!isObject(msg)) return { ok: false, error: 'message must be an object' }

    switch (msg.type) {
        case 'welcome': {
            const connectionId = nonEmptyString(msg.connectionId)
            if (!connectionId) return { ok: false, error: 'welcome.connectionId required' }
            return {
                ok: true,
                value: {
                    type: 'welcome',
                    serverTime: String(msg.serverTime ?? ''),
                    connectionId,
                    role: msg.role === 'Local' ? 'Local' : 'Remote',
                },
            }
        }

        case 'fleet.snapshot': {
            if (!Array.isArray(msg.devices)) return { ok: false, error: 'fleet.snapshot.devices required' }
            const devices: DeviceSnapshot[] = []
            for (const raw of msg.devices) {
                const snap = coerceDeviceSnapshot(raw)
                if (snap) devices.push(snap)
            }
            return { ok: true, value: { type: 'fleet.snapshot', devices } }
        }

        case 'device.snapshot': {
            const snapshot = coerceDeviceSnapshot(msg.snapshot)
            if (!snapshot) return { ok: false, error: 'device.snapshot.snapshot malformed' }
            return { ok: true, value: { type: 'device.snapshot', snapshot } }
        }

        case 'device.removed': {
            const device = nonEmptyString(msg.device)
            if (!device) return { ok: false, error: 'device.removed.device required' }
            return { ok: true, value: { type: 'device.removed', device } }
        }

        case 'command.ack': {
            const requestId = nonEmptyString(msg.requestId)
            if (!requestId) return { ok: false, error: 'command.ack.requestId required' }
            if (msg.ok === true) {
                return { ok: true, value: { type: 'command.ack', requestId, ok: true, result: msg.result } }
            }
            const err = isObject(msg.error) ? msg.error : {}
            return {
                ok: true,
                value: {
                    type: 'command.ack',
                    requestId,
                    ok: false,
                    error: {
                        code: isErrorCode(err.code) ? err.code : 'Internal',
                        message: String(err.message ?? 'command failed'),
                    },
                },
            }
        }

        case 'logs.history':
            return { ok: true, value: { type: 'logs.history', entries: coerceLogEntries(msg.entries) } }

        case 'logs.append':
            return { ok: true, value: { type: 'logs.append', entries: coerceLogEntries(msg.entries) } }

        case 'pong':
            return { ok: true, value: { type: 'pong', ts: typeof msg.ts === 'number' ? msg.ts : Date.now() } }

        case 'server.closing':
            return { ok: true, value: { type: 'server.closing' } }

        default:
            return { ok: false, error: `unknown message type: ${String(msg.type)}` }
    }
}
