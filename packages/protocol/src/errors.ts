// packages/protocol/src/errors.ts

export type ErrorCode =
    // registry
    | 'ConfigCorrupt'
    | 'DuplicateBoxId'
    | 'UnknownDevice'
    | 'DeviceBusy'
    // worker start
    | 'PortUnavailable'
    | 'EngineLaunchFailed'
    | 'Timeout'
    // rejected before dispatch
    | 'InvalidState'
    | 'PermissionDenied'
    | 'UnknownProtocol'
    | 'UnknownSubject'
    | 'UnknownSettings'
    // worker results
    | 'AlreadyStopped'
    | 'AlreadyRunning'
    | 'NotRunning'
    | 'UnknownStatus'
    // transport
    | 'BadRequest'
    | 'Disconnected'
    | 'Internal'

const ERROR_CODES: ReadonlySet<string> = new Set<ErrorCode>([
    'ConfigCorrupt', 'DuplicateBoxId', 'UnknownDevice', 'DeviceBusy',
    'PortUnavailable', 'EngineLaunchFailed', 'Timeout',
    'InvalidState', 'PermissionDenied', 'UnknownProtocol', 'UnknownSubject', 'UnknownSettings',
    'AlreadyStopped', 'AlreadyRunning', 'NotRunning', 'UnknownStatus',
    'BadRequest', 'Disconnected', 'Internal',
])

export interface WireError {
    code: ErrorCode
    message: string
}

export class AcademyError extends Error {
    readonly code: ErrorCode

    constructor(code: ErrorCode, message?: string) {
        super(message ?? code)
        this.name = 'AcademyError'
        this.code = code
    }

    toWire(): WireError {
        return { code: this.code, message: this.message }
    }
}

export function isErrorCode(v: unknown): v is ErrorCode {
    return typeof v === 'string' && ERROR_CODES.has(v)
}

export function toWireError(err: unknown): WireError {
    if (err instanceof AcademyError) return err.toWire()
    if (err instanceof Error) return { code: 'Internal', message: err.message }
    return { code: 'Internal', message: String(err) }
}
