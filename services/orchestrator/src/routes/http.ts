// services/orchestrator/src/routes/http.ts
import type { FastifyReply } from 'fastify'
import { toWireError, type ErrorCode, type WireError } from '@rig-academy/protocol'

const STATUS: Partial<Record<ErrorCode, number>> = {
    BadRequest: 400,
    PermissionDenied: 403,
    UnknownDevice: 404,
    UnknownProtocol: 404,
    UnknownSubject: 404,
    UnknownSettings: 404,
    DuplicateBoxId: 409,
    DeviceBusy: 409,
    InvalidState: 409,
    AlreadyRunning: 409,
    AlreadyStopped: 409,
    NotRunning: 409,
    PortUnavailable: 503,
    Timeout: 504,
}

export function httpStatusOf(code: ErrorCode): number {
    return STATUS[code] ?? 500
}

/** Sets the status for `err` and returns the body `{ ok: false, error }`. */
export function replyError(reply: FastifyReply, err: unknown): { ok: false; error: WireError } {
    const error = toWireError(err)
    reply.code(httpStatusOf(error.code))
    return { ok: false, error }
}
