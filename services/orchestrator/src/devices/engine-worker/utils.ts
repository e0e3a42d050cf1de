// services/orchestrator/src/devices/engine-worker/utils.ts
import type { ErrorCode } from '@rig-academy/protocol'
import type { WorkerResult } from './types.js'

export const TIMED_OUT: unique symbol = Symbol('timed-out')

/** Resolves with the promise's value, or TIMED_OUT after `ms`. The timer is always cleared. */
export async function raceTimeout<T>(p: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
        timer = setTimeout(() => resolve(TIMED_OUT), ms)
    })
    try {
        return await Promise.race([p, timeout])
    } finally {
        if (timer) clearTimeout(timer)
    }
}

export function ok<T>(value: T): WorkerResult<T> {
    return { ok: true, value }
}

export function fail<T>(code: ErrorCode, message: string): WorkerResult<T> {
    return { ok: false, code, message }
}

export function outcomeOf(result: WorkerResult<unknown>): string {
    return result.ok ? 'ok' : `${result.code}: ${result.message}`
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}
