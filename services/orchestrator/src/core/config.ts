// services/orchestrator/src/core/config.ts
import os from 'node:os'
import path from 'node:path'

export type AcademyConfig = {
    dataDir: string
    /** `<dataDir>/Academy/AcademyConfig.csv` */
    configFile: string
    /** `<dataDir>/Academy/logs` */
    logDir: string

    engine: {
        command: string
        args: string[]
        readyMarker: string
        startTimeoutMs: number
        stopGraceMs: number
    }

    watcher: {
        pollIntervalMs: number
        completeMarker: string
        failedMarker: string
    }

    ws: {
        maxBufferedBytes: number
        resyncCheckMs: number
        localAddresses: string[]
        logsSnapshot: number
    }

    serial: {
        /** Substring of the USB manufacturer string used to pick candidate ports. Empty = all ports. */
        manufacturerHint: string
    }

    relay: {
        path: string | null
        baudRate: number
        ackTimeoutMs: number
    }
}

function parseIntSafe(v: string | undefined, def: number): number {
    if (v === undefined || v.trim() === '') return def
    const n = Number.parseInt(v, 10)
    return Number.isFinite(n) ? n : def
}

function clampInt(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    if (n < min) return min
    if (n > max) return max
    return n
}

function csv(v: string | undefined): string[] {
    if (typeof v !== 'string') return []
    return v.split(',').map(s => s.trim()).filter(Boolean)
}

function words(v: string | undefined): string[] {
    if (typeof v !== 'string') return []
    return v.split(/\s+/).filter(Boolean)
}

function textOr(v: string | undefined, def: string): string {
    if (v === undefined) return def
    const s = v.trim()
    return s.length > 0 ? s : def
}

/**
 * Build AcademyConfig from environment. Never throws; unset or malformed
 * values fall back to defaults.
 */
export function buildAcademyConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AcademyConfig {
    const dataDir = path.resolve(textOr(env.RIG_DATA_DIR, path.join(os.homedir(), 'RigData')))
    const academyDir = path.join(dataDir, 'Academy')

    return {
        dataDir,
        configFile: path.join(academyDir, 'AcademyConfig.csv'),
        logDir: path.join(academyDir, 'logs'),

        engine: {
            command: textOr(env.ENGINE_COMMAND, 'rig-engine'),
            args: words(env.ENGINE_ARGS),
            readyMarker: textOr(env.ENGINE_READY_MARKER, 'engine ready'),
            startTimeoutMs: clampInt(parseIntSafe(env.ENGINE_START_TIMEOUT_MS, 30_000), 100, 600_000),
            stopGraceMs: clampInt(parseIntSafe(env.ENGINE_STOP_GRACE_MS, 10_000), 100, 600_000),
        },

        watcher: {
            pollIntervalMs: clampInt(parseIntSafe(env.WATCHER_POLL_MS, 500), 10, 60_000),
            completeMarker: textOr(env.PROTOCOL_COMPLETE_MARKER, 'protocol complete'),
            failedMarker: textOr(env.PROTOCOL_FAILED_MARKER, 'protocol failed'),
        },

        ws: {
            maxBufferedBytes: clampInt(parseIntSafe(env.WS_MAX_BUFFERED_BYTES, 1024 * 1024), 1024, 256 * 1024 * 1024),
            resyncCheckMs: clampInt(parseIntSafe(env.WS_RESYNC_CHECK_MS, 1000), 50, 60_000),
            localAddresses: csv(env.ACADEMY_LOCAL_ADDRESSES),
            logsSnapshot: clampInt(parseIntSafe(env.CLIENT_LOGS_SNAPSHOT, 200), 0, 10_000),
        },

        serial: {
            manufacturerHint: env.SERIAL_PORT_MANUFACTURER_HINT ?? 'duino',
        },

        relay: {
            path: env.SYNC_RELAY_PATH && env.SYNC_RELAY_PATH.trim() ? env.SYNC_RELAY_PATH.trim() : null,
            baudRate: clampInt(parseIntSafe(env.SYNC_RELAY_BAUD, 9600), 300, 4_000_000),
            ackTimeoutMs: clampInt(parseIntSafe(env.SYNC_RELAY_ACK_TIMEOUT_MS, 10_000), 10, 120_000),
        },
    }
}
