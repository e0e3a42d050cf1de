// services/orchestrator/src/adapters/logs.adapter.ts
import type { ClientLog, ClientLogBuffer } from '@rig-academy/logging'
import type { WireLogEntry } from '@rig-academy/protocol'

const LEVEL_ORDER: Record<string, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    fatal: 50,
}

export interface LogFilter {
    /** Top-level channel names; null lets every channel through. */
    channels: ReadonlySet<string> | null
    minLevel: number
    redact: RegExp | null
}

/**
 * Reads LOG_CHANNEL_ALLOWLIST ("router,worker" or "device:serial" style),
 * LOG_LEVEL_MIN and LOG_REDACT_REGEX. A bad redaction pattern is reported
 * through `onBadPattern` and disables redaction.
 */
export function logFilterFromEnv(
    env: NodeJS.ProcessEnv,
    onBadPattern: (pattern: string, err: unknown) => void = () => {}
): LogFilter {
    const allow = String(env.LOG_CHANNEL_ALLOWLIST ?? '').trim()
    const channels = allow
        ? new Set(
              allow
                  .split(',')
                  .map((s) => channelName(s))
                  .filter(Boolean)
          )
        : null

    const min = (env.LOG_LEVEL_MIN ?? 'debug').toLowerCase()

    let redact: RegExp | null = null
    const pattern = env.LOG_REDACT_REGEX
    if (pattern) {
        try {
            redact = new RegExp(pattern, 'g')
        } catch (err) {
            onBadPattern(pattern, err)
        }
    }

    return { channels, minLevel: LEVEL_ORDER[min] ?? LEVEL_ORDER.debug, redact }
}

function channelName(ch: string): string {
    return ch.trim().toLowerCase().split(':')[0]
}

export function filterLogs(entries: readonly ClientLog[], filter: LogFilter): WireLogEntry[] {
    const out: WireLogEntry[] = []
    for (const e of entries) {
        const channel = channelName(e.channel)
        if (filter.channels && !filter.channels.has(channel)) continue
        if ((LEVEL_ORDER[e.level] ?? LEVEL_ORDER.debug) < filter.minLevel) continue
        const message = filter.redact ? e.message.replace(filter.redact, '██') : e.message
        out.push({ ts: e.ts, channel, emoji: e.emoji, color: e.color, level: e.level, message })
    }
    return out
}

/**
 * Filtered view of the shared client log buffer: bounded history for new
 * connections and live entries for everyone else.
 */
export class ClientLogFeed {
    constructor(
        private readonly buffer: ClientLogBuffer,
        private readonly filter: LogFilter
    ) {}

    history(n: number): WireLogEntry[] {
        if (n <= 0) return []
        return filterLogs(this.buffer.getLatest(n), this.filter)
    }

    /** Returns an unsubscribe function. */
    subscribe(listener: (entries: WireLogEntry[]) => void): () => void {
        return this.buffer.subscribe((entry) => {
            const filtered = filterLogs([entry], this.filter)
            if (filtered.length > 0) listener(filtered)
        })
    }
}
