// services/orchestrator/src/devices/completion-watcher/CompletionWatcher.ts
import fs from 'node:fs/promises'
import { StringDecoder } from 'node:string_decoder'
import { engineText, parseRecord } from '../engine-worker/executionLog.js'

export interface CompletionWatcherConfig {
    pollIntervalMs: number
    completeMarker: string
    failedMarker: string
}

export type WatcherEvent =
    | { kind: 'protocol-completed'; at: number; boxId: string; line: string }
    | { kind: 'protocol-failed'; at: number; boxId: string; error: string; line: string }
    | { kind: 'log-unreadable'; at: number; boxId: string; file: string; error: string }
    | { kind: 'log-recovered'; at: number; boxId: string; file: string }
    | { kind: 'log-rotated'; at: number; boxId: string; file: string; reason: 'truncated' | 'replaced' }

export interface WatcherEventSink {
    publish(evt: WatcherEvent): void
}

/** Upper bound on bytes read per poll; the rest is picked up next tick. */
const MAX_READ_BYTES = 1024 * 1024

type Watch = {
    boxId: string
    file: string
    offset: number
    ino: number | null
    partial: string
    decoder: StringDecoder
    timer: NodeJS.Timeout | null
    busy: boolean
    unreadable: boolean
}

/**
 * Tails each box's execution log for completion / failure markers written by
 * the engine. One timer per box; a slow or broken file never delays another
 * box's poll.
 *
 * A watch ends itself after reporting completion or failure.
 */
export class CompletionWatcher {
    private readonly watches = new Map<string, Watch>()
    private readonly completeMarker: string
    private readonly failedMarker: string

    constructor(
        private readonly cfg: CompletionWatcherConfig,
        private readonly events: WatcherEventSink
    ) {
        this.completeMarker = cfg.completeMarker.toLowerCase()
        this.failedMarker = cfg.failedMarker.toLowerCase()
    }

    /** Start (or restart) tailing `file` for `boxId` from byte `fromOffset`. */
    watch(boxId: string, file: string, fromOffset: number): void {
        this.unwatch(boxId)

        const w: Watch = {
            boxId,
            file,
            offset: Math.max(0, fromOffset),
            ino: null,
            partial: '',
            decoder: new StringDecoder('utf8'),
            timer: null,
            busy: false,
            unreadable: false,
        }
        w.timer = setInterval(() => {
            void this.pollOnce(boxId)
        }, this.cfg.pollIntervalMs)
        w.timer.unref()
        this.watches.set(boxId, w)
    }

    unwatch(boxId: string): void {
        const w = this.watches.get(boxId)
        if (!w) return
        if (w.timer) clearInterval(w.timer)
        w.timer = null
        this.watches.delete(boxId)
    }

    isWatching(boxId: string): boolean {
        return this.watches.has(boxId)
    }

    stop(): void {
        for (const boxId of [...this.watches.keys()]) this.unwatch(boxId)
    }

    /** One poll for one box. Overlapping calls for the same box are skipped. Never rejects. */
    async pollOnce(boxId: string): Promise<void> {
        const w = this.watches.get(boxId)
        if (!w || w.busy) return
        w.busy = true
        try {
            await this.poll(w)
        } catch (err) {
            this.markUnreadable(w, err)
        } finally {
            w.busy = false
        }
    }

    private isCurrent(w: Watch): boolean {
        return this.watches.get(w.boxId) === w
    }

    private async poll(w: Watch): Promise<void> {
        const st = await fs.stat(w.file)
        if (!this.isCurrent(w)) return

        if (w.ino !== null && st.ino !== w.ino) {
            this.rewind(w, 'replaced')
        } else if (st.size < w.offset) {
            this.rewind(w, 'truncated')
        }
        w.ino = st.ino

        if (st.size === w.offset) {
            this.markReadable(w)
            return
        }

        const length = Math.min(st.size - w.offset, MAX_READ_BYTES)
        const buf = Buffer.alloc(length)
        const fh = await fs.open(w.file, 'r')
        let bytesRead = 0
        try {
            const res = await fh.read(buf, 0, length, w.offset)
            bytesRead = res.bytesRead
        } finally {
            await fh.close()
        }
        if (!this.isCurrent(w)) return

        this.markReadable(w)
        w.offset += bytesRead

        const lines = (w.partial + w.decoder.write(buf.subarray(0, bytesRead))).split('\n')
        w.partial = lines.pop() ?? ''

        for (const raw of lines) {
            if (this.matchLine(w, raw.replace(/\r$/, ''))) return
        }
    }

    /** True when the line ended the watch. */
    private matchLine(w: Watch, line: string): boolean {
        const rec = parseRecord(line)
        const eng = rec ? engineText(rec) : null
        if (!eng) return false

        const lower = eng.text.toLowerCase()
        const failedAt = lower.indexOf(this.failedMarker)
        if (failedAt >= 0) {
            const detail = eng.text
                .slice(failedAt + this.failedMarker.length)
                .replace(/^[\s:,-]+/, '')
                .trim()
            this.unwatch(w.boxId)
            this.events.publish({
                kind: 'protocol-failed',
                at: Date.now(),
                boxId: w.boxId,
                error: detail || eng.text,
                line: eng.text,
            })
            return true
        }

        if (lower.includes(this.completeMarker)) {
            this.unwatch(w.boxId)
            this.events.publish({ kind: 'protocol-completed', at: Date.now(), boxId: w.boxId, line: eng.text })
            return true
        }
        return false
    }

    private rewind(w: Watch, reason: 'truncated' | 'replaced'): void {
        w.offset = 0
        w.partial = ''
        w.decoder = new StringDecoder('utf8')
        this.events.publish({ kind: 'log-rotated', at: Date.now(), boxId: w.boxId, file: w.file, reason })
    }

    private markUnreadable(w: Watch, err: unknown): void {
        if (!this.isCurrent(w) || w.unreadable) return
        w.unreadable = true
        this.events.publish({
            kind: 'log-unreadable',
            at: Date.now(),
            boxId: w.boxId,
            file: w.file,
            error: err instanceof Error ? err.message : String(err),
        })
    }

    private markReadable(w: Watch): void {
        if (!w.unreadable) return
        w.unreadable = false
        this.events.publish({ kind: 'log-recovered', at: Date.now(), boxId: w.boxId, file: w.file })
    }
}
