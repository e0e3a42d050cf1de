// services/orchestrator/src/devices/engine-worker/executionLog.ts
import fs from 'node:fs/promises'
import path from 'node:path'
import type { EngineStream } from './types.js'

/**
 * One line of `<boxId>.log`:
 *
 *   <ISO timestamp> \t <boxId> \t <verb> \t <JSON args> \t <outcome>
 *
 * Engine output uses verb `engine`, the line as a JSON string for args and
 * `out` / `err` as outcome. JSON encoding keeps tabs and newlines out of
 * the args column.
 */
export interface ExecutionRecord {
    ts: string
    boxId: string
    verb: string
    args: string
    outcome: string
}

export const ENGINE_VERB = 'engine'

function oneLine(s: string): string {
    return s.replace(/[\t\r\n]+/g, ' ')
}

export function formatRecord(rec: ExecutionRecord): string {
    return [rec.ts, rec.boxId, rec.verb, rec.args, oneLine(rec.outcome)].join('\t') + '\n'
}

export function parseRecord(line: string): ExecutionRecord | null {
    const parts = line.split('\t')
    if (parts.length !== 5) return null
    const [ts, boxId, verb, args, outcome] = parts
    return { ts, boxId, verb, args, outcome }
}

/** Text of an engine output record, or null for command records and junk. */
export function engineText(rec: ExecutionRecord): { text: string; stream: EngineStream } | null {
    if (rec.verb !== ENGINE_VERB) return null
    if (rec.outcome !== 'out' && rec.outcome !== 'err') return null
    let text: unknown
    try {
        text = JSON.parse(rec.args)
    } catch {
        return null
    }
    return typeof text === 'string' ? { text, stream: rec.outcome } : null
}

/**
 * Append-only writer. Appends are chained so records land in call order;
 * failures go to `onError` and never reject the returned promise.
 */
export class ExecutionLog {
    private tail: Promise<void> = Promise.resolve()
    private dirReady = false

    constructor(
        readonly file: string,
        private readonly boxId: string,
        private readonly onError: (err: Error) => void
    ) {}

    static forBox(logDir: string, boxId: string, onError: (err: Error) => void): ExecutionLog {
        return new ExecutionLog(path.join(logDir, `${boxId}.log`), boxId, onError)
    }

    command(verb: string, args: unknown, outcome: string): Promise<void> {
        return this.append({
            ts: new Date().toISOString(),
            boxId: this.boxId,
            verb,
            args: JSON.stringify(args ?? {}),
            outcome,
        })
    }

    engine(line: string, stream: EngineStream): Promise<void> {
        return this.append({
            ts: new Date().toISOString(),
            boxId: this.boxId,
            verb: ENGINE_VERB,
            args: JSON.stringify(line),
            outcome: stream,
        })
    }

    private append(rec: ExecutionRecord): Promise<void> {
        const text = formatRecord(rec)
        this.tail = this.tail.then(async () => {
            try {
                if (!this.dirReady) {
                    await fs.mkdir(path.dirname(this.file), { recursive: true })
                    this.dirReady = true
                }
                await fs.appendFile(this.file, text, 'utf8')
            } catch (err) {
                this.onError(err instanceof Error ? err : new Error(String(err)))
            }
        })
        return this.tail
    }

    /** Waits for queued appends. */
    flush(): Promise<void> {
        return this.tail
    }

    async size(): Promise<number> {
        await this.flush()
        try {
            return (await fs.stat(this.file)).size
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return 0
            throw err
        }
    }
}
