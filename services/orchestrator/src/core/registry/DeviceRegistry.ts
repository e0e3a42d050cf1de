// services/orchestrator/src/core/registry/DeviceRegistry.ts
import fs from 'node:fs/promises'
import path from 'node:path'
import { AcademyError } from '@rig-academy/protocol'
import { Mutex } from '../router/lanes.js'
import { formatCsv, parseCsv } from './csv.js'

export interface DeviceRecord {
    boxId: string
    serialLocator: string
}

export interface SkippedRow {
    /** 1-based line number in the config file */
    line: number
    reason: string
}

export interface RegistryLoadReport {
    loaded: number
    skipped: SkippedRow[]
    created: boolean
}

export type RegistryEvent =
    | { kind: 'registry-loaded'; at: number; file: string; loaded: number; skipped: number; created: boolean }
    | { kind: 'registry-row-skipped'; at: number; file: string; line: number; reason: string }
    | { kind: 'registry-saved'; at: number; file: string; count: number }
    | { kind: 'registry-device-added'; at: number; boxId: string; serialLocator: string }
    | { kind: 'registry-device-removed'; at: number; boxId: string }
    | { kind: 'registry-locator-changed'; at: number; boxId: string; from: string; to: string }

export interface RegistryEventSink {
    publish(evt: RegistryEvent): void
}

const BOX_ID_RE = /^[A-Za-z0-9_.-]+$/

export function assertValidBoxId(boxId: string): void {
    if (!BOX_ID_RE.test(boxId) || boxId === '.' || boxId === '..') {
        throw new AcademyError('BadRequest', `invalid box id "${boxId}" (letters, digits, _ . - only)`)
    }
}

function assertValidLocator(serialLocator: string): void {
    if (serialLocator.trim().length === 0 || /[\r\n]/.test(serialLocator)) {
        throw new AcademyError('BadRequest', 'serialLocator must be a non-empty single-line string')
    }
}

/**
 * Persistent box id -> serial locator map backed by a two-column CSV.
 *
 * Changes for different boxes arrive concurrently from the router's lanes;
 * `add`, `remove` and `changeLocator` hold one registry-wide lock across the
 * in-memory change and the file rewrite.
 */
export class DeviceRegistry {
    private readonly file: string
    private readonly events: RegistryEventSink
    private readonly devices = new Map<string, DeviceRecord>()
    private readonly writeLock = new Mutex()
    private writes = 0

    constructor(file: string, events: RegistryEventSink) {
        this.file = file
        this.events = events
    }

    get path(): string {
        return this.file
    }

    async load(): Promise<RegistryLoadReport> {
        this.devices.clear()

        let text: string
        let created = false
        try {
            text = await fs.readFile(this.file, 'utf8')
        } catch (err) {
            if (!isNotFound(err)) throw err
            text = ''
            created = true
        }

        const skipped: SkippedRow[] = []
        const rows = parseCsv(text)
        rows.forEach((row, idx) => {
            const line = idx + 1
            if (row.length === 0) return

            const reason = this.rowProblem(row)
            if (reason) {
                skipped.push({ line, reason })
                this.events.publish({ kind: 'registry-row-skipped', at: Date.now(), file: this.file, line, reason })
                return
            }
            const [boxId, serialLocator] = row.map(f => f.trim())
            this.devices.set(boxId, { boxId, serialLocator })
        })

        if (created) await this.save()

        this.events.publish({
            kind: 'registry-loaded',
            at: Date.now(),
            file: this.file,
            loaded: this.devices.size,
            skipped: skipped.length,
            created,
        })

        return { loaded: this.devices.size, skipped, created }
    }

    private rowProblem(row: string[]): string | null {
        if (row.length !== 2) return `expected 2 columns, got ${row.length}`
        const [boxId, serialLocator] = row.map(f => f.trim())
        if (!boxId || !serialLocator) return 'empty field'
        if (!BOX_ID_RE.test(boxId)) return `invalid box id "${boxId}"`
        if (this.devices.has(boxId)) return `duplicate box id "${boxId}"`
        return null
    }

    /** Atomic overwrite: temp file then rename. */
    async save(): Promise<void> {
        await fs.mkdir(path.dirname(this.file), { recursive: true })
        const rows = Array.from(this.devices.values(), d => [d.boxId, d.serialLocator])
        const tmp = `${this.file}.${process.pid}.${++this.writes}.tmp`
        await fs.writeFile(tmp, formatCsv(rows), 'utf8')
        await fs.rename(tmp, this.file)
        this.events.publish({ kind: 'registry-saved', at: Date.now(), file: this.file, count: rows.length })
    }

    list(): DeviceRecord[] {
        return Array.from(this.devices.values(), d => ({ ...d }))
    }

    get(boxId: string): DeviceRecord | undefined {
        const d = this.devices.get(boxId)
        return d ? { ...d } : undefined
    }

    has(boxId: string): boolean {
        return this.devices.has(boxId)
    }

    async add(boxId: string, serialLocator: string): Promise<DeviceRecord> {
        assertValidBoxId(boxId)
        assertValidLocator(serialLocator)
        return this.writeLock.runExclusive(() => this.addLocked(boxId, serialLocator))
    }

    private async addLocked(boxId: string, serialLocator: string): Promise<DeviceRecord> {
        if (this.devices.has(boxId)) {
            throw new AcademyError('DuplicateBoxId', `box "${boxId}" already exists`)
        }
        const rec = { boxId, serialLocator: serialLocator.trim() }
        this.devices.set(boxId, rec)
        try {
            await this.save()
        } catch (err) {
            this.devices.delete(boxId)
            throw err
        }
        this.events.publish({ kind: 'registry-device-added', at: Date.now(), ...rec })
        return { ...rec }
    }

    /**
     * @param isRunning reports whether the box currently has a live engine session
     */
    async remove(boxId: string, isRunning: (boxId: string) => boolean = () => false): Promise<void> {
        await this.writeLock.runExclusive(() => this.removeLocked(boxId, isRunning))
    }

    private async removeLocked(boxId: string, isRunning: (boxId: string) => boolean): Promise<void> {
        const rec = this.devices.get(boxId)
        if (!rec) throw new AcademyError('UnknownDevice', `unknown box "${boxId}"`)
        if (isRunning(boxId)) throw new AcademyError('DeviceBusy', `box "${boxId}" is running; stop it first`)

        this.devices.delete(boxId)
        try {
            await this.save()
        } catch (err) {
            this.devices.set(boxId, rec)
            throw err
        }
        this.events.publish({ kind: 'registry-device-removed', at: Date.now(), boxId })
    }

    async changeLocator(
        boxId: string,
        serialLocator: string,
        isRunning: (boxId: string) => boolean = () => false
    ): Promise<DeviceRecord> {
        assertValidLocator(serialLocator)
        return this.writeLock.runExclusive(() => this.changeLocatorLocked(boxId, serialLocator, isRunning))
    }

    private async changeLocatorLocked(
        boxId: string,
        serialLocator: string,
        isRunning: (boxId: string) => boolean
    ): Promise<DeviceRecord> {
        const rec = this.devices.get(boxId)
        if (!rec) throw new AcademyError('UnknownDevice', `unknown box "${boxId}"`)
        if (isRunning(boxId)) throw new AcademyError('DeviceBusy', `box "${boxId}" is running; stop it first`)

        const from = rec.serialLocator
        const to = serialLocator.trim()
        rec.serialLocator = to
        try {
            await this.save()
        } catch (err) {
            rec.serialLocator = from
            throw err
        }
        this.events.publish({ kind: 'registry-locator-changed', at: Date.now(), boxId, from, to })
        return { ...rec }
    }
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
