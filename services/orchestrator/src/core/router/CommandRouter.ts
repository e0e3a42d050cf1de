// services/orchestrator/src/core/router/CommandRouter.ts
import {
    AcademyError,
    LOCAL_ONLY_VERBS,
    toWireError,
    type CommandVerb,
    type ConnectionRole,
    type DeviceSnapshot,
    type DeviceState,
    type DeviceView,
    type ErrorCode,
    type ProtocolSessionStatus,
    type ProtocolSessionView,
    type WireError,
} from '@rig-academy/protocol'
import type { FleetStateStore } from '../state.js'
import type { DeviceRegistry } from '../registry/DeviceRegistry.js'
import { DEFAULT_SETTINGS_FILE, type ProtocolCatalog } from '../catalog/ProtocolCatalog.js'
import type { PortSummary } from '../serial/PortLocator.js'
import type { DeviceWorker, WorkerEvent, WorkerFactory } from '../../devices/engine-worker/types.js'
import type { WatcherEvent } from '../../devices/completion-watcher/CompletionWatcher.js'
import { DeviceLanes } from './lanes.js'
import { canTransition, checkVerb, isDeviceVerb } from './stateMachine.js'

export interface CommandOrigin {
    connectionId: string
    role: ConnectionRole
}

/** Immutable once built; `requestId` is namespaced by the connection. */
export interface CommandRequest {
    readonly requestId: string
    readonly boxId: string
    readonly verb: CommandVerb
    readonly args: Readonly<Record<string, unknown>>
    readonly origin: CommandOrigin
}

export type CommandOutcome = { ok: true; result?: unknown } | { ok: false; error: WireError }

export type RouterEvent =
    | { kind: 'command-accepted'; at: number; requestId: string; boxId: string; verb: CommandVerb; role: ConnectionRole }
    | { kind: 'command-rejected'; at: number; requestId: string; boxId: string; verb: CommandVerb; code: ErrorCode; message: string }
    | { kind: 'command-completed'; at: number; requestId: string; boxId: string; verb: CommandVerb }
    | { kind: 'device-state'; at: number; boxId: string; from: DeviceState; to: DeviceState; lastError: string | null }
    | { kind: 'stale-event'; at: number; boxId: string; event: string; reason: string }
    | { kind: 'event-failed'; at: number; boxId: string; event: string; error: string }

export interface RouterEventSink {
    publish(evt: RouterEvent): void
}

export interface LogWatcher {
    watch(boxId: string, file: string, fromOffset: number): void
    unwatch(boxId: string): void
}

export interface PortCandidates {
    listCandidates(): Promise<PortSummary[]>
}

export interface CommandRouterDeps {
    registry: DeviceRegistry
    store: FleetStateStore
    watcher: LogWatcher
    catalog: ProtocolCatalog
    ports: PortCandidates
    workerFactory: WorkerFactory
    events: RouterEventSink
}

/** An accepted `start` or `runProtocol` that has not finished yet. */
type PendingCommand = {
    verb: CommandVerb
    /** State the box is in while the command runs. */
    leadsTo: DeviceState
}

const PENDING_STATE: Partial<Record<CommandVerb, DeviceState>> = {
    start: 'Starting',
    runProtocol: 'RunningProtocol',
}

type DeviceEntry = {
    view: DeviceView
    activeSession: ProtocolSessionView | null
    lastSession: ProtocolSessionView | null
    worker: DeviceWorker | null
}

function str(v: unknown): string | null {
    if (typeof v !== 'string') return null
    const s = v.trim()
    return s.length > 0 ? s : null
}

/**
 * Single writer of device and protocol-session state.
 *
 * Every request is checked against the device's state when it arrives and
 * rejected at once when illegal. While an accepted `start` or `runProtocol`
 * is still queued or running, arrivals are checked against the state it
 * leads to, and conflicting ones get `DeviceBusy` instead of waiting behind
 * it. Accepted requests, worker crashes and
 * watcher events for one box run one at a time in that box's lane, in arrival
 * order; different boxes never wait on each other.
 */
export class CommandRouter {
    private readonly entries = new Map<string, DeviceEntry>()
    private readonly lanes = new DeviceLanes()
    private readonly pending = new Map<string, PendingCommand>()

    constructor(private readonly deps: CommandRouterDeps) {}

    /** Seed Stopped views for every registered box. Call once after registry.load(). */
    init(): void {
        for (const rec of this.deps.registry.list()) {
            if (this.entries.has(rec.boxId)) continue
            this.addEntry(rec.boxId, rec.serialLocator)
        }
    }

    /** Resolves with the ack payload; never rejects. */
    async handle(req: CommandRequest): Promise<CommandOutcome> {
        try {
            this.precheckOnArrival(req)
        } catch (err) {
            return this.rejected(req, err)
        }

        const leadsTo = PENDING_STATE[req.verb]
        const marker: PendingCommand | null = leadsTo ? { verb: req.verb, leadsTo } : null
        if (marker) this.pending.set(req.boxId, marker)

        this.deps.events.publish({
            kind: 'command-accepted',
            at: Date.now(),
            requestId: req.requestId,
            boxId: req.boxId,
            verb: req.verb,
            role: req.origin.role,
        })

        try {
            const result =
                req.verb === 'listPorts'
                    ? await this.deps.ports.listCandidates()
                    : await this.lanes.run(req.boxId, async () => {
                          // state may have moved while queued
                          this.precheck(req)
                          return this.execute(req)
                      })
            this.deps.events.publish({
                kind: 'command-completed',
                at: Date.now(),
                requestId: req.requestId,
                boxId: req.boxId,
                verb: req.verb,
            })
            return { ok: true, result }
        } catch (err) {
            return this.rejected(req, err)
        } finally {
            if (marker && this.pending.get(req.boxId) === marker) this.pending.delete(req.boxId)
        }
    }

    /** True while the box has a live engine session. */
    isBusy(boxId: string): boolean {
        return Boolean(this.entries.get(boxId)?.worker)
    }

    listBoxIds(): string[] {
        return [...this.entries.keys()]
    }

    /** Stops every live worker; used on shutdown. */
    async stopAll(): Promise<void> {
        await Promise.all(
            [...this.entries.keys()].map((boxId) =>
                this.lanes.run(boxId, async () => {
                    const entry = this.entries.get(boxId)
                    if (!entry?.worker) return
                    await this.doStop(boxId, entry)
                })
            )
        )
    }

    // ---------------------------------------------------------------------
    // events from workers and the completion watcher
    // ---------------------------------------------------------------------

    onWorkerEvent(evt: WorkerEvent): Promise<void> {
        if (evt.kind !== 'worker-crashed') return Promise.resolve()
        const crash = evt
        return this.inLane(crash.boxId, crash.kind, async () => {
            const entry = this.entries.get(crash.boxId)
            if (!entry || entry.worker?.id !== crash.workerId) {
                this.stale(crash.boxId, crash.kind, `worker ${crash.workerId} is not current`)
                return
            }
            entry.worker = null
            this.deps.watcher.unwatch(crash.boxId)

            const why = crash.error ?? `code=${crash.code ?? 'null'} signal=${crash.signal ?? 'null'}`
            const message = `engine exited unexpectedly (${why})`
            this.finalizeSession(entry, 'Failed', message)
            this.setState(entry, 'Error', { lastError: message, guiVisible: false })
        })
    }

    onWatcherEvent(evt: WatcherEvent): Promise<void> {
        if (evt.kind === 'log-rotated') return Promise.resolve()
        const update = evt
        return this.inLane(update.boxId, update.kind, async () => {
            const entry = this.entries.get(update.boxId)
            const session = entry?.activeSession
            if (!entry || !session || entry.view.state !== 'RunningProtocol') {
                this.stale(update.boxId, update.kind, 'no protocol is running')
                return
            }

            switch (update.kind) {
                case 'protocol-completed':
                    entry.worker?.markProtocolFinished()
                    this.finalizeSession(entry, 'Completed', null)
                    this.setState(entry, 'Idle')
                    return

                case 'protocol-failed':
                    entry.worker?.markProtocolFinished()
                    this.finalizeSession(entry, 'Failed', update.error)
                    this.setState(entry, 'Error', { lastError: `protocol failed: ${update.error}` })
                    return

                case 'log-unreadable':
                    if (session.status !== 'Running') return
                    entry.activeSession = { ...session, status: 'UnknownStatus', error: update.error }
                    this.publish(entry)
                    return

                case 'log-recovered':
                    if (session.status !== 'UnknownStatus') return
                    entry.activeSession = { ...session, status: 'Running', error: null }
                    this.publish(entry)
                    return
            }
        })
    }

    private inLane(boxId: string, event: string, fn: () => Promise<void>): Promise<void> {
        return this.lanes.run(boxId, fn).catch((err: unknown) => {
            this.deps.events.publish({
                kind: 'event-failed',
                at: Date.now(),
                boxId,
                event,
                error: err instanceof Error ? err.message : String(err),
            })
        })
    }

    // ---------------------------------------------------------------------
    // validation
    // ---------------------------------------------------------------------

    private precheckOnArrival(req: CommandRequest): void {
        const pending = this.pending.get(req.boxId)
        if (!pending || req.verb === 'query' || req.verb === 'listPorts') {
            this.precheck(req)
            return
        }

        if (req.origin.role === 'Remote' && LOCAL_ONLY_VERBS.has(req.verb)) {
            throw new AcademyError('PermissionDenied', `${req.verb} is only allowed from the rig itself`)
        }
        if (!isDeviceVerb(req.verb)) {
            throw new AcademyError('DeviceBusy', `box "${req.boxId}" is busy with ${pending.verb}`)
        }
        const ahead = checkVerb(pending.leadsTo, req.verb)
        if (ahead.ok) return
        const current = this.entries.get(req.boxId)?.view.state
        if (current === pending.leadsTo) throw new AcademyError(ahead.code, ahead.message)
        throw new AcademyError('DeviceBusy', `box "${req.boxId}" is busy with ${pending.verb}; ${ahead.message}`)
    }

    private precheck(req: CommandRequest): void {
        if (req.verb === 'listPorts') return

        if (req.verb === 'addDevice') {
            if (this.entries.has(req.boxId)) {
                throw new AcademyError('DuplicateBoxId', `box "${req.boxId}" already exists`)
            }
            return
        }

        const entry = this.entries.get(req.boxId)
        if (!entry) throw new AcademyError('UnknownDevice', `unknown box "${req.boxId}"`)

        if (isDeviceVerb(req.verb)) {
            const legal = checkVerb(entry.view.state, req.verb)
            if (!legal.ok) throw new AcademyError(legal.code, legal.message)
        }

        if (req.origin.role === 'Remote' && LOCAL_ONLY_VERBS.has(req.verb)) {
            throw new AcademyError('PermissionDenied', `${req.verb} is only allowed from the rig itself`)
        }
    }

    private entryFor(boxId: string): DeviceEntry {
        const entry = this.entries.get(boxId)
        if (!entry) throw new AcademyError('UnknownDevice', `unknown box "${boxId}"`)
        return entry
    }

    private workerFor(boxId: string, entry: DeviceEntry): DeviceWorker {
        if (!entry.worker) throw new AcademyError('InvalidState', `box "${boxId}" has no engine session`)
        return entry.worker
    }

    // ---------------------------------------------------------------------
    // execution (inside the box's lane)
    // ---------------------------------------------------------------------

    private async execute(req: CommandRequest): Promise<unknown> {
        const { boxId, args } = req

        switch (req.verb) {
            case 'start':
                return this.doStart(boxId, this.entryFor(boxId))

            case 'stop':
                return this.doStop(boxId, this.entryFor(boxId))

            case 'setConsoleVisible': {
                if (typeof args.visible !== 'boolean') {
                    throw new AcademyError('BadRequest', 'setConsoleVisible requires args.visible (boolean)')
                }
                const entry = this.entryFor(boxId)
                const res = await this.workerFor(boxId, entry).setConsoleVisible(args.visible)
                if (!res.ok) throw new AcademyError(res.code, res.message)
                this.setState(entry, entry.view.state, { guiVisible: args.visible })
                return { guiVisible: args.visible }
            }

            case 'calibrate': {
                const entry = this.entryFor(boxId)
                const res = await this.workerFor(boxId, entry).calibrate()
                if (!res.ok) throw new AcademyError(res.code, res.message)
                return undefined
            }

            case 'runProtocol':
                return this.doRunProtocol(boxId, this.entryFor(boxId), args)

            case 'stopProtocol': {
                const entry = this.entryFor(boxId)
                const res = await this.workerFor(boxId, entry).stopProtocol()
                if (!res.ok) throw new AcademyError(res.code, res.message)
                this.deps.watcher.unwatch(boxId)
                this.finalizeSession(entry, 'StoppedByUser', null)
                this.setState(entry, 'Idle')
                return undefined
            }

            case 'query':
                return this.deps.store.getDevice(boxId)

            case 'addDevice': {
                const serialLocator = str(args.serialLocator)
                if (!serialLocator) throw new AcademyError('BadRequest', 'addDevice requires args.serialLocator')
                const rec = await this.deps.registry.add(boxId, serialLocator)
                return this.addEntry(rec.boxId, rec.serialLocator)
            }

            case 'removeDevice': {
                await this.deps.registry.remove(boxId, (id) => this.isBusy(id))
                this.entries.delete(boxId)
                this.deps.watcher.unwatch(boxId)
                this.deps.store.removeDevice(boxId)
                return undefined
            }

            case 'changeLocator': {
                const serialLocator = str(args.serialLocator)
                if (!serialLocator) throw new AcademyError('BadRequest', 'changeLocator requires args.serialLocator')
                const rec = await this.deps.registry.changeLocator(boxId, serialLocator, (id) => this.isBusy(id))
                const entry = this.entryFor(boxId)
                entry.view = { ...entry.view, serialLocator: rec.serialLocator }
                return this.publish(entry)
            }

            case 'listPorts':
                return this.deps.ports.listCandidates()
        }
    }

    private async doStart(boxId: string, entry: DeviceEntry): Promise<unknown> {
        this.setState(entry, 'Starting', { lastError: null })

        const worker = this.deps.workerFactory(boxId)
        entry.worker = worker
        const res = await worker.start(entry.view.serialLocator)

        if (!res.ok) {
            entry.worker = null
            this.setState(entry, 'Error', { lastError: `${res.code}: ${res.message}` })
            throw new AcademyError(res.code, res.message)
        }

        const calibration = await this.deps.catalog.calibrationStatus(boxId)
        this.setState(entry, 'Idle', { guiVisible: true, calibration })
        return { portPath: res.value.portPath, pid: res.value.pid ?? null, calibration }
    }

    private async doStop(boxId: string, entry: DeviceEntry): Promise<unknown> {
        const worker = entry.worker
        this.deps.watcher.unwatch(boxId)

        if (!worker) {
            // Error after a crash or failed start: nothing left to end
            this.finalizeSession(entry, 'StoppedByUser', null)
            this.setState(entry, 'Stopped', { guiVisible: false, lastError: null })
            return { forced: false }
        }

        const res = await worker.stop()
        entry.worker = null
        this.finalizeSession(entry, 'StoppedByUser', null)

        if (res.ok && res.value.forced) {
            this.setState(entry, 'Error', {
                guiVisible: false,
                lastError: 'engine did not exit within the grace period and was killed',
            })
            return { forced: true }
        }

        // AlreadyStopped here means the engine died just before we asked.
        this.setState(entry, 'Stopped', { guiVisible: false, lastError: null })
        return { forced: false }
    }

    private async doRunProtocol(
        boxId: string,
        entry: DeviceEntry,
        args: Readonly<Record<string, unknown>>
    ): Promise<unknown> {
        const protocol = str(args.protocol)
        const subject = str(args.subject)
        if (!protocol || !subject) {
            throw new AcademyError('BadRequest', 'runProtocol requires args.protocol and args.subject')
        }
        const settingsFile = args.settingsFile === undefined ? DEFAULT_SETTINGS_FILE : str(args.settingsFile)
        if (!settingsFile) throw new AcademyError('BadRequest', 'args.settingsFile must be a non-empty string')

        const { catalog } = this.deps
        if (!(await catalog.hasProtocol(protocol))) {
            throw new AcademyError('UnknownProtocol', `unknown protocol "${protocol}"`)
        }
        if (!(await catalog.hasSubject(subject, protocol))) {
            throw new AcademyError('UnknownSubject', `unknown subject "${subject}" for protocol "${protocol}"`)
        }
        if (!(await catalog.hasSettings(subject, protocol, settingsFile))) {
            throw new AcademyError('UnknownSettings', `unknown settings "${settingsFile}" for ${subject}/${protocol}`)
        }

        const worker = this.workerFor(boxId, entry)

        // Arm the watcher before dispatch so an immediate completion line is seen.
        const offset = await worker.logSize()
        this.deps.watcher.watch(boxId, worker.logPath(), offset)

        const res = await worker.runProtocol({ protocol, subject, settingsFile })
        if (!res.ok) {
            this.deps.watcher.unwatch(boxId)
            throw new AcademyError(res.code, res.message)
        }

        entry.activeSession = {
            boxId,
            protocol,
            subject,
            settingsFile,
            startedAt: new Date().toISOString(),
            endedAt: null,
            status: 'Running',
            error: null,
        }
        this.setState(entry, 'RunningProtocol')
        return { protocol, subject, settingsFile }
    }

    // ---------------------------------------------------------------------
    // state helpers
    // ---------------------------------------------------------------------

    private addEntry(boxId: string, serialLocator: string): DeviceSnapshot {
        const entry: DeviceEntry = {
            view: {
                boxId,
                serialLocator,
                state: 'Stopped',
                guiVisible: false,
                lastError: null,
                calibration: 'unknown',
            },
            activeSession: null,
            lastSession: null,
            worker: null,
        }
        this.entries.set(boxId, entry)
        return this.publish(entry)
    }

    private finalizeSession(entry: DeviceEntry, status: ProtocolSessionStatus, error: string | null): void {
        const s = entry.activeSession
        if (!s) return
        entry.lastSession = { ...s, status, error, endedAt: new Date().toISOString() }
        entry.activeSession = null
    }

    private setState(
        entry: DeviceEntry,
        to: DeviceState,
        patch: Partial<Pick<DeviceView, 'guiVisible' | 'lastError' | 'calibration'>> = {}
    ): void {
        const from = entry.view.state
        if (!canTransition(from, to)) {
            throw new AcademyError('Internal', `illegal transition ${from} -> ${to} for box "${entry.view.boxId}"`)
        }
        entry.view = { ...entry.view, ...patch, state: to }
        if (from !== to) {
            this.deps.events.publish({
                kind: 'device-state',
                at: Date.now(),
                boxId: entry.view.boxId,
                from,
                to,
                lastError: entry.view.lastError,
            })
        }
        this.publish(entry)
    }

    private publish(entry: DeviceEntry): DeviceSnapshot {
        return this.deps.store.putDevice(entry.view, entry.activeSession, entry.lastSession)
    }

    private stale(boxId: string, event: string, reason: string): void {
        this.deps.events.publish({ kind: 'stale-event', at: Date.now(), boxId, event, reason })
    }

    private rejected(req: CommandRequest, err: unknown): CommandOutcome {
        const error = toWireError(err)
        this.deps.events.publish({
            kind: 'command-rejected',
            at: Date.now(),
            requestId: req.requestId,
            boxId: req.boxId,
            verb: req.verb,
            code: error.code,
            message: error.message,
        })
        return { ok: false, error }
    }
}
