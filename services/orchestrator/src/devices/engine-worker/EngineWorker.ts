// services/orchestrator/src/devices/engine-worker/EngineWorker.ts
import type { RunProtocolArgs } from '@rig-academy/protocol'
import { ExecutionLog } from './executionLog.js'
import type {
    DeviceWorker,
    EngineExit,
    EngineLauncher,
    EngineSession,
    EngineStream,
    EngineWorkerConfig,
    PortResolver,
    StartResult,
    StopResult,
    WorkerEventSink,
    WorkerResult,
} from './types.js'
import { TIMED_OUT, errorMessage, fail, ok, outcomeOf, raceTimeout } from './utils.js'

export interface EngineWorkerDeps {
    launcher: EngineLauncher
    ports: PortResolver
    events: WorkerEventSink
}

/** How long to wait for the exit after SIGKILL before giving up on it. */
const KILL_WAIT_MS = 2000

let workerSeq = 0

type LiveSession = {
    session: EngineSession
    exited: Promise<EngineExit>
}

/**
 * Owns one engine subprocess for one box.
 *
 * Lifecycle:
 *   start()  resolve port → spawn → wait for ready marker (bounded)
 *   stop()   [stop-protocol] → end → wait grace period → SIGKILL
 *
 * Every public operation appends a record to `<logDir>/<boxId>.log` before it
 * returns. Engine output is appended to the same file as it arrives; the
 * CompletionWatcher reads it from there.
 */
export class EngineWorker implements DeviceWorker {
    readonly id: string
    private readonly log: ExecutionLog

    private live: LiveSession | null = null
    private ready = false
    private stopping = false
    private protocolRunning = false
    private readyWaiter: ((r: 'ready' | EngineExit) => void) | null = null

    constructor(
        readonly boxId: string,
        private readonly cfg: EngineWorkerConfig,
        private readonly deps: EngineWorkerDeps
    ) {
        this.id = `${boxId}#${++workerSeq}`
        this.log = ExecutionLog.forBox(cfg.logDir, boxId, (err) => {
            this.deps.events.publish({
                kind: 'execution-log-error',
                at: Date.now(),
                boxId,
                error: err.message,
            })
        })
    }

    isActive(): boolean {
        return this.live !== null && this.ready && !this.live.session.hasExited()
    }

    isRunningProtocol(): boolean {
        return this.isActive() && this.protocolRunning
    }

    logPath(): string {
        return this.log.file
    }

    logSize(): Promise<number> {
        return this.log.size()
    }

    // ---------------------------------------------------------------------
    // start / stop
    // ---------------------------------------------------------------------

    async start(serialLocator: string): Promise<WorkerResult<StartResult>> {
        const args = { serialLocator }

        if (this.live && !this.live.session.hasExited()) {
            return this.finish('start', args, fail('InvalidState', 'engine already started'))
        }

        let portPath: string | null
        try {
            portPath = await this.deps.ports.resolve(serialLocator)
        } catch (err) {
            return this.startFailed(args, fail('PortUnavailable', `port lookup failed: ${errorMessage(err)}`))
        }
        if (!portPath) {
            return this.startFailed(args, fail('PortUnavailable', `no serial port matches "${serialLocator}"`))
        }

        this.deps.events.publish({
            kind: 'worker-starting',
            at: Date.now(),
            boxId: this.boxId,
            workerId: this.id,
            portPath,
        })

        let session: EngineSession
        try {
            session = this.deps.launcher.launch({ boxId: this.boxId, portPath })
        } catch (err) {
            return this.startFailed(args, fail('EngineLaunchFailed', errorMessage(err)))
        }

        const readyPromise = new Promise<'ready' | EngineExit>((resolve) => {
            this.readyWaiter = resolve
        })
        this.ready = false
        this.protocolRunning = false
        this.live = {
            session,
            exited: new Promise<EngineExit>((resolve) => session.onExit(resolve)),
        }
        session.onLine((line, stream) => this.handleLine(session, line, stream))
        session.onExit((exit) => this.handleExit(session, exit))

        const outcome = await raceTimeout(readyPromise, this.cfg.startTimeoutMs)
        this.readyWaiter = null

        if (outcome === 'ready') {
            this.deps.events.publish({
                kind: 'worker-ready',
                at: Date.now(),
                boxId: this.boxId,
                workerId: this.id,
                pid: session.pid,
            })
            return this.finish('start', args, ok({ portPath, pid: session.pid }))
        }

        this.live = null
        this.ready = false

        if (outcome === TIMED_OUT) {
            session.kill('SIGKILL')
            return this.startFailed(
                args,
                fail('Timeout', `engine not ready within ${this.cfg.startTimeoutMs} ms`)
            )
        }

        const why =
            outcome.error ??
            `engine exited before ready (code=${outcome.code ?? 'null'} signal=${outcome.signal ?? 'null'})`
        return this.startFailed(args, fail('EngineLaunchFailed', why))
    }

    async stop(): Promise<WorkerResult<StopResult>> {
        const live = this.live
        if (!live || live.session.hasExited()) {
            return this.finish('stop', {}, fail('AlreadyStopped', 'engine is not running'))
        }

        this.stopping = true
        try {
            let protocolStopped = false
            if (this.protocolRunning) {
                this.trySend(live.session, 'stop-protocol')
                this.protocolRunning = false
                protocolStopped = true
            }
            this.trySend(live.session, 'end')

            let forced = false
            const graceful = await raceTimeout(live.exited, this.cfg.stopGraceMs)
            if (graceful === TIMED_OUT) {
                forced = true
                live.session.kill('SIGKILL')
                await raceTimeout(live.exited, KILL_WAIT_MS)
            }

            this.live = null
            this.ready = false

            this.deps.events.publish({
                kind: 'worker-stopped',
                at: Date.now(),
                boxId: this.boxId,
                workerId: this.id,
                forced,
            })
            return this.finish('stop', {}, ok({ forced, protocolStopped }))
        } finally {
            this.stopping = false
        }
    }

    // ---------------------------------------------------------------------
    // engine commands
    // ---------------------------------------------------------------------

    async setConsoleVisible(visible: boolean): Promise<WorkerResult> {
        return this.finish('setConsoleVisible', { visible }, this.sendWhenIdle(`console ${visible ? 'show' : 'hide'}`))
    }

    async calibrate(): Promise<WorkerResult> {
        return this.finish('calibrate', {}, this.sendWhenIdle('calibrate'))
    }

    async runProtocol(args: Required<RunProtocolArgs>): Promise<WorkerResult> {
        const payload = { protocol: args.protocol, subject: args.subject, settingsFile: args.settingsFile }
        const live = this.live
        if (!live || !this.ready) {
            return this.finish('runProtocol', payload, fail('InvalidState', 'engine is not started'))
        }
        if (this.protocolRunning) {
            return this.finish('runProtocol', payload, fail('AlreadyRunning', 'a protocol is already running'))
        }
        const res = this.sendLine(live.session, `run ${JSON.stringify(payload)}`)
        if (res.ok) this.protocolRunning = true
        return this.finish('runProtocol', payload, res)
    }

    async stopProtocol(): Promise<WorkerResult> {
        const live = this.live
        if (!live || !this.ready) {
            return this.finish('stopProtocol', {}, fail('InvalidState', 'engine is not started'))
        }
        if (!this.protocolRunning) {
            return this.finish('stopProtocol', {}, fail('NotRunning', 'no protocol is running'))
        }
        const res = this.sendLine(live.session, 'stop-protocol')
        if (res.ok) this.protocolRunning = false
        return this.finish('stopProtocol', {}, res)
    }

    markProtocolFinished(): void {
        this.protocolRunning = false
    }

    // ---------------------------------------------------------------------
    // internals
    // ---------------------------------------------------------------------

    private sendWhenIdle(line: string): WorkerResult {
        const live = this.live
        if (!live || !this.ready) return fail('InvalidState', 'engine is not started')
        if (this.protocolRunning) return fail('InvalidState', 'a protocol is running')
        return this.sendLine(live.session, line)
    }

    private sendLine(session: EngineSession, line: string): WorkerResult {
        try {
            session.send(line)
            return ok(undefined)
        } catch (err) {
            return fail('Internal', `engine did not accept "${line}": ${errorMessage(err)}`)
        }
    }

    /** Used on the way out, where a dead stdin is expected. */
    private trySend(session: EngineSession, line: string): void {
        const res = this.sendLine(session, line)
        if (!res.ok) void this.log.command(line, {}, outcomeOf(res))
    }

    private handleLine(session: EngineSession, line: string, stream: EngineStream): void {
        void this.log.engine(line, stream)
        this.deps.events.publish({ kind: 'engine-line', at: Date.now(), boxId: this.boxId, stream, line })

        if (
            this.live?.session === session &&
            !this.ready &&
            stream === 'out' &&
            line.toLowerCase().includes(this.cfg.readyMarker.toLowerCase())
        ) {
            this.ready = true
            this.readyWaiter?.('ready')
        }
    }

    private handleExit(session: EngineSession, exit: EngineExit): void {
        if (this.live?.session !== session) return

        if (!this.ready) {
            // still starting; start() reports it
            this.readyWaiter?.(exit)
            return
        }
        if (this.stopping) return

        this.live = null
        this.ready = false
        this.protocolRunning = false

        void this.log.command('exit', { code: exit.code, signal: exit.signal }, 'crashed')
        this.deps.events.publish({
            kind: 'worker-crashed',
            at: Date.now(),
            boxId: this.boxId,
            workerId: this.id,
            code: exit.code,
            signal: exit.signal,
            ...(exit.error ? { error: exit.error } : {}),
        })
    }

    private async startFailed<T>(args: Record<string, unknown>, res: WorkerResult<T>): Promise<WorkerResult<T>> {
        if (!res.ok) {
            this.deps.events.publish({
                kind: 'worker-start-failed',
                at: Date.now(),
                boxId: this.boxId,
                workerId: this.id,
                code: res.code,
                message: res.message,
            })
        }
        return this.finish('start', args, res)
    }

    private async finish<T>(verb: string, args: Record<string, unknown>, res: WorkerResult<T>): Promise<WorkerResult<T>> {
        const outcome = outcomeOf(res)
        await this.log.command(verb, args, outcome)
        this.deps.events.publish({
            kind: 'worker-command',
            at: Date.now(),
            boxId: this.boxId,
            workerId: this.id,
            verb,
            outcome,
        })
        return res
    }
}
