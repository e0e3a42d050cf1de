// services/orchestrator/src/devices/engine-worker/types.ts
import type { ErrorCode, RunProtocolArgs } from '@rig-academy/protocol'

/* -------------------------------------------------------------------------- */
/*  Engine subprocess boundary                                                */
/* -------------------------------------------------------------------------- */

export type EngineStream = 'out' | 'err'

export interface EngineExit {
    code: number | null
    signal: NodeJS.Signals | null
    /** Set when the process could not be spawned at all (ENOENT, EACCES, ...). */
    error?: string
}

/**
 * One running engine process. Commands are single lines on stdin; output is
 * free text on stdout/stderr, delivered line by line.
 */
export interface EngineSession {
    readonly pid: number | undefined
    /** Throws when stdin is no longer writable. */
    send(line: string): void
    onLine(listener: (line: string, stream: EngineStream) => void): void
    onExit(listener: (exit: EngineExit) => void): void
    kill(signal: NodeJS.Signals): void
    hasExited(): boolean
}

export interface EngineLaunchOptions {
    boxId: string
    /** Resolved port path, or `EMU` for the engine's emulator. */
    portPath: string
}

export interface EngineLauncher {
    launch(opts: EngineLaunchOptions): EngineSession
}

/* -------------------------------------------------------------------------- */
/*  Worker                                                                    */
/* -------------------------------------------------------------------------- */

export interface EngineWorkerConfig {
    /** Directory holding `<boxId>.log` execution logs. */
    logDir: string
    readyMarker: string
    startTimeoutMs: number
    stopGraceMs: number
}

export type WorkerResult<T = undefined> =
    | { ok: true; value: T }
    | { ok: false; code: ErrorCode; message: string }

export interface StartResult {
    portPath: string
    pid: number | undefined
}

export interface StopResult {
    /** True when the engine ignored `end` and had to be killed. */
    forced: boolean
    /** True when a running protocol was stopped on the way out. */
    protocolStopped: boolean
}

export interface PortResolver {
    resolve(serialLocator: string): Promise<string | null>
}

/**
 * Router-facing surface of a per-device worker. Each worker owns at most one
 * engine session; a new worker (with a new id) is created for every start.
 */
export interface DeviceWorker {
    readonly id: string
    readonly boxId: string
    isActive(): boolean
    isRunningProtocol(): boolean
    start(serialLocator: string): Promise<WorkerResult<StartResult>>
    stop(): Promise<WorkerResult<StopResult>>
    setConsoleVisible(visible: boolean): Promise<WorkerResult>
    calibrate(): Promise<WorkerResult>
    runProtocol(args: Required<RunProtocolArgs>): Promise<WorkerResult>
    stopProtocol(): Promise<WorkerResult>
    /** Completion was observed in the log; the engine is idle again. */
    markProtocolFinished(): void
    logPath(): string
    /** Byte size of the execution log once pending appends are flushed. */
    logSize(): Promise<number>
}

export type WorkerFactory = (boxId: string) => DeviceWorker

/* -------------------------------------------------------------------------- */
/*  Events                                                                    */
/* -------------------------------------------------------------------------- */

export type WorkerEvent =
    | { kind: 'worker-starting'; at: number; boxId: string; workerId: string; portPath: string }
    | { kind: 'worker-ready'; at: number; boxId: string; workerId: string; pid: number | undefined }
    | { kind: 'worker-start-failed'; at: number; boxId: string; workerId: string; code: ErrorCode; message: string }
    | { kind: 'worker-stopped'; at: number; boxId: string; workerId: string; forced: boolean }
    | {
          kind: 'worker-crashed'
          at: number
          boxId: string
          workerId: string
          code: number | null
          signal: NodeJS.Signals | null
          error?: string
      }
    | { kind: 'worker-command'; at: number; boxId: string; workerId: string; verb: string; outcome: string }
    | { kind: 'engine-line'; at: number; boxId: string; stream: EngineStream; line: string }
    | { kind: 'execution-log-error'; at: number; boxId: string; error: string }

export interface WorkerEventSink {
    publish(evt: WorkerEvent): void
}
