// services/orchestrator/src/devices/engine-worker/engineSession.ts
import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process'
import { ReadlineParser } from '@serialport/parser-readline'
import type {
    EngineExit,
    EngineLaunchOptions,
    EngineLauncher,
    EngineSession,
    EngineStream,
} from './types.js'

type LineListener = (line: string, stream: EngineStream) => void
type ExitListener = (exit: EngineExit) => void

class ChildEngineSession implements EngineSession {
    private exited = false
    private readonly lineListeners: LineListener[] = []
    private readonly exitListeners: ExitListener[] = []

    constructor(private readonly child: ChildProcessWithoutNullStreams) {
        const out = child.stdout.pipe(new ReadlineParser({ delimiter: '\n' }))
        const err = child.stderr.pipe(new ReadlineParser({ delimiter: '\n' }))
        out.on('data', (line: string) => this.emitLine(line, 'out'))
        err.on('data', (line: string) => this.emitLine(line, 'err'))

        child.stdin.on('error', (e: Error) => {
            this.emitLine(`stdin error: ${e.message}`, 'err')
        })

        child.on('error', (e: Error) => {
            if (child.pid === undefined) {
                // spawn failure: 'exit' never comes
                this.finish({ code: null, signal: null, error: e.message })
                return
            }
            this.emitLine(`process error: ${e.message}`, 'err')
        })

        // 'close' fires after stdio drains, so every output line precedes the exit.
        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            this.finish({ code, signal })
        })
    }

    get pid(): number | undefined {
        return this.child.pid
    }

    send(line: string): void {
        if (this.exited || !this.child.stdin.writable) {
            throw new Error('engine stdin is closed')
        }
        this.child.stdin.write(line + '\n')
    }

    onLine(listener: LineListener): void {
        this.lineListeners.push(listener)
    }

    onExit(listener: ExitListener): void {
        this.exitListeners.push(listener)
    }

    kill(signal: NodeJS.Signals): void {
        if (this.exited) return
        this.child.kill(signal)
    }

    hasExited(): boolean {
        return this.exited
    }

    private emitLine(raw: string, stream: EngineStream): void {
        const line = raw.replace(/\r$/, '')
        for (const l of this.lineListeners) l(line, stream)
    }

    private finish(exit: EngineExit): void {
        if (this.exited) return
        this.exited = true
        for (const l of this.exitListeners) l(exit)
    }
}

/**
 * Spawns `<command> [...args] --port <path> --box <boxId>` with piped stdio.
 */
export class ChildProcessEngineLauncher implements EngineLauncher {
    constructor(
        private readonly command: string,
        private readonly args: readonly string[] = []
    ) {}

    launch(opts: EngineLaunchOptions): EngineSession {
        const child = spawn(this.command, [...this.args, '--port', opts.portPath, '--box', opts.boxId])
        return new ChildEngineSession(child)
    }
}
