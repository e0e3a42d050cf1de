// services/orchestrator/src/devices/sync-relay/SerialRelayTransport.ts
import { SerialPort } from 'serialport'
import type { RelayTransport } from './types.js'

type DataListener = (chunk: Uint8Array) => void

/** Raw 8N1 link to the relay board; no parser, frames are binary. */
export class SerialRelayTransport implements RelayTransport {
    private port: SerialPort | null = null
    private readonly listeners = new Set<DataListener>()

    constructor(
        private readonly path: string,
        private readonly baudRate: number,
        private readonly onError: (err: Error) => void
    ) {}

    get description(): string {
        return `${this.path}@${this.baudRate}`
    }

    async open(): Promise<void> {
        if (this.port?.isOpen) return

        await new Promise<void>((resolve, reject) => {
            const port = new SerialPort({
                path: this.path,
                baudRate: this.baudRate,
                autoOpen: false,
                dataBits: 8,
                parity: 'none',
                stopBits: 1,
            })

            const onOpen = () => {
                port.off('error', onOpenError)
                this.port = port

                // Attach data/error handlers only after successful open
                port.on('data', (chunk: Buffer) => {
                    for (const l of this.listeners) l(chunk)
                })
                port.on('error', (err: Error) => this.onError(err))
                port.on('close', () => {
                    if (this.port === port) this.port = null
                })
                resolve()
            }

            const onOpenError = (err: Error) => {
                port.off('open', onOpen)
                reject(err)
            }

            port.once('open', onOpen)
            port.once('error', onOpenError)
            port.open()
        })
    }

    async write(bytes: Uint8Array): Promise<void> {
        const port = this.port
        if (!port?.isOpen) throw new Error(`relay port ${this.path} is not open`)

        await new Promise<void>((resolve, reject) => {
            port.write(Buffer.from(bytes), (err) => {
                if (err) {
                    reject(err)
                    return
                }
                port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()))
            })
        })
    }

    onData(listener: DataListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    async close(): Promise<void> {
        const port = this.port
        this.port = null
        if (!port?.isOpen) return

        await new Promise<void>((resolve, reject) => {
            port.close((err) => (err ? reject(err) : resolve()))
        })
    }
}
