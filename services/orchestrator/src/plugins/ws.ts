// services/orchestrator/src/plugins/ws.ts
import fp from 'fastify-plugin'
import websocket from '@fastify/websocket'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { RawData, WebSocket as WSSocket } from 'ws'
import { createLogger, LogChannel } from '@rig-academy/logging'
import type { ConnectionRole } from '@rig-academy/protocol'

export interface WsPluginOptions {
    /** Decides a connection's role; defaults to loopback or ACADEMY_LOCAL_ADDRESSES → Local. */
    resolveRole?: (req: FastifyRequest) => ConnectionRole
}

const LOOPBACK = new Set(['127.0.0.1', '::1', '::ffff:127.0.0.1'])

export function roleForAddress(address: string | undefined, localAddresses: readonly string[]): ConnectionRole {
    if (!address) return 'Remote'
    if (LOOPBACK.has(address) || address.startsWith('127.')) return 'Local'
    const bare = address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address
    return localAddresses.includes(address) || localAddresses.includes(bare) ? 'Local' : 'Remote'
}

export function rawToText(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
    return data.toString('utf8')
}

export default fp<WsPluginOptions>(
    async function wsPlugin(app: FastifyInstance, opts: WsPluginOptions) {
        const { channel } = createLogger('orchestrator:ws', app.clientBuf)
        const logWs = channel(LogChannel.websocket)
        const { hub, logs, config } = app.academy

        const resolveRole =
            opts.resolveRole ?? ((req: FastifyRequest) => roleForAddress(req.socket.remoteAddress, config.ws.localAddresses))

        // Live logs -> filter/transform -> broadcast
        const unsubscribeLogs = logs.subscribe((entries) => {
            hub.broadcast({ type: 'logs.append', entries })
        })

        await app.register(websocket, {
            options: {
                perMessageDeflate: true,
                clientTracking: true,
            },
            // announce shutdown before the sockets go away
            preClose: async () => {
                unsubscribeLogs()
                hub.close()
                for (const client of app.websocketServer.clients) client.close(1001, 'server shutting down')
            },
        })

        // Handler signature: (socket, request)
        app.get('/ws', { websocket: true }, (socket: WSSocket, req: FastifyRequest) => {
            const connectionId = hub.attach(socket, resolveRole(req))

            socket.on('message', (data: RawData) => {
                void hub.handleMessage(connectionId, rawToText(data))
            })

            socket.on('error', (err: Error) => {
                logWs.warn('socket error', { connectionId, err: err.message })
            })

            socket.on('close', () => {
                hub.detach(connectionId)
            })
        })
    },
    { name: 'ws-plugin', dependencies: ['academy-plugin'] }
)
