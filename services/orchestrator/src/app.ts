import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@rig-academy/logging'

import academyPlugin, { type AcademyPluginOptions } from './plugins/academy.js'
import wsPlugin, { type WsPluginOptions } from './plugins/ws.js'
import syncRelayPlugin, { type SyncRelayPluginOptions } from './plugins/syncRelay.js'
import devicesRoutes from './routes/devices.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    academy?: AcademyPluginOptions
    ws?: WsPluginOptions
    relay?: SyncRelayPluginOptions
    /** Shared log buffer; a fresh one per app by default. */
    clientBuf?: ClientLogBuffer
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_LOG_HEADERS =
    String(process.env.REQUEST_LOG_HEADERS ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

const VERSION = '0.1.0'

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('orchestrator', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    const sampledIds = new Set<string>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    // CORS
    void app.register(cors, { origin: true })

    // Academy core first: ws, relay and routes read app.academy
    void app.register(academyPlugin, opts.academy ?? {})
    void app.register(wsPlugin, opts.ws ?? {})
    void app.register(syncRelayPlugin, opts.relay ?? {})
    void app.register(devicesRoutes)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        sampledIds.add(req.id)
        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            const detail: Record<string, unknown> = { id: req.id, ip: req.ip }
            if (REQUEST_LOG_HEADERS) {
                const { host, 'user-agent': ua, accept, referer } = req.headers
                detail.headers = { host, 'user-agent': ua, accept, referer }
            }
            logReq.debug('request detail', detail)
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        if (!sampledIds.has(req.id)) return
        sampledIds.delete(req.id)

        const start = startedAt.get(req.id)
        if (start !== undefined) startedAt.delete(req.id)
        const ms = start !== undefined ? Date.now() - start : undefined

        logReq.info(`${req.method} ${req.url} → ${reply.statusCode}${ms !== undefined ? ` (${ms} ms)` : ''}`)

        if (REQUEST_VERBOSE) {
            const outLen = reply.getHeader('content-length') ?? null
            logReq.debug('response detail', { id: req.id, bytesOut: outLen, ms })
        }
    })
    // ---------------------------------------------------

    // Health / ready
    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/ready', async (_req, reply) => {
        const { meta, devices } = app.academy.store.getSnapshot()
        const ready = meta.status === 'ready'
        if (!ready) reply.code(503)
        return {
            ready,
            status: meta.status,
            startedAt: meta.startedAt,
            devices: devices.length,
            clients: app.academy.hub.size,
            relay: app.syncRelay ? app.syncRelay.status() : null,
        }
    })

    app.get('/version', async () => ({ name: 'rig-academy-orchestrator', version: VERSION }))

    logApp.info('orchestrator app built')
    return app
}
