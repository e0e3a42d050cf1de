// services/orchestrator/src/routes/sync.ts
import type { FastifyPluginAsync } from 'fastify'
import { AcademyError } from '@rig-academy/protocol'
import type { SyncRelayService } from '../devices/sync-relay/SyncRelayService.js'
import { replyError } from './http.js'

interface ChannelParams {
    channel: string
}

interface TakeQuery {
    before?: string
}

function parseChannel(raw: string): number {
    if (!/^\d+$/.test(raw)) throw new AcademyError('BadRequest', `invalid relay channel "${raw}"`)
    return Number(raw)
}

function parseBefore(raw: string | undefined): number | undefined {
    if (raw === undefined || raw === '') return undefined
    const n = Number(raw)
    if (!Number.isFinite(n)) throw new AcademyError('BadRequest', 'before must be epoch milliseconds')
    return n
}

/** Event timestamping relay; every route answers 503 when no relay is configured. */
const syncRoutes: FastifyPluginAsync = async (app) => {
    const relay = (): SyncRelayService => {
        if (!app.syncRelay) throw new AcademyError('PortUnavailable', 'sync relay is not configured (SYNC_RELAY_PATH)')
        return app.syncRelay
    }

    app.get('/api/sync', async (_req, reply) => {
        try {
            return { ok: true, status: relay().status() }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post('/api/sync/connect', async (_req, reply) => {
        try {
            await relay().connect()
            return { ok: true }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post('/api/sync/disconnect', async (_req, reply) => {
        try {
            await relay().disconnect()
            return { ok: true }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post('/api/sync/reboot', async (_req, reply) => {
        try {
            await relay().reboot()
            return { ok: true }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post<{ Params: ChannelParams }>('/api/sync/channels/:channel/start', async (req, reply) => {
        try {
            await relay().startChannel(parseChannel(req.params.channel))
            return { ok: true }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    app.post<{ Params: ChannelParams }>('/api/sync/channels/:channel/stop', async (req, reply) => {
        try {
            const elapsed = await relay().stopChannel(parseChannel(req.params.channel))
            return { ok: true, elapsed }
        } catch (err) {
            return replyError(reply, err)
        }
    })

    /** Drains recorded edges; `?before=<epoch ms>` keeps later ones queued. */
    app.post<{ Params: ChannelParams; Querystring: TakeQuery }>(
        '/api/sync/channels/:channel/take',
        async (req, reply) => {
            try {
                const events = relay().takeSyncTimes(parseChannel(req.params.channel), parseBefore(req.query.before))
                return { ok: true, events }
            } catch (err) {
                return replyError(reply, err)
            }
        }
    )
}

export default syncRoutes
