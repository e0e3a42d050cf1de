// services/orchestrator/src/routes/devices.ts
import type { FastifyPluginAsync } from 'fastify'
import { AcademyError } from '@rig-academy/protocol'
import { replyError } from './http.js'

interface BoxParams {
    boxId: string
}

/** Read-only fleet views; every mutation goes through the WebSocket command channel. */
const devicesRoutes: FastifyPluginAsync = async (app) => {
    const { store, ports } = app.academy

    app.get('/api/devices', async () => {
        return { ok: true, devices: store.listDevices() }
    })

    app.get<{ Params: BoxParams }>('/api/devices/:boxId', async (req, reply) => {
        const snapshot = store.getDevice(req.params.boxId)
        if (!snapshot) {
            return replyError(reply, new AcademyError('UnknownDevice', `unknown box "${req.params.boxId}"`))
        }
        return { ok: true, snapshot }
    })

    app.get('/api/ports', async (_req, reply) => {
        try {
            return { ok: true, ports: await ports.listCandidates() }
        } catch (err) {
            return replyError(reply, err)
        }
    })
}

export default devicesRoutes
