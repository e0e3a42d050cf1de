// services/orchestrator/src/plugins/syncRelay.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel, type ChannelLogger } from '@rig-academy/logging'

import { SyncRelayService } from '../devices/sync-relay/SyncRelayService.js'
import { SerialRelayTransport } from '../devices/sync-relay/SerialRelayTransport.js'
import { EmulatorTransport } from '../devices/sync-relay/RelayEmulator.js'
import type { RelayEvent, RelayEventSink, RelayTransport } from '../devices/sync-relay/types.js'
import { EMULATOR_LOCATOR } from '../core/serial/PortLocator.js'
import syncRoutes from '../routes/sync.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        /** null when SYNC_RELAY_PATH is unset */
        syncRelay: SyncRelayService | null
    }
}

export interface SyncRelayPluginOptions {
    /** Overrides the transport picked from SYNC_RELAY_PATH. */
    transport?: RelayTransport
}

// ---- Event sink using orchestrator logging ---------------------------------

class RelayLoggerEventSink implements RelayEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: RelayEvent): void {
        switch (evt.kind) {
            case 'relay-ttl':
                // one per input edge; too frequent for info
                this.log.debug(`kind=${evt.kind} ch=${evt.channel} level=${evt.level} elapsed=${evt.elapsed}`)
                break
            case 'relay-opened':
            case 'relay-closed':
                this.log.info(`kind=${evt.kind} transport=${evt.transport}`)
                break
            case 'relay-connected':
            case 'relay-disconnected':
                this.log.info(`kind=${evt.kind}`)
                break
            case 'relay-channel-started':
                this.log.info(`kind=${evt.kind} ch=${evt.channel}`)
                break
            case 'relay-channel-stopped':
                this.log.info(`kind=${evt.kind} ch=${evt.channel} elapsed=${evt.elapsed}`)
                break
            case 'relay-unexpected':
                this.log.warn(`kind=${evt.kind} detail=${evt.detail}`)
                break
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const syncRelayPlugin: FastifyPluginAsync<SyncRelayPluginOptions> = async (
    app: FastifyInstance,
    opts: SyncRelayPluginOptions
) => {
    const { channel } = createLogger('sync-relay', app.clientBuf)
    const logRelay = channel(LogChannel.relay)
    const cfg = app.academy.config.relay

    let transport: RelayTransport | null = opts.transport ?? null
    if (!transport && cfg.path === EMULATOR_LOCATOR) {
        transport = new EmulatorTransport()
    } else if (!transport && cfg.path) {
        transport = new SerialRelayTransport(cfg.path, cfg.baudRate, (err) => {
            logRelay.warn('relay port error', { err: err.message })
        })
    }

    const service = transport
        ? new SyncRelayService(
              { ackTimeoutMs: cfg.ackTimeoutMs },
              { transport, events: new RelayLoggerEventSink(logRelay) }
          )
        : null

    app.decorate('syncRelay', service)
    await app.register(syncRoutes)

    if (!service) {
        logRelay.info('sync relay disabled (SYNC_RELAY_PATH unset)')
        return
    }

    // open failures are logged; the academy keeps serving without the relay
    app.addHook('onReady', async () => {
        await service.open().catch((err: unknown) => {
            logRelay.error('failed to open sync relay', {
                err: err instanceof Error ? err.message : String(err),
            })
        })
    })

    app.addHook('onClose', async () => {
        await service.close().catch((err: unknown) => {
            logRelay.warn('error closing sync relay', {
                err: err instanceof Error ? err.message : String(err),
            })
        })
    })
}

export default fp(syncRelayPlugin, {
    name: 'sync-relay-plugin',
    dependencies: ['academy-plugin'],
})
