// services/orchestrator/src/plugins/academy.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    makeClientBuffer,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@rig-academy/logging'

import { buildAcademyConfigFromEnv, type AcademyConfig } from '../core/config.js'
import { FleetStateStore } from '../core/state.js'
import { DeviceRegistry, type RegistryEvent, type RegistryEventSink } from '../core/registry/DeviceRegistry.js'
import { FileProtocolCatalog, type ProtocolCatalog } from '../core/catalog/ProtocolCatalog.js'
import { PortLocator, SerialPortLister, type PortLister } from '../core/serial/PortLocator.js'
import { CommandRouter, type RouterEvent, type RouterEventSink } from '../core/router/CommandRouter.js'
import { AcademyHub, type HubEvent, type HubEventSink } from '../core/academy/AcademyHub.js'
import { EngineWorker } from '../devices/engine-worker/EngineWorker.js'
import { ChildProcessEngineLauncher } from '../devices/engine-worker/engineSession.js'
import type {
    EngineLauncher,
    WorkerEvent,
    WorkerEventSink,
    WorkerFactory,
} from '../devices/engine-worker/types.js'
import {
    CompletionWatcher,
    type WatcherEvent,
    type WatcherEventSink,
} from '../devices/completion-watcher/CompletionWatcher.js'
import { ClientLogFeed, logFilterFromEnv } from '../adapters/logs.adapter.js'

// ---- Fastify decoration ----------------------------------------------------

export interface Academy {
    config: AcademyConfig
    store: FleetStateStore
    registry: DeviceRegistry
    router: CommandRouter
    hub: AcademyHub
    ports: PortLocator
    logs: ClientLogFeed
}

declare module 'fastify' {
    interface FastifyInstance {
        academy: Academy
        clientBuf: ClientLogBuffer
    }
}

export interface AcademyPluginOptions {
    config?: AcademyConfig
    /** Replaces the engine subprocess launcher (tests, alternative engines). */
    launcher?: EngineLauncher
    /** Replaces EngineWorker entirely; `launcher` is then unused. */
    workerFactory?: WorkerFactory
    catalog?: ProtocolCatalog
    portLister?: PortLister
}

// ---- Event sinks using orchestrator logging --------------------------------

type Publisher<E> = { publish(evt: E): void }

/** Delivers each event to every sink; a throwing sink does not stop the others. */
class FanoutSink<E> implements Publisher<E> {
    private readonly sinks: Publisher<E>[]

    constructor(
        private readonly onError: (err: unknown) => void,
        ...sinks: Publisher<E>[]
    ) {
        this.sinks = sinks
    }

    publish(evt: E): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                this.onError(err)
            }
        }
    }
}

class RegistryLoggerEventSink implements RegistryEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: RegistryEvent): void {
        switch (evt.kind) {
            case 'registry-loaded':
                this.log.info(
                    `kind=${evt.kind} file=${evt.file} loaded=${evt.loaded} skipped=${evt.skipped} created=${evt.created}`
                )
                break
            case 'registry-row-skipped':
                this.log.warn(`kind=${evt.kind} line=${evt.line} reason=${evt.reason}`)
                break
            case 'registry-saved':
                this.log.debug(`kind=${evt.kind} count=${evt.count}`)
                break
            case 'registry-device-added':
                this.log.info(`kind=${evt.kind} box=${evt.boxId} locator=${evt.serialLocator}`)
                break
            case 'registry-device-removed':
                this.log.info(`kind=${evt.kind} box=${evt.boxId}`)
                break
            case 'registry-locator-changed':
                this.log.info(`kind=${evt.kind} box=${evt.boxId} from=${evt.from} to=${evt.to}`)
                break
        }
    }
}

class WorkerLoggerEventSink implements WorkerEventSink {
    constructor(
        private readonly log: ChannelLogger,
        private readonly logEngine: ChannelLogger
    ) {}

    publish(evt: WorkerEvent): void {
        switch (evt.kind) {
            case 'engine-line':
                // stdout is chatty; stderr is worth seeing
                if (evt.stream === 'err') this.logEngine.warn(`[${evt.boxId}] ${evt.line}`)
                else this.logEngine.debug(`[${evt.boxId}] ${evt.line}`)
                break
            case 'worker-starting':
                this.log.info(`kind=${evt.kind} worker=${evt.workerId} port=${evt.portPath}`)
                break
            case 'worker-ready':
                this.log.info(`kind=${evt.kind} worker=${evt.workerId} pid=${evt.pid ?? 'unknown'}`)
                break
            case 'worker-start-failed':
                this.log.warn(`kind=${evt.kind} worker=${evt.workerId} code=${evt.code} message=${evt.message}`)
                break
            case 'worker-stopped':
                this.log.info(`kind=${evt.kind} worker=${evt.workerId} forced=${evt.forced}`)
                break
            case 'worker-crashed':
                this.log.error(
                    `kind=${evt.kind} worker=${evt.workerId} code=${evt.code ?? 'null'} signal=${evt.signal ?? 'null'}${evt.error ? ` error=${evt.error}` : ''}`
                )
                break
            case 'worker-command':
                this.log.debug(`kind=${evt.kind} worker=${evt.workerId} verb=${evt.verb} outcome=${evt.outcome}`)
                break
            case 'execution-log-error':
                this.log.error(`kind=${evt.kind} box=${evt.boxId} error=${evt.error}`)
                break
        }
    }
}

class WatcherLoggerEventSink implements WatcherEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: WatcherEvent): void {
        switch (evt.kind) {
            case 'protocol-completed':
                this.log.info(`kind=${evt.kind} box=${evt.boxId}`)
                break
            case 'protocol-failed':
                this.log.warn(`kind=${evt.kind} box=${evt.boxId} error=${evt.error}`)
                break
            case 'log-unreadable':
                this.log.warn(`kind=${evt.kind} box=${evt.boxId} file=${evt.file} error=${evt.error}`)
                break
            case 'log-recovered':
                this.log.info(`kind=${evt.kind} box=${evt.boxId}`)
                break
            case 'log-rotated':
                this.log.warn(`kind=${evt.kind} box=${evt.boxId} reason=${evt.reason}`)
                break
        }
    }
}

class RouterLoggerEventSink implements RouterEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: RouterEvent): void {
        switch (evt.kind) {
            case 'command-accepted':
                this.log.debug(`kind=${evt.kind} req=${evt.requestId} box=${evt.boxId} verb=${evt.verb} role=${evt.role}`)
                break
            case 'command-completed':
                this.log.debug(`kind=${evt.kind} req=${evt.requestId} box=${evt.boxId} verb=${evt.verb}`)
                break
            case 'command-rejected':
                this.log.info(
                    `kind=${evt.kind} req=${evt.requestId} box=${evt.boxId} verb=${evt.verb} code=${evt.code} message=${evt.message}`
                )
                break
            case 'device-state': {
                const suffix = evt.lastError ? ` lastError=${evt.lastError}` : ''
                if (evt.to === 'Error') this.log.warn(`[${evt.boxId}] ${evt.from} → ${evt.to}${suffix}`)
                else this.log.info(`[${evt.boxId}] ${evt.from} → ${evt.to}`)
                break
            }
            case 'stale-event':
                this.log.debug(`kind=${evt.kind} box=${evt.boxId} event=${evt.event} reason=${evt.reason}`)
                break
            case 'event-failed':
                this.log.error(`kind=${evt.kind} box=${evt.boxId} event=${evt.event} error=${evt.error}`)
                break
        }
    }
}

class HubLoggerEventSink implements HubEventSink {
    constructor(private readonly log: ChannelLogger) {}

    publish(evt: HubEvent): void {
        switch (evt.kind) {
            case 'client-connected':
                this.log.info(`client connected id=${evt.connectionId} role=${evt.role} clients=${evt.clients}`)
                break
            case 'client-disconnected':
                this.log.info(`client disconnected id=${evt.connectionId} clients=${evt.clients}`)
                break
            case 'client-lagging':
                this.log.warn(`client lagging id=${evt.connectionId} buffered=${evt.bufferedAmount}`)
                break
            case 'client-resynced':
                this.log.info(`client resynced id=${evt.connectionId}`)
                break
            case 'bad-message':
                this.log.warn(`bad message id=${evt.connectionId} error=${evt.error}`)
                break
            case 'send-failed':
                this.log.warn(`send failed id=${evt.connectionId} error=${evt.error}`)
                break
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const academyPlugin: FastifyPluginAsync<AcademyPluginOptions> = async (
    app: FastifyInstance,
    opts: AcademyPluginOptions
) => {
    if (!app.hasDecorator('clientBuf')) app.decorate('clientBuf', makeClientBuffer())

    const { channel } = createLogger('academy', app.clientBuf)
    const logPlugin = channel(LogChannel.app)
    const logRegistry = channel(LogChannel.registry)
    const logRouter = channel(LogChannel.router)
    const logWorker = channel(LogChannel.worker)
    const logEngine = channel(LogChannel.engine)
    const logWatcher = channel(LogChannel.watcher)
    const logWs = channel(LogChannel.websocket)

    const sinkFailed = (err: unknown) => {
        logPlugin.error('event sink failed', { err: err instanceof Error ? err.message : String(err) })
    }

    // 1) Config
    const config = opts.config ?? buildAcademyConfigFromEnv(process.env)

    // 2) State + leaves
    const store = new FleetStateStore()
    const registry = new DeviceRegistry(config.configFile, new RegistryLoggerEventSink(logRegistry))
    const catalog = opts.catalog ?? new FileProtocolCatalog(config.dataDir)
    const ports = new PortLocator(opts.portLister ?? new SerialPortLister(), config.serial.manufacturerHint)

    // Router is built below; worker and watcher events reach it through these sinks.
    let router: CommandRouter | null = null

    const workerEvents: WorkerEventSink = new FanoutSink<WorkerEvent>(
        sinkFailed,
        new WorkerLoggerEventSink(logWorker, logEngine),
        {
            publish(evt: WorkerEvent): void {
                if (router) void router.onWorkerEvent(evt)
            },
        }
    )

    const watcher = new CompletionWatcher(
        config.watcher,
        new FanoutSink<WatcherEvent>(sinkFailed, new WatcherLoggerEventSink(logWatcher), {
            publish(evt: WatcherEvent): void {
                if (router) void router.onWatcherEvent(evt)
            },
        })
    )

    const launcher = opts.launcher ?? new ChildProcessEngineLauncher(config.engine.command, config.engine.args)
    const workerFactory: WorkerFactory =
        opts.workerFactory ??
        ((boxId: string) =>
            new EngineWorker(
                boxId,
                {
                    logDir: config.logDir,
                    readyMarker: config.engine.readyMarker,
                    startTimeoutMs: config.engine.startTimeoutMs,
                    stopGraceMs: config.engine.stopGraceMs,
                },
                { launcher, ports, events: workerEvents }
            ))

    // 3) Router (single writer of fleet state)
    const commandRouter = new CommandRouter({
        registry,
        store,
        watcher,
        catalog,
        ports,
        workerFactory,
        events: new RouterLoggerEventSink(logRouter),
    })
    router = commandRouter

    // 4) Client fan-out
    const logs = new ClientLogFeed(
        app.clientBuf,
        logFilterFromEnv(process.env, (pattern, err) => {
            logPlugin.warn('ignoring LOG_REDACT_REGEX', {
                pattern,
                err: err instanceof Error ? err.message : String(err),
            })
        })
    )
    const hub = new AcademyHub(
        commandRouter,
        store,
        {
            maxBufferedBytes: config.ws.maxBufferedBytes,
            resyncCheckMs: config.ws.resyncCheckMs,
            logHistory: () => logs.history(config.ws.logsSnapshot),
        },
        new HubLoggerEventSink(logWs)
    )

    app.decorate('academy', { config, store, registry, router: commandRouter, hub, ports, logs })

    // 5) Lifecycle hooks
    app.addHook('onReady', async () => {
        const report = await registry.load()
        commandRouter.init()
        store.setStatus('ready')
        logPlugin.info(
            `academy ready boxes=${report.loaded} skippedRows=${report.skipped.length} dataDir=${config.dataDir}`
        )
    })

    app.addHook('onClose', async () => {
        store.setStatus('closing')
        hub.close()
        logPlugin.info('stopping engine sessions')
        await commandRouter.stopAll().catch((err: unknown) => {
            logPlugin.warn('error stopping engine sessions', {
                err: err instanceof Error ? err.message : String(err),
            })
        })
        watcher.stop()
    })
}

export default fp(academyPlugin, {
    name: 'academy-plugin',
})
