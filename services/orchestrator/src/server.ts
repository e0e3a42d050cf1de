import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { createLogger, LogChannel } from '@rig-academy/logging'
import { buildApp } from './app.js'
import { buildAcademyConfigFromEnv } from './core/config.js'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

function errMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

async function start() {
    const { channel } = createLogger('orchestrator')
    const logOrch = channel(LogChannel.orchestrator)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        const config = buildAcademyConfigFromEnv(process.env)
        app = buildApp({ academy: { config } })
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logOrch.info(`listening host=${HOST} port=${PORT} env=${env}`)
        logOrch.info(
            `engine command=${config.engine.command} config=${config.configFile} logs=${config.logDir} relay=${config.relay.path ?? 'off'}`
        )

        // Graceful shutdown
        let closing = false
        const shutdown = async (signal: NodeJS.Signals) => {
            if (closing) return
            closing = true
            if (!app) process.exit(0)
            try {
                logOrch.info(`received ${signal}, shutting down`)
                await app.close()
                logOrch.info('orchestrator closed')
                process.exit(0)
            } catch (err) {
                logOrch.error('error during shutdown', { err: errMessage(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        // Boot failure (port in use, unreadable config file)
        logOrch.error(`failed to start err="${errMessage(err)}"`)
        await app?.close().catch((closeErr: unknown) => {
            logOrch.error('error closing after failed start', { err: errMessage(closeErr) })
        })
        process.exit(1)
    }
}

void start()
