import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { createLogger, LogChannel } from '@radiod/logging'

import { buildApp } from './app.js'
import type { FatalReason } from './core/adapter-state/types.js'
import { errorMessage } from './core/events.js'
import { clampInt, envInt, envString } from './core/env.js'

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

const FATAL_EXIT_CODE = 1

async function start(): Promise<void> {
    const { channel } = createLogger('controller')
    const logCtl = channel(LogChannel.controller)

    const PORT = clampInt(envInt(process.env, 'API_PORT', 3000), 1, 65_535)
    const HOST = envString(process.env, 'API_HOST', '0.0.0.0')

    let app: FastifyInstance | null = null

    // The radio cannot be trusted after a fatal timeout; let the supervisor restart us.
    const onFatal = (reason: FatalReason): void => {
        logCtl.fatal(`radio fatal outcome reason=${reason}, terminating`)
        process.exit(FATAL_EXIT_CODE)
    }

    try {
        app = buildApp({ radio: { onFatal } })
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logCtl.info(`listening host=${HOST} port=${PORT} env=${env}`)

        // Graceful shutdown
        const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
            if (!app) process.exit(0)
            try {
                logCtl.info(`received ${signal}, shutting down`)
                await app.close()
                logCtl.info('controller closed')
                process.exit(0)
            } catch (err) {
                logCtl.error(`error during shutdown err="${errorMessage(err)}"`)
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logCtl.error(`failed to start err="${errorMessage(err)}"`)
        if (app) {
            await app.close().catch((closeErr: unknown) => {
                logCtl.error(`close after failed start err="${errorMessage(closeErr)}"`)
            })
        }
        process.exit(1)
    }
}

void start()
