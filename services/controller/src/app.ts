import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@radiod/logging'

import radioPlugin, { type RadioPluginOptions } from './plugins/radio.js'
import { envBool, envInt, clampInt } from './core/env.js'

interface LogsQuery {
    n?: string
}

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    radio?: RadioPluginOptions
    clientBuf?: ClientLogBuffer
}

export const APP_NAME = 'radiod-controller'
export const APP_VERSION = '0.1.0'

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('controller', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    // ---- Request logging config (env) ----
    const REQUEST_VERBOSE = envBool(process.env, 'REQUEST_VERBOSE', false)
    const REQUEST_SAMPLE = clampInt(envInt(process.env, 'REQUEST_SAMPLE', 1), 1, 10_000)
    // --------------------------------------

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)

    void app.register(radioPlugin, opts.radio ?? {})

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % REQUEST_SAMPLE !== 0) return
        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)
        if (REQUEST_VERBOSE) {
            logReq.debug('request detail', { id: req.id, ip: req.ip })
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)
        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${Date.now() - start} ms)`)
    })
    // ---------------------------------------------------

    app.get('/health', async () => ({ status: 'ok' }))

    app.get('/ready', async (_req, reply) => {
        const snap = app.radioState.getSnapshot()
        const ready = snap.fatal === null
        if (!ready) reply.code(503)
        return {
            ready,
            subState: snap.subState,
            adapterState: snap.adapterState,
            observers: snap.observers,
            fatal: snap.fatal
        }
    })

    app.get('/api/radio/state', async () => app.radioState.getSnapshot())

    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req) => {
        const requested = Number.parseInt(req.query.n ?? '', 10)
        const n = Number.isFinite(requested) ? clampInt(requested, 1, 5_000) : 100
        return { logs: clientBuf.getLatest(n) }
    })

    app.get('/version', async () => ({ name: APP_NAME, version: APP_VERSION }))

    logApp.info('controller app built')
    return app
}
