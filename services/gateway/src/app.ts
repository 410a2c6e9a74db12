import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'

import {
    createLogger,
    LogChannel,
    type ClientLogBuffer
} from '@pondlink/logging'

import diagnosticsPlugin, { type GatewayStatusSource } from './plugins/diagnostics.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

export interface BuildAppOptions {
    gateway: GatewayStatusSource
    clientBuf: ClientLogBuffer
    mode: string
    fastify?: FastifyServerOptions
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)
// --------------------------------------

export function buildApp(opts: BuildAppOptions): FastifyInstance {
    const { channel } = createLogger('gateway-api', opts.clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', opts.clientBuf)

    void app.register(diagnosticsPlugin, { gateway: opts.gateway, mode: opts.mode, logger: logApp })

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        startedAt.set(req.id, Date.now())
        logReq.debug(`${req.method} ${req.url}`)

        if (REQUEST_VERBOSE) {
            logReq.debug('request detail', { id: req.id, ip: req.ip })
        }
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        const ms = Date.now() - start
        logReq.debug(`${req.method} ${req.url} → ${reply.statusCode} (${ms} ms)`)
    })
    // ---------------------------------------------------

    app.get('/version', async () => ({ name: 'pondlink-gateway', version: '0.1.0' }))

    app.setNotFoundHandler((_req, reply) => {
        reply.status(404).send({ error: 'Not found' })
    })

    logApp.info('diagnostics app built')
    return app
}
