// services/gateway/src/plugins/diagnostics.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { isClientLogLevel, isLogChannel, type ClientLogFilter } from '@pondlink/logging'

import { describeError } from '../core/errors.js'
import type { IngestState, IngestStats } from '../core/events.js'
import { noopLogger, type LoggerLike } from '../core/types.js'
import type { LatestStatusView } from '../sinks/cache/latest-status.cache.js'
import type { WriterStats } from '../sinks/dual-sink-writer.js'

/** Read-only view of a running gateway; IngestionLoop satisfies it. */
export interface GatewayStatusSource {
    getState(): IngestState
    getStats(): IngestStats
    getWriterStats(): WriterStats | null
    readLatestStatus(): Promise<LatestStatusView | null>
    sinkHealth(): Promise<Record<string, boolean>>
    transportAlive(): boolean
}

export interface DiagnosticsPluginOptions {
    gateway: GatewayStatusSource
    /** Reported by /api/stats. */
    mode: string
    logger?: LoggerLike
}

interface LogsQuery {
    n?: string
    channel?: string
    level?: string
}

const DEFAULT_LOGS = 200
const MAX_LOGS = 1000

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        gateway: GatewayStatusSource
    }
}

// ---- Plugin implementation -------------------------------------------------

const diagnosticsPlugin: FastifyPluginAsync<DiagnosticsPluginOptions> = async (
    app: FastifyInstance,
    opts: DiagnosticsPluginOptions
) => {
    app.decorate('gateway', opts.gateway)
    const log = opts.logger ?? noopLogger

    // Liveness: the process answers.
    app.get('/health', async () => ({ status: 'ok' }))

    // Readiness: loop running with a live link.
    app.get('/ready', async (_req, reply) => {
        const state = app.gateway.getState()
        const transport = app.gateway.transportAlive()
        const sinks = await app.gateway.sinkHealth()
        const ready = state === 'running' && transport
        if (!ready) reply.code(503)
        return { ready, state, transport, sinks }
    })

    app.get('/api/status', async (_req, reply) => {
        let status: LatestStatusView | null
        try {
            status = await app.gateway.readLatestStatus()
        } catch (err) {
            log.warn(`kind=status-read-failed err=${JSON.stringify(describeError(err))}`)
            reply.code(503)
            return { error: 'cache unavailable' }
        }
        if (!status) {
            reply.code(404)
            return { error: 'no recent status' }
        }
        return status
    })

    app.get('/api/stats', async () => ({
        mode: opts.mode,
        state: app.gateway.getState(),
        ingest: app.gateway.getStats(),
        writer: app.gateway.getWriterStats(),
    }))

    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req, reply) => {
        const parsed = Number.parseInt(req.query.n ?? '', 10)
        const n = Number.isFinite(parsed) ? Math.min(Math.max(parsed, 1), MAX_LOGS) : DEFAULT_LOGS

        const filter: ClientLogFilter = {}
        const { channel, level } = req.query
        if (channel !== undefined) {
            if (!isLogChannel(channel)) {
                reply.code(400)
                return { error: `unknown channel ${JSON.stringify(channel)}` }
            }
            filter.channel = channel
        }
        if (level !== undefined) {
            if (!isClientLogLevel(level)) {
                reply.code(400)
                return { error: `unknown level ${JSON.stringify(level)}` }
            }
            filter.minLevel = level
        }

        return { logs: app.clientBuf.getLatest(n, filter), buffer: app.clientBuf.stats() }
    })
}

export default fp(diagnosticsPlugin, {
    name: 'diagnostics-plugin',
})
