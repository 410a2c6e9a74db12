import { afterEach, describe, expect, it } from 'vitest'
import type { FastifyInstance } from 'fastify'

import { LogChannel, makeClientBuffer, type ClientLog, type ClientLogLevel } from '@pondlink/logging'

import { buildApp } from '../src/app.js'
import type { IngestState, IngestStats } from '../src/core/events.js'
import type { GatewayStatusSource } from '../src/plugins/diagnostics.js'
import type { LatestStatusView } from '../src/sinks/cache/latest-status.cache.js'

const STATS: IngestStats = {
    iterations: 12,
    linesRead: 10,
    readingsSimulated: 0,
    decodeErrors: 1,
    validationErrors: 2,
    recordsWritten: 7,
    writeFailures: 0,
    reconnectAttempts: 0,
    iterationErrors: 0,
    lastRecordAt: '2024-06-01T12:00:00.000Z',
    lastErrorAt: null,
}

const VIEW: LatestStatusView = {
    battery_v: 12.46,
    solar_v: 14.2,
    signal_dbm: -72,
    temperature_c: 25.5,
    last_heartbeat: '2024-06-01T12:00:00.000Z',
    station_id: 'north-pond',
    connected: true,
    on_solar: true,
    age_seconds: 4,
}

class StubGateway implements GatewayStatusSource {
    state: IngestState = 'running'
    alive = true
    latest: LatestStatusView | null = VIEW
    readError: Error | null = null

    getState(): IngestState {
        return this.state
    }
    getStats(): IngestStats {
        return STATS
    }
    getWriterStats() {
        return null
    }
    async readLatestStatus(): Promise<LatestStatusView | null> {
        if (this.readError) throw this.readError
        return this.latest
    }
    async sinkHealth(): Promise<Record<string, boolean>> {
        return { cache: true, timeseries: true }
    }
    transportAlive(): boolean {
        return this.alive
    }
}

function logLine(message: string, channel: LogChannel = LogChannel.gateway, level: ClientLogLevel = 'info'): ClientLog {
    return { ts: 1, channel, emoji: '📡', color: 'blue', level, message }
}

describe('diagnostics api', () => {
    let app: FastifyInstance | null = null

    afterEach(async () => {
        await app?.close()
        app = null
    })

    function build(gateway: GatewayStatusSource, clientBuf = makeClientBuffer(50)): FastifyInstance {
        app = buildApp({ gateway, clientBuf, mode: 'serial' })
        return app
    }

    it('answers liveness', async () => {
        const res = await build(new StubGateway()).inject({ method: 'GET', url: '/health' })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({ status: 'ok' })
    })

    it('is ready only while running with a live link', async () => {
        const gateway = new StubGateway()
        const api = build(gateway)

        const ready = await api.inject({ method: 'GET', url: '/ready' })
        expect(ready.statusCode).toBe(200)
        expect(ready.json()).toEqual({
            ready: true,
            state: 'running',
            transport: true,
            sinks: { cache: true, timeseries: true },
        })

        gateway.alive = false
        const down = await api.inject({ method: 'GET', url: '/ready' })
        expect(down.statusCode).toBe(503)
        expect(down.json()).toMatchObject({ ready: false, transport: false })
    })

    it('serves the latest status or 404 when there is none', async () => {
        const gateway = new StubGateway()
        const api = build(gateway)

        const found = await api.inject({ method: 'GET', url: '/api/status' })
        expect(found.statusCode).toBe(200)
        expect(found.json()).toEqual(VIEW)

        gateway.latest = null
        const missing = await api.inject({ method: 'GET', url: '/api/status' })
        expect(missing.statusCode).toBe(404)
        expect(missing.json()).toEqual({ error: 'no recent status' })
    })

    it('answers 503 when the cache cannot be read', async () => {
        const gateway = new StubGateway()
        gateway.readError = new Error('Connection is closed.')

        const res = await build(gateway).inject({ method: 'GET', url: '/api/status' })

        expect(res.statusCode).toBe(503)
        expect(res.json()).toEqual({ error: 'cache unavailable' })
    })

    it('reports loop and writer stats', async () => {
        const res = await build(new StubGateway()).inject({ method: 'GET', url: '/api/stats' })

        expect(res.json()).toEqual({ mode: 'serial', state: 'running', ingest: STATS, writer: null })
    })

    it('returns the newest client log entries', async () => {
        const clientBuf = makeClientBuffer(50)
        const api = build(new StubGateway(), clientBuf)
        for (const message of ['one', 'two', 'three']) clientBuf.push(logLine(message))

        const res = await api.inject({ method: 'GET', url: '/api/logs?n=3' })

        // Buffer: the build line, the three above, then this request's own line.
        expect(res.json()).toMatchObject({
            logs: [{ message: 'two' }, { message: 'three' }, { message: 'GET /api/logs?n=3', channel: 'request' }],
            buffer: { capacity: 50, size: 5, evicted: 0 },
        })
    })

    it('filters logs by channel and minimum level', async () => {
        const clientBuf = makeClientBuffer(50)
        const api = build(new StubGateway(), clientBuf)
        clientBuf.push(logLine('opened'))
        clientBuf.push(logLine('link lost', LogChannel.gateway, 'warn'))
        clientBuf.push(logLine('bad frame', LogChannel.decoder, 'warn'))

        const byChannel = await api.inject({ method: 'GET', url: '/api/logs?channel=decoder' })
        expect(byChannel.json()).toMatchObject({ logs: [{ message: 'bad frame' }] })

        const both = await api.inject({ method: 'GET', url: '/api/logs?channel=gateway&level=warn' })
        expect(both.json()).toMatchObject({ logs: [{ message: 'link lost' }] })
    })

    it('rejects an unknown log channel or level', async () => {
        const api = build(new StubGateway())

        const channel = await api.inject({ method: 'GET', url: '/api/logs?channel=weather' })
        expect(channel.statusCode).toBe(400)
        expect(channel.json()).toEqual({ error: 'unknown channel "weather"' })

        const level = await api.inject({ method: 'GET', url: '/api/logs?level=trace' })
        expect(level.statusCode).toBe(400)
        expect(level.json()).toEqual({ error: 'unknown level "trace"' })
    })

    it('answers unknown routes with a JSON 404', async () => {
        const res = await build(new StubGateway()).inject({ method: 'GET', url: '/nope' })

        expect(res.statusCode).toBe(404)
        expect(res.json()).toEqual({ error: 'Not found' })
    })
})
