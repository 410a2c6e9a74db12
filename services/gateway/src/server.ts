import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import {
    createLogger,
    makeClientBuffer,
    LogChannel
} from '@pondlink/logging'

import { buildApp } from './app.js'
import { buildGatewayConfigFromEnv, summarizeConfig, validateGatewayConfig } from './config.js'
import { ConnectionManager } from './connection/ConnectionManager.js'
import { buildConnectors } from './connection/connectors.js'
import { describeError } from './core/errors.js'
import { GatewayLoggerEventSink } from './core/event-logger.js'
import { IngestionLoop, type ReadingSource } from './ingest/IngestionLoop.js'
import { runToExit } from './ingest/run.js'
import { ReadingSimulator } from './simulator/ReadingSimulator.js'

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

async function start(): Promise<number> {
    const cfg = buildGatewayConfigFromEnv(process.env)
    const clientBuf = makeClientBuffer(cfg.diagnostics.logBufferSize)
    const { channel } = createLogger('gateway', clientBuf)
    const logGw = channel(LogChannel.gateway)

    const validation = validateGatewayConfig(cfg)
    for (const warning of validation.warnings) logGw.warn(`config warning: ${warning}`)
    if (!validation.ok) {
        for (const error of validation.errors) logGw.error(`config error: ${error}`)
        return 1
    }
    logGw.info(`config ${summarizeConfig(cfg)}`)

    const events = new GatewayLoggerEventSink(channel)

    const connections = new ConnectionManager({
        retry: cfg.retry,
        connectors: buildConnectors(cfg, channel),
        events,
    })

    const source: ReadingSource = cfg.mode === 'simulated'
        ? {
            mode: 'simulated',
            simulator: new ReadingSimulator({ intervalMs: cfg.testing.simulationIntervalMs }),
        }
        : { mode: 'line' }

    if (source.mode === 'simulated') {
        channel(LogChannel.simulator).info(`kind=simulator-enabled intervalMs=${cfg.testing.simulationIntervalMs}`)
    }

    const loop = new IngestionLoop({
        connections,
        source,
        readTimeoutMs: cfg.serial.readTimeoutMs,
        iterationErrorPauseMs: cfg.loop.iterationErrorPauseMs,
        events,
        writerLogger: logGw,
    })

    let app: FastifyInstance | null = null
    if (cfg.diagnostics.enabled) {
        app = buildApp({ gateway: loop, clientBuf, mode: cfg.mode })
        try {
            await app.listen({ port: cfg.diagnostics.port, host: cfg.diagnostics.host })
            logGw.info(`listening host=${cfg.diagnostics.host} port=${cfg.diagnostics.port}`)
        } catch (err) {
            // Diagnostics are optional; ingestion goes on without them.
            logGw.warn(`diagnostics unavailable err=${JSON.stringify(describeError(err))}`)
            app = null
        }
    }

    // Graceful shutdown: the loop drains, then the API closes.
    const shutdown = (signal: NodeJS.Signals): void => {
        logGw.info(`received ${signal}, shutting down`)
        loop.requestShutdown(signal)
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)

    const exitCode = await runToExit(loop, logGw)

    if (app) {
        await app.close().catch((err: unknown) => {
            logGw.warn('error closing diagnostics api', { err: describeError(err) })
        })
    }
    return exitCode
}

start().then(
    (code) => process.exit(code),
    (err: unknown) => {
        console.error(err)
        process.exit(1)
    }
)
