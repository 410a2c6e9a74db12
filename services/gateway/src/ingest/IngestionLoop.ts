// services/gateway/src/ingest/IngestionLoop.ts
import type { ConnectionManager, GatewayContext } from '../connection/ConnectionManager.js'
import { describeError } from '../core/errors.js'
import {
    noopEventSink,
    type GatewayEventSink,
    type IngestState,
    type IngestStats,
} from '../core/events.js'
import { noopLogger, sleep as defaultSleep, type LoggerLike, type Sleep } from '../core/types.js'
import { decodeLine, validateReading, type DecodeResult } from '../decoder/decode.js'
import type { LatestStatusView } from '../sinks/cache/latest-status.cache.js'
import { DualSinkWriter, type WriterStats } from '../sinks/dual-sink-writer.js'
import type { ReadingSimulator } from '../simulator/ReadingSimulator.js'

/**
 * Where readings come from: text lines off the transport, or already-decoded
 * readings from the simulator (which skip line decoding).
 */
export type ReadingSource =
    | { mode: 'line' }
    | { mode: 'simulated'; simulator: ReadingSimulator }

export interface IngestionLoopOptions {
    connections: ConnectionManager
    source: ReadingSource
    /** Upper bound on one blocking read, so shutdown is noticed promptly. */
    readTimeoutMs: number
    /** Pause after an iteration died on something unexpected. */
    iterationErrorPauseMs: number
    events?: GatewayEventSink
    /** Handed to the DualSinkWriter for its per-sink failure lines. */
    writerLogger?: LoggerLike
    now?: () => Date
    sleep?: Sleep
}

/**
 * IngestionLoop
 *
 * States: starting -> running -> draining -> stopped.
 *
 * - starting: ConnectionManager.startup(); a failure there goes straight to
 *   stopped and rethrows.
 * - running: one iteration at a time (check link, read, decode, write).
 *   Per-record problems are logged and counted; nothing short of a shutdown
 *   request leaves this state.
 * - draining: the current iteration finishes, then every resource is released.
 */
export class IngestionLoop {
    private readonly connections: ConnectionManager
    private readonly source: ReadingSource
    private readonly readTimeoutMs: number
    private readonly iterationErrorPauseMs: number
    private readonly events: GatewayEventSink
    private readonly writerLogger: LoggerLike
    private readonly now: () => Date
    private readonly sleep: Sleep

    private state: IngestState = 'starting'
    private started = false
    private shutdownRequested = false
    private ctx: GatewayContext | null = null
    private writer: DualSinkWriter | null = null

    private readonly stats: IngestStats = {
        iterations: 0,
        linesRead: 0,
        readingsSimulated: 0,
        decodeErrors: 0,
        validationErrors: 0,
        recordsWritten: 0,
        writeFailures: 0,
        reconnectAttempts: 0,
        iterationErrors: 0,
        lastRecordAt: null,
        lastErrorAt: null,
    }

    constructor(opts: IngestionLoopOptions) {
        this.connections = opts.connections
        this.source = opts.source
        this.readTimeoutMs = Math.max(1, opts.readTimeoutMs)
        this.iterationErrorPauseMs = Math.max(0, opts.iterationErrorPauseMs)
        this.events = opts.events ?? noopEventSink
        this.writerLogger = opts.writerLogger ?? noopLogger
        this.now = opts.now ?? (() => new Date())
        this.sleep = opts.sleep ?? defaultSleep
    }

    /**
     * Resolves once the loop has drained and released its resources.
     * Rejects only when startup fails.
     */
    async run(): Promise<void> {
        if (this.started) throw new Error(`ingestion loop already started (state=${this.state})`)
        this.started = true

        let ctx: GatewayContext
        try {
            ctx = await this.connections.startup()
        } catch (err) {
            this.transition('stopped')
            throw err
        }

        this.ctx = ctx
        const writer = new DualSinkWriter({
            cache: ctx.cache,
            timeseries: ctx.timeseries,
            logger: this.writerLogger,
            now: () => this.now().getTime(),
        })
        this.writer = writer

        try {
            if (!this.shutdownRequested) this.transition('running')
            while (!this.shutdownRequested) {
                await this.iterate(ctx, writer)
            }
        } finally {
            this.transition('draining')
            await this.connections.release(ctx)
            this.transition('stopped')
        }
    }

    /**
     * Ask the loop to stop after the current iteration. Safe to call more
     * than once and from any state.
     */
    requestShutdown(signal = 'request'): void {
        if (this.shutdownRequested) return
        this.shutdownRequested = true
        this.events.publish({ kind: 'shutdown-requested', at: this.now().getTime(), signal })
    }

    getState(): IngestState {
        return this.state
    }

    getStats(): IngestStats {
        return { ...this.stats }
    }

    getWriterStats(): WriterStats | null {
        return this.writer ? this.writer.getStats() : null
    }

    /** Latest cached status, or null before startup / when the key is gone. */
    async readLatestStatus(): Promise<LatestStatusView | null> {
        return this.ctx ? this.ctx.cache.readLatest() : null
    }

    async sinkHealth(): Promise<Record<string, boolean>> {
        return this.writer ? this.writer.healthySnapshot() : {}
    }

    transportAlive(): boolean {
        return this.ctx?.transport?.isAlive() ?? false
    }

    // ---------------------------------------------------------------------
    // Iteration
    // ---------------------------------------------------------------------

    private async iterate(ctx: GatewayContext, writer: DualSinkWriter): Promise<void> {
        this.stats.iterations += 1
        try {
            const result = await this.nextResult(ctx)
            if (!result) return

            if (!result.ok) {
                if (result.error.kind === 'decode') this.stats.decodeErrors += 1
                else this.stats.validationErrors += 1
                this.stats.lastErrorAt = this.now().toISOString()
                this.events.publish({ kind: 'record-rejected', at: this.now().getTime(), error: result.error })
                return
            }

            const outcome = await writer.write(result.record)
            if (outcome.status === 'failed') {
                // Neither store committed.
                this.stats.writeFailures += 1
                this.stats.lastErrorAt = this.now().toISOString()
            } else {
                this.stats.recordsWritten += 1
                this.stats.lastRecordAt = result.record.observedAt.toISOString()
            }
            this.events.publish({
                kind: 'record-written',
                at: this.now().getTime(),
                stationId: result.record.stationId,
                outcome,
            })
        } catch (err) {
            this.stats.iterationErrors += 1
            this.stats.lastErrorAt = this.now().toISOString()
            this.events.publish({ kind: 'iteration-error', at: this.now().getTime(), error: describeError(err) })
            await this.sleep(this.iterationErrorPauseMs)
        }
    }

    /**
     * One step of input: a decode result, or null when this iteration
     * produced nothing (timeout, blank line, link being re-established).
     */
    private async nextResult(ctx: GatewayContext): Promise<DecodeResult | null> {
        const handle = ctx.transport
        if (!handle || !handle.isAlive()) {
            if (handle) {
                this.events.publish({ kind: 'transport-lost', at: this.now().getTime(), description: handle.description })
            }
            this.stats.reconnectAttempts += 1
            ctx.transport = await this.connections.reconnectTransport(handle)
            if (!ctx.transport) await this.sleep(this.connections.retryDelayMs)
            return null
        }

        if (this.source.mode === 'simulated') {
            const reading = await this.source.simulator.next(this.readTimeoutMs)
            if (!reading) return null
            this.stats.readingsSimulated += 1
            return validateReading(reading, this.now())
        }

        const line = await handle.readLine(this.readTimeoutMs)
        if (line.trim() === '') return null
        this.stats.linesRead += 1
        return decodeLine(line, this.now())
    }

    private transition(to: IngestState): void {
        if (this.state === to) return
        const from = this.state
        this.state = to
        this.events.publish({ kind: 'state-changed', at: this.now().getTime(), from, to })
    }
}
