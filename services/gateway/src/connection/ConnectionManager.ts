// services/gateway/src/connection/ConnectionManager.ts
import {
    ConnectionExhaustedError,
    SchemaError,
    TransportError,
    describeError,
} from '../core/errors.js'
import { noopEventSink, type GatewayEventSink } from '../core/events.js'
import { sleep as defaultSleep, type ResourceKind, type Sleep } from '../core/types.js'
import type { LatestStatusCache } from '../sinks/cache/latest-status.cache.js'
import type { TimeseriesStore } from '../sinks/timeseries/timeseries.store.js'
import type { TransportAdapter, TransportHandle } from '../transport/types.js'

export interface RetryPolicy {
    /** Attempts per resource, including the first. */
    maxAttempts: number
    /** Fixed pause between attempts. No backoff, no jitter. */
    delayMs: number
}

/**
 * How each resource comes up. A connector resolves with a resource that has
 * already answered a health check, or rejects.
 */
export interface ResourceConnectors {
    transport: TransportAdapter
    connectCache: () => Promise<LatestStatusCache>
    connectTimeseries: () => Promise<TimeseriesStore>
}

/**
 * Everything one ingestion run holds open. `transport` is swapped in place
 * on reconnect and is null while the link is down.
 */
export interface GatewayContext {
    transport: TransportHandle | null
    readonly cache: LatestStatusCache
    readonly timeseries: TimeseriesStore
}

export interface ConnectionManagerOptions {
    retry: RetryPolicy
    connectors: ResourceConnectors
    events?: GatewayEventSink
    sleep?: Sleep
}

/**
 * ConnectionManager
 *
 * Brings the three dependencies up in a fixed order (cache, time-series
 * store plus schema gate, transport), each under the same fixed retry
 * policy. Startup is all-or-nothing: whatever was acquired before a failure
 * is released again before the error propagates.
 */
export class ConnectionManager {
    private readonly retry: RetryPolicy
    private readonly connectors: ResourceConnectors
    private readonly events: GatewayEventSink
    private readonly sleep: Sleep

    constructor(opts: ConnectionManagerOptions) {
        this.retry = {
            maxAttempts: Math.max(1, opts.retry.maxAttempts),
            delayMs: Math.max(0, opts.retry.delayMs),
        }
        this.connectors = opts.connectors
        this.events = opts.events ?? noopEventSink
        this.sleep = opts.sleep ?? defaultSleep
    }

    get retryDelayMs(): number {
        return this.retry.delayMs
    }

    /**
     * Run `attempt` until it resolves or the attempt budget is spent, pausing
     * the fixed delay between tries (never after the last one).
     *
     * SchemaError is not retried: a missing table will not appear on its own.
     */
    async establish<T>(resource: ResourceKind, attempt: () => Promise<T>): Promise<T> {
        const { maxAttempts, delayMs } = this.retry
        let lastError: unknown

        for (let n = 1; n <= maxAttempts; n++) {
            this.events.publish({ kind: 'connect-attempt', at: Date.now(), resource, attempt: n, maxAttempts })
            try {
                const value = await attempt()
                this.events.publish({ kind: 'connect-ok', at: Date.now(), resource, attempt: n })
                return value
            } catch (err) {
                if (err instanceof SchemaError) throw err
                lastError = err
                this.events.publish({
                    kind: 'connect-failed',
                    at: Date.now(),
                    resource,
                    attempt: n,
                    maxAttempts,
                    error: describeError(err),
                })
                if (n < maxAttempts) await this.sleep(delayMs)
            }
        }

        this.events.publish({
            kind: 'connect-exhausted',
            at: Date.now(),
            resource,
            attempts: maxAttempts,
            error: describeError(lastError),
        })
        throw new ConnectionExhaustedError(resource, maxAttempts, { cause: lastError })
    }

    /**
     * Acquire cache, then time-series store (schema verified), then transport.
     * Throws ConnectionExhaustedError or SchemaError; nothing stays open when
     * it does.
     */
    async startup(): Promise<GatewayContext> {
        const acquired: Array<{ resource: ResourceKind; release: () => Promise<void> }> = []

        try {
            const cache = await this.establish('cache', () => this.connectors.connectCache())
            acquired.push({ resource: 'cache', release: () => cache.shutdown() })

            const timeseries = await this.establish('timeseries', () => this.connectors.connectTimeseries())
            acquired.push({ resource: 'timeseries', release: () => timeseries.shutdown() })

            await this.verifySchema(timeseries)

            const transport = await this.establish('transport', () => this.openTransport())

            return { transport, cache, timeseries }
        } catch (err) {
            // Reverse acquisition order.
            for (const { resource, release } of acquired.reverse()) {
                await this.releaseOne(resource, release)
            }
            throw err
        }
    }

    /**
     * One reopen attempt for a link that went dead. The old handle is closed
     * first. Resolves with the new handle, or null when the attempt failed;
     * the caller decides when to try again.
     */
    async reconnectTransport(current: TransportHandle | null): Promise<TransportHandle | null> {
        if (current) await this.releaseOne('transport', () => current.close(), false)

        this.events.publish({ kind: 'connect-attempt', at: Date.now(), resource: 'transport', attempt: 1, maxAttempts: 1 })
        try {
            const handle = await this.openTransport()
            this.events.publish({ kind: 'connect-ok', at: Date.now(), resource: 'transport', attempt: 1 })
            return handle
        } catch (err) {
            this.events.publish({
                kind: 'connect-failed',
                at: Date.now(),
                resource: 'transport',
                attempt: 1,
                maxAttempts: 1,
                error: describeError(err),
            })
            return null
        }
    }

    /** Close transport, cache and store. Each is attempted even if one fails. */
    async release(ctx: GatewayContext): Promise<void> {
        const transport = ctx.transport
        ctx.transport = null
        if (transport) await this.releaseOne('transport', () => transport.close())
        await this.releaseOne('cache', () => ctx.cache.shutdown())
        await this.releaseOne('timeseries', () => ctx.timeseries.shutdown())
    }

    private async verifySchema(store: TimeseriesStore): Promise<void> {
        try {
            const report = await store.verifySchema()
            this.events.publish({ kind: 'schema-verified', at: Date.now(), ...report })
        } catch (err) {
            if (err instanceof SchemaError) {
                this.events.publish({ kind: 'schema-missing', at: Date.now(), tables: err.missingTables })
            }
            throw err
        }
    }

    /** Open and confirm the link is alive; a dead handle is closed, not returned. */
    private async openTransport(): Promise<TransportHandle> {
        const adapter = this.connectors.transport
        const handle = await adapter.open()
        if (!handle.isAlive()) {
            await handle.close()
            throw new TransportError(`link not alive after open: ${handle.description}`, adapter.description)
        }
        return handle
    }

    private async releaseOne(resource: ResourceKind, release: () => Promise<void>, announce = true): Promise<void> {
        try {
            await release()
            if (announce) this.events.publish({ kind: 'resource-released', at: Date.now(), resource })
        } catch (err) {
            this.events.publish({ kind: 'resource-release-failed', at: Date.now(), resource, error: describeError(err) })
        }
    }
}
