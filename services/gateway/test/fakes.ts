// services/gateway/test/fakes.ts
import type { GatewayEvent, GatewayEventSink } from '../src/core/events.js'
import type { CacheClient } from '../src/sinks/cache/cache.client.js'
import type { SqlClient, SqlPool, SqlResult, SqlRow } from '../src/sinks/timeseries/timeseries.client.js'
import type { TransportAdapter, TransportHandle } from '../src/transport/types.js'

/* -------------------------------------------------------------------------- */
/*  Cache                                                                     */
/* -------------------------------------------------------------------------- */

/** In-process Redis stand-in with SET EX semantics on an injected clock. */
export class MemoryCacheClient implements CacheClient {
    readonly sets: Array<{ key: string; value: string; ttlSec: number }> = []
    failWrites = false
    failPing = false
    quitCalls = 0

    private readonly entries = new Map<string, { value: string; expiresAt: number }>()

    constructor(private readonly clock: () => number = Date.now) {}

    async setWithExpiry(key: string, value: string, ttlSec: number): Promise<void> {
        if (this.failWrites) throw new Error('cache offline')
        this.sets.push({ key, value, ttlSec })
        this.entries.set(key, { value, expiresAt: this.clock() + ttlSec * 1000 })
    }

    async get(key: string): Promise<string | null> {
        const entry = this.entries.get(key)
        if (!entry) return null
        if (this.clock() >= entry.expiresAt) {
            this.entries.delete(key)
            return null
        }
        return entry.value
    }

    /** Raw write, for seeding unreadable entries. */
    seed(key: string, value: string, ttlSec = 60): void {
        this.entries.set(key, { value, expiresAt: this.clock() + ttlSec * 1000 })
    }

    async ping(): Promise<string> {
        if (this.failPing) throw new Error('cache offline')
        return 'PONG'
    }

    async quit(): Promise<void> {
        this.quitCalls += 1
    }
}

/* -------------------------------------------------------------------------- */
/*  Time-series                                                               */
/* -------------------------------------------------------------------------- */

export type RecordedQuery = { text: string; params: unknown[] | undefined }

/**
 * In-process pg pool stand-in. Records every statement; `failOn` makes any
 * statement containing the given fragment reject.
 */
export class FakeSqlPool implements SqlPool {
    readonly queries: RecordedQuery[] = []
    readonly releases: Array<Error | boolean | undefined> = []
    existingTables: string[] = ['station_metrics', 'pond_metrics']
    failOn: string | null = null
    failConnect = false
    endCalls = 0

    async connect(): Promise<SqlClient> {
        if (this.failConnect) throw new Error('connect ECONNREFUSED')
        return {
            query: (text: string, params?: unknown[]) => this.run(text, params),
            release: (err?: Error | boolean) => {
                this.releases.push(err)
            },
        }
    }

    async end(): Promise<void> {
        this.endCalls += 1
    }

    /** Statements with whitespace collapsed, for readable assertions. */
    statements(): string[] {
        return this.queries.map((q) => q.text.replace(/\s+/g, ' ').trim())
    }

    private async run(text: string, params?: unknown[]): Promise<SqlResult> {
        this.queries.push({ text, params })
        if (this.failOn !== null && text.includes(this.failOn)) {
            throw new Error(`statement failed: ${this.failOn}`)
        }

        let rows: SqlRow[] = []
        if (text.includes('information_schema.tables')) {
            rows = this.existingTables.map((table_name) => ({ table_name }))
        } else if (text.includes('count(*)')) {
            rows = [{ count: '42' }]
        } else if (text.includes('pg_extension')) {
            rows = [{ extversion: '2.14.2' }]
        } else if (text.includes('SELECT 1')) {
            rows = [{ ok: 1 }]
        }
        return { rows, rowCount: rows.length }
    }
}

/* -------------------------------------------------------------------------- */
/*  Transport                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Scripted link shared by every handle a FakeTransport opens. `downChecks`
 * makes that many isAlive() calls report false before the link comes up.
 */
export class FakeLink {
    readonly lines: string[]
    downChecks = 0
    aliveChecks = 0
    /** Called once the scripted lines are used up. */
    onDrained: () => void = () => undefined
    /** Thrown from the next readLine(), then cleared. */
    readError: Error | null = null

    constructor(lines: string[] = []) {
        this.lines = [...lines]
    }
}

export class FakeTransport implements TransportAdapter {
    readonly description = 'fake:link'
    readonly handles: TransportHandle[] = []
    openCalls = 0
    closeCalls = 0
    /** open() rejects this many times before it succeeds. */
    failOpens = 0

    constructor(readonly link: FakeLink = new FakeLink()) {}

    async open(): Promise<TransportHandle> {
        this.openCalls += 1
        if (this.failOpens > 0) {
            this.failOpens -= 1
            throw new Error('port busy')
        }

        const link = this.link
        let closed = false
        const handle: TransportHandle = {
            description: `fake:link#${this.openCalls}`,
            async readLine(): Promise<string> {
                if (link.readError) {
                    const err = link.readError
                    link.readError = null
                    throw err
                }
                const line = link.lines.shift()
                if (line === undefined) {
                    link.onDrained()
                    return ''
                }
                return line
            },
            isAlive(): boolean {
                link.aliveChecks += 1
                if (closed) return false
                if (link.downChecks > 0) {
                    link.downChecks -= 1
                    return false
                }
                return true
            },
            close: async (): Promise<void> => {
                closed = true
                this.closeCalls += 1
            },
        }
        this.handles.push(handle)
        return handle
    }
}

/* -------------------------------------------------------------------------- */
/*  Misc                                                                      */
/* -------------------------------------------------------------------------- */

export class RecordingEventSink implements GatewayEventSink {
    readonly events: GatewayEvent[] = []

    publish(evt: GatewayEvent): void {
        this.events.push(evt)
    }

    kinds(): string[] {
        return this.events.map((e) => e.kind)
    }
}

/** Resolves at once and remembers what it was asked to wait. */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; waits: number[] } {
    const waits: number[] = []
    return {
        waits,
        sleep: async (ms: number) => {
            waits.push(ms)
        },
    }
}
