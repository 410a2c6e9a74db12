// services/gateway/src/sinks/timeseries/timeseries.store.ts
import { SchemaError, TimeseriesWriteError, describeError } from '../../core/errors.js'
import { noopLogger, type CanonicalRecord, type LoggerLike } from '../../core/types.js'
import type { RecordSink } from '../record-sink.js'
import type { SqlClient, SqlPool } from './timeseries.client.js'
import {
    INSERT_POND_METRICS,
    INSERT_STATION_METRICS,
    PING,
    POND_TABLE,
    REQUIRED_TABLES,
    SELECT_EXISTING_TABLES,
    SELECT_TIMESCALE_VERSION,
    STATION_TABLE,
    countRowsSql,
} from './timeseries.sql.js'

export type SchemaReport = {
    tables: string[]
    /** Diagnostic only; null when the count query failed. */
    rowCounts: Record<string, number | null>
    timescaleVersion: string | null
}

/**
 * TimeseriesStore
 *
 * Append-only writer for the two metric tables. One pooled connection per
 * record, one transaction per connection; the station row always goes in,
 * the pond row only when the record carries level or outflow.
 */
export class TimeseriesStore implements RecordSink {
    readonly id = 'timeseries' as const
    private readonly pool: SqlPool
    private readonly log: LoggerLike

    constructor(opts: { pool: SqlPool; logger?: LoggerLike }) {
        this.pool = opts.pool
        this.log = opts.logger ?? noopLogger
    }

    async publish(record: CanonicalRecord): Promise<void> {
        let stage = 'connect'

        try {
            await this.withClient(async (client) => {
                stage = 'begin'
                await client.query('BEGIN')
                try {
                    stage = STATION_TABLE
                    await client.query(INSERT_STATION_METRICS, [
                        record.observedAt,
                        record.temperatureC,
                        record.batteryV,
                        record.solarV,
                        record.signalDbm,
                        record.stationId,
                    ])

                    if (record.levelCm !== null || record.outflowLps !== null) {
                        stage = POND_TABLE
                        await client.query(INSERT_POND_METRICS, [
                            record.observedAt,
                            record.levelCm,
                            record.outflowLps,
                        ])
                    }

                    stage = 'commit'
                    await client.query('COMMIT')
                } catch (err) {
                    await this.rollback(client)
                    throw err
                }
            })
        } catch (err) {
            throw new TimeseriesWriteError(stage, { cause: err })
        }

        this.log.debug(`kind=timeseries-insert station=${record.stationId} pond=${record.levelCm !== null || record.outflowLps !== null}`)
    }

    /** SELECT 1 round trip; throws when the database does not answer. */
    async ping(): Promise<void> {
        await this.withClient(async (client) => {
            await client.query(PING)
        })
    }

    async healthy(): Promise<boolean> {
        try {
            await this.ping()
            return true
        } catch {
            return false
        }
    }

    /**
     * Gate on table existence only. Row counts and the TimescaleDB version are
     * gathered for the startup log and never decide anything.
     */
    async verifySchema(): Promise<SchemaReport> {
        return this.withClient(async (client) => {
            const res = await client.query(SELECT_EXISTING_TABLES, [[...REQUIRED_TABLES]])
            const existing = res.rows.map((r) => r.table_name).filter((t): t is string => typeof t === 'string')
            const missing = REQUIRED_TABLES.filter((t) => !existing.includes(t))
            if (missing.length > 0) throw new SchemaError(missing)

            const rowCounts: Record<string, number | null> = {}
            for (const table of REQUIRED_TABLES) {
                try {
                    const count = await client.query(countRowsSql(table))
                    // pg returns count(*) as a string (bigint)
                    rowCounts[table] = Number(count.rows[0]?.count ?? 0)
                } catch (err) {
                    rowCounts[table] = null
                    this.log.debug(`kind=schema-row-count-failed table=${table} err=${JSON.stringify(describeError(err))}`)
                }
            }

            let timescaleVersion: string | null = null
            try {
                const ext = await client.query(SELECT_TIMESCALE_VERSION)
                const version = ext.rows[0]?.extversion
                timescaleVersion = typeof version === 'string' ? version : null
            } catch (err) {
                this.log.debug(`kind=timescale-version-failed err=${JSON.stringify(describeError(err))}`)
            }

            return { tables: [...REQUIRED_TABLES], rowCounts, timescaleVersion }
        })
    }

    async shutdown(): Promise<void> {
        await this.pool.end()
    }

    /**
     * Scoped checkout: the client goes back to the pool on every path, and is
     * discarded rather than reused if the callback failed.
     */
    private async withClient<T>(fn: (client: SqlClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect()
        let poisoned: Error | undefined
        try {
            return await fn(client)
        } catch (err) {
            poisoned = err instanceof Error ? err : new Error(describeError(err))
            throw err
        } finally {
            client.release(poisoned)
        }
    }

    private async rollback(client: SqlClient): Promise<void> {
        try {
            await client.query('ROLLBACK')
        } catch (err) {
            this.log.warn(`kind=timeseries-rollback-failed err=${JSON.stringify(describeError(err))}`)
        }
    }
}
