// services/gateway/src/sinks/timeseries/timeseries.client.ts
import pg from 'pg'

import { noopLogger, type LoggerLike } from '../../core/types.js'

export type SqlRow = Record<string, unknown>

export interface SqlResult {
    rows: SqlRow[]
    rowCount: number | null
}

/** One checked-out connection. release(err) discards it instead of reusing it. */
export interface SqlClient {
    query(text: string, params?: unknown[]): Promise<SqlResult>
    release(err?: Error | boolean): void
}

export interface SqlPool {
    connect(): Promise<SqlClient>
    end(): Promise<void>
}

export type PostgresConnectionConfig = {
    host: string
    port: number
    database: string
    user: string
    password: string | null
    poolSize: number
    connectTimeoutMs: number
}

export function createPgPool(cfg: PostgresConnectionConfig, logger: LoggerLike = noopLogger): SqlPool {
    const pool = new pg.Pool({
        host: cfg.host,
        port: cfg.port,
        database: cfg.database,
        user: cfg.user,
        password: cfg.password ?? undefined,
        max: cfg.poolSize,
        connectionTimeoutMillis: cfg.connectTimeoutMs,
        idleTimeoutMillis: 30_000,
    })

    // An idle client losing its backend emits here; unhandled it would crash the process.
    pool.on('error', (err: Error) => {
        logger.warn(`kind=pg-idle-client-error err=${JSON.stringify(err.message)}`)
    })

    return {
        async connect(): Promise<SqlClient> {
            const client = await pool.connect()
            return {
                async query(text: string, params?: unknown[]): Promise<SqlResult> {
                    const res = await client.query(text, params)
                    return { rows: res.rows, rowCount: res.rowCount }
                },
                release: (err?: Error | boolean) => client.release(err),
            }
        },
        end: () => pool.end(),
    }
}
