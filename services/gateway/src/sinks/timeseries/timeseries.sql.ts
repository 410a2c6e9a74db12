// services/gateway/src/sinks/timeseries/timeseries.sql.ts

export const STATION_TABLE = 'station_metrics'
export const POND_TABLE = 'pond_metrics'

export const REQUIRED_TABLES = [STATION_TABLE, POND_TABLE] as const

export const INSERT_STATION_METRICS = `
    INSERT INTO station_metrics
        (timestamp, temperature_c, battery_v, solar_v, signal_dbm, station_id)
    VALUES ($1, $2, $3, $4, $5, $6)
`

export const INSERT_POND_METRICS = `
    INSERT INTO pond_metrics (timestamp, level_cm, outflow_lps)
    VALUES ($1, $2, $3)
`

export const SELECT_EXISTING_TABLES = `
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'public'
      AND table_name = ANY($1)
`

export const SELECT_TIMESCALE_VERSION = `
    SELECT extversion
    FROM pg_extension
    WHERE extname = 'timescaledb'
`

export const PING = 'SELECT 1 AS ok'

/** Only ever called with names from REQUIRED_TABLES. */
export function countRowsSql(table: (typeof REQUIRED_TABLES)[number]): string {
    return `SELECT count(*) AS count FROM ${table}`
}
