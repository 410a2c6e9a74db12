import { beforeEach, describe, expect, it } from 'vitest'

import { SchemaError, TimeseriesWriteError } from '../src/core/errors.js'
import type { CanonicalRecord } from '../src/core/types.js'
import { decodeLine } from '../src/decoder/decode.js'
import { TimeseriesStore } from '../src/sinks/timeseries/timeseries.store.js'
import { FakeSqlPool } from './fakes.js'

const NOW = new Date('2024-06-01T12:00:00.000Z')

function record(line: string): CanonicalRecord {
    const result = decodeLine(line, NOW)
    if (!result.ok) throw new Error('fixture line must decode')
    return result.record
}

const WITH_POND = record(
    '{"temperature_c":25.46,"battery_v":12.456,"solar_v":14.204,"signal_dbm":-72,"station_id":"north-pond","level_cm":120.44,"outflow_lps":2.5}'
)
const STATION_ONLY = record('{"temperature_c":19,"battery_v":12.2,"solar_v":0.5}')
const OUTFLOW_ONLY = record('{"temperature_c":19,"battery_v":12.2,"solar_v":0.5,"outflow_lps":1.25}')

describe('TimeseriesStore.publish', () => {
    let pool: FakeSqlPool
    let store: TimeseriesStore

    beforeEach(() => {
        pool = new FakeSqlPool()
        store = new TimeseriesStore({ pool })
    })

    it('writes station and pond rows in one transaction', async () => {
        await store.publish(WITH_POND)

        expect(pool.statements()).toEqual([
            'BEGIN',
            expect.stringContaining('INSERT INTO station_metrics'),
            expect.stringContaining('INSERT INTO pond_metrics'),
            'COMMIT',
        ])
        expect(pool.queries[1]?.params).toEqual([NOW, 25.5, 12.46, 14.2, -72, 'north-pond'])
        expect(pool.queries[2]?.params).toEqual([NOW, 120.4, 2.5])
        expect(pool.releases).toEqual([undefined])
    })

    it('skips the pond row when neither level nor outflow is present', async () => {
        await store.publish(STATION_ONLY)

        expect(pool.statements()).toEqual([
            'BEGIN',
            expect.stringContaining('INSERT INTO station_metrics'),
            'COMMIT',
        ])
        expect(pool.queries[1]?.params).toEqual([NOW, 19, 12.2, 0.5, -75, 'default'])
    })

    it('writes a pond row with a null level when only outflow is present', async () => {
        await store.publish(OUTFLOW_ONLY)

        expect(pool.queries[2]?.params).toEqual([NOW, null, 1.25])
    })

    it('rolls back and discards the connection when an insert fails', async () => {
        pool.failOn = 'INSERT INTO pond_metrics'

        const write = store.publish(WITH_POND)
        await expect(write).rejects.toBeInstanceOf(TimeseriesWriteError)
        await expect(write).rejects.toThrow(
            'time-series write failed stage=pond_metrics err="statement failed: INSERT INTO pond_metrics"'
        )

        expect(pool.statements().at(-1)).toBe('ROLLBACK')
        expect(pool.statements()).not.toContain('COMMIT')
        expect(pool.releases).toHaveLength(1)
        expect(pool.releases[0]).toBeInstanceOf(Error)
    })

    it('reports the connect stage when no connection can be had', async () => {
        pool.failConnect = true

        await expect(store.publish(WITH_POND)).rejects.toThrow('stage=connect')
        expect(pool.queries).toHaveLength(0)
        expect(pool.releases).toHaveLength(0)
    })

    it('reports the commit stage when COMMIT fails', async () => {
        pool.failOn = 'COMMIT'

        const write = store.publish(STATION_ONLY)
        await expect(write).rejects.toThrow('stage=commit')
        expect(pool.statements().at(-1)).toBe('ROLLBACK')
    })
})

describe('TimeseriesStore.verifySchema', () => {
    it('reports tables, row counts and the TimescaleDB version', async () => {
        const store = new TimeseriesStore({ pool: new FakeSqlPool() })

        expect(await store.verifySchema()).toEqual({
            tables: ['station_metrics', 'pond_metrics'],
            rowCounts: { station_metrics: 42, pond_metrics: 42 },
            timescaleVersion: '2.14.2',
        })
    })

    it('fails with SchemaError naming the missing tables', async () => {
        const pool = new FakeSqlPool()
        pool.existingTables = ['station_metrics']
        const store = new TimeseriesStore({ pool })

        const check = store.verifySchema()
        await expect(check).rejects.toBeInstanceOf(SchemaError)
        await expect(check).rejects.toThrow('missing required tables: pond_metrics')
    })

    it('does not gate on row counts', async () => {
        const pool = new FakeSqlPool()
        pool.failOn = 'count(*)'
        const store = new TimeseriesStore({ pool })

        const report = await store.verifySchema()
        expect(report.rowCounts).toEqual({ station_metrics: null, pond_metrics: null })
    })
})

describe('TimeseriesStore health', () => {
    it('pings through the pool and ends it on shutdown', async () => {
        const pool = new FakeSqlPool()
        const store = new TimeseriesStore({ pool })

        expect(await store.healthy()).toBe(true)
        expect(pool.statements()).toEqual(['SELECT 1 AS ok'])

        pool.failConnect = true
        expect(await store.healthy()).toBe(false)

        await store.shutdown()
        expect(pool.endCalls).toBe(1)
    })
})
