import { beforeEach, describe, expect, it } from 'vitest'

import type { CanonicalRecord, LoggerLike } from '../src/core/types.js'
import { decodeLine } from '../src/decoder/decode.js'
import { LatestStatusCache } from '../src/sinks/cache/latest-status.cache.js'
import { DualSinkWriter } from '../src/sinks/dual-sink-writer.js'
import { TimeseriesStore } from '../src/sinks/timeseries/timeseries.store.js'
import { FakeSqlPool, MemoryCacheClient } from './fakes.js'

const NOW_MS = Date.parse('2024-06-01T12:00:00.000Z')

function record(temperature: number): CanonicalRecord {
    const result = decodeLine(
        JSON.stringify({ temperature_c: temperature, battery_v: 12.5, solar_v: 3.2, level_cm: 100 }),
        new Date(NOW_MS)
    )
    if (!result.ok) throw new Error('fixture line must decode')
    return result.record
}

function captureLogger(): LoggerLike & { errors: string[] } {
    const errors: string[] = []
    return {
        errors,
        debug: () => undefined,
        info: () => undefined,
        warn: () => undefined,
        error: (msg: string) => {
            errors.push(msg)
        },
    }
}

describe('DualSinkWriter', () => {
    let cacheClient: MemoryCacheClient
    let pool: FakeSqlPool
    let logger: ReturnType<typeof captureLogger>
    let writer: DualSinkWriter

    beforeEach(() => {
        cacheClient = new MemoryCacheClient(() => NOW_MS)
        pool = new FakeSqlPool()
        logger = captureLogger()
        writer = new DualSinkWriter({
            cache: new LatestStatusCache({
                client: cacheClient,
                key: 'latest_status',
                ttlSec: 300,
                staleAfterSec: 120,
                now: () => new Date(NOW_MS),
            }),
            timeseries: new TimeseriesStore({ pool }),
            logger,
            now: () => NOW_MS,
        })
    })

    const stationInserts = (): number =>
        pool.statements().filter((s) => s.startsWith('INSERT INTO station_metrics')).length

    it('commits to both sinks, cache first', async () => {
        const outcome = await writer.write(record(20))

        expect(outcome.status).toBe('full')
        expect(outcome.cacheOk).toBe(true)
        expect(outcome.timeseriesOk).toBe(true)
        expect(outcome.receipts.map((r) => r.sinkId)).toEqual(['cache', 'timeseries'])
        expect(outcome.receipts[0]).toEqual({
            sinkId: 'cache',
            ok: true,
            publishedAt: '2024-06-01T12:00:00.000Z',
            durationMs: 0,
        })
        expect(stationInserts()).toBe(1)
    })

    it('still writes the store when the cache is down', async () => {
        cacheClient.failWrites = true

        const outcome = await writer.write(record(20))

        expect(outcome.status).toBe('partial')
        expect(outcome.cacheOk).toBe(false)
        expect(outcome.timeseriesOk).toBe(true)
        expect(stationInserts()).toBe(1)
        expect(logger.errors).toHaveLength(1)
        expect(logger.errors[0]).toContain('kind=sink-publish-failed id=cache')
    })

    it('still refreshes the cache when the store is down', async () => {
        pool.failConnect = true

        const outcome = await writer.write(record(21))

        expect(outcome.status).toBe('partial')
        expect(outcome.cacheOk).toBe(true)
        expect(outcome.timeseriesOk).toBe(false)
        expect(outcome.receipts[1]?.error).toBe(
            'time-series write failed stage=connect err="connect ECONNREFUSED"'
        )
        expect(cacheClient.sets).toHaveLength(1)
        expect(logger.errors[0]).toContain('kind=sink-publish-failed id=timeseries')
    })

    it('reports failed when neither sink commits, without throwing', async () => {
        cacheClient.failWrites = true
        pool.failConnect = true

        const outcome = await writer.write(record(22))

        expect(outcome.status).toBe('failed')
        expect(writer.getStats()).toEqual({
            records: 1,
            full: 0,
            partial: 0,
            failed: 1,
            cacheFailures: 1,
            timeseriesFailures: 1,
            lastFailureAt: '2024-06-01T12:00:00.000Z',
        })
    })

    it('keeps the cache current through a store outage and resumes after it', async () => {
        pool.failConnect = true
        for (let i = 0; i < 10; i++) {
            await writer.write(record(10 + i))
        }

        expect(cacheClient.sets).toHaveLength(10)
        const latest: unknown = JSON.parse(cacheClient.sets[9]?.value ?? 'null')
        expect(latest).toMatchObject({ temperature_c: 19 })
        expect(stationInserts()).toBe(0)

        pool.failConnect = false
        const outcome = await writer.write(record(30))

        expect(outcome.status).toBe('full')
        expect(stationInserts()).toBe(1)
        expect(writer.getStats()).toMatchObject({ records: 11, full: 1, partial: 10, timeseriesFailures: 10 })
    })

    it('snapshots sink health', async () => {
        expect(await writer.healthySnapshot()).toEqual({ cache: true, timeseries: true })

        cacheClient.failPing = true
        expect(await writer.healthySnapshot()).toEqual({ cache: false, timeseries: true })
    })
})
