// services/gateway/src/sinks/cache/latest-status.cache.ts
import { z } from 'zod'

import { CacheWriteError } from '../../core/errors.js'
import { noopLogger, type CanonicalRecord, type LoggerLike } from '../../core/types.js'
import type { RecordSink } from '../record-sink.js'
import type { CacheClient } from './cache.client.js'

/** Wire shape stored under the latest-status key. */
export type LatestStatusEntry = {
    battery_v: number
    solar_v: number
    signal_dbm: number
    temperature_c: number
    last_heartbeat: string
    station_id: string
    connected: boolean
    on_solar: boolean
    level_cm?: number
    outflow_lps?: number
}

const LatestStatusSchema = z.object({
    battery_v: z.number(),
    solar_v: z.number(),
    signal_dbm: z.number(),
    temperature_c: z.number(),
    last_heartbeat: z.string().datetime({ offset: true }),
    station_id: z.string(),
    connected: z.boolean(),
    on_solar: z.boolean(),
    level_cm: z.number().optional(),
    outflow_lps: z.number().optional(),
})

/** Entry as read back, with liveness recomputed from the heartbeat age. */
export type LatestStatusView = LatestStatusEntry & {
    age_seconds: number
}

export interface LatestStatusCacheOptions {
    client: CacheClient
    key: string
    ttlSec: number
    /** Heartbeat age at which a reader should call the station disconnected. */
    staleAfterSec: number
    now?: () => Date
    logger?: LoggerLike
}

export function toLatestStatusEntry(record: CanonicalRecord, heartbeat: Date): LatestStatusEntry {
    const entry: LatestStatusEntry = {
        battery_v: record.batteryV,
        solar_v: record.solarV,
        signal_dbm: record.signalDbm,
        temperature_c: record.temperatureC,
        last_heartbeat: heartbeat.toISOString(),
        station_id: record.stationId,
        connected: record.connected,
        on_solar: record.onSolar,
    }
    if (record.levelCm !== null) entry.level_cm = record.levelCm
    if (record.outflowLps !== null) entry.outflow_lps = record.outflowLps
    return entry
}

/**
 * LatestStatusCache
 *
 * Single-station "live status" sink: one key, overwritten on every record,
 * expiring after ttlSec. If the gateway dies silently the key disappears,
 * which readers treat as stale.
 */
export class LatestStatusCache implements RecordSink {
    readonly id = 'cache' as const
    private readonly client: CacheClient
    private readonly key: string
    private readonly ttlSec: number
    private readonly staleAfterSec: number
    private readonly now: () => Date
    private readonly log: LoggerLike

    constructor(opts: LatestStatusCacheOptions) {
        this.client = opts.client
        this.key = opts.key
        this.ttlSec = opts.ttlSec
        this.staleAfterSec = opts.staleAfterSec
        this.now = opts.now ?? (() => new Date())
        this.log = opts.logger ?? noopLogger
    }

    async publish(record: CanonicalRecord): Promise<void> {
        const entry = toLatestStatusEntry(record, this.now())
        try {
            await this.client.setWithExpiry(this.key, JSON.stringify(entry), this.ttlSec)
        } catch (err) {
            throw new CacheWriteError(this.key, { cause: err })
        }
        this.log.debug(`kind=cache-set key=${this.key} ttl=${this.ttlSec}`)
    }

    /** Null when the key has expired or holds something unreadable. */
    async readLatest(): Promise<LatestStatusView | null> {
        const raw = await this.client.get(this.key)
        if (raw === null) return null

        let json: unknown
        try {
            json = JSON.parse(raw)
        } catch {
            this.log.warn(`kind=cache-entry-invalid key=${this.key} reason=json`)
            return null
        }

        const parsed = LatestStatusSchema.safeParse(json)
        if (!parsed.success) {
            this.log.warn(`kind=cache-entry-invalid key=${this.key} reason=shape`)
            return null
        }

        const ageMs = this.now().getTime() - Date.parse(parsed.data.last_heartbeat)
        const ageSeconds = Math.max(0, Math.round(ageMs / 1000))

        return {
            ...parsed.data,
            connected: ageMs < this.staleAfterSec * 1000,
            age_seconds: ageSeconds,
        }
    }

    async healthy(): Promise<boolean> {
        try {
            return (await this.client.ping()) === 'PONG'
        } catch {
            return false
        }
    }

    async shutdown(): Promise<void> {
        await this.client.quit()
    }
}
