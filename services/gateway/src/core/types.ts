// services/gateway/src/core/types.ts

/**
 * Raw reading exactly as decoded from a wire line (or synthesized by the
 * simulator). Nothing about it is trusted yet.
 */
export type SensorReading = Record<string, unknown>

/**
 * Validated, normalized reading. Frozen at construction; the unit that gets
 * projected into the latest-status cache and the time-series tables.
 */
export interface CanonicalRecord {
    readonly temperatureC: number
    readonly batteryV: number
    readonly solarV: number
    readonly signalDbm: number
    readonly stationId: string
    readonly levelCm: number | null
    readonly outflowLps: number | null
    /** Decode time (UTC). Sensor clocks are not trusted, so this is ours. */
    readonly observedAt: Date
    /** Always true for a record just ingested; staleness lives on the heartbeat. */
    readonly connected: boolean
    readonly onSolar: boolean
}

/** The three external dependencies the gateway supervises. */
export type ResourceKind = 'transport' | 'cache' | 'timeseries'

export type LoggerLike = {
    debug(msg: string, extra?: Record<string, unknown>): void
    info(msg: string, extra?: Record<string, unknown>): void
    warn(msg: string, extra?: Record<string, unknown>): void
    error(msg: string, extra?: Record<string, unknown>): void
}

export const noopLogger: LoggerLike = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
}

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms))
