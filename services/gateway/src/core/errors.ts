// services/gateway/src/core/errors.ts
import type { ResourceKind } from './types.js'

/*
 * Per-record failures (malformed line, bad field) are plain values, see
 * decoder/decode.ts. The classes below are for failures that cross a
 * component boundary: sink writes, connections and the schema gate.
 */

export type GatewayErrorKind =
    | 'transport'
    | 'cache-write'
    | 'timeseries-write'
    | 'schema'
    | 'connection-exhausted'

export abstract class GatewayError extends Error {
    abstract readonly kind: GatewayErrorKind

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

export class TransportError extends GatewayError {
    readonly kind = 'transport' as const

    constructor(
        message: string,
        readonly path: string,
        options?: { cause?: unknown }
    ) {
        super(message, options)
    }
}

export class CacheWriteError extends GatewayError {
    readonly kind = 'cache-write' as const

    constructor(readonly key: string, options?: { cause?: unknown }) {
        super(`cache write failed key=${key} err=${JSON.stringify(describeError(options?.cause))}`, options)
    }
}

export class TimeseriesWriteError extends GatewayError {
    readonly kind = 'timeseries-write' as const

    /** stage: connect, begin, a table name, or commit */
    constructor(
        readonly stage: string,
        options?: { cause?: unknown }
    ) {
        super(`time-series write failed stage=${stage} err=${JSON.stringify(describeError(options?.cause))}`, options)
    }
}

/** Required relations are missing. Fatal: provisioning problem, not a retryable one. */
export class SchemaError extends GatewayError {
    readonly kind = 'schema' as const

    constructor(readonly missingTables: string[]) {
        super(`missing required tables: ${missingTables.join(', ')}`)
    }
}

export class ConnectionExhaustedError extends GatewayError {
    readonly kind = 'connection-exhausted' as const

    constructor(
        readonly resource: ResourceKind,
        readonly attempts: number,
        options?: { cause?: unknown }
    ) {
        super(
            `${resource} unavailable after ${attempts} attempt(s): ${describeError(options?.cause)}`,
            options
        )
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message
    if (err === undefined) return 'unknown error'
    return String(err)
}
