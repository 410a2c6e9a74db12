// services/gateway/src/decoder/decode.ts
import { z } from 'zod'

import type { CanonicalRecord, SensorReading } from '../core/types.js'
import {
    DEFAULT_SIGNAL_DBM,
    DEFAULT_STATION_ID,
    FIELD_RULES,
    ON_SOLAR_THRESHOLD_V,
    roundTo,
    ruleFor,
    type FieldRange,
    type NumericField,
} from './fields.js'

/* -------------------------------------------------------------------------- */
/*  Result types                                                              */
/* -------------------------------------------------------------------------- */

/** The line is not a structured key/value payload at all. */
export interface DecodeError {
    kind: 'decode'
    reason: string
    /** Offending line, truncated for logs. */
    line: string
}

export type ValidationReason = 'missing' | 'invalid-type' | 'out-of-range'

/** The payload parsed but a field is absent, mistyped or outside its range. */
export interface ValidationError {
    kind: 'validation'
    field: string
    reason: ValidationReason
    value?: unknown
    range?: FieldRange
}

export type RecordError = DecodeError | ValidationError

export type DecodeResult =
    | { ok: true; record: CanonicalRecord }
    | { ok: false; error: RecordError }

const MAX_LINE_ECHO = 120

/* -------------------------------------------------------------------------- */
/*  Schemas                                                                   */
/* -------------------------------------------------------------------------- */

const PayloadSchema = z.record(z.string(), z.unknown())

// Key order matters: the first failing key is the one reported.
const ReadingSchema = z.object({
    temperature_c: z.number().finite(),
    battery_v: z.number().finite(),
    solar_v: z.number().finite(),
    signal_dbm: z.number().int().nullish(),
    station_id: z.string().nullish(),
    level_cm: z.number().finite().nullish(),
    outflow_lps: z.number().finite().nullish(),
})

type ParsedReading = z.infer<typeof ReadingSchema>

/* -------------------------------------------------------------------------- */
/*  Pipeline                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Step 1: syntactic decode. The line must hold one JSON object.
 */
export function parseLine(line: string): { ok: true; reading: SensorReading } | { ok: false; error: DecodeError } {
    const trimmed = line.trim()
    const echo = trimmed.length > MAX_LINE_ECHO ? `${trimmed.slice(0, MAX_LINE_ECHO)}…` : trimmed

    let parsed: unknown
    try {
        parsed = JSON.parse(trimmed)
    } catch (err) {
        const reason = err instanceof Error ? err.message : 'invalid JSON'
        return { ok: false, error: { kind: 'decode', reason, line: echo } }
    }

    const payload = PayloadSchema.safeParse(parsed)
    if (!payload.success) {
        const got = parsed === null ? 'null' : Array.isArray(parsed) ? 'array' : typeof parsed
        return { ok: false, error: { kind: 'decode', reason: `expected a JSON object, got ${got}`, line: echo } }
    }

    return { ok: true, reading: payload.data }
}

/**
 * Steps 2-4: presence/type, range, normalization. `now` becomes observedAt;
 * any timestamp carried by the payload is ignored.
 */
export function validateReading(reading: SensorReading, now: Date): DecodeResult {
    const parsed = ReadingSchema.safeParse(reading)
    if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const field = String(issue?.path[0] ?? 'payload')
        const value = reading[field]
        const reason: ValidationReason = value === undefined || value === null ? 'missing' : 'invalid-type'
        return {
            ok: false,
            error: reason === 'missing'
                ? { kind: 'validation', field, reason }
                : { kind: 'validation', field, reason, value },
        }
    }

    const rangeError = checkRanges(parsed.data)
    if (rangeError) return { ok: false, error: rangeError }

    return { ok: true, record: normalize(parsed.data, now) }
}

/** Full decode of one wire line. Pure for a given line and instant. */
export function decodeLine(line: string, now: Date): DecodeResult {
    const parsed = parseLine(line)
    if (!parsed.ok) return parsed
    return validateReading(parsed.reading, now)
}

function checkRanges(data: ParsedReading): ValidationError | null {
    for (const rule of FIELD_RULES) {
        const value = data[rule.field]
        if (value === null || value === undefined) continue

        const [min, max] = rule.range
        if (value < min || value > max) {
            return { kind: 'validation', field: rule.field, reason: 'out-of-range', value, range: rule.range }
        }
    }
    return null
}

function normalize(data: ParsedReading, now: Date): CanonicalRecord {
    const round = (field: NumericField, value: number): number => {
        const { decimals } = ruleFor(field)
        return decimals === null ? value : roundTo(value, decimals)
    }

    const solarV = round('solar_v', data.solar_v)
    const stationId = data.station_id?.trim()

    return Object.freeze({
        temperatureC: round('temperature_c', data.temperature_c),
        batteryV: round('battery_v', data.battery_v),
        solarV,
        signalDbm: data.signal_dbm ?? DEFAULT_SIGNAL_DBM,
        stationId: stationId ? stationId : DEFAULT_STATION_ID,
        levelCm: data.level_cm == null ? null : round('level_cm', data.level_cm),
        outflowLps: data.outflow_lps == null ? null : round('outflow_lps', data.outflow_lps),
        observedAt: new Date(now.getTime()),
        connected: true,
        onSolar: solarV > ON_SOLAR_THRESHOLD_V,
    })
}

/* -------------------------------------------------------------------------- */
/*  Helpers                                                                   */
/* -------------------------------------------------------------------------- */

/** Back to wire shape; validating the result again always succeeds. */
export function readingFromRecord(record: CanonicalRecord): SensorReading {
    return {
        temperature_c: record.temperatureC,
        battery_v: record.batteryV,
        solar_v: record.solarV,
        signal_dbm: record.signalDbm,
        station_id: record.stationId,
        level_cm: record.levelCm,
        outflow_lps: record.outflowLps,
    }
}

export function formatRecordError(error: RecordError): string {
    if (error.kind === 'decode') {
        return `malformed line reason=${JSON.stringify(error.reason)} line=${JSON.stringify(error.line)}`
    }

    switch (error.reason) {
        case 'missing':
            return `missing required field ${error.field}`
        case 'invalid-type':
            return `invalid type for ${error.field} value=${JSON.stringify(error.value)}`
        case 'out-of-range': {
            const range = error.range ? `[${error.range[0]}, ${error.range[1]}]` : '[?]'
            return `${error.field}=${String(error.value)} out of range ${range}`
        }
    }
}
