// services/gateway/src/decoder/fields.ts

/** Wire names of the numeric fields, in the order they are range-checked. */
export type NumericField =
    | 'temperature_c'
    | 'battery_v'
    | 'solar_v'
    | 'signal_dbm'
    | 'level_cm'
    | 'outflow_lps'

export type FieldRange = readonly [min: number, max: number]

export interface FieldRule {
    field: NumericField
    range: FieldRange
    /** Decimals kept after normalization; null for integers. */
    decimals: number | null
}

export const FIELD_RULES: readonly FieldRule[] = [
    { field: 'temperature_c', range: [-50, 80], decimals: 1 },
    { field: 'battery_v', range: [0, 20], decimals: 2 },
    { field: 'solar_v', range: [0, 25], decimals: 2 },
    { field: 'signal_dbm', range: [-150, 0], decimals: null },
    { field: 'level_cm', range: [0, 500], decimals: 1 },
    { field: 'outflow_lps', range: [0, 100], decimals: 2 },
]

export const DEFAULT_SIGNAL_DBM = -75
export const DEFAULT_STATION_ID = 'default'

/** Solar voltage above which the station counts as running on solar. */
export const ON_SOLAR_THRESHOLD_V = 1.0

export function ruleFor(field: NumericField): FieldRule {
    const rule = FIELD_RULES.find((r) => r.field === field)
    if (!rule) throw new Error(`no rule for field ${field}`)
    return rule
}

export function roundTo(value: number, decimals: number): number {
    const f = 10 ** decimals
    return Math.round(value * f) / f
}
