// services/gateway/src/simulator/ReadingSimulator.ts
import { sleep as defaultSleep, type SensorReading, type Sleep } from '../core/types.js'
import { roundTo } from '../decoder/fields.js'

export interface ReadingSimulatorOptions {
    /** Cadence between synthetic readings. */
    intervalMs: number
    stationId?: string
    /** Returns [0, 1). Injected so tests get fixed values. */
    random?: () => number
    now?: () => number
    sleep?: Sleep
}

/**
 * ReadingSimulator
 *
 * Testing-mode source of plausible station readings. It hands out already
 * decoded SensorReading objects, so the ingestion loop feeds them straight to
 * validation and skips line decoding.
 */
export class ReadingSimulator {
    private readonly intervalMs: number
    private readonly stationId: string
    private readonly random: () => number
    private readonly now: () => number
    private readonly sleep: Sleep

    /** First reading is due immediately. */
    private nextDueAt: number | null = null
    private produced = 0

    constructor(opts: ReadingSimulatorOptions) {
        this.intervalMs = Math.max(1, opts.intervalMs)
        this.stationId = opts.stationId ?? 'simulator'
        this.random = opts.random ?? Math.random
        this.now = opts.now ?? Date.now
        this.sleep = opts.sleep ?? defaultSleep
    }

    /**
     * Wait until the next reading is due, but never longer than maxWaitMs.
     * Resolves with the reading, or null if it is not due yet.
     */
    async next(maxWaitMs: number): Promise<SensorReading | null> {
        const now = this.now()
        const dueAt = this.nextDueAt ?? now
        const remaining = dueAt - now

        if (remaining > 0) {
            await this.sleep(Math.min(remaining, Math.max(0, maxWaitMs)))
            if (this.now() < dueAt) return null
        }

        this.nextDueAt = this.now() + this.intervalMs
        this.produced += 1
        return this.synthesize(new Date(this.now()))
    }

    get producedCount(): number {
        return this.produced
    }

    /** One reading for the given wall-clock time. */
    synthesize(at: Date): SensorReading {
        const hour = at.getUTCHours() + at.getUTCMinutes() / 60
        // 0 at night, peaks at 1 around 13:00 UTC
        const daylight = Math.max(0, Math.sin(((hour - 7) / 12) * Math.PI))
        const jitter = (span: number): number => (this.random() - 0.5) * span

        const temperature = 12 + daylight * 10 + jitter(2)
        const solar = daylight > 0 ? 2 + daylight * 16 + jitter(1) : this.random() * 0.5
        const battery = 11.9 + daylight * 0.9 + jitter(0.1)

        return {
            temperature_c: roundTo(clamp(temperature, 12, 24), 1),
            battery_v: roundTo(clamp(battery, 11.8, 13.0), 2),
            solar_v: roundTo(clamp(solar, 0, 18.5), 2),
            signal_dbm: Math.round(-95 + this.random() * 35),
            station_id: this.stationId,
            level_cm: roundTo(80 + this.random() * 40, 1),
            outflow_lps: roundTo(0.5 + this.random() * 3, 2),
        }
    }
}

function clamp(n: number, min: number, max: number): number {
    if (n < min) return min
    if (n > max) return max
    return n
}
