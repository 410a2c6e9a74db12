import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogFilter,
    type ClientLogLevel
} from './types.js'

const LEVEL_RANK: Record<ClientLogLevel, number> = {
    debug: 20,
    info: 30,
    warn: 40,
    error: 50,
    fatal: 60,
}

export function isClientLogLevel(value: unknown): value is ClientLogLevel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
}

/**
 * Fixed-size ring of recent log lines. Once full, each push overwrites the
 * oldest slot.
 */
export function makeClientBuffer(capacity: number): ClientLogBuffer {
    const size = Math.max(1, Math.floor(capacity))
    const ring = new Array<ClientLog | undefined>(size)
    let head = 0 // next slot to write
    let count = 0
    let evicted = 0

    const push = (log: ClientLog): void => {
        if (count === size) evicted += 1
        else count += 1
        ring[head] = log
        head = (head + 1) % size
    }

    const ordered = (): ClientLog[] => {
        const out: ClientLog[] = []
        const start = (head - count + size) % size
        for (let i = 0; i < count; i++) {
            const entry = ring[(start + i) % size]
            if (entry) out.push(entry)
        }
        return out
    }

    const getLatest = (n: number, filter: ClientLogFilter = {}): ClientLog[] => {
        if (n <= 0) return []
        const minRank = filter.minLevel ? LEVEL_RANK[filter.minLevel] : 0
        const matches = ordered().filter((l) =>
            (filter.channel === undefined || l.channel === filter.channel) && LEVEL_RANK[l.level] >= minRank
        )
        return matches.slice(-n)
    }

    return {
        push,
        getLatest,
        stats: () => ({ capacity: size, size: count, evicted }),
    }
}
