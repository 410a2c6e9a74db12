// packages/logging/src/types.ts

export enum LogChannel {
    gateway = 'gateway',
    serial = 'serial',
    decoder = 'decoder',
    cache = 'cache',
    timeseries = 'timeseries',
    connection = 'connection',
    simulator = 'simulator',
    app = 'app',
    request = 'request',
}

export type ChannelColor =
    | 'blue'
    | 'yellow'
    | 'green'
    | 'magenta'
    | 'cyan'
    | 'red'
    | 'white'
    | 'purple'

export type ClientLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface ClientLog {
    ts: number
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
}

/** Narrows getLatest(); an absent key matches everything. */
export interface ClientLogFilter {
    channel?: LogChannel
    /** Entries at this level or above. */
    minLevel?: ClientLogLevel
}

export interface ClientLogBufferStats {
    capacity: number
    size: number
    /** Entries overwritten since the buffer was made. */
    evicted: number
}

/** Recent log lines kept in memory for the diagnostics API. */
export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    /** Newest `n` entries matching `filter`, oldest first. */
    getLatest: (n: number, filter?: ClientLogFilter) => ClientLog[]
    stats: () => ClientLogBufferStats
}

export interface ChannelLogger {
    debug: (msg: string, extra?: Record<string, unknown>) => void
    info:  (msg: string, extra?: Record<string, unknown>) => void
    warn:  (msg: string, extra?: Record<string, unknown>) => void
    error: (msg: string, extra?: Record<string, unknown>) => void
    fatal: (msg: string, extra?: Record<string, unknown>) => void
}

export interface LoggerBundle {
    base: import('pino').Logger
    channel: (ch: LogChannel) => ChannelLogger
}
