import pino, { type Logger, type LoggerOptions } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, channelPrefix } from './channels.js'

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        timestamp: pino.stdTimeFunctions.isoTime,
    }

    const destination = PRETTY
        ? pinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            // keep these ignored fields out of output
            ignore: 'pid,hostname,service,channel'
        })
        : undefined

    const base: Logger = destination ? pino(options, destination) : pino(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const channel = (ch: LogChannel): ChannelLogger => {
        // JSON output carries the channel as a field; only the pretty stream gets the tag.
        const prefix = PRETTY ? `${channelPrefix(ch, true)} ` : ''
        const fields = (extra?: Record<string, unknown>): Record<string, unknown> =>
            extra ? { channel: ch, ...extra } : { channel: ch }

        return {
            debug: (msg: string, extra?: Record<string, unknown>): void => {
                base.debug(fields(extra), prefix + msg)
                fanout(ch, 'debug', msg)
            },
            info: (msg: string, extra?: Record<string, unknown>): void => {
                base.info(fields(extra), prefix + msg)
                fanout(ch, 'info', msg)
            },
            warn: (msg: string, extra?: Record<string, unknown>): void => {
                base.warn(fields(extra), prefix + msg)
                fanout(ch, 'warn', msg)
            },
            error: (msg: string, extra?: Record<string, unknown>): void => {
                base.error(fields(extra), prefix + msg)
                fanout(ch, 'error', msg)
            },
            fatal: (msg: string, extra?: Record<string, unknown>): void => {
                base.fatal(fields(extra), prefix + msg)
                fanout(ch, 'fatal', msg)
            }
        }
    }

    return { base, channel }
}
