import { type ChannelColor, LogChannel } from './types.js'

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.gateway]:    { emoji: '📡', color: 'blue' },
    [LogChannel.serial]:     { emoji: '🔌', color: 'yellow' },
    [LogChannel.decoder]:    { emoji: '🔎', color: 'magenta' },
    [LogChannel.cache]:      { emoji: '⚡', color: 'red' },
    [LogChannel.timeseries]: { emoji: '🗄️', color: 'green' },
    [LogChannel.connection]: { emoji: '🔗', color: 'cyan' },
    // Synthetic readings in testing mode
    [LogChannel.simulator]:  { emoji: '🧪', color: 'white' },
    [LogChannel.app]:        { emoji: '📦', color: 'blue' },
    [LogChannel.request]:    { emoji: '📝', color: 'purple' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

export function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, value)
}

/** Prefix shown in front of every message on a channel, e.g. "📡 [gateway]:". */
export function channelPrefix(ch: LogChannel, colorize: boolean): string {
    const meta = CHANNELS[ch]
    const tag = `${meta.emoji} [${ch}]:`
    return colorize ? `${ANSI[meta.color]}${tag}${RESET}` : tag
}
