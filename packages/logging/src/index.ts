export { createLogger } from './pino.js'
export { isClientLogLevel, makeClientBuffer } from './buffer.js'
export { CHANNELS, channelPrefix, isLogChannel } from './channels.js'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogBufferStats,
    type ClientLogFilter,
    type ClientLogLevel,
    type LoggerBundle,
} from './types.js'
