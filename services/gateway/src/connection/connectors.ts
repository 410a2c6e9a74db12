// services/gateway/src/connection/connectors.ts
import { LogChannel, type ChannelLogger } from '@pondlink/logging'

import type { GatewayConfig } from '../config.js'
import { connectRedis } from '../sinks/cache/cache.client.js'
import { LatestStatusCache } from '../sinks/cache/latest-status.cache.js'
import { createPgPool } from '../sinks/timeseries/timeseries.client.js'
import { TimeseriesStore } from '../sinks/timeseries/timeseries.store.js'
import { IdleTransport } from '../transport/IdleTransport.js'
import { SerialTransport } from '../transport/SerialTransport.js'
import type { TransportAdapter } from '../transport/types.js'
import type { ResourceConnectors } from './ConnectionManager.js'

/**
 * Real serial port unless testing mode is on; in testing mode the link is an
 * always-alive idle stand-in and readings (if any) come from the simulator.
 */
export function selectTransport(cfg: GatewayConfig, log: ChannelLogger): TransportAdapter {
    if (cfg.mode === 'serial') {
        return new SerialTransport({
            path: cfg.serial.path,
            baudRate: cfg.serial.baudRate,
            maxBufferedLines: cfg.serial.maxBufferedLines,
            logger: log,
        })
    }
    return new IdleTransport()
}

/** Production connectors: ioredis for the cache, a pg pool for the store. */
export function buildConnectors(
    cfg: GatewayConfig,
    channel: (ch: LogChannel) => ChannelLogger
): ResourceConnectors {
    const logCache = channel(LogChannel.cache)
    const logTs = channel(LogChannel.timeseries)

    return {
        transport: selectTransport(cfg, channel(LogChannel.serial)),

        async connectCache(): Promise<LatestStatusCache> {
            const client = await connectRedis(cfg.cache, logCache)
            return new LatestStatusCache({
                client,
                key: cfg.cache.key,
                ttlSec: cfg.cache.ttlSec,
                staleAfterSec: cfg.cache.staleAfterSec,
                logger: logCache,
            })
        },

        async connectTimeseries(): Promise<TimeseriesStore> {
            const pool = createPgPool(cfg.timeseries, logTs)
            const store = new TimeseriesStore({ pool, logger: logTs })
            try {
                await store.ping()
            } catch (err) {
                await store.shutdown().catch((endErr: unknown) => {
                    logTs.debug('pool end after failed ping also failed', { err: String(endErr) })
                })
                throw err
            }
            return store
        },
    }
}
