// services/gateway/src/sinks/cache/cache.client.ts
import { Redis, type RedisOptions } from 'ioredis'

import { noopLogger, type LoggerLike } from '../../core/types.js'
import { describeError } from '../../core/errors.js'

/**
 * The slice of Redis the gateway uses. Production wraps ioredis; tests hand
 * in an in-memory stand-in.
 */
export interface CacheClient {
    setWithExpiry(key: string, value: string, ttlSec: number): Promise<void>
    get(key: string): Promise<string | null>
    ping(): Promise<string>
    quit(): Promise<void>
}

export type RedisConnectionConfig = {
    host: string
    port: number
    password: string | null
    db: number
    connectTimeoutMs: number
    /** Upper bound on one command, so a half-open socket cannot stall a write. */
    commandTimeoutMs: number
}

export function redisOptions(cfg: RedisConnectionConfig): RedisOptions {
    return {
        host: cfg.host,
        port: cfg.port,
        password: cfg.password ?? undefined,
        db: cfg.db,
        connectTimeout: cfg.connectTimeoutMs,
        commandTimeout: cfg.commandTimeoutMs,
        lazyConnect: true,
        enableOfflineQueue: false,
        maxRetriesPerRequest: 1,
    }
}

/**
 * Connect to Redis and confirm it answers PING. A failed attempt tears its
 * client down so ioredis stops reconnecting in the background.
 *
 * Once up, the client keeps ioredis' own reconnect behaviour, but with the
 * offline queue disabled: a write while Redis is away fails at once instead
 * of piling up.
 */
export async function connectRedis(cfg: RedisConnectionConfig, logger: LoggerLike = noopLogger): Promise<CacheClient> {
    const redis = new Redis(redisOptions(cfg))

    redis.on('error', (err: Error) => {
        logger.debug(`kind=redis-client-error err=${JSON.stringify(err.message)}`)
    })

    try {
        await redis.connect()
        const pong = await redis.ping()
        if (pong !== 'PONG') throw new Error(`unexpected PING reply ${JSON.stringify(pong)}`)
    } catch (err) {
        redis.disconnect()
        throw err
    }

    logger.info(`kind=redis-connected host=${cfg.host} port=${cfg.port} db=${cfg.db}`)

    return {
        async setWithExpiry(key: string, value: string, ttlSec: number): Promise<void> {
            await redis.set(key, value, 'EX', ttlSec)
        },
        get: (key: string) => redis.get(key),
        ping: () => redis.ping(),
        async quit(): Promise<void> {
            try {
                await redis.quit()
            } catch (err) {
                logger.debug(`kind=redis-quit-error err=${JSON.stringify(describeError(err))}`)
                redis.disconnect()
            }
        },
    }
}
