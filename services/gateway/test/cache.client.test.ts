import { describe, expect, it } from 'vitest'

import { buildGatewayConfigFromEnv } from '../src/config.js'
import { redisOptions } from '../src/sinks/cache/cache.client.js'

describe('redisOptions', () => {
    it('bounds every command and fails fast while disconnected', () => {
        const cfg = buildGatewayConfigFromEnv({ REDIS_PASSWORD: 'test-secret', REDIS_CONNECT_TIMEOUT: '2' })

        expect(redisOptions(cfg.cache)).toEqual({
            host: 'redis',
            port: 6379,
            password: 'test-secret',
            db: 0,
            connectTimeout: 2000,
            commandTimeout: 2000,
            lazyConnect: true,
            enableOfflineQueue: false,
            maxRetriesPerRequest: 1,
        })
    })

    it('leaves the password unset when none is configured', () => {
        const cfg = buildGatewayConfigFromEnv({ REDIS_COMMAND_TIMEOUT: '0.75' })

        expect(redisOptions(cfg.cache)).toMatchObject({ password: undefined, connectTimeout: 5000, commandTimeout: 750 })
    })
})
