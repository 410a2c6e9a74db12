// services/gateway/src/core/event-logger.ts
import { LogChannel, type ChannelLogger } from '@pondlink/logging'

import { formatRecordError } from '../decoder/decode.js'
import type { GatewayEvent, GatewayEventSink } from './events.js'
import type { ResourceKind } from './types.js'

const RESOURCE_CHANNEL: Record<ResourceKind, LogChannel> = {
    transport: LogChannel.serial,
    cache: LogChannel.cache,
    timeseries: LogChannel.timeseries,
}

/**
 * Maps gateway events onto channel log lines ("kind=... key=value").
 * Connection chatter goes to the resource's own channel, per-record noise
 * stays at debug unless something failed.
 */
export class GatewayLoggerEventSink implements GatewayEventSink {
    private readonly channel: (ch: LogChannel) => ChannelLogger

    constructor(channel: (ch: LogChannel) => ChannelLogger) {
        this.channel = channel
    }

    publish(evt: GatewayEvent): void {
        switch (evt.kind) {
            case 'connect-attempt': {
                this.channel(LogChannel.connection).debug(
                    `kind=${evt.kind} resource=${evt.resource} attempt=${evt.attempt}/${evt.maxAttempts}`
                )
                break
            }

            case 'connect-ok': {
                this.channel(RESOURCE_CHANNEL[evt.resource]).info(
                    `kind=${evt.kind} resource=${evt.resource} attempt=${evt.attempt}`
                )
                break
            }

            case 'connect-failed': {
                this.channel(RESOURCE_CHANNEL[evt.resource]).warn(
                    `kind=${evt.kind} resource=${evt.resource} attempt=${evt.attempt}/${evt.maxAttempts} err=${JSON.stringify(evt.error)}`
                )
                break
            }

            case 'connect-exhausted': {
                this.channel(LogChannel.connection).error(
                    `kind=${evt.kind} resource=${evt.resource} attempts=${evt.attempts} err=${JSON.stringify(evt.error)}`
                )
                break
            }

            case 'schema-verified': {
                const counts = Object.entries(evt.rowCounts)
                    .map(([table, n]) => `${table}=${n ?? 'unknown'}`)
                    .join(' ')
                this.channel(LogChannel.timeseries).info(
                    `kind=${evt.kind} tables=${evt.tables.join(',')} ${counts} timescale=${evt.timescaleVersion ?? 'absent'}`
                )
                break
            }

            case 'schema-missing': {
                this.channel(LogChannel.timeseries).error(`kind=${evt.kind} tables=${evt.tables.join(',')}`)
                break
            }

            case 'resource-released': {
                this.channel(LogChannel.connection).info(`kind=${evt.kind} resource=${evt.resource}`)
                break
            }

            case 'resource-release-failed': {
                this.channel(LogChannel.connection).warn(
                    `kind=${evt.kind} resource=${evt.resource} err=${JSON.stringify(evt.error)}`
                )
                break
            }

            case 'state-changed': {
                this.channel(LogChannel.gateway).info(`kind=${evt.kind} from=${evt.from} to=${evt.to}`)
                break
            }

            case 'transport-lost': {
                this.channel(LogChannel.serial).warn(`kind=${evt.kind} link=${evt.description}`)
                break
            }

            case 'record-rejected': {
                this.channel(LogChannel.decoder).warn(
                    `kind=${evt.kind} type=${evt.error.kind} ${formatRecordError(evt.error)}`
                )
                break
            }

            case 'record-written': {
                const { outcome } = evt
                const line = `kind=${evt.kind} station=${evt.stationId} status=${outcome.status} cache=${outcome.cacheOk} timeseries=${outcome.timeseriesOk}`
                // High frequency when healthy -> debug only
                if (outcome.status === 'full') this.channel(LogChannel.gateway).debug(line)
                else this.channel(LogChannel.gateway).warn(line)
                break
            }

            case 'iteration-error': {
                this.channel(LogChannel.gateway).error(`kind=${evt.kind} err=${JSON.stringify(evt.error)}`)
                break
            }

            case 'shutdown-requested': {
                this.channel(LogChannel.gateway).info(`kind=${evt.kind} signal=${evt.signal}`)
                break
            }
        }
    }
}
