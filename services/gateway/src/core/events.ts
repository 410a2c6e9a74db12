// services/gateway/src/core/events.ts
import type { RecordError } from '../decoder/decode.js'
import type { WriteOutcome } from '../sinks/record-sink.js'
import type { ResourceKind } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Loop state                                                                */
/* -------------------------------------------------------------------------- */

export type IngestState = 'starting' | 'running' | 'draining' | 'stopped'

export interface IngestStats {
    iterations: number
    linesRead: number
    readingsSimulated: number
    decodeErrors: number
    validationErrors: number
    /** Records at least one store accepted. */
    recordsWritten: number
    /** Records both stores refused. */
    writeFailures: number
    reconnectAttempts: number
    iterationErrors: number
    lastRecordAt: string | null
    lastErrorAt: string | null
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                 */
/* -------------------------------------------------------------------------- */

export interface GatewayEventSink {
    publish(evt: GatewayEvent): void
}

export type GatewayEvent =
    | {
        kind: 'connect-attempt'
        at: number
        resource: ResourceKind
        attempt: number
        maxAttempts: number
    }
    | {
        kind: 'connect-ok'
        at: number
        resource: ResourceKind
        attempt: number
    }
    | {
        kind: 'connect-failed'
        at: number
        resource: ResourceKind
        attempt: number
        maxAttempts: number
        error: string
    }
    | {
        kind: 'connect-exhausted'
        at: number
        resource: ResourceKind
        attempts: number
        error: string
    }
    | {
        kind: 'schema-verified'
        at: number
        tables: string[]
        rowCounts: Record<string, number | null>
        timescaleVersion: string | null
    }
    | {
        kind: 'schema-missing'
        at: number
        tables: string[]
    }
    | {
        kind: 'resource-released'
        at: number
        resource: ResourceKind
    }
    | {
        kind: 'resource-release-failed'
        at: number
        resource: ResourceKind
        error: string
    }
    | {
        kind: 'state-changed'
        at: number
        from: IngestState
        to: IngestState
    }
    | {
        kind: 'transport-lost'
        at: number
        description: string
    }
    | {
        kind: 'record-rejected'
        at: number
        error: RecordError
    }
    | {
        kind: 'record-written'
        at: number
        stationId: string
        outcome: WriteOutcome
    }
    | {
        kind: 'iteration-error'
        at: number
        error: string
    }
    | {
        kind: 'shutdown-requested'
        at: number
        signal: string
    }

export const noopEventSink: GatewayEventSink = {
    publish: () => undefined,
}
