// services/gateway/src/ingest/run.ts
import type { ChannelLogger } from '@pondlink/logging'

import { describeError } from '../core/errors.js'
import type { IngestionLoop } from './IngestionLoop.js'

/**
 * Run the loop to completion and map the result to a process exit code:
 * 0 after a requested stop, 1 when startup gave up.
 */
export async function runToExit(loop: Pick<IngestionLoop, 'run'>, log: ChannelLogger): Promise<number> {
    try {
        await loop.run()
        log.info('gateway stopped')
        return 0
    } catch (err) {
        log.fatal(`failed to start err=${JSON.stringify(describeError(err))}`)
        return 1
    }
}
