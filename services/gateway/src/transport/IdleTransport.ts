// services/gateway/src/transport/IdleTransport.ts
import { sleep as defaultSleep, type Sleep } from '../core/types.js'
import type { TransportAdapter, TransportHandle } from './types.js'

/**
 * Testing-mode stand-in for the serial link when no data is simulated:
 * always alive, every read times out empty.
 */
export class IdleTransport implements TransportAdapter {
    readonly description = 'idle:testing'

    constructor(private readonly sleep: Sleep = defaultSleep) {}

    async open(): Promise<TransportHandle> {
        let open = true
        const sleep = this.sleep

        return {
            description: this.description,
            async readLine(timeoutMs: number): Promise<string> {
                if (open) await sleep(timeoutMs)
                return ''
            },
            isAlive: () => open,
            async close(): Promise<void> {
                open = false
            },
        }
    }
}
