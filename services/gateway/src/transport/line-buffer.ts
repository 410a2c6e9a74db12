// services/gateway/src/transport/line-buffer.ts

type Waiter = {
    resolve: (line: string) => void
    timer: NodeJS.Timeout
}

/**
 * Bridges the push-style parser stream to the pull-style readLine() the
 * ingestion loop wants. Holds at most `maxLines`; the oldest are dropped.
 */
export class LineBuffer {
    private readonly lines: string[] = []
    private readonly waiters: Waiter[] = []
    private closed = false
    private dropped = 0

    constructor(private readonly maxLines: number) {}

    push(line: string): void {
        if (this.closed) return

        const waiter = this.waiters.shift()
        if (waiter) {
            clearTimeout(waiter.timer)
            waiter.resolve(line)
            return
        }

        this.lines.push(line)
        if (this.lines.length > this.maxLines) {
            this.lines.shift()
            this.dropped += 1
        }
    }

    next(timeoutMs: number): Promise<string> {
        const queued = this.lines.shift()
        if (queued !== undefined) return Promise.resolve(queued)
        if (this.closed) return Promise.resolve('')

        return new Promise<string>((resolve) => {
            const waiter: Waiter = {
                resolve,
                timer: setTimeout(() => {
                    const idx = this.waiters.indexOf(waiter)
                    if (idx >= 0) this.waiters.splice(idx, 1)
                    resolve('')
                }, Math.max(0, timeoutMs)),
            }
            this.waiters.push(waiter)
        })
    }

    /** Wake every pending reader with '' and refuse further lines. */
    close(): void {
        this.closed = true
        for (const waiter of this.waiters.splice(0)) {
            clearTimeout(waiter.timer)
            waiter.resolve('')
        }
    }

    get droppedCount(): number {
        return this.dropped
    }
}
