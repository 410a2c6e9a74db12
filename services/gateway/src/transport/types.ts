// services/gateway/src/transport/types.ts

/**
 * An open link to the station. One handle per successful open(); a handle
 * that has gone dead is closed and replaced, never revived.
 */
export interface TransportHandle {
    /** e.g. "serial:/dev/ttyUSB0@9600" */
    readonly description: string
    /**
     * Resolve with the next line, or with '' once timeoutMs passes without one.
     * Never waits longer than timeoutMs.
     */
    readLine(timeoutMs: number): Promise<string>
    /** Link state as last reported by the port; no read needed. */
    isAlive(): boolean
    close(): Promise<void>
}

export interface TransportAdapter {
    readonly description: string
    /** Rejects with TransportError when the link cannot be opened. */
    open(): Promise<TransportHandle>
}
