// services/gateway/src/transport/SerialTransport.ts
import { SerialPort } from 'serialport'
import { ReadlineParser } from '@serialport/parser-readline'

import { TransportError, describeError } from '../core/errors.js'
import { noopLogger, type LoggerLike } from '../core/types.js'
import { LineBuffer } from './line-buffer.js'
import type { TransportAdapter, TransportHandle } from './types.js'

export interface SerialTransportOptions {
    path: string
    baudRate: number
    /** Lines kept between reads before the oldest are dropped. */
    maxBufferedLines: number
    logger?: LoggerLike
}

/**
 * SerialTransport
 *
 * - Opens the station's serial port (8N1) and splits the byte stream on '\n'.
 * - Trailing '\r' is stripped, so CRLF sketches (Serial.println) work as-is.
 * - Each open() yields a fresh SerialLineHandle; liveness comes from the
 *   port's own 'close' / 'error' events, so an unplugged adapter shows up
 *   as not-alive without a read.
 */
export class SerialTransport implements TransportAdapter {
    private readonly opts: SerialTransportOptions
    private readonly log: LoggerLike

    constructor(opts: SerialTransportOptions) {
        this.opts = opts
        this.log = opts.logger ?? noopLogger
    }

    get description(): string {
        return `serial:${this.opts.path}@${this.opts.baudRate}`
    }

    open(): Promise<TransportHandle> {
        const { path, baudRate, maxBufferedLines } = this.opts

        return new Promise<TransportHandle>((resolve, reject) => {
            const port = new SerialPort({
                path,
                baudRate,
                autoOpen: false,
                dataBits: 8,
                parity: 'none',
                stopBits: 1,
            })

            port.open((err) => {
                if (err) {
                    reject(new TransportError(`failed to open ${path}: ${err.message}`, path, { cause: err }))
                    return
                }
                this.log.info(`kind=serial-open path=${path} baud=${baudRate}`)
                resolve(new SerialLineHandle(port, this.description, maxBufferedLines, this.log))
            })
        })
    }
}

class SerialLineHandle implements TransportHandle {
    readonly description: string
    private readonly port: SerialPort
    private readonly parser: ReadlineParser
    private readonly buffer: LineBuffer
    private readonly log: LoggerLike
    private alive = true

    constructor(port: SerialPort, description: string, maxBufferedLines: number, log: LoggerLike) {
        this.port = port
        this.description = description
        this.log = log
        this.buffer = new LineBuffer(maxBufferedLines)
        this.parser = port.pipe(new ReadlineParser({ delimiter: '\n' }))

        this.parser.on('data', (chunk: unknown) => {
            const line = String(chunk).replace(/\r$/, '')
            this.buffer.push(line)
        })

        port.on('error', (err: Error) => {
            this.alive = false
            this.log.warn(`kind=serial-error path=${port.path} err=${JSON.stringify(err.message)}`)
        })

        port.on('close', () => {
            if (this.alive) {
                this.log.warn(`kind=serial-closed path=${port.path} reason=link-lost`)
            }
            this.alive = false
            this.buffer.close()
        })
    }

    readLine(timeoutMs: number): Promise<string> {
        return this.buffer.next(timeoutMs)
    }

    isAlive(): boolean {
        return this.alive && this.port.isOpen
    }

    async close(): Promise<void> {
        this.alive = false
        this.buffer.close()
        this.port.unpipe(this.parser)
        this.parser.removeAllListeners('data')

        if (!this.port.isOpen) return

        await new Promise<void>((resolve) => {
            this.port.close((err) => {
                if (err) {
                    this.log.debug(`kind=serial-close-error path=${this.port.path} err=${JSON.stringify(describeError(err))}`)
                }
                resolve()
            })
        })

        const dropped = this.buffer.droppedCount
        if (dropped > 0) {
            this.log.warn(`kind=serial-lines-dropped path=${this.port.path} count=${dropped}`)
        }
    }
}
