// services/gateway/src/sinks/dual-sink-writer.ts
import { describeError } from '../core/errors.js'
import { noopLogger, type CanonicalRecord, type LoggerLike } from '../core/types.js'
import {
  classifyOutcome,
  type PublishReceipt,
  type RecordSink,
  type WriteOutcome,
} from './record-sink.js'

export type WriterStats = {
  records: number
  full: number
  partial: number
  failed: number
  cacheFailures: number
  timeseriesFailures: number
  lastFailureAt: string | null
}

/**
 * DualSinkWriter
 *
 * Responsibilities:
 * - Commit each record to the cache sink, then the time-series sink
 * - Attempt both sinks every time; one failing never skips or undoes the other
 * - Turn sink errors into a WriteOutcome; write() never throws
 *
 * Logging format convention:
 * - Message strings are "key=value key=value" to match other subsystems.
 */
export class DualSinkWriter {
  private readonly cache: RecordSink
  private readonly timeseries: RecordSink
  private readonly log: LoggerLike
  private readonly now: () => number

  private readonly stats: WriterStats = {
    records: 0,
    full: 0,
    partial: 0,
    failed: 0,
    cacheFailures: 0,
    timeseriesFailures: 0,
    lastFailureAt: null,
  }

  constructor(opts: { cache: RecordSink; timeseries: RecordSink; logger?: LoggerLike; now?: () => number }) {
    this.cache = opts.cache
    this.timeseries = opts.timeseries
    this.log = opts.logger ?? noopLogger
    this.now = opts.now ?? Date.now
  }

  async write(record: CanonicalRecord): Promise<WriteOutcome> {
    // Sequential on purpose: one worker, no interleaving between the sinks.
    const cacheReceipt = await this.publishTo(this.cache, record)
    const timeseriesReceipt = await this.publishTo(this.timeseries, record)

    const status = classifyOutcome(cacheReceipt.ok, timeseriesReceipt.ok)

    this.stats.records += 1
    this.stats[status] += 1
    if (!cacheReceipt.ok) this.stats.cacheFailures += 1
    if (!timeseriesReceipt.ok) this.stats.timeseriesFailures += 1
    if (status !== 'full') this.stats.lastFailureAt = new Date(this.now()).toISOString()

    return {
      cacheOk: cacheReceipt.ok,
      timeseriesOk: timeseriesReceipt.ok,
      status,
      receipts: [cacheReceipt, timeseriesReceipt],
    }
  }

  getStats(): WriterStats {
    return { ...this.stats }
  }

  async healthySnapshot(): Promise<Record<string, boolean>> {
    const out: Record<string, boolean> = {}
    for (const sink of [this.cache, this.timeseries]) {
      try {
        out[sink.id] = await sink.healthy()
      } catch {
        out[sink.id] = false
      }
    }
    return out
  }

  private async publishTo(sink: RecordSink, record: CanonicalRecord): Promise<PublishReceipt> {
    const started = this.now()
    try {
      await sink.publish(record)
      return {
        sinkId: sink.id,
        ok: true,
        publishedAt: new Date(this.now()).toISOString(),
        durationMs: this.now() - started,
      }
    } catch (err) {
      const msg = describeError(err)
      // Keep err as a single token (quoted) since it may contain spaces.
      this.log.error(`kind=sink-publish-failed id=${sink.id} err=${JSON.stringify(msg)}`)
      return {
        sinkId: sink.id,
        ok: false,
        publishedAt: new Date(this.now()).toISOString(),
        durationMs: this.now() - started,
        error: msg,
      }
    }
  }
}
