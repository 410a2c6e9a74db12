/**
 * Record sink interface.
 *
 * The gateway has exactly two sinks, the latest-status cache and the
 * time-series store. Each commits a CanonicalRecord on its own; neither
 * knows about the other.
 */
import type { CanonicalRecord } from '../core/types.js'

export type SinkId = 'cache' | 'timeseries'

export interface RecordSink {
  readonly id: SinkId
  /** Throws CacheWriteError / TimeseriesWriteError; the writer catches. */
  publish(record: CanonicalRecord): Promise<void>
  healthy(): Promise<boolean>
  shutdown(): Promise<void>
}

export type PublishReceipt = {
  sinkId: SinkId
  ok: boolean
  publishedAt: string // ISO
  durationMs: number
  error?: string
}

export type WriteStatus = 'full' | 'partial' | 'failed'

export type WriteOutcome = {
  cacheOk: boolean
  timeseriesOk: boolean
  status: WriteStatus
  receipts: PublishReceipt[]
}

export function classifyOutcome(cacheOk: boolean, timeseriesOk: boolean): WriteStatus {
  if (cacheOk && timeseriesOk) return 'full'
  if (cacheOk || timeseriesOk) return 'partial'
  return 'failed'
}
