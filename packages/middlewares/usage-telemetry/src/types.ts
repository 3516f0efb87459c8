/** One observed request. */
export interface LogEntry {
  readonly requestId: string;
  readonly count: number;
}

/** Wire form accepted by the collector. */
export interface LogEntryDto {
  request_id: string;
  count: number;
}

/** Destination of flushed batches. */
export interface BatchSink {
  deliver(batch: ReadonlyArray<LogEntry>): Promise<void>;
}

export interface PipelineStats {
  /** Entries waiting in the queue. */
  queued: number;
  /** Entries refused because the queue was full or closed. */
  dropped: number;
  /** Entries handed to the sink, delivered or not. */
  flushed: number;
  /** Entries in batches the sink accepted. */
  delivered: number;
  /** Flush attempts that failed. */
  failedFlushes: number;
}

export function toDto(entry: LogEntry): LogEntryDto {
  return { request_id: entry.requestId, count: entry.count };
}
