// ---------------------------------------------------------------------------
// TelemetryPipeline: Bounded queue drained by a single batching aggregator
// ---------------------------------------------------------------------------

import type { IMiddlewareLogger } from "@tollgate/middleware-sdk";
import { silentLogger } from "@tollgate/middleware-sdk";
import { BoundedQueue } from "./bounded-queue";
import type { BatchSink, LogEntry, PipelineStats } from "./types";

export const DEFAULT_LOG_BUFFER_SIZE = 100_000;
export const DEFAULT_MAX_BATCH_SIZE = 20;
export const DEFAULT_BATCH_FLUSH_INTERVAL_MS = 2_000;

export interface TelemetryPipelineOptions {
  sink: BatchSink;
  /** Queue capacity. Default: 100000. */
  bufferSize?: number;
  /** Entries per flush. Default: 20. */
  batchSize?: number;
  /** Time between timer flushes. Default: 2 s. */
  flushIntervalMs?: number;
  logger?: IMiddlewareLogger;
}

/**
 * Producers call `offer` from the request path and never wait. One
 * aggregator loop drains the queue into a batch and hands the batch to the
 * sink once it holds `batchSize` entries or the flush timer fires, whichever
 * comes first. Every flush restarts the timer.
 */
export class TelemetryPipeline {
  private readonly sink: BatchSink;
  private readonly queue: BoundedQueue<LogEntry>;
  private readonly batchSize: number;
  private readonly flushIntervalMs: number;
  private readonly logger: IMiddlewareLogger;

  private batch: LogEntry[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  private timerDue = false;
  private wake: (() => void) | null = null;
  private closing = false;
  private loop: Promise<void> | null = null;

  private dropped = 0;
  private flushed = 0;
  private delivered = 0;
  private failedFlushes = 0;

  constructor(options: TelemetryPipelineOptions) {
    this.sink = options.sink;
    this.queue = new BoundedQueue<LogEntry>(options.bufferSize ?? DEFAULT_LOG_BUFFER_SIZE);
    this.batchSize = options.batchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_BATCH_FLUSH_INTERVAL_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Start the aggregator. Calling it again is a no-op. */
  start(): void {
    if (this.loop || this.closing) return;
    this.armTimer();
    this.loop = this.run();
  }

  /** Enqueue without blocking. Returns false when the entry was dropped. */
  offer(entry: LogEntry): boolean {
    if (this.closing || !this.queue.offer(entry)) {
      this.dropped++;
      this.logger.warn(
        `Dropped log entry for "${entry.requestId}": ` +
          (this.closing ? "pipeline is closed" : "buffer is full") +
          ` (${this.dropped} dropped so far)`
      );
      return false;
    }
    this.notify();
    return true;
  }

  /**
   * Stop accepting entries, drain what is queued, flush the last partial
   * batch and wait for the aggregator to finish.
   */
  async close(): Promise<void> {
    this.closing = true;
    if (!this.loop) {
      this.loop = this.run();
    }
    this.notify();
    await this.loop;
    this.clearTimer();
  }

  stats(): PipelineStats {
    return {
      queued: this.queue.size,
      dropped: this.dropped,
      flushed: this.flushed,
      delivered: this.delivered,
      failedFlushes: this.failedFlushes,
    };
  }

  private async run(): Promise<void> {
    for (;;) {
      if (this.timerDue) {
        this.timerDue = false;
        if (this.batch.length > 0) {
          await this.flush();
        } else {
          this.armTimer();
        }
        continue;
      }

      const entry = this.queue.poll();
      if (entry !== undefined) {
        this.batch.push(entry);
        if (this.batch.length >= this.batchSize) {
          await this.flush();
        }
        continue;
      }

      if (this.closing) break;

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }

    if (this.batch.length > 0) {
      await this.flush();
    }
  }

  private async flush(): Promise<void> {
    const batch = this.batch;
    this.batch = [];
    if (!this.closing) {
      this.armTimer();
    }
    this.flushed += batch.length;

    try {
      await this.sink.deliver(batch);
      this.delivered += batch.length;
    } catch (err) {
      this.failedFlushes++;
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`FLUSH_LOGS: dropped batch of ${batch.length}: ${reason}`);
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private armTimer(): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.timerDue = true;
      this.notify();
    }, this.flushIntervalMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    this.timerDue = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
