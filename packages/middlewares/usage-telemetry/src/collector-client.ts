// ---------------------------------------------------------------------------
// CollectorClient: POSTs batches of log entries to the usage collector
// ---------------------------------------------------------------------------

import { CollectorDeliveryError } from "./errors";
import { toDto } from "./types";
import type { BatchSink, LogEntry } from "./types";

export const DEFAULT_COLLECTOR_TIMEOUT_MS = 10_000;

export interface CollectorClientOptions {
  remoteAddress: string;
  apiKey: string;
  /** Per-call timeout. Default: 10 s. */
  timeoutMs?: number;
  /** Injected for tests. Default: global fetch. */
  fetch?: typeof fetch;
}

export class CollectorClient implements BatchSink {
  private readonly remoteAddress: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: CollectorClientOptions) {
    this.remoteAddress = options.remoteAddress;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COLLECTOR_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  /**
   * Send one batch in a single call. Resolves only on HTTP 200; anything
   * else rejects with CollectorDeliveryError.
   */
  async deliver(batch: ReadonlyArray<LogEntry>): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchFn(this.remoteAddress, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Api-Key": this.apiKey,
        },
        body: JSON.stringify(batch.map(toDto)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new CollectorDeliveryError(
        `Collector unreachable: ${cause.message}`,
        undefined,
        undefined,
        cause
      );
    }

    if (response.status !== 200) {
      const body = await response.text().catch(() => "");
      throw new CollectorDeliveryError(
        `unexpected status code: ${response.status}, body: ${body}`,
        response.status,
        body
      );
    }

    // Drain so the connection goes back to the agent's pool.
    await response.arrayBuffer();
  }
}
