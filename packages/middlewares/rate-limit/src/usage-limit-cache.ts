// ---------------------------------------------------------------------------
// UsageLimitCache: Per-user usage counted against the subscription's limit
// ---------------------------------------------------------------------------

import type { IMiddlewareLogger } from "@tollgate/middleware-sdk";
import { silentLogger } from "@tollgate/middleware-sdk";
import type { PlanLimitSource } from "./subscription-client";

export const DEFAULT_REFRESH_INTERVAL_MS = 60_000;
export const DEFAULT_RECORD_TTL_MS = 60 * 60_000;

export interface UsageRecord {
  planLimit: number;
  usage: number;
  lastSeenAt: number;
}

export interface Admission {
  readonly admitted: boolean;
  /** Usage after this decision. */
  readonly usage: number;
  readonly planLimit: number;
}

export interface UsageLimitCacheOptions {
  source: PlanLimitSource;
  /** Period of the plan-limit refresh. Default: 60 s. */
  refreshIntervalMs?: number;
  /** Records unused for this long are dropped at the next refresh. Default: 1 h. */
  recordTtlMs?: number;
  now?: () => number;
  logger?: IMiddlewareLogger;
}

/**
 * All reads and writes of a record happen synchronously between awaits, so
 * concurrent admissions on the event loop cannot lose increments. Plan-limit
 * fetches are single-flight per user.
 */
export class UsageLimitCache {
  private readonly records = new Map<string, UsageRecord>();
  private readonly inflight = new Map<string, Promise<UsageRecord>>();
  private readonly source: PlanLimitSource;
  private readonly refreshIntervalMs: number;
  private readonly recordTtlMs: number;
  private readonly now: () => number;
  private readonly logger: IMiddlewareLogger;

  private ticker: ReturnType<typeof setInterval> | null = null;
  private refreshing: Promise<void> | null = null;

  constructor(options: UsageLimitCacheOptions) {
    this.source = options.source;
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.recordTtlMs = options.recordTtlMs ?? DEFAULT_RECORD_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.records.size;
  }

  /** Copy of a user's record, or undefined when the user is unknown. */
  get(userId: string): UsageRecord | undefined {
    const record = this.records.get(userId);
    return record ? { ...record } : undefined;
  }

  /**
   * Count one request for `userId`. An unknown user's plan limit is fetched
   * first; a failed fetch rejects with PlanLimitFetchError and counts nothing.
   */
  async admit(userId: string): Promise<Admission> {
    const record = this.records.get(userId) ?? (await this.load(userId));

    record.lastSeenAt = this.now();
    if (record.usage >= record.planLimit) {
      return { admitted: false, usage: record.usage, planLimit: record.planLimit };
    }
    record.usage++;
    return { admitted: true, usage: record.usage, planLimit: record.planLimit };
  }

  /** Re-fetch every known user's plan limit, keeping their usage. */
  async refreshAll(): Promise<void> {
    this.evictIdle();

    for (const userId of [...this.records.keys()]) {
      try {
        const planLimit = await this.source.fetchPlanLimit(userId);
        const record = this.records.get(userId);
        if (record) {
          record.planLimit = planLimit;
        }
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Keeping previous plan limit for ${userId}: ${reason}`);
      }
    }
  }

  start(): void {
    if (this.ticker) return;
    this.ticker = setInterval(() => {
      if (this.refreshing) return;
      this.refreshing = this.refreshAll().finally(() => {
        this.refreshing = null;
      });
    }, this.refreshIntervalMs);
    this.ticker.unref();
  }

  /** Stop the ticker and wait for a refresh in progress. */
  async stop(): Promise<void> {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
    await this.refreshing;
  }

  private load(userId: string): Promise<UsageRecord> {
    let pending = this.inflight.get(userId);
    if (!pending) {
      pending = this.fetchRecord(userId).finally(() => {
        this.inflight.delete(userId);
      });
      this.inflight.set(userId, pending);
    }
    return pending;
  }

  private async fetchRecord(userId: string): Promise<UsageRecord> {
    const planLimit = await this.source.fetchPlanLimit(userId);
    const existing = this.records.get(userId);
    if (existing) {
      existing.planLimit = planLimit;
      return existing;
    }
    const record: UsageRecord = { planLimit, usage: 0, lastSeenAt: this.now() };
    this.records.set(userId, record);
    return record;
  }

  private evictIdle(): void {
    const cutoff = this.now() - this.recordTtlMs;
    for (const [userId, record] of this.records) {
      if (record.lastSeenAt < cutoff) {
        this.records.delete(userId);
        this.logger.debug(`Evicted idle usage record for ${userId}`);
      }
    }
  }
}
