import { v4 as uuidv4 } from "uuid";
import type {
  HttpRequest,
  IMiddlewareContext,
  IMiddlewareLogger,
  ISelfDescribingMiddleware,
  MiddlewareAction,
  MiddlewareMetadata,
} from "@tollgate/middleware-sdk";
import {
  IdentifierExtractor,
  MiddlewareActions,
  parseMiddlewareConfig,
} from "@tollgate/middleware-sdk";
import { RateLimitConfigSchema } from "./config";
import { InvalidRequestIdError, PlanLimitFetchError } from "./errors";
import { userIdFromRequestId } from "./request-id";
import { SubscriptionClient } from "./subscription-client";
import type { PlanLimitSource } from "./subscription-client";
import { UsageLimitCache } from "./usage-limit-cache";
import { UsageStoreClient } from "./usage-store-client";

/** Header carrying a fresh id for each admitted request. */
export const FORWARDED_ID_HEADER = "x-uuid";

export interface UsageRecorder {
  record(requestId: string): Promise<void>;
}

export interface RateLimitDependencies {
  planLimits?: PlanLimitSource;
  usageStore?: UsageRecorder;
  fetch?: typeof fetch;
  now?: () => number;
}

interface ActiveState {
  readonly extractor: IdentifierExtractor;
  readonly cache: UsageLimitCache;
  readonly usageStore: UsageRecorder;
  readonly logger: IMiddlewareLogger;
}

export class RateLimitMiddleware implements ISelfDescribingMiddleware {
  readonly name = "rate-limit";

  private state: ActiveState | null = null;
  private readonly pendingRecords = new Set<Promise<void>>();

  constructor(private readonly dependencies: RateLimitDependencies = {}) {}

  async initialize(context: IMiddlewareContext): Promise<void> {
    const config = parseMiddlewareConfig(RateLimitConfigSchema, context.middlewareConfig, this.name);
    const extractor = new IdentifierExtractor(config.requestIdPattern);

    const planLimits =
      this.dependencies.planLimits ??
      new SubscriptionClient({
        planLimitUrl: config.planLimitUrl,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
        fetch: this.dependencies.fetch,
      });
    const usageStore =
      this.dependencies.usageStore ??
      new UsageStoreClient({
        storeUrl: config.storeUrl,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
        fetch: this.dependencies.fetch,
      });

    const cache = new UsageLimitCache({
      source: planLimits,
      refreshIntervalMs: config.refreshIntervalMs,
      recordTtlMs: config.recordTtlMs,
      now: this.dependencies.now,
      logger: context.logger,
    });
    cache.start();

    this.state = { extractor, cache, usageStore, logger: context.logger };
    context.logger.info(
      `Enforcing plan limits from ${config.planLimitUrl} (refresh every ${config.refreshIntervalMs}ms)`
    );
  }

  async destroy(): Promise<void> {
    const state = this.state;
    if (!state) return;
    this.state = null;
    await state.cache.stop();
    await Promise.all(this.pendingRecords);
  }

  async onHttpRequest(req: Readonly<HttpRequest>): Promise<MiddlewareAction<HttpRequest>> {
    const state = this.state;
    if (!state) {
      throw new Error(`Middleware "${this.name}" used before initialize()`);
    }

    const requestId = state.extractor.extract(req.path);
    let userId: string;
    try {
      userId = userIdFromRequestId(requestId);
    } catch (err) {
      if (err instanceof InvalidRequestIdError) {
        return MiddlewareActions.block("invalid requestId", 400);
      }
      throw err;
    }

    let admitted: boolean;
    try {
      admitted = (await state.cache.admit(userId)).admitted;
    } catch (err) {
      if (err instanceof PlanLimitFetchError) {
        state.logger.error(`Plan limit unavailable for ${userId}: ${err.message}`);
        return MiddlewareActions.block("rate limit unavailable", 503);
      }
      throw err;
    }

    if (!admitted) {
      return MiddlewareActions.block("too many requests", 429);
    }

    this.recordUsage(state, requestId);

    return MiddlewareActions.modify({
      ...req,
      headers: { ...req.headers, [FORWARDED_ID_HEADER]: uuidv4() },
    });
  }

  /** Usage of a known user, or undefined. */
  usageOf(userId: string): number | undefined {
    return this.state?.cache.get(userId)?.usage;
  }

  getMetadata(): MiddlewareMetadata {
    return {
      displayName: "Rate Limit",
      version: "0.1.0",
      description: "Rejects requests once a user's usage reaches their subscription's request limit",
      hooks: ["onHttpRequest"],
    };
  }

  // The request does not wait for the usage store.
  private recordUsage(state: ActiveState, requestId: string): void {
    const pending = state.usageStore.record(requestId).catch((err: unknown) => {
      const reason = err instanceof Error ? err.message : String(err);
      state.logger.warn(`Failed to record usage for ${requestId}: ${reason}`);
    });
    this.pendingRecords.add(pending);
    void pending.then(() => this.pendingRecords.delete(pending));
  }
}
