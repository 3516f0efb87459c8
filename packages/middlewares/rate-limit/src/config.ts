import { z } from "zod";
import { withDefault } from "@tollgate/middleware-sdk";
import { DEFAULT_RECORD_TTL_MS, DEFAULT_REFRESH_INTERVAL_MS } from "./usage-limit-cache";
import { DEFAULT_REMOTE_TIMEOUT_MS } from "./subscription-client";

export const DEFAULT_REQUEST_ID_PATTERN = "([a-z0-9]{42})";
export const DEFAULT_RATE_LIMIT_STORE_URL = "http://localhost:8083/api/v1/endpoints/stats";
export const DEFAULT_RATE_LIMIT_PLAN_LIMIT_URL =
  "http://localhost:8083/api/v1/subscriptions/:userId/request-limit";

const seconds = z.number().nonnegative().optional();

/** Options of the rate-limit middleware; durations are in seconds. */
export const RateLimitConfigSchema = z
  .object({
    RequestIdPattern: z
      .string()
      .min(1, "RequestIdPattern can't be empty")
      .default(DEFAULT_REQUEST_ID_PATTERN),
    RateLimitStoreURL: z
      .string()
      .min(1, "RateLimitStoreURL can't be empty")
      .url()
      .default(DEFAULT_RATE_LIMIT_STORE_URL),
    RateLimitPlanLimitURL: z
      .string()
      .min(1, "RateLimitPlanLimitURL can't be empty")
      .includes(":userId", { message: "RateLimitPlanLimitURL needs a :userId placeholder" })
      .default(DEFAULT_RATE_LIMIT_PLAN_LIMIT_URL),
    APIKey: z.string().min(1, "APIKey can't be empty"),
    RefreshInterval: seconds,
    RecordTTL: seconds,
    Timeout: seconds,
  })
  .transform((raw) => ({
    requestIdPattern: raw.RequestIdPattern,
    storeUrl: raw.RateLimitStoreURL,
    planLimitUrl: raw.RateLimitPlanLimitURL,
    apiKey: raw.APIKey,
    refreshIntervalMs: withDefault(raw.RefreshInterval, DEFAULT_REFRESH_INTERVAL_MS / 1000) * 1000,
    recordTtlMs: withDefault(raw.RecordTTL, DEFAULT_RECORD_TTL_MS / 1000) * 1000,
    timeoutMs: withDefault(raw.Timeout, DEFAULT_REMOTE_TIMEOUT_MS / 1000) * 1000,
  }));

export type RateLimitConfigInput = z.input<typeof RateLimitConfigSchema>;
export type RateLimitConfig = z.output<typeof RateLimitConfigSchema>;
