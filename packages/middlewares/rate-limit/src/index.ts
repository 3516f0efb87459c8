import type { IMiddleware } from "@tollgate/middleware-sdk";
import { RateLimitMiddleware } from "./rate-limit-middleware";

export { RateLimitMiddleware, FORWARDED_ID_HEADER } from "./rate-limit-middleware";
export type { RateLimitDependencies, UsageRecorder } from "./rate-limit-middleware";
export { UsageLimitCache } from "./usage-limit-cache";
export type { Admission, UsageLimitCacheOptions, UsageRecord } from "./usage-limit-cache";
export { SubscriptionClient } from "./subscription-client";
export type { PlanLimitSource, SubscriptionClientOptions } from "./subscription-client";
export { UsageStoreClient } from "./usage-store-client";
export type { UsageStoreClientOptions } from "./usage-store-client";
export { userIdFromRequestId } from "./request-id";
export { InvalidRequestIdError, PlanLimitFetchError, UsageStoreError } from "./errors";
export { RateLimitConfigSchema } from "./config";
export type { RateLimitConfig, RateLimitConfigInput } from "./config";

export default function createMiddleware(): IMiddleware {
  return new RateLimitMiddleware();
}
