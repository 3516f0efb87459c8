import { z } from "zod";
import { PlanLimitFetchError } from "./errors";

export const DEFAULT_REMOTE_TIMEOUT_MS = 5_000;

const PlanLimitResponseSchema = z.object({
  data: z.object({
    request_limit: z.number().int(),
  }),
});

export interface PlanLimitSource {
  fetchPlanLimit(userId: string): Promise<number>;
}

export interface SubscriptionClientOptions {
  /** URL template; `:userId` is replaced with the user id. */
  planLimitUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class SubscriptionClient implements PlanLimitSource {
  private readonly planLimitUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: SubscriptionClientOptions) {
    this.planLimitUrl = options.planLimitUrl;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  urlFor(userId: string): string {
    return this.planLimitUrl.replace(":userId", encodeURIComponent(userId));
  }

  /** GET the user's plan and return `data.request_limit`. */
  async fetchPlanLimit(userId: string): Promise<number> {
    let response: Response;
    try {
      response = await this.fetchFn(this.urlFor(userId), {
        method: "GET",
        headers: {
          "Content-Type": "application/json",
          "X-Api-Key": this.apiKey,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new PlanLimitFetchError(
        `Subscription service unreachable: ${cause.message}`,
        userId,
        undefined,
        cause
      );
    }

    if (response.status !== 200) {
      await response.arrayBuffer();
      throw new PlanLimitFetchError(
        `Subscription service answered ${response.status}`,
        userId,
        response.status
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new PlanLimitFetchError(`Unreadable plan limit: ${cause.message}`, userId, 200, cause);
    }

    const parsed = PlanLimitResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new PlanLimitFetchError(
        `Unexpected plan limit payload: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
        userId,
        200
      );
    }
    return parsed.data.data.request_limit;
  }
}
