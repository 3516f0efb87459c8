import { UsageStoreError } from "./errors";
import { DEFAULT_REMOTE_TIMEOUT_MS } from "./subscription-client";

export interface UsageStoreClientOptions {
  storeUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/** Records each admitted request with the usage store, one call per request. */
export class UsageStoreClient {
  private readonly storeUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: UsageStoreClientOptions) {
    this.storeUrl = options.storeUrl;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  async record(requestId: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchFn(this.storeUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Api-Key": this.apiKey,
        },
        body: JSON.stringify({ request_id: requestId }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      throw new UsageStoreError(`Usage store unreachable: ${cause.message}`, undefined, cause);
    }

    await response.arrayBuffer();
    if (response.status !== 200) {
      throw new UsageStoreError(`Usage store answered ${response.status}`, response.status);
    }
  }
}
