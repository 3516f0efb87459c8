/** The subscription service did not return a usable plan limit. */
export class PlanLimitFetchError extends Error {
  constructor(
    message: string,
    public readonly userId: string,
    public readonly statusCode?: number,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "PlanLimitFetchError";
  }
}

/** The request id does not end in a parseable user UUID. */
export class InvalidRequestIdError extends Error {
  constructor(public readonly requestId: string) {
    super(`invalid requestId "${requestId}"`);
    this.name = "InvalidRequestIdError";
  }
}

/** The usage store refused or missed a usage record. Logged only. */
export class UsageStoreError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "UsageStoreError";
  }
}
