/**
 * Raised while a middleware initializes with missing or malformed config.
 * The proxy treats it as fatal: the middleware is never put in the chain.
 */
export class MiddlewareConfigError extends Error {
  constructor(
    message: string,
    public readonly middleware?: string,
    public readonly issues: string[] = []
  ) {
    super(middleware ? `[${middleware}] ${message}` : message);
    this.name = "MiddlewareConfigError";
  }
}

/** The inbound body stream failed before its end was reached. */
export class BodyReadError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "BodyReadError";
  }
}
