import { MiddlewareConfigError } from "./errors";

/** Pulls a correlation key out of a request path with a pattern compiled once. */
export class IdentifierExtractor {
  private readonly compiled: RegExp;

  constructor(readonly pattern: string) {
    if (pattern.length === 0) {
      throw new MiddlewareConfigError("pattern can't be empty");
    }
    try {
      this.compiled = new RegExp(pattern);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new MiddlewareConfigError(`invalid pattern "${pattern}": ${reason}`);
    }
  }

  /** Whole first match, or "" when the path does not match. */
  extract(path: string): string {
    return this.compiled.exec(path)?.[0] ?? "";
  }
}
