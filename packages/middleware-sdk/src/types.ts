import type { Readable } from "node:stream";

export type HttpHeaders = Record<string, string | string[] | undefined>;

/** HTTP request representation for middleware processing */
export interface HttpRequest {
  readonly method: string;
  readonly path: string;
  readonly headers: HttpHeaders;
  /**
   * Single-use body stream. A middleware that reads it must hand a fresh
   * stream back through a `modify` action, or the upstream receives nothing.
   */
  readonly body: Readable;
  readonly query: Record<string, string>;
}

/** HTTP response representation for middleware processing */
export interface HttpResponse {
  readonly statusCode: number;
  readonly headers: HttpHeaders;
  readonly body: Buffer;
}

/** Discriminated union for middleware actions */
export type MiddlewareAction<T> =
  | { action: "pass" }
  | { action: "modify"; data: T }
  | { action: "block"; reason?: string; statusCode?: number };

/** Convenience factory for creating middleware actions */
export const MiddlewareActions = {
  pass: (): MiddlewareAction<never> => ({ action: "pass" }),
  modify: <T>(data: T): MiddlewareAction<T> => ({ action: "modify", data }),
  block: (reason?: string, statusCode?: number): MiddlewareAction<never> => ({
    action: "block",
    reason,
    statusCode,
  }),
} as const;

/** First value of a header, ignoring repeats. */
export function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
