import type { z } from "zod";
import { MiddlewareConfigError } from "./errors";

/**
 * Validate a middleware's raw `config` object against its zod schema.
 * Throws MiddlewareConfigError listing every issue on failure.
 */
export function parseMiddlewareConfig<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  middleware: string
): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  throw new MiddlewareConfigError(
    `Invalid configuration: ${issues.join("; ")}`,
    middleware,
    issues
  );
}

/** Numeric option where 0 (or absence) selects the default. */
export function withDefault(value: number | undefined, fallback: number): number {
  return value === undefined || value === 0 ? fallback : value;
}
