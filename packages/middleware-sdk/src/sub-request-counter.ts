import type { Readable } from "node:stream";
import { PooledBuffer } from "./buffer-pool";
import type { BufferPool } from "./buffer-pool";

export const BATCH_CONTENT_TYPE = "application/json";

export interface CountOptions {
  /** Count reported for a JSON body that is not an array. Default: 1. */
  nonBatchCount?: number;
  pool?: BufferPool;
}

/** Media type without parameters, lower-cased. */
export function mediaType(contentType: string | undefined): string {
  return (contentType ?? "").split(";")[0].trim().toLowerCase();
}

/**
 * Number of logical units of work in a request. Only a JSON array counts as
 * a batch; any other content type is one unit and its body is never read.
 */
export async function countSubRequests(
  contentType: string | undefined,
  body: Readable,
  options: CountOptions = {}
): Promise<number> {
  if (mediaType(contentType) !== BATCH_CONTENT_TYPE) {
    return 1;
  }

  const nonBatchCount = options.nonBatchCount ?? 1;
  const buffer = options.pool?.acquire() ?? new PooledBuffer();

  try {
    for await (const chunk of body) {
      buffer.write(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    const decoded: unknown = JSON.parse(buffer.toString());
    return Array.isArray(decoded) ? decoded.length : nonBatchCount;
  } catch {
    // Not a batch. Release whatever is left of the stream.
    body.destroy();
    return nonBatchCount;
  } finally {
    options.pool?.release(buffer);
  }
}
