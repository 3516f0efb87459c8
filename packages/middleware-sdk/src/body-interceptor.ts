import { Readable } from "node:stream";
import type { BufferPool, PooledBuffer } from "./buffer-pool";
import { BodyReadError } from "./errors";

/** Ceiling on intercepted request bodies. */
export const MAX_REQUEST_BODY_SIZE = 2 * 1024 * 1024;

export interface InterceptOptions {
  pool: BufferPool;
  /** Default: MAX_REQUEST_BODY_SIZE. */
  maxBytes?: number;
}

export interface InterceptedBody {
  /** Fresh stream to hand back to the request. */
  readonly downstream: Readable;
  /** Independent stream for observers. */
  readonly observed: Readable;
  /** Bytes in each copy. */
  readonly size: number;
  /** True when the source held more than `maxBytes`. */
  readonly truncated: boolean;
}

/**
 * Read at most `maxBytes` of a single-use body and rebuild it as two
 * independent streams over the same bytes. Anything past the ceiling is
 * discarded for both copies.
 */
export async function interceptBody(
  source: Readable,
  options: InterceptOptions
): Promise<InterceptedBody> {
  const maxBytes = options.maxBytes ?? MAX_REQUEST_BODY_SIZE;

  return options.pool.use(async (buffer) => {
    const truncated = await readBounded(source, buffer, maxBytes);
    return {
      downstream: streamOf(buffer.copy()),
      observed: streamOf(buffer.copy()),
      size: buffer.size,
      truncated,
    };
  });
}

function streamOf(bytes: Buffer): Readable {
  return Readable.from(bytes.length > 0 ? [bytes] : [], { objectMode: false });
}

function readBounded(
  source: Readable,
  target: PooledBuffer,
  maxBytes: number
): Promise<boolean> {
  return new Promise((resolve, reject) => {
    if (source.readableEnded) {
      resolve(false);
      return;
    }
    // A destroyed source emits nothing more; waiting on it would never settle.
    if (source.destroyed || source.errored) {
      reject(readFailure(source.errored));
      return;
    }

    let settled = false;

    // The error listener stays attached after settling so a late failure on
    // the discarded tail is not raised as an unhandled stream error.
    const onError = (err: Error): void => {
      if (settled) return;
      settled = true;
      detach();
      reject(readFailure(err));
    };

    const onClose = (): void => {
      if (settled) return;
      settled = true;
      detach();
      reject(readFailure(null));
    };

    const onEnd = (): void => {
      if (settled) return;
      settled = true;
      detach();
      resolve(false);
    };

    const onData = (chunk: Buffer | string): void => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      const room = maxBytes - target.size;

      if (bytes.length <= room) {
        target.write(bytes);
        return;
      }

      target.write(bytes.subarray(0, room));
      settled = true;
      detach();
      // Let the rest flow into nowhere instead of buffering it.
      source.resume();
      resolve(true);
    };

    function detach(): void {
      source.off("data", onData);
      source.off("end", onEnd);
      source.off("close", onClose);
    }

    source.on("error", onError);
    source.on("close", onClose);
    source.on("end", onEnd);
    source.on("data", onData);
  });
}

function readFailure(err: Error | null): BodyReadError {
  return err
    ? new BodyReadError(`Error reading request body: ${err.message}`, err)
    : new BodyReadError("Error reading request body: stream closed before it ended");
}
