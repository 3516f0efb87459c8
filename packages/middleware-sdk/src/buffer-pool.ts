// ---------------------------------------------------------------------------
// BufferPool: Reusable byte buffers for body reads and decodes
// ---------------------------------------------------------------------------

const DEFAULT_INITIAL_CAPACITY = 16 * 1024;
const DEFAULT_MAX_RETAINED_CAPACITY = 4 * 1024 * 1024;
const DEFAULT_MAX_POOLED = 64;

/** Growable byte buffer. Contents are only valid while it is borrowed. */
export class PooledBuffer {
  private storage: Buffer;
  private length = 0;

  constructor(initialCapacity = DEFAULT_INITIAL_CAPACITY) {
    this.storage = Buffer.allocUnsafe(initialCapacity);
  }

  get size(): number {
    return this.length;
  }

  get capacity(): number {
    return this.storage.length;
  }

  write(chunk: Uint8Array): void {
    this.ensureCapacity(this.length + chunk.length);
    this.storage.set(chunk, this.length);
    this.length += chunk.length;
  }

  /** View over the written bytes; copy it before the buffer is released. */
  bytes(): Buffer {
    return this.storage.subarray(0, this.length);
  }

  /** Copy of the written bytes, safe to keep after release. */
  copy(): Buffer {
    return Buffer.from(this.bytes());
  }

  toString(encoding: BufferEncoding = "utf8"): string {
    return this.storage.toString(encoding, 0, this.length);
  }

  reset(): void {
    this.length = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.storage.length) return;
    let next = Math.max(this.storage.length, 1);
    while (next < required) next *= 2;
    const grown = Buffer.allocUnsafe(next);
    this.storage.copy(grown, 0, 0, this.length);
    this.storage = grown;
  }
}

export interface BufferPoolOptions {
  /** Capacity of newly allocated buffers. Default: 16 KiB. */
  initialCapacity?: number;
  /** Buffers that grew past this are dropped on release instead of pooled. Default: 4 MiB. */
  maxRetainedCapacity?: number;
  /** Maximum idle buffers kept. Default: 64. */
  maxPooled?: number;
}

export class BufferPool {
  private readonly idle: PooledBuffer[] = [];
  private readonly initialCapacity: number;
  private readonly maxRetainedCapacity: number;
  private readonly maxPooled: number;

  constructor(options?: BufferPoolOptions) {
    this.initialCapacity = options?.initialCapacity ?? DEFAULT_INITIAL_CAPACITY;
    this.maxRetainedCapacity = options?.maxRetainedCapacity ?? DEFAULT_MAX_RETAINED_CAPACITY;
    this.maxPooled = options?.maxPooled ?? DEFAULT_MAX_POOLED;
  }

  /** Number of idle buffers ready to be borrowed. */
  get available(): number {
    return this.idle.length;
  }

  acquire(): PooledBuffer {
    const buffer = this.idle.pop() ?? new PooledBuffer(this.initialCapacity);
    buffer.reset();
    return buffer;
  }

  release(buffer: PooledBuffer): void {
    buffer.reset();
    if (buffer.capacity > this.maxRetainedCapacity) return;
    if (this.idle.length >= this.maxPooled) return;
    if (this.idle.includes(buffer)) return;
    this.idle.push(buffer);
  }

  /** Borrow a buffer for the duration of `fn`; it is returned even if `fn` throws. */
  async use<T>(fn: (buffer: PooledBuffer) => Promise<T> | T): Promise<T> {
    const buffer = this.acquire();
    try {
      return await fn(buffer);
    } finally {
      this.release(buffer);
    }
  }
}
