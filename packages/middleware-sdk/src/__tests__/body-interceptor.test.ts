import { PassThrough } from "node:stream";
import { BufferPool } from "../buffer-pool";
import { interceptBody, MAX_REQUEST_BODY_SIZE } from "../body-interceptor";
import { BodyReadError } from "../errors";
import { failingStream, readAll, streamOf } from "./helpers";

describe("interceptBody", () => {
  let pool: BufferPool;

  beforeEach(() => {
    pool = new BufferPool({ initialCapacity: 8 });
  });

  it("gives both copies the exact bytes of a body under the ceiling", async () => {
    const result = await interceptBody(streamOf('[{"a":1},', '{"b":2}]'), { pool });

    expect(result.size).toBe(17);
    expect(result.truncated).toBe(false);
    expect((await readAll(result.downstream)).toString()).toBe('[{"a":1},{"b":2}]');
    expect((await readAll(result.observed)).toString()).toBe('[{"a":1},{"b":2}]');
  });

  it("keeps the copies independent: draining one leaves the other readable", async () => {
    const result = await interceptBody(streamOf("hello"), { pool });

    await readAll(result.observed);

    expect((await readAll(result.downstream)).toString()).toBe("hello");
  });

  it("truncates both copies to exactly the ceiling", async () => {
    const result = await interceptBody(streamOf("abc", "def", "ghi"), { pool, maxBytes: 4 });

    expect(result.size).toBe(4);
    expect(result.truncated).toBe(true);
    expect((await readAll(result.downstream)).toString()).toBe("abcd");
    expect((await readAll(result.observed)).toString()).toBe("abcd");
  });

  it("does not mark a body of exactly the ceiling as truncated", async () => {
    const result = await interceptBody(streamOf("abc", "def"), { pool, maxBytes: 6 });

    expect(result.truncated).toBe(false);
    expect((await readAll(result.downstream)).toString()).toBe("abcdef");
  });

  it("produces empty copies for an empty body", async () => {
    const result = await interceptBody(streamOf(), { pool });

    expect(result.size).toBe(0);
    expect(await readAll(result.downstream)).toHaveLength(0);
    expect(await readAll(result.observed)).toHaveLength(0);
  });

  it("copies bytes out so reusing the pooled buffer cannot corrupt them", async () => {
    const first = await interceptBody(streamOf("first-body"), { pool });
    await interceptBody(streamOf("XXXXXXXXXX"), { pool });

    expect((await readAll(first.downstream)).toString()).toBe("first-body");
  });

  it("rejects with BodyReadError when the stream fails", async () => {
    await expect(
      interceptBody(failingStream("socket hang up"), { pool })
    ).rejects.toThrow(BodyReadError);
  });

  it("rejects a source that errored before interception started", async () => {
    const source = new PassThrough();
    source.write(Buffer.from("partial"));
    source.on("error", () => undefined);
    source.destroy(new Error("aborted"));

    await expect(interceptBody(source, { pool })).rejects.toThrow(
      "Error reading request body: aborted"
    );
    expect(pool.available).toBe(1);
  });

  it("rejects a source destroyed without an error before interception started", async () => {
    const source = new PassThrough();
    source.write(Buffer.from("partial"));
    source.destroy();

    await expect(interceptBody(source, { pool })).rejects.toThrow(
      "Error reading request body: stream closed before it ended"
    );
    expect(pool.available).toBe(1);
  });

  it("rejects when the source closes before it ends", async () => {
    const source = new PassThrough();
    source.write(Buffer.from("partial"));

    const pending = interceptBody(source, { pool });
    setImmediate(() => source.destroy());

    await expect(pending).rejects.toThrow(
      "Error reading request body: stream closed before it ended"
    );
  });

  it("returns the buffer to the pool whether the read succeeds or fails", async () => {
    await interceptBody(streamOf("ok"), { pool });
    expect(pool.available).toBe(1);

    await interceptBody(failingStream("boom"), { pool }).catch((err: unknown) => err);
    expect(pool.available).toBe(1);
  });

  it("keeps an error listener on a truncated source", async () => {
    const source = new PassThrough();
    source.write(Buffer.from("abcdef"));

    const result = await interceptBody(source, { pool, maxBytes: 3 });

    expect(result.truncated).toBe(true);
    expect(source.listenerCount("error")).toBeGreaterThan(0);
    source.destroy(new Error("late failure"));
  });

  it("uses a 2 MiB ceiling by default", () => {
    expect(MAX_REQUEST_BODY_SIZE).toBe(2 * 1024 * 1024);
  });
});
