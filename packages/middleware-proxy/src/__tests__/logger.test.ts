import { Writable } from "node:stream";
import { createLogger, toMiddlewareLogger } from "../logger";

function captureLines(): { stream: Writable; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      for (const line of chunk.toString().split("\n")) {
        if (line) lines.push(JSON.parse(line));
      }
      callback();
    },
  });
  return { stream, lines };
}

describe("toMiddlewareLogger", () => {
  it("writes plain messages with the child's bindings", () => {
    const { stream, lines } = captureLines();
    const logger = toMiddlewareLogger(createLogger(stream).child({ middleware: "rate-limit" }));

    logger.info("Enforcing plan limits");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Enforcing plan limits",
      middleware: "rate-limit",
      service: "middleware-proxy",
    });
  });

  it("serializes a leading error under err", () => {
    const { stream, lines } = captureLines();
    const logger = toMiddlewareLogger(createLogger(stream));

    logger.error("Middleware failed", new Error("boom"));

    expect(lines[0]).toMatchObject({ level: 50, msg: "Middleware failed" });
    expect(lines[0]?.err).toMatchObject({ type: "Error", message: "boom" });
  });

  it("keeps other arguments under args", () => {
    const { stream, lines } = captureLines();
    const logger = toMiddlewareLogger(createLogger(stream));

    logger.warn("Slow flush", 1200, "ms");

    expect(lines[0]).toMatchObject({ level: 40, msg: "Slow flush", args: [1200, "ms"] });
  });
});
