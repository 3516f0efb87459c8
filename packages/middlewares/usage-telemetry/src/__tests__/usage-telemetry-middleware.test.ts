import { Readable } from "node:stream";
import type {
  HttpRequest,
  IMiddlewareContext,
  IMiddlewareLogger,
  MiddlewareAction,
} from "@tollgate/middleware-sdk";
import { MiddlewareConfigError } from "@tollgate/middleware-sdk";
import createMiddleware, { UsageTelemetryMiddleware } from "../index";
import type { BatchSink, LogEntry } from "../types";

const UUID_PATTERN =
  "([0-9a-z]{8}-[0-9a-z]{4}-[0-9a-z]{4}-[0-9a-z]{4}-[0-9a-z]{12})";
const REQUEST_ID = "550e8400-e29b-41d4-a716-446655440000";

function mockLogger(): jest.Mocked<IMiddlewareLogger> {
  return { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

function makeContext(
  middlewareConfig: Record<string, unknown>,
  logger: IMiddlewareLogger = mockLogger()
): IMiddlewareContext {
  return {
    serviceName: "test",
    externalPort: 18789,
    internalPort: 18790,
    middlewareConfig,
    logger,
  };
}

function makeRequest(overrides: Partial<HttpRequest> & { rawBody?: string } = {}): HttpRequest {
  const { rawBody = "", ...rest } = overrides;
  return {
    method: "POST",
    path: `/v1/${REQUEST_ID}/items`,
    headers: { "content-type": "application/json", "content-length": String(rawBody.length) },
    body: Readable.from(rawBody.length > 0 ? [Buffer.from(rawBody)] : []),
    query: {},
    ...rest,
  };
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks).toString();
}

function modified(result: MiddlewareAction<HttpRequest>): HttpRequest {
  if (result.action !== "modify") {
    throw new Error(`expected modify, got ${result.action}`);
  }
  return result.data;
}

function recordingSink(): { sink: BatchSink; batches: LogEntry[][] } {
  const batches: LogEntry[][] = [];
  return {
    batches,
    sink: {
      deliver: async (batch) => {
        batches.push([...batch]);
      },
    },
  };
}

const baseConfig = {
  Pattern: UUID_PATTERN,
  RemoteAddress: "http://collector.test/api/v1/activity",
  APIKey: "test-key",
  BatchSize: 1,
};

describe("UsageTelemetryMiddleware", () => {
  let middleware: UsageTelemetryMiddleware;
  let sinkBatches: LogEntry[][];

  beforeEach(async () => {
    const { sink, batches } = recordingSink();
    sinkBatches = batches;
    middleware = new UsageTelemetryMiddleware({ sink });
    await middleware.initialize(makeContext(baseConfig));
  });

  afterEach(async () => {
    await middleware.destroy();
  });

  it("re-injects the body unchanged for the upstream", async () => {
    const rawBody = '[{"a":1},{"b":2},{"c":3}]';

    const result = await middleware.onHttpRequest(makeRequest({ rawBody }));

    expect(await readAll(modified(result).body)).toBe(rawBody);
  });

  it("reports the correlation id and sub-request count", async () => {
    await middleware.onHttpRequest(makeRequest({ rawBody: '[{"a":1},{"b":2},{"c":3}]' }));
    await middleware.destroy();

    expect(sinkBatches).toEqual([[{ requestId: REQUEST_ID, count: 3 }]]);
  });

  it("counts a non-JSON request as one without caring about its body", async () => {
    await middleware.onHttpRequest(
      makeRequest({ rawBody: "[1,2]", headers: { "content-type": "text/plain" } })
    );
    await middleware.destroy();

    expect(sinkBatches).toEqual([[{ requestId: REQUEST_ID, count: 1 }]]);
  });

  it("reports an empty id when the path does not match", async () => {
    await middleware.onHttpRequest(makeRequest({ path: "/health" }));
    await middleware.destroy();

    expect(sinkBatches).toEqual([[{ requestId: "", count: 1 }]]);
  });

  it("replaces chunked framing with the length of the re-injected body", async () => {
    const request = makeRequest({
      rawBody: "[1]",
      headers: { "content-type": "application/json", "transfer-encoding": "chunked" },
    });

    const headers = modified(await middleware.onHttpRequest(request)).headers;

    expect(headers["content-length"]).toBe("3");
    expect(headers["transfer-encoding"]).toBeUndefined();
  });

  it("leaves headers alone for a request without a body", async () => {
    const request = makeRequest({ method: "GET", headers: {} });

    const result = modified(await middleware.onHttpRequest(request));

    expect(result.headers).toBe(request.headers);
  });

  it("truncates oversized bodies to the configured ceiling", async () => {
    const { sink } = recordingSink();
    const small = new UsageTelemetryMiddleware({ sink });
    await small.initialize(makeContext({ ...baseConfig, MaxRequestBodySize: 4 }));

    const result = modified(
      await small.onHttpRequest(
        makeRequest({ rawBody: "abcdefgh", headers: { "content-type": "text/plain" } })
      )
    );

    expect(await readAll(result.body)).toBe("abcd");
    expect(result.headers["content-length"]).toBe("4");
    await small.destroy();
  });

  it("blocks with 500 when the body cannot be read", async () => {
    const logger = mockLogger();
    const { sink } = recordingSink();
    const failing = new UsageTelemetryMiddleware({ sink });
    await failing.initialize(makeContext(baseConfig, logger));
    const body = new Readable({
      read() {
        this.destroy(new Error("connection reset"));
      },
    });

    const result = await failing.onHttpRequest(makeRequest({ body }));

    expect(result).toEqual({
      action: "block",
      reason: "Error reading request body",
      statusCode: 500,
    });
    expect(logger.error).toHaveBeenCalledWith(
      "Error reading request body: connection reset"
    );
    await failing.destroy();
    expect(failing.stats()).toBeNull();
  });

  it("exposes pipeline stats", async () => {
    await middleware.onHttpRequest(makeRequest());

    expect(middleware.stats()).toMatchObject({ dropped: 0 });
  });

  it("throws when used before initialize", async () => {
    await expect(new UsageTelemetryMiddleware().onHttpRequest(makeRequest())).rejects.toThrow(
      "used before initialize()"
    );
  });

  describe("configuration", () => {
    it.each([
      ["APIKey", { ...baseConfig, APIKey: "" }],
      ["Pattern", { ...baseConfig, Pattern: "" }],
      ["RemoteAddress", { ...baseConfig, RemoteAddress: "" }],
    ])("rejects an empty %s", async (_field, config) => {
      await expect(
        new UsageTelemetryMiddleware().initialize(makeContext(config))
      ).rejects.toThrow(MiddlewareConfigError);
    });

    it("rejects an invalid pattern", async () => {
      await expect(
        new UsageTelemetryMiddleware().initialize(makeContext({ ...baseConfig, Pattern: "([" }))
      ).rejects.toThrow(/invalid pattern/);
    });

    it("logs the effective settings, with 0 meaning the default", async () => {
      const logger = mockLogger();
      const { sink } = recordingSink();
      const configured = new UsageTelemetryMiddleware({ sink });

      await configured.initialize(
        makeContext({ ...baseConfig, BufferSize: 0, BatchSize: 0, FlushInterval: 0 }, logger)
      );

      expect(logger.info).toHaveBeenCalledWith(
        "Reporting usage to http://collector.test/api/v1/activity (buffer=100000, batch=20, interval=2000ms)"
      );
      await configured.destroy();
    });
  });

  it("is created by the default export factory", () => {
    const created = createMiddleware();

    expect(created).toBeInstanceOf(UsageTelemetryMiddleware);
    expect(created.name).toBe("usage-telemetry");
  });
});
