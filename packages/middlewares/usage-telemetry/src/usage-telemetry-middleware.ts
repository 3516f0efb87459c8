import type {
  HttpHeaders,
  HttpRequest,
  IMiddlewareContext,
  IMiddlewareLogger,
  ISelfDescribingMiddleware,
  InterceptedBody,
  MiddlewareAction,
  MiddlewareMetadata,
} from "@tollgate/middleware-sdk";
import {
  BodyReadError,
  BufferPool,
  IdentifierExtractor,
  MiddlewareActions,
  countSubRequests,
  headerValue,
  interceptBody,
  parseMiddlewareConfig,
} from "@tollgate/middleware-sdk";
import { CollectorClient } from "./collector-client";
import { UsageTelemetryConfigSchema } from "./config";
import type { UsageTelemetryConfig } from "./config";
import { TelemetryPipeline } from "./telemetry-pipeline";
import type { BatchSink, PipelineStats } from "./types";

export interface UsageTelemetryDependencies {
  /** Replaces the HTTP collector client. */
  sink?: BatchSink;
  /** Passed to the collector client. Default: global fetch. */
  fetch?: typeof fetch;
  pool?: BufferPool;
}

interface ActiveState {
  readonly config: UsageTelemetryConfig;
  readonly extractor: IdentifierExtractor;
  readonly pool: BufferPool;
  readonly pipeline: TelemetryPipeline;
  readonly logger: IMiddlewareLogger;
}

export class UsageTelemetryMiddleware implements ISelfDescribingMiddleware {
  readonly name = "usage-telemetry";

  private state: ActiveState | null = null;

  constructor(private readonly dependencies: UsageTelemetryDependencies = {}) {}

  async initialize(context: IMiddlewareContext): Promise<void> {
    const config = parseMiddlewareConfig(
      UsageTelemetryConfigSchema,
      context.middlewareConfig,
      this.name
    );
    const extractor = new IdentifierExtractor(config.pattern);
    const pool = this.dependencies.pool ?? new BufferPool();
    const sink =
      this.dependencies.sink ??
      new CollectorClient({
        remoteAddress: config.remoteAddress,
        apiKey: config.apiKey,
        timeoutMs: config.timeoutMs,
        fetch: this.dependencies.fetch,
      });

    const pipeline = new TelemetryPipeline({
      sink,
      bufferSize: config.bufferSize,
      batchSize: config.batchSize,
      flushIntervalMs: config.flushIntervalMs,
      logger: context.logger,
    });
    pipeline.start();

    this.state = { config, extractor, pool, pipeline, logger: context.logger };
    context.logger.info(
      `Reporting usage to ${config.remoteAddress} (buffer=${config.bufferSize}, batch=${config.batchSize}, interval=${config.flushIntervalMs}ms)`
    );
  }

  async destroy(): Promise<void> {
    const state = this.state;
    if (!state) return;
    this.state = null;
    await state.pipeline.close();
  }

  async onHttpRequest(req: Readonly<HttpRequest>): Promise<MiddlewareAction<HttpRequest>> {
    const state = this.state;
    if (!state) {
      throw new Error(`Middleware "${this.name}" used before initialize()`);
    }

    let body: InterceptedBody;
    try {
      body = await interceptBody(req.body, {
        pool: state.pool,
        maxBytes: state.config.maxRequestBodySize,
      });
    } catch (err) {
      if (err instanceof BodyReadError) {
        state.logger.error(err.message);
        return MiddlewareActions.block("Error reading request body", 500);
      }
      throw err;
    }

    if (body.truncated) {
      state.logger.warn(
        `Request body for ${req.path} cut to ${state.config.maxRequestBodySize} bytes`
      );
    }

    const count = await countSubRequests(headerValue(req.headers, "content-type"), body.observed, {
      pool: state.pool,
      nonBatchCount: state.config.nonBatchCount,
    });
    body.observed.destroy();

    state.pipeline.offer({ requestId: state.extractor.extract(req.path), count });

    return MiddlewareActions.modify({
      ...req,
      headers: reframeHeaders(req.headers, body.size),
      body: body.downstream,
    });
  }

  /** Pipeline counters, or null before initialize. */
  stats(): PipelineStats | null {
    return this.state?.pipeline.stats() ?? null;
  }

  getMetadata(): MiddlewareMetadata {
    return {
      displayName: "Usage Telemetry",
      version: "0.1.0",
      description:
        "Counts sub-requests per correlation id and reports them to a usage collector in batches",
      hooks: ["onHttpRequest"],
    };
  }
}

/** The re-injected body has a known length: describe it with Content-Length. */
function reframeHeaders(headers: HttpHeaders, size: number): HttpHeaders {
  const hadBody =
    headers["content-length"] !== undefined || headers["transfer-encoding"] !== undefined;
  if (!hadBody && size === 0) {
    return headers;
  }
  const next: HttpHeaders = { ...headers, "content-length": String(size) };
  delete next["transfer-encoding"];
  return next;
}
