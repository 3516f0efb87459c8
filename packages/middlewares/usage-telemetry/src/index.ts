import type { IMiddleware } from "@tollgate/middleware-sdk";
import { UsageTelemetryMiddleware } from "./usage-telemetry-middleware";

export { UsageTelemetryMiddleware } from "./usage-telemetry-middleware";
export type { UsageTelemetryDependencies } from "./usage-telemetry-middleware";
export { TelemetryPipeline } from "./telemetry-pipeline";
export type { TelemetryPipelineOptions } from "./telemetry-pipeline";
export { BoundedQueue } from "./bounded-queue";
export { CollectorClient } from "./collector-client";
export type { CollectorClientOptions } from "./collector-client";
export { CollectorDeliveryError } from "./errors";
export { UsageTelemetryConfigSchema } from "./config";
export type { UsageTelemetryConfig, UsageTelemetryConfigInput } from "./config";
export type { BatchSink, LogEntry, LogEntryDto, PipelineStats } from "./types";

export default function createMiddleware(): IMiddleware {
  return new UsageTelemetryMiddleware();
}
