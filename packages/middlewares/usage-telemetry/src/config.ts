import { z } from "zod";
import { MAX_REQUEST_BODY_SIZE, withDefault } from "@tollgate/middleware-sdk";
import { DEFAULT_COLLECTOR_TIMEOUT_MS } from "./collector-client";
import {
  DEFAULT_BATCH_FLUSH_INTERVAL_MS,
  DEFAULT_LOG_BUFFER_SIZE,
  DEFAULT_MAX_BATCH_SIZE,
} from "./telemetry-pipeline";

const count = z.number().int().nonnegative().optional();
const seconds = z.number().nonnegative().optional();

/**
 * Options of the usage-telemetry middleware. Numeric options set to 0 fall
 * back to their defaults; durations are in seconds.
 */
export const UsageTelemetryConfigSchema = z
  .object({
    Pattern: z.string().min(1, "pattern can't be empty"),
    RemoteAddress: z.string().min(1, "RemoteAddress can't be empty").url(),
    APIKey: z.string().min(1, "APIKey can't be empty"),
    BufferSize: count,
    BatchSize: count,
    FlushInterval: seconds,
    Timeout: seconds,
    MaxRequestBodySize: count,
    NonBatchCount: z.union([z.literal(0), z.literal(1)]).optional(),
  })
  .transform((raw) => ({
    pattern: raw.Pattern,
    remoteAddress: raw.RemoteAddress,
    apiKey: raw.APIKey,
    bufferSize: withDefault(raw.BufferSize, DEFAULT_LOG_BUFFER_SIZE),
    batchSize: withDefault(raw.BatchSize, DEFAULT_MAX_BATCH_SIZE),
    flushIntervalMs: withDefault(raw.FlushInterval, DEFAULT_BATCH_FLUSH_INTERVAL_MS / 1000) * 1000,
    timeoutMs: withDefault(raw.Timeout, DEFAULT_COLLECTOR_TIMEOUT_MS / 1000) * 1000,
    maxRequestBodySize: withDefault(raw.MaxRequestBodySize, MAX_REQUEST_BODY_SIZE),
    nonBatchCount: raw.NonBatchCount ?? 1,
  }));

export type UsageTelemetryConfigInput = z.input<typeof UsageTelemetryConfigSchema>;
export type UsageTelemetryConfig = z.output<typeof UsageTelemetryConfigSchema>;
