import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { IMiddlewareLogger } from "@tollgate/middleware-sdk";

export type { Logger } from "pino";

const level = process.env.LOG_LEVEL || "info";

export function createLogger(destination?: DestinationStream): Logger {
  const options = { level, base: { service: "middleware-proxy" } };
  return destination ? pino(options, destination) : pino(options);
}

type Level = "info" | "warn" | "error" | "debug";

function forward(logger: Logger, level: Level) {
  return (message: string, ...args: unknown[]): void => {
    if (args.length === 0) {
      logger[level](message);
      return;
    }
    const [first, ...rest] = args;
    if (first instanceof Error) {
      logger[level](rest.length > 0 ? { err: first, args: rest } : { err: first }, message);
      return;
    }
    logger[level]({ args }, message);
  };
}

// Middlewares see only the small logger interface of the SDK.
export function toMiddlewareLogger(logger: Logger): IMiddlewareLogger {
  return {
    info: forward(logger, "info"),
    warn: forward(logger, "warn"),
    error: forward(logger, "error"),
    debug: forward(logger, "debug"),
  };
}
