export type {
  IMiddleware,
  ISelfDescribingMiddleware,
  MiddlewareMetadata,
} from "./middleware.interface";
export { isSelfDescribing } from "./middleware.interface";

export type { IMiddlewareContext, IMiddlewareLogger } from "./middleware-context.interface";
export { silentLogger } from "./middleware-context.interface";

export type {
  HttpHeaders,
  HttpRequest,
  HttpResponse,
  MiddlewareAction,
} from "./types";
export { MiddlewareActions, headerValue } from "./types";

export { MiddlewareConfigError, BodyReadError } from "./errors";
export { parseMiddlewareConfig, withDefault } from "./config";

export { BufferPool, PooledBuffer } from "./buffer-pool";
export type { BufferPoolOptions } from "./buffer-pool";
export { interceptBody, MAX_REQUEST_BODY_SIZE } from "./body-interceptor";
export type { InterceptOptions, InterceptedBody } from "./body-interceptor";
export { IdentifierExtractor } from "./identifier-extractor";
export { countSubRequests, mediaType, BATCH_CONTENT_TYPE } from "./sub-request-counter";
export type { CountOptions } from "./sub-request-counter";
