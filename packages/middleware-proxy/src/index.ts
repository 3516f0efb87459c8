export { MiddlewareChain } from "./middleware-chain";
export type { ChainOutcome } from "./middleware-chain";
export { HttpForwarder, PROXY_HEALTH_PATH } from "./http-forwarder";
export type { UpstreamTarget } from "./http-forwarder";
export { ProxyServer } from "./proxy-server";
export type { ProxyServerOptions } from "./proxy-server";
export { loadMiddlewares } from "./middleware-loader";
export type { LoadedMiddleware } from "./middleware-loader";
export { ProxyConfigSchema, MiddlewareConfigEntrySchema, parseProxyConfig } from "./proxy-config";
export type { MiddlewareConfigEntry, ProxyConfig, ProxyConfigInput } from "./proxy-config";
export { createLogger, toMiddlewareLogger } from "./logger";
