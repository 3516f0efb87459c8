/** Logger interface provided to middlewares */
export interface IMiddlewareLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/** Context provided to middlewares during initialization */
export interface IMiddlewareContext {
  readonly serviceName: string;
  readonly externalPort: number;
  readonly internalPort: number;
  /** The `config` object of this middleware's entry in the proxy config */
  readonly middlewareConfig: Record<string, unknown>;
  readonly logger: IMiddlewareLogger;
}

const noop = (): void => undefined;

export const silentLogger: IMiddlewareLogger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
};
