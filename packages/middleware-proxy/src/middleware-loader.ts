import type { IMiddleware, IMiddlewareLogger } from "@tollgate/middleware-sdk";
import { isSelfDescribing, silentLogger } from "@tollgate/middleware-sdk";
import type { ProxyConfig } from "./proxy-config";

export interface LoadedMiddleware {
  readonly middleware: IMiddleware;
  /** The `config` object of the middleware's entry */
  readonly config: Record<string, unknown>;
  readonly source: string;
}

type MiddlewareFactory = () => unknown;

function isFactory(value: unknown): value is MiddlewareFactory {
  return typeof value === "function";
}

function isMiddleware(value: unknown): value is IMiddleware {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    value.name.length > 0
  );
}

/**
 * CJS interop: import() of a CommonJS module wraps module.exports as
 * `default`, so the factory may sit one or two `default`s deep.
 */
function resolveFactory(mod: unknown): MiddlewareFactory | undefined {
  let candidate = mod;
  for (let depth = 0; depth < 3; depth++) {
    if (isFactory(candidate)) return candidate;
    if (typeof candidate !== "object" || candidate === null || !("default" in candidate)) {
      return undefined;
    }
    candidate = candidate.default;
  }
  return isFactory(candidate) ? candidate : undefined;
}

export async function loadMiddlewares(
  config: ProxyConfig,
  logger: IMiddlewareLogger = silentLogger
): Promise<LoadedMiddleware[]> {
  const loaded: LoadedMiddleware[] = [];

  for (const entry of config.middlewares) {
    if (!entry.enabled) {
      logger.info(`Skipping disabled middleware: ${entry.package}`);
      continue;
    }

    logger.info(`Loading middleware: ${entry.package}`);

    const mod: unknown = await import(entry.package);
    const factory = resolveFactory(mod);
    if (!factory) {
      throw new Error(
        `Middleware "${entry.package}" does not export a factory function (default export)`
      );
    }

    const middleware = factory();
    if (!isMiddleware(middleware)) {
      throw new Error(
        `Middleware from "${entry.package}" does not have a valid "name" property`
      );
    }

    if (isSelfDescribing(middleware)) {
      const { displayName, version } = middleware.getMetadata();
      logger.info(`Loaded middleware: ${middleware.name} (${displayName} ${version})`);
    } else {
      logger.info(`Loaded middleware: ${middleware.name}`);
    }
    loaded.push({ middleware, config: entry.config, source: entry.package });
  }

  return loaded;
}
