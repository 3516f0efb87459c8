import * as http from "node:http";
import { createLogger, toMiddlewareLogger } from "./logger";
import type { Logger } from "./logger";
import { MiddlewareChain } from "./middleware-chain";
import { loadMiddlewares } from "./middleware-loader";
import { parseProxyConfig } from "./proxy-config";
import { ProxyServer } from "./proxy-server";

export const CONFIG_ENV_VAR = "TOLLGATE_MIDDLEWARE_CONFIG";

async function waitForUpstream(
  logger: Logger,
  host: string,
  port: number,
  maxAttempts = 60,
  intervalMs = 1000
): Promise<void> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      await new Promise<void>((resolve, reject) => {
        const req = http.get(`http://${host}:${port}/health`, (res) => {
          res.resume();
          if (res.statusCode && res.statusCode < 500) {
            resolve();
          } else {
            reject(new Error(`Health check returned ${res.statusCode}`));
          }
        });
        req.on("error", reject);
        req.setTimeout(2000, () => {
          req.destroy();
          reject(new Error("Health check timeout"));
        });
      });
      logger.info({ attempt }, `Upstream healthy at ${host}:${port}`);
      return;
    } catch (err) {
      if (attempt === maxAttempts) {
        throw new Error(
          `Upstream not healthy after ${maxAttempts} attempts at ${host}:${port}`
        );
      }
      logger.debug({ attempt, err }, "Upstream not ready yet");
      await new Promise((r) => setTimeout(r, intervalMs));
    }
  }
}

async function main(logger: Logger): Promise<void> {
  const configEnv = process.env[CONFIG_ENV_VAR];
  if (!configEnv) {
    throw new Error(`${CONFIG_ENV_VAR} env var not set`);
  }

  const config = parseProxyConfig(configEnv);
  logger.info(
    `Config: external=${config.externalPort}, internal=${config.internalHost}:${config.internalPort}, middlewares=${config.middlewares.length}`
  );

  const loaded = await loadMiddlewares(config, toMiddlewareLogger(logger.child({ module: "loader" })));
  const chain = new MiddlewareChain(
    loaded.map((entry) => entry.middleware),
    toMiddlewareLogger(logger.child({ module: "chain" }))
  );

  await waitForUpstream(logger, config.internalHost, config.internalPort);

  const serviceName = process.env.SERVICE_NAME ?? "unknown";
  await chain.initializeAll((mw, index) => ({
    serviceName,
    externalPort: config.externalPort,
    internalPort: config.internalPort,
    middlewareConfig: loaded[index]?.config ?? {},
    logger: toMiddlewareLogger(logger.child({ middleware: mw.name })),
  }));

  const proxy = new ProxyServer({
    chain,
    externalPort: config.externalPort,
    internalPort: config.internalPort,
    internalHost: config.internalHost,
    logger: toMiddlewareLogger(logger.child({ module: "forwarder" })),
  });

  await proxy.start();
  logger.info(`Ready on port ${config.externalPort}, forwarding to ${config.internalPort}`);

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "Shutting down");
    await proxy.stop();
    // Middlewares flush what they still hold (queued telemetry, pending usage reports).
    await chain.destroyAll();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

if (require.main === module) {
  const logger = createLogger();
  main(logger).catch((err: unknown) => {
    logger.fatal({ err }, "Fatal");
    process.exit(1);
  });
}
