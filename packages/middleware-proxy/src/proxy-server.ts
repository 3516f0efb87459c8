import * as http from "node:http";
import type { IMiddlewareLogger } from "@tollgate/middleware-sdk";
import { silentLogger } from "@tollgate/middleware-sdk";
import type { MiddlewareChain } from "./middleware-chain";
import { HttpForwarder } from "./http-forwarder";

export interface ProxyServerOptions {
  chain: MiddlewareChain;
  externalPort: number;
  internalPort: number;
  internalHost?: string;
  logger?: IMiddlewareLogger;
}

export class ProxyServer {
  private readonly externalPort: number;
  private readonly logger: IMiddlewareLogger;
  private readonly httpForwarder: HttpForwarder;
  private httpServer: http.Server | null = null;

  constructor(options: ProxyServerOptions) {
    this.externalPort = options.externalPort;
    this.logger = options.logger ?? silentLogger;
    this.httpForwarder = new HttpForwarder(
      options.chain,
      { host: options.internalHost ?? "127.0.0.1", port: options.internalPort },
      this.logger
    );
  }

  /** Port actually bound; differs from externalPort when that is 0. */
  get port(): number {
    const address = this.httpServer?.address();
    return typeof address === "object" && address ? address.port : this.externalPort;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.httpForwarder.handle(req, res).catch((err: unknown) => {
          this.logger.error(`Unhandled error for ${req.method ?? "GET"} ${req.url ?? "/"}`, err);
          if (res.headersSent) {
            res.destroy();
          } else {
            res.writeHead(500, { "Content-Type": "application/json" });
            res.end(JSON.stringify({ error: "Internal proxy error" }));
          }
        });
      });
      server.once("error", reject);
      server.listen(this.externalPort, () => {
        server.off("error", reject);
        resolve();
      });
      this.httpServer = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.httpServer) {
        this.httpServer.close(() => resolve());
        this.httpServer.closeIdleConnections();
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}
