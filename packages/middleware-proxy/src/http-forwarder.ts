import * as http from "node:http";
import { pipeline } from "node:stream";
import { URL, URLSearchParams } from "node:url";
import type {
  HttpHeaders,
  HttpRequest,
  HttpResponse,
  IMiddlewareLogger,
} from "@tollgate/middleware-sdk";
import { silentLogger } from "@tollgate/middleware-sdk";
import type { MiddlewareChain } from "./middleware-chain";

export const PROXY_HEALTH_PATH = "/__proxy/health";

const DEFAULT_BLOCK_STATUS = 403;
const DEFAULT_BLOCK_REASON = "Blocked by middleware";

export interface UpstreamTarget {
  readonly host: string;
  readonly port: number;
}

export class HttpForwarder {
  constructor(
    private readonly chain: MiddlewareChain,
    private readonly upstream: UpstreamTarget,
    private readonly logger: IMiddlewareLogger = silentLogger
  ) {}

  async handle(
    req: http.IncomingMessage,
    res: http.ServerResponse
  ): Promise<void> {
    if (req.url === PROXY_HEALTH_PATH) {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok", proxy: true }));
      return;
    }

    const parsedUrl = new URL(req.url ?? "/", "http://proxy.local");

    // The body stays a stream; middlewares that read it hand back a new one.
    const httpReq: HttpRequest = {
      method: req.method ?? "GET",
      path: parsedUrl.pathname,
      headers: { ...req.headers },
      body: req,
      query: Object.fromEntries(parsedUrl.searchParams.entries()),
    };

    const outcome = await this.chain.processHttpRequest(httpReq);
    if (outcome.blocked) {
      req.resume();
      sendError(res, outcome.statusCode ?? DEFAULT_BLOCK_STATUS, outcome.reason ?? DEFAULT_BLOCK_REASON);
      return;
    }

    await this.forward(outcome.data, res);
  }

  private async forward(
    proxyReq: HttpRequest,
    clientRes: http.ServerResponse
  ): Promise<void> {
    let upstreamRes: http.IncomingMessage;
    try {
      upstreamRes = await this.send(proxyReq);
    } catch (err) {
      this.logger.warn(`Upstream request failed: ${errorMessage(err)}`);
      sendError(clientRes, 502, "Bad gateway");
      return;
    }

    try {
      const httpRes: HttpResponse = {
        statusCode: upstreamRes.statusCode ?? 500,
        headers: upstreamRes.headers,
        body: await collectBody(upstreamRes),
      };

      const outcome = await this.chain.processHttpResponse(httpRes);
      if (outcome.blocked) {
        sendError(clientRes, outcome.statusCode ?? DEFAULT_BLOCK_STATUS, outcome.reason ?? DEFAULT_BLOCK_REASON);
        return;
      }
      clientRes.writeHead(outcome.data.statusCode, definedHeaders(outcome.data.headers));
      clientRes.end(outcome.data.body);
    } catch (err) {
      this.logger.warn(`Upstream response failed: ${errorMessage(err)}`);
      sendError(clientRes, 502, "Bad gateway");
    }
  }

  private send(proxyReq: HttpRequest): Promise<http.IncomingMessage> {
    return new Promise((resolve, reject) => {
      const upstreamReq = http.request(
        {
          hostname: this.upstream.host,
          port: this.upstream.port,
          path: upstreamPath(proxyReq),
          method: proxyReq.method,
          headers: {
            ...definedHeaders(proxyReq.headers),
            host: `${this.upstream.host}:${this.upstream.port}`,
          },
        },
        resolve
      );
      upstreamReq.on("error", reject);

      pipeline(proxyReq.body, upstreamReq, (err) => {
        if (err) reject(err);
      });
    });
  }
}

function upstreamPath(req: HttpRequest): string {
  const search = new URLSearchParams(req.query).toString();
  return search ? `${req.path}?${search}` : req.path;
}

function definedHeaders(headers: HttpHeaders): http.OutgoingHttpHeaders {
  const result: http.OutgoingHttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) result[name] = value;
  }
  return result;
}

function collectBody(stream: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));
    stream.on("end", () => resolve(Buffer.concat(chunks)));
    stream.on("error", reject);
  });
}

function sendError(res: http.ServerResponse, statusCode: number, message: string): void {
  if (res.headersSent) {
    res.destroy();
    return;
  }
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ error: message }));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
