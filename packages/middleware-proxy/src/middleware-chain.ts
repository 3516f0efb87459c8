import type {
  HttpRequest,
  HttpResponse,
  IMiddleware,
  IMiddlewareContext,
  IMiddlewareLogger,
  MiddlewareAction,
} from "@tollgate/middleware-sdk";
import { silentLogger } from "@tollgate/middleware-sdk";

type HookName = "onHttpRequest" | "onHttpResponse";

/** Result of running a hook across the chain. */
export type ChainOutcome<T> =
  | { readonly blocked: false; readonly data: T }
  | {
      readonly blocked: true;
      readonly middleware: string;
      readonly reason?: string;
      readonly statusCode?: number;
    };

type HookInvoker<T> = (
  mw: IMiddleware,
  data: T
) => Promise<MiddlewareAction<T>> | undefined;

export class MiddlewareChain {
  private readonly middlewares: IMiddleware[];

  constructor(
    middlewares: IMiddleware[],
    private readonly logger: IMiddlewareLogger = silentLogger
  ) {
    this.middlewares = middlewares;
  }

  get size(): number {
    return this.middlewares.length;
  }

  async processHttpRequest(req: HttpRequest): Promise<ChainOutcome<HttpRequest>> {
    return this.processHook("onHttpRequest", req, (mw, data) => mw.onHttpRequest?.(data));
  }

  async processHttpResponse(res: HttpResponse): Promise<ChainOutcome<HttpResponse>> {
    return this.processHook("onHttpResponse", res, (mw, data) => mw.onHttpResponse?.(data));
  }

  /**
   * Initializes middlewares in order. A failure stops the sequence and
   * propagates: a misconfigured middleware must not serve traffic.
   */
  async initializeAll(
    contextFor: (mw: IMiddleware, index: number) => IMiddlewareContext
  ): Promise<void> {
    for (const [index, mw] of this.middlewares.entries()) {
      if (mw.initialize) {
        await mw.initialize(contextFor(mw, index));
      }
    }
  }

  async destroyAll(): Promise<void> {
    for (const mw of this.middlewares) {
      if (mw.destroy) {
        try {
          await mw.destroy();
        } catch (err) {
          this.logger.error(`Middleware "${mw.name}" failed to shut down`, err);
        }
      }
    }
  }

  private async processHook<T>(
    hook: HookName,
    data: T,
    invoke: HookInvoker<T>
  ): Promise<ChainOutcome<T>> {
    let current = data;

    for (const mw of this.middlewares) {
      try {
        const pending = invoke(mw, current);
        if (!pending) continue;
        const result = await pending;

        switch (result.action) {
          case "pass":
            break;
          case "modify":
            current = result.data;
            break;
          case "block":
            return {
              blocked: true,
              middleware: mw.name,
              reason: result.reason,
              statusCode: result.statusCode,
            };
        }
      } catch (err) {
        this.logger.error(`Middleware "${mw.name}" threw in ${hook}`, err);
      }
    }

    return { blocked: false, data: current };
  }
}
