import type { RequestContext } from "./context";
import { ActionError, DuplicateRegistrationError, toActionError, UnknownActionError } from "./errors";

export type Handler = (ctx: RequestContext) => Promise<unknown>;

/** Gate run before the handler. Aborts the request by setting `ctx.error`. */
export type Preprocessor = (ctx: RequestContext) => Promise<void> | void;

export type RouteHandler =
  | { kind: "native"; handle: Handler }
  | { kind: "plugin"; plugin: string; handle: Handler };

export type HttpMethod = "GET" | "PUT" | "POST" | "DELETE";

type Route = {
  readonly key: string;
  readonly handler: RouteHandler;
  readonly preprocessors: readonly Preprocessor[];
};

type PathRoute = Route & {
  readonly method: HttpMethod;
  readonly pattern: RegExp;
};

export type DispatchOutcome =
  | { ok: true; result: unknown }
  | { ok: false; error: ActionError };

export type PathMatch = {
  route: string;
  params: string[];
};

function toRouteHandler(handler: Handler | RouteHandler): RouteHandler {
  return typeof handler === "function" ? { kind: "native", handle: handler } : handler;
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(`^(?:${source})$`);
  } catch (error) {
    throw new Error(`invalid path pattern ${source}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function stripSlashes(path: string): string {
  return path.replace(/^\/+/, "");
}

/**
 * Action table filled during startup, read-only once sealed. Lookups during
 * serving need no synchronization.
 */
export class Router {
  private readonly routes = new Map<string, Route>();
  private readonly pathRoutes: PathRoute[] = [];
  private sealed = false;

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error("router is sealed; routes can only be registered during startup");
    }
  }

  register(action: string, handler: Handler | RouteHandler, preprocessors: readonly Preprocessor[] = []): void {
    this.assertOpen();
    if (this.routes.has(action)) {
      throw new DuplicateRegistrationError("action", action);
    }
    this.routes.set(action, {
      key: action,
      handler: toRouteHandler(handler),
      preprocessors: Object.freeze([...preprocessors]),
    });
  }

  registerPath(
    method: HttpMethod,
    pattern: string,
    handler: Handler | RouteHandler,
    preprocessors: readonly Preprocessor[] = []
  ): void {
    this.assertOpen();
    const key = `${method} ${pattern}`;
    if (this.pathRoutes.some((route) => route.key === key)) {
      throw new DuplicateRegistrationError("path route", key);
    }
    this.pathRoutes.push({
      key,
      method,
      pattern: compilePattern(pattern),
      handler: toRouteHandler(handler),
      preprocessors: Object.freeze([...preprocessors]),
    });
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  has(action: string): boolean {
    return this.routes.has(action);
  }

  actions(): string[] {
    return [...this.routes.keys()];
  }

  routeKind(action: string): RouteHandler["kind"] | null {
    return this.routes.get(action)?.handler.kind ?? null;
  }

  matchPath(method: string, path: string): PathMatch | null {
    const target = stripSlashes(path);
    for (const route of this.pathRoutes) {
      if (route.method !== method) continue;
      const match = route.pattern.exec(target);
      if (match) {
        return { route: route.key, params: match.slice(1).map((value) => value ?? "") };
      }
    }
    return null;
  }

  async dispatch(ctx: RequestContext): Promise<DispatchOutcome> {
    const route = this.routes.get(ctx.action);
    if (!route) {
      const error = new UnknownActionError(ctx.action);
      ctx.error = error;
      return { ok: false, error };
    }
    return this.run(route, ctx);
  }

  async dispatchPath(method: string, path: string, ctx: RequestContext): Promise<DispatchOutcome> {
    const target = stripSlashes(path);
    for (const route of this.pathRoutes) {
      if (route.method !== method) continue;
      const match = route.pattern.exec(target);
      if (!match) continue;
      ctx.pathParams = match.slice(1).map((value) => value ?? "");
      return this.run(route, ctx);
    }
    const error = new UnknownActionError(`${method} ${target}`);
    ctx.error = error;
    return { ok: false, error };
  }

  private async run(route: Route, ctx: RequestContext): Promise<DispatchOutcome> {
    for (const preprocess of route.preprocessors) {
      try {
        await preprocess(ctx);
      } catch (error) {
        ctx.error = toActionError(error);
      }
      if (ctx.error) {
        ctx.logger.debug("preprocessor_aborted", {
          requestId: ctx.requestId,
          route: route.key,
          error: ctx.error.errorName,
        });
        return { ok: false, error: ctx.error };
      }
    }

    try {
      const result = await route.handler.handle(ctx);
      ctx.result = result;
      return { ok: true, result };
    } catch (error) {
      const actionError = toActionError(error);
      ctx.error = actionError;
      return { ok: false, error: actionError };
    }
  }
}
