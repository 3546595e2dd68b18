import http from "node:http";
import crypto from "node:crypto";
import type { AddressInfo } from "node:net";
import { URL } from "node:url";
import type { Logger } from "../config/logger";
import { API_KEY_HEADER } from "../router/preprocessors";
import { createRequestContext, releaseRequestContext, type RequestContext } from "../router/context";
import { ActionError, InvalidArgumentError, isPlainObject, toActionError } from "../router/errors";
import type { DispatchOutcome, Router } from "../router/router";

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export type HealthProvider = () => Record<string, unknown> | Promise<Record<string, unknown>>;

export type ActionServer = {
  readonly server: http.Server;
  /** Resolves once the socket is bound. */
  readonly listening: Promise<AddressInfo>;
  inFlight(): number;
  /** Stops accepting and waits for in-flight requests; false when the deadline passed first. */
  drain(timeoutMs: number): Promise<boolean>;
};

function withSecurityHeaders(headers: Record<string, string>): Record<string, string> {
  return {
    "x-content-type-options": "nosniff",
    "x-frame-options": "DENY",
    "cache-control": "no-store",
    ...headers,
  };
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value[0]) return value[0];
  return undefined;
}

function flattenHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    const first = firstHeader(value);
    if (first !== undefined) output[key.toLowerCase()] = first;
  }
  return output;
}

async function readJsonBody(req: http.IncomingMessage, maxBytes: number): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > maxBytes) {
      throw new ActionError("InvalidArgument", "request body is too large", { maxBytes }, { status: 413 });
    }
    chunks.push(buffer);
  }
  if (!chunks.length) return {};
  const raw = Buffer.concat(chunks).toString("utf8");
  if (raw.trim().length === 0) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InvalidArgumentError("request body is not valid JSON");
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidArgumentError("request body must be a JSON object");
  }
  return parsed;
}

/** `/record/save` and `{"action":"record:save"}` name the same action. */
export function actionFromRequest(pathname: string, body: Record<string, unknown>): string {
  if (typeof body.action === "string") return body.action;
  return pathname.replace(/^\/+|\/+$/g, "").split("/").filter(Boolean).join(":");
}

export function startHttpServer(params: {
  host: string;
  port: number;
  logger: Logger;
  router: Router;
  health?: HealthProvider;
  allowedOrigins?: string[];
  maxBodyBytes?: number;
}): ActionServer {
  const { host, port, logger, router, health, allowedOrigins = [], maxBodyBytes = DEFAULT_MAX_BODY_BYTES } = params;
  let active = 0;
  let draining = false;
  const idleWaiters: Array<() => void> = [];

  const isOriginAllowed = (origin: string | null): boolean => {
    if (!origin) return true;
    return allowedOrigins.includes(origin);
  };

  const corsHeadersFor = (origin: string | null): Record<string, string> => {
    if (!origin || !isOriginAllowed(origin)) return {};
    return {
      "access-control-allow-origin": origin,
      "access-control-allow-headers": `content-type, ${API_KEY_HEADER}`,
      "access-control-allow-methods": "GET,PUT,POST,OPTIONS",
      "access-control-max-age": "600",
      vary: "Origin",
    };
  };

  const settle = () => {
    active -= 1;
    if (active === 0) {
      for (const resolve of idleWaiters.splice(0)) resolve();
    }
  };

  const server = http.createServer(async (req, res) => {
    active += 1;
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", `http://${host}:${port}`);
    const originHeader = firstHeader(req.headers.origin) ?? null;
    const baseHeaders = { ...corsHeadersFor(originHeader), "x-request-id": requestId };
    let statusCode = 500;
    let action: string | null = null;
    let ctx: RequestContext | null = null;

    const sendJson = (status: number, body: unknown) => {
      statusCode = status;
      if (res.destroyed || res.writableEnded) return;
      res.writeHead(status, withSecurityHeaders({ "content-type": "application/json", ...baseHeaders }));
      res.end(JSON.stringify(body));
      logger.debug("http_response_body", { requestId, statusCode: status, body });
    };

    const sendOutcome = (outcome: DispatchOutcome) => {
      if (outcome.ok) {
        sendJson(200, { result: outcome.result ?? null });
      } else {
        sendJson(outcome.error.status, { error: outcome.error.toPayload() });
      }
    };

    try {
      if (method === "OPTIONS") {
        statusCode = isOriginAllowed(originHeader) ? 204 : 403;
        res.writeHead(statusCode, withSecurityHeaders(baseHeaders));
        res.end();
        return;
      }

      if (method === "GET" && url.pathname === "/healthz") {
        const details = health ? await health() : {};
        sendJson(200, { ok: true, service: "actionbase", ...details });
        return;
      }

      const headers = flattenHeaders(req.headers);
      const pathMatch = router.matchPath(method, url.pathname);
      if (pathMatch) {
        const payload = method === "GET" ? {} : await readJsonBody(req, maxBodyBytes);
        action = pathMatch.route;
        logger.debug("http_request_body", { requestId, action, body: payload });
        ctx = createRequestContext({ action, payload, headers, requestId, logger });
        sendOutcome(await router.dispatchPath(method, url.pathname, ctx));
        return;
      }

      if (method !== "POST") {
        const error = new ActionError("NotFound", `no route for ${method} ${url.pathname}`);
        sendJson(error.status, { error: error.toPayload() });
        return;
      }

      const payload = await readJsonBody(req, maxBodyBytes);
      action = actionFromRequest(url.pathname, payload);
      logger.debug("http_request_body", { requestId, action, body: payload });
      ctx = createRequestContext({ action, payload, headers, requestId, logger });
      sendOutcome(await router.dispatch(ctx));
    } catch (error) {
      const failure = toActionError(error);
      if (failure.errorName === "UnexpectedError") {
        logger.error("http_handler_error", {
          requestId,
          method,
          path: url.pathname,
          message: failure.message,
        });
      }
      sendJson(failure.status, { error: failure.toPayload() });
    } finally {
      if (ctx) {
        await releaseRequestContext(ctx);
      }
      logger.info("http_request", {
        requestId,
        method,
        path: url.pathname,
        action,
        statusCode,
        durationMs: Date.now() - startedAt,
      });
      settle();
    }
  });

  const listening = new Promise<AddressInfo>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("server is not bound to a TCP address"));
        return;
      }
      logger.info("http_listening", { host, port: address.port });
      resolve(address);
    });
  });

  const drain = async (timeoutMs: number): Promise<boolean> => {
    if (!draining) {
      draining = true;
      server.close((error) => {
        if (error) logger.debug("http_close_error", { message: error.message });
      });
      server.closeIdleConnections();
    }
    if (active === 0) return true;

    let timer: NodeJS.Timeout | null = null;
    const idle = new Promise<boolean>((resolve) => {
      idleWaiters.push(() => resolve(true));
    });
    const deadline = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const drained = await Promise.race([idle, deadline]);
    if (timer) clearTimeout(timer);
    if (!drained) {
      logger.warn("http_drain_timeout", { inFlight: active, timeoutMs });
      server.closeAllConnections();
    }
    return drained;
  };

  return {
    server,
    listening,
    inFlight: () => active,
    drain,
  };
}
