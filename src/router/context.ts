import crypto from "node:crypto";
import type { AssetStore } from "../assets/assetStore";
import type { TokenStore } from "../auth/tokenStore";
import { silentLogger, type Logger } from "../config/logger";
import type { HookRegistry } from "../registry/hooks";
import type { StorageConnection } from "../storage/types";
import type { ActionError } from "./errors";

export type Principal =
  | { kind: "none" }
  | { kind: "api-key" }
  | { kind: "master" }
  | { kind: "user"; userId: string; accessToken: string };

/**
 * Mutable per-request state. Preprocessors assemble everything a handler
 * needs here; handlers never authenticate or open connections themselves.
 */
export type RequestContext = {
  readonly requestId: string;
  readonly action: string;
  readonly payload: Record<string, unknown>;
  readonly headers: Readonly<Record<string, string>>;
  readonly logger: Logger;
  pathParams: string[];
  principal: Principal;
  storage: StorageConnection | null;
  tokenStore: TokenStore | null;
  assetStore: AssetStore | null;
  hooks: HookRegistry | null;
  error: ActionError | null;
  result: unknown;
};

export function createRequestContext(input: {
  action: string;
  payload?: Record<string, unknown>;
  headers?: Record<string, string>;
  requestId?: string;
  logger?: Logger;
}): RequestContext {
  const requestId = input.requestId ?? crypto.randomUUID();
  return {
    requestId,
    action: input.action,
    payload: input.payload ?? {},
    headers: input.headers ?? {},
    logger: input.logger ?? silentLogger,
    pathParams: [],
    principal: { kind: "none" },
    storage: null,
    tokenStore: null,
    assetStore: null,
    hooks: null,
    error: null,
    result: undefined,
  };
}

/** Releases whatever the preprocessor chain opened for this request. */
export async function releaseRequestContext(ctx: RequestContext): Promise<void> {
  const storage = ctx.storage;
  if (!storage) return;
  ctx.storage = null;
  try {
    await storage.close();
  } catch (error) {
    ctx.logger.warn("storage_connection_close_failed", {
      requestId: ctx.requestId,
      message: error instanceof Error ? error.message : String(error),
    });
  }
}
