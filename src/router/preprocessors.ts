import crypto from "node:crypto";
import type { AssetStore } from "../assets/assetStore";
import { isExpired, type TokenStore } from "../auth/tokenStore";
import type { HookRegistry } from "../registry/hooks";
import type { StorageConnector } from "../storage/types";
import type { RequestContext } from "./context";
import { ActionError } from "./errors";
import type { Preprocessor } from "./router";

export const API_KEY_HEADER = "x-actionbase-api-key";

export type AppKeys = {
  apiKey: string;
  masterKey: string;
};

function safeEqual(left: string, right: string): boolean {
  if (!left || !right) return false;
  const a = Buffer.from(left, "utf8");
  const b = Buffer.from(right, "utf8");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function presentedApiKey(ctx: RequestContext): string | null {
  const fromPayload = ctx.payload.api_key;
  if (typeof fromPayload === "string" && fromPayload.length > 0) return fromPayload;
  const fromHeader = ctx.headers[API_KEY_HEADER];
  return fromHeader && fromHeader.length > 0 ? fromHeader : null;
}

function applyApiKey(ctx: RequestContext, keys: AppKeys): void {
  const presented = presentedApiKey(ctx);
  if (presented === null) {
    ctx.error = new ActionError("NotAuthenticated", "API key is required");
    return;
  }
  if (safeEqual(presented, keys.masterKey)) {
    ctx.principal = { kind: "master" };
    return;
  }
  if (safeEqual(presented, keys.apiKey)) {
    ctx.principal = { kind: "api-key" };
    return;
  }
  ctx.error = new ActionError("NotAuthenticated", "API key is not valid");
}

export function apiKeyPreprocessor(keys: AppKeys): Preprocessor {
  return (ctx) => applyApiKey(ctx, keys);
}

export function tokenStorePreprocessor(store: TokenStore): Preprocessor {
  return (ctx) => {
    ctx.tokenStore = store;
  };
}

/** Resolves `access_token` into a user principal; without one, API-key rules apply. */
export function authenticatorPreprocessor(keys: AppKeys, now: () => Date = () => new Date()): Preprocessor {
  return async (ctx) => {
    const presented = ctx.payload.access_token;
    if (presented === undefined || presented === null || presented === "") {
      applyApiKey(ctx, keys);
      return;
    }
    if (typeof presented !== "string") {
      ctx.error = new ActionError("AccessTokenNotAccepted", "access_token must be a string");
      return;
    }
    if (!ctx.tokenStore) {
      throw new Error("token store must be attached before the authenticator runs");
    }
    const token = await ctx.tokenStore.get(presented);
    if (!token || isExpired(token, now())) {
      ctx.error = new ActionError("AccessTokenNotAccepted", "token expired or invalid");
      return;
    }
    ctx.principal = { kind: "user", userId: token.userId, accessToken: token.token };
  };
}

export function storagePreprocessor(connector: StorageConnector): Preprocessor {
  return async (ctx) => {
    try {
      ctx.storage = await connector.open();
    } catch (error) {
      ctx.logger.error("storage_open_failed", {
        requestId: ctx.requestId,
        impl: connector.impl,
        message: error instanceof Error ? error.message : String(error),
      });
      ctx.error = new ActionError("ServiceUnavailable", "storage is unavailable");
    }
  };
}

export function assetStorePreprocessor(store: AssetStore): Preprocessor {
  return (ctx) => {
    ctx.assetStore = store;
  };
}

export function hookRegistryPreprocessor(registry: HookRegistry): Preprocessor {
  return (ctx) => {
    ctx.hooks = registry;
  };
}

export const requireUserForWrite: Preprocessor = (ctx) => {
  if (ctx.principal.kind === "user" || ctx.principal.kind === "master") return;
  ctx.error = new ActionError("PermissionDenied", "writes require a signed-in user");
};
