import type { Logger } from "../config/logger";
import type { HookEvent, TriggerPoint } from "../registry/hooks";
import type { Principal, RequestContext } from "../router/context";
import { PluginProtocolError, toActionError } from "../router/errors";
import { StoredRecordSchema, type StoredRecord } from "../storage/types";
import type { PluginDescriptor } from "./descriptor";
import { PluginPool, type PluginPoolStats } from "./pool";
import { PluginProcess } from "./process";
import type { PluginManifest } from "./protocol";
import { createTransport, type TransportFactory } from "./transport";

export type PluginStatus = "pending" | "ready" | "disabled" | "closed";

export type PluginSummary = {
  name: string;
  transport: string;
  status: PluginStatus;
  reason: string | null;
  pool: PluginPoolStats;
};

type WirePrincipal = { kind: Principal["kind"]; userId?: string };

const CREDENTIAL_KEYS = new Set(["api_key", "access_token"]);

function toWirePrincipal(principal: Principal): WirePrincipal {
  return principal.kind === "user" ? { kind: "user", userId: principal.userId } : { kind: principal.kind };
}

function stripCredentials(payload: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!CREDENTIAL_KEYS.has(key)) output[key] = value;
  }
  return output;
}

/** The part of a request a plugin gets to see. Credentials never cross the pipe. */
export function toOpContext(ctx: RequestContext): Record<string, unknown> {
  return {
    requestId: ctx.requestId,
    action: ctx.action,
    payload: stripCredentials(ctx.payload),
    pathParams: ctx.pathParams,
    principal: toWirePrincipal(ctx.principal),
  };
}

/** A configured plugin: its descriptor, its process pool and its handshake result. */
export class Plugin {
  readonly name: string;
  private readonly logger: Logger;
  private readonly pool: PluginPool;
  private status: PluginStatus = "pending";
  private reason: string | null = null;
  private manifest: PluginManifest | null = null;

  constructor(
    readonly descriptor: PluginDescriptor,
    logger: Logger,
    transportFactory: TransportFactory = createTransport
  ) {
    this.name = descriptor.name;
    this.logger = logger.child({ plugin: descriptor.name });
    this.pool = new PluginPool({
      plugin: descriptor.name,
      width: descriptor.poolWidth,
      acquireTimeoutMs: descriptor.acquireTimeoutMs,
      maxRestarts: descriptor.maxRestarts,
      restartWindowMs: descriptor.restartWindowMs,
      logger: this.logger,
      spawn: (serial) =>
        new PluginProcess(serial, transportFactory(descriptor, this.logger), {
          plugin: descriptor.name,
          callTimeoutMs: descriptor.callTimeoutMs,
          handshakeTimeoutMs: descriptor.handshakeTimeoutMs,
          logger: this.logger,
        }),
    });
  }

  get isReady(): boolean {
    return this.status === "ready";
  }

  get declared(): PluginManifest | null {
    return this.manifest;
  }

  /**
   * Starts the pool and handshakes. Returns null when the plugin could not be
   * brought up; the failure is logged and the plugin stays disabled.
   */
  async init(): Promise<PluginManifest | null> {
    try {
      const manifest = await this.pool.start();
      this.manifest = manifest;
      this.status = "ready";
      this.logger.info("plugin_ready", {
        transport: this.descriptor.transport,
        poolWidth: this.descriptor.poolWidth,
        handlers: manifest.handlers.length,
        hooks: manifest.hooks.length,
        lambdas: manifest.lambdas.length,
        timers: manifest.timers.length,
      });
      return manifest;
    } catch (error) {
      this.disable(toActionError(error).message);
      return null;
    }
  }

  /** Marks the plugin unusable after a failed handshake or a rejected declaration. */
  disable(reason: string): void {
    this.status = "disabled";
    this.reason = reason;
    this.logger.warn("plugin_handshake_failed", { path: this.descriptor.path, reason });
    void this.pool.close().catch((error: unknown) => {
      this.logger.warn("plugin_close_failed", { message: toActionError(error).message });
    });
  }

  invokeAction(ctx: RequestContext): Promise<unknown> {
    return this.pool.call(ctx.action, toOpContext(ctx));
  }

  async invokeHook(hook: string, trigger: TriggerPoint, event: HookEvent): Promise<StoredRecord | void> {
    const data = await this.pool.call(hook, {
      ...toOpContext(event.ctx),
      hook,
      trigger,
      record: event.record,
      original: event.original,
    });
    if (data === null || data === undefined) return;
    const parsed = StoredRecordSchema.safeParse(data);
    if (!parsed.success) {
      throw new PluginProtocolError(this.name, `hook ${hook} returned something other than a record`);
    }
    return parsed.data;
  }

  invokeLambda(lambda: string, args: unknown, ctx: RequestContext): Promise<unknown> {
    return this.pool.call(lambda, { ...toOpContext(ctx), args: args ?? null });
  }

  invokeTimer(timer: string, firedAt: Date = new Date()): Promise<unknown> {
    return this.pool.call(timer, { timer, firedAt: firedAt.toISOString() });
  }

  describe(): PluginSummary {
    const pool = this.pool.stats();
    return {
      name: this.name,
      transport: this.descriptor.transport,
      status: this.status === "ready" && pool.disabled ? "disabled" : this.status,
      reason: this.reason ?? pool.disabled,
      pool,
    };
  }

  async close(): Promise<void> {
    if (this.status === "closed") return;
    this.status = "closed";
    await this.pool.close();
  }
}
