import type { Logger } from "../config/logger";
import { PluginCallError, PluginProtocolError, toActionError } from "../router/errors";
import { FrameError, parseManifest, type PluginManifest } from "./protocol";
import type { PluginTransport } from "./transport";

export type PluginProcessState = "starting" | "ready" | "busy" | "dead";

const TRANSITIONS: Record<PluginProcessState, readonly PluginProcessState[]> = {
  starting: ["ready", "dead"],
  ready: ["busy", "dead"],
  busy: ["ready", "dead"],
  dead: [],
};

export type PluginProcessOptions = {
  plugin: string;
  callTimeoutMs: number;
  handshakeTimeoutMs: number;
  logger: Logger;
};

/** One running plugin instance and its place in the pool's state machine. */
export class PluginProcess {
  private current: PluginProcessState = "starting";
  private reason: string | null = null;
  private readonly deathListeners: Array<(process: PluginProcess, reason: string) => void> = [];

  constructor(
    readonly serial: number,
    private readonly transport: PluginTransport,
    private readonly options: PluginProcessOptions
  ) {
    transport.onExit((exit) => {
      const detail = exit.error ?? `code=${String(exit.code)}, signal=${String(exit.signal)}`;
      this.markDead(`process exited (${detail})`);
    });
  }

  get state(): PluginProcessState {
    return this.current;
  }

  get pid(): number | null {
    return this.transport.pid;
  }

  get deathReason(): string | null {
    return this.reason;
  }

  onDeath(listener: (process: PluginProcess, reason: string) => void): void {
    this.deathListeners.push(listener);
  }

  private transition(next: PluginProcessState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`plugin ${this.options.plugin} process #${this.serial}: invalid transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  async handshake(): Promise<PluginManifest> {
    if (this.current !== "starting") {
      throw new Error(`plugin ${this.options.plugin} process #${this.serial} is ${this.current}, not starting`);
    }
    try {
      const data = await this.transport.request("init", "init", null, this.options.handshakeTimeoutMs);
      const manifest = parseManifest(data);
      this.transition("ready");
      return manifest;
    } catch (error) {
      const failure =
        error instanceof FrameError ? new PluginProtocolError(this.options.plugin, error.message) : toActionError(error);
      this.markDead(`handshake failed: ${failure.message}`);
      throw failure;
    }
  }

  checkout(): void {
    this.transition("busy");
  }

  checkin(): void {
    this.transition("ready");
  }

  /**
   * Sends one `op`. An `error` reply leaves the process usable; a timeout,
   * protocol violation, write failure or exit kills it.
   */
  async call(name: string, context: Record<string, unknown>): Promise<unknown> {
    if (this.current !== "busy") {
      throw new Error(`plugin ${this.options.plugin} process #${this.serial} must be checked out to call ${name}`);
    }
    try {
      return await this.transport.request("op", name, context, this.options.callTimeoutMs);
    } catch (error) {
      if (!(error instanceof PluginCallError)) {
        this.markDead(`call ${name} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
      throw error;
    }
  }

  markDead(reason: string): void {
    if (this.die(reason)) {
      this.transport.kill();
    }
  }

  async terminate(): Promise<void> {
    this.die("terminated");
    await this.transport.close();
  }

  private die(reason: string): boolean {
    if (this.current === "dead") return false;
    this.transition("dead");
    this.reason = reason;
    this.options.logger.debug("plugin_process_dead", {
      plugin: this.options.plugin,
      serial: this.serial,
      pid: this.pid,
      reason,
    });
    for (const listener of this.deathListeners) {
      listener(this, reason);
    }
    return true;
  }
}
