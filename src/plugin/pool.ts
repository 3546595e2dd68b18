import type { Logger } from "../config/logger";
import { restartDelayMs } from "../connectivity/retry";
import { PluginUnavailableError, toActionError } from "../router/errors";
import type { PluginProcess } from "./process";
import type { PluginManifest } from "./protocol";
import { RestartBudget, type RestartBudgetState } from "./restartBudget";

export type PluginPoolOptions = {
  plugin: string;
  width: number;
  acquireTimeoutMs: number;
  maxRestarts: number;
  restartWindowMs: number;
  logger: Logger;
  spawn: (serial: number) => PluginProcess;
};

export type PluginPoolStats = {
  plugin: string;
  width: number;
  ready: number;
  busy: number;
  starting: number;
  waiting: number;
  disabled: string | null;
  restarts: RestartBudgetState;
};

type Waiter = {
  resolve: (process: PluginProcess) => void;
  reject: (error: PluginUnavailableError) => void;
  timer: NodeJS.Timeout | null;
};

/**
 * Fixed-width set of interchangeable processes for one plugin. Callers go
 * through acquire/release only; each process serves one call at a time.
 */
export class PluginPool {
  private readonly members = new Set<PluginProcess>();
  private readonly ready: PluginProcess[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly budget: RestartBudget;
  private readonly replacementTimers = new Set<NodeJS.Timeout>();
  private serial = 0;
  private started = false;
  private closed = false;
  private disabledReason: string | null = null;

  constructor(private readonly options: PluginPoolOptions) {
    this.budget = new RestartBudget(options.maxRestarts, options.restartWindowMs);
  }

  get disabled(): string | null {
    return this.disabledReason;
  }

  /** Spawns every process and handshakes them; any failure disables the pool. */
  async start(): Promise<PluginManifest> {
    const processes = Array.from({ length: this.options.width }, () => this.spawnProcess());
    const results = await Promise.allSettled(processes.map((process) => process.handshake()));

    let manifest: PluginManifest | null = null;
    for (const result of results) {
      if (result.status === "rejected") {
        const failure = toActionError(result.reason);
        this.disable(`handshake failed: ${failure.message}`);
        await this.terminateAll();
        throw failure;
      }
      manifest = manifest ?? result.value;
    }
    if (!manifest) {
      throw new PluginUnavailableError(this.options.plugin, "pool has no processes");
    }

    this.started = true;
    for (const process of processes) {
      if (process.state === "ready") {
        this.offer(process);
      } else {
        this.handleDeath(process, process.deathReason ?? "died during startup");
      }
    }
    return manifest;
  }

  async acquire(timeoutMs = this.options.acquireTimeoutMs): Promise<PluginProcess> {
    this.assertServing();
    const next = this.ready.shift();
    if (next) {
      next.checkout();
      return next;
    }

    return new Promise<PluginProcess>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, timer: null };
      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(new PluginUnavailableError(this.options.plugin, `no process became ready within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  release(process: PluginProcess): void {
    if (process.state !== "busy") return;
    if (this.closed || this.disabledReason) {
      void this.terminate(process);
      return;
    }
    process.checkin();
    this.offer(process);
  }

  async call(name: string, context: Record<string, unknown>): Promise<unknown> {
    const process = await this.acquire();
    try {
      return await process.call(name, context);
    } finally {
      this.release(process);
    }
  }

  stats(): PluginPoolStats {
    let busy = 0;
    let starting = 0;
    for (const process of this.members) {
      if (process.state === "busy") busy += 1;
      if (process.state === "starting") starting += 1;
    }
    return {
      plugin: this.options.plugin,
      width: this.options.width,
      ready: this.ready.length,
      busy,
      starting,
      waiting: this.waiters.length,
      disabled: this.disabledReason,
      restarts: this.budget.state(),
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const timer of this.replacementTimers) clearTimeout(timer);
    this.replacementTimers.clear();
    this.rejectWaiters("pool is closed");
    await this.terminateAll();
  }

  private assertServing(): void {
    if (this.closed) {
      throw new PluginUnavailableError(this.options.plugin, "pool is closed");
    }
    if (this.disabledReason) {
      throw new PluginUnavailableError(this.options.plugin, this.disabledReason);
    }
  }

  private spawnProcess(): PluginProcess {
    this.serial += 1;
    const process = this.options.spawn(this.serial);
    this.members.add(process);
    process.onDeath((dead, reason) => this.handleDeath(dead, reason));
    return process;
  }

  /** Hands a ready process to the oldest waiter, or queues it at the tail. */
  private offer(process: PluginProcess): void {
    const waiter = this.waiters.shift();
    if (!waiter) {
      this.ready.push(process);
      return;
    }
    if (waiter.timer) clearTimeout(waiter.timer);
    process.checkout();
    waiter.resolve(process);
  }

  private handleDeath(process: PluginProcess, reason: string): void {
    if (!this.members.has(process)) return;
    // Deaths before start() settles are replaced by start() itself.
    if (!this.started && !this.closed && !this.disabledReason) return;
    this.members.delete(process);
    const index = this.ready.indexOf(process);
    if (index >= 0) this.ready.splice(index, 1);
    if (this.closed || this.disabledReason) return;

    this.options.logger.warn("plugin_process_died", {
      plugin: this.options.plugin,
      serial: process.serial,
      pid: process.pid,
      reason,
    });

    if (!this.budget.recordDeath()) {
      this.disable(
        `more than ${this.options.maxRestarts} process deaths within ${this.options.restartWindowMs}ms`
      );
      void this.terminateAll();
      return;
    }

    const delayMs = restartDelayMs(this.budget.recentDeaths());
    const timer = setTimeout(() => {
      this.replacementTimers.delete(timer);
      void this.replace();
    }, delayMs);
    if (typeof timer.unref === "function") {
      timer.unref();
    }
    this.replacementTimers.add(timer);
  }

  private async replace(): Promise<void> {
    if (this.closed || this.disabledReason) return;
    const process = this.spawnProcess();
    try {
      await process.handshake();
    } catch (error) {
      // The death listener has already scheduled the next attempt.
      this.options.logger.warn("plugin_replacement_failed", {
        plugin: this.options.plugin,
        serial: process.serial,
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (this.closed || this.disabledReason) {
      await this.terminate(process);
      return;
    }
    if (process.state === "ready") {
      this.options.logger.info("plugin_process_replaced", {
        plugin: this.options.plugin,
        serial: process.serial,
        pid: process.pid,
      });
      this.offer(process);
    }
  }

  private disable(reason: string): void {
    if (this.disabledReason) return;
    this.disabledReason = reason;
    this.options.logger.error("plugin_disabled", { plugin: this.options.plugin, reason });
    this.rejectWaiters(reason);
  }

  private rejectWaiters(reason: string): void {
    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(new PluginUnavailableError(this.options.plugin, reason));
    }
  }

  private async terminate(process: PluginProcess): Promise<void> {
    this.members.delete(process);
    try {
      await process.terminate();
    } catch (error) {
      this.options.logger.warn("plugin_process_terminate_failed", {
        plugin: this.options.plugin,
        serial: process.serial,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async terminateAll(): Promise<void> {
    const all = [...this.members];
    this.ready.splice(0);
    await Promise.all(all.map((process) => this.terminate(process)));
  }
}
