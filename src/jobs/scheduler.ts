import type { Logger } from "../config/logger";
import type { TimerRegistry } from "../registry/timers";
import type { TimerRunner } from "./runner";

// setTimeout overflows above this and fires immediately.
const MAX_TIMEOUT_MS = 2_147_483_647;

export type TimerScheduleState = {
  name: string;
  schedule: string;
  nextRunAt: string | null;
};

export interface TimerScheduler {
  start(): void;
  stop(): void;
  state(): TimerScheduleState[];
}

/** Fires every registered timer at its schedule through the runner. */
export class IntervalScheduler implements TimerScheduler {
  private readonly handles = new Map<string, NodeJS.Timeout>();
  private readonly nextRuns = new Map<string, Date>();
  private running = false;

  constructor(
    private readonly timers: TimerRegistry,
    private readonly runner: TimerRunner,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    for (const timer of this.timers.list()) {
      this.arm(timer.name, this.now());
    }
    this.logger.info("timer_scheduler_started", { timers: this.timers.list().map((timer) => timer.name) });
  }

  stop(): void {
    this.running = false;
    for (const handle of this.handles.values()) {
      clearTimeout(handle);
    }
    this.handles.clear();
    this.nextRuns.clear();
  }

  state(): TimerScheduleState[] {
    return this.timers.list().map((timer) => ({
      name: timer.name,
      schedule: timer.schedule.source,
      nextRunAt: this.nextRuns.get(timer.name)?.toISOString() ?? null,
    }));
  }

  private arm(name: string, from: Date): void {
    const timer = this.timers.get(name);
    if (!this.running || !timer) return;
    let nextAt: Date;
    try {
      nextAt = timer.schedule.next(from);
    } catch (error) {
      this.logger.error("timer_schedule_exhausted", {
        timer: name,
        message: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    this.nextRuns.set(name, nextAt);
    this.wait(name, nextAt);
  }

  private wait(name: string, nextAt: Date): void {
    const delayMs = Math.max(0, nextAt.getTime() - this.now().getTime());
    const handle = setTimeout(() => {
      this.handles.delete(name);
      if (delayMs > MAX_TIMEOUT_MS) {
        this.wait(name, nextAt);
        return;
      }
      this.arm(name, nextAt);
      void this.runner.run(name).catch((error: unknown) => {
        this.logger.error("timer_dispatch_failed", {
          timer: name,
          message: error instanceof Error ? error.message : String(error),
        });
      });
    }, Math.min(delayMs, MAX_TIMEOUT_MS));
    if (typeof handle.unref === "function") {
      handle.unref();
    }
    this.handles.set(name, handle);
  }
}
