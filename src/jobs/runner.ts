import type { Logger } from "../config/logger";
import type { TimerRegistry } from "../registry/timers";

export type TimerExecutionStats = {
  running: boolean;
  successCount: number;
  failureCount: number;
  skipCount: number;
  lastStartedAt: string | null;
  lastCompletedAt: string | null;
  lastStatus: "succeeded" | "failed" | "skipped" | null;
  lastDurationMs: number | null;
  lastError: string | null;
};

export type TimerRunOutcome = "succeeded" | "failed" | "skipped";

/**
 * Runs registered timers by name, one invocation per timer at a time, and
 * keeps per-timer counters.
 */
export class TimerRunner {
  private readonly runningTimers = new Set<string>();
  private readonly stats = new Map<string, TimerExecutionStats>();

  constructor(
    private readonly timers: TimerRegistry,
    private readonly logger: Logger
  ) {}

  private ensureStats(name: string): TimerExecutionStats {
    const existing = this.stats.get(name);
    if (existing) return existing;
    const created: TimerExecutionStats = {
      running: false,
      successCount: 0,
      failureCount: 0,
      skipCount: 0,
      lastStartedAt: null,
      lastCompletedAt: null,
      lastStatus: null,
      lastDurationMs: null,
      lastError: null,
    };
    this.stats.set(name, created);
    return created;
  }

  getStats(): Record<string, TimerExecutionStats> {
    const output: Record<string, TimerExecutionStats> = {};
    for (const [name, stats] of this.stats.entries()) {
      output[name] = { ...stats };
    }
    return output;
  }

  /** Failures are recorded and logged, not thrown. */
  async run(name: string): Promise<TimerRunOutcome> {
    const timer = this.timers.get(name);
    if (!timer) {
      throw new Error(`Unknown timer: ${name}`);
    }

    const stats = this.ensureStats(name);

    if (this.runningTimers.has(name)) {
      stats.skipCount += 1;
      stats.lastCompletedAt = new Date().toISOString();
      stats.lastStatus = "skipped";
      stats.lastDurationMs = 0;
      stats.lastError = "already_running";
      this.logger.warn("timer_skipped_already_running", { timer: name });
      return "skipped";
    }

    this.runningTimers.add(name);
    const startedAtMs = Date.now();
    stats.running = true;
    stats.lastStartedAt = new Date(startedAtMs).toISOString();
    stats.lastError = null;
    this.logger.debug("timer_started", { timer: name });

    try {
      await timer.invoke();
      stats.successCount += 1;
      stats.lastStatus = "succeeded";
      this.logger.info("timer_succeeded", { timer: name, durationMs: Date.now() - startedAtMs });
      return "succeeded";
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      stats.failureCount += 1;
      stats.lastStatus = "failed";
      stats.lastError = message;
      this.logger.error("timer_failed", { timer: name, error: message });
      return "failed";
    } finally {
      this.runningTimers.delete(name);
      stats.running = false;
      stats.lastCompletedAt = new Date().toISOString();
      stats.lastDurationMs = Date.now() - startedAtMs;
    }
  }
}
