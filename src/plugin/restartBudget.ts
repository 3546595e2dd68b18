export type RestartBudgetState = {
  recentDeaths: number;
  maxRestarts: number;
  windowMs: number;
  exhausted: boolean;
};

/**
 * Sliding-window count of process deaths. Once more than `maxRestarts`
 * deaths land inside `windowMs` the budget stays exhausted.
 */
export class RestartBudget {
  private deaths: number[] = [];
  private exhausted = false;

  constructor(
    private readonly maxRestarts = 5,
    private readonly windowMs = 60_000
  ) {}

  /** Returns whether a replacement may be spawned. */
  recordDeath(now = Date.now()): boolean {
    if (this.exhausted) return false;
    this.deaths = this.deaths.filter((at) => now - at < this.windowMs);
    this.deaths.push(now);
    if (this.deaths.length > this.maxRestarts) {
      this.exhausted = true;
    }
    return !this.exhausted;
  }

  recentDeaths(now = Date.now()): number {
    return this.deaths.filter((at) => now - at < this.windowMs).length;
  }

  state(now = Date.now()): RestartBudgetState {
    return {
      recentDeaths: this.recentDeaths(now),
      maxRestarts: this.maxRestarts,
      windowMs: this.windowMs,
      exhausted: this.exhausted,
    };
  }
}
