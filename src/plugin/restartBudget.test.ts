import test from "node:test";
import assert from "node:assert/strict";
import { RestartBudget } from "./restartBudget";

test("budget allows maxRestarts deaths inside the window", () => {
  const budget = new RestartBudget(2, 1_000);

  assert.equal(budget.recordDeath(0), true);
  assert.equal(budget.recordDeath(100), true);
  assert.equal(budget.recordDeath(200), false);
  assert.equal(budget.state(200).exhausted, true);
  assert.equal(budget.recordDeath(5_000), false);
});

test("deaths outside the window no longer count", () => {
  const budget = new RestartBudget(2, 1_000);

  budget.recordDeath(0);
  budget.recordDeath(500);
  assert.equal(budget.recordDeath(1_600), true);
  assert.equal(budget.recentDeaths(1_600), 1);
  assert.deepEqual(budget.state(1_600), { recentDeaths: 1, maxRestarts: 2, windowMs: 1_000, exhausted: false });
});
