import test from "node:test";
import assert from "node:assert/strict";
import { DuplicateRegistrationError } from "../router/errors";
import { TimerRegistry } from "./timers";

test("timers keep their parsed schedule", () => {
  const registry = new TimerRegistry();
  registry.registerTimer("cleanup", "@every 5m", async () => null);

  const timer = registry.get("cleanup");
  assert.equal(timer?.schedule.source, "@every 5m");
  assert.equal(
    timer?.schedule.next(new Date("2026-01-01T00:00:00.000Z")).toISOString(),
    "2026-01-01T00:05:00.000Z"
  );
});

test("invalid schedules and duplicate names are rejected", () => {
  const registry = new TimerRegistry();
  registry.registerTimer("cleanup", "@hourly", async () => null);

  assert.throws(() => registry.registerTimer("broken", "every tuesday", async () => null), /invalid schedule/);
  assert.throws(() => registry.registerTimer("cleanup", "@daily", async () => null), DuplicateRegistrationError);
  assert.deepEqual(
    registry.list().map((timer) => timer.name),
    ["cleanup"]
  );
});
