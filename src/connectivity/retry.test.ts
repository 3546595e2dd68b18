import test from "node:test";
import assert from "node:assert/strict";
import { captureLogger } from "../testing/fakes";
import { normalizeRetryOptions, restartDelayMs, retryDelayMs, withDeadline, withRetry } from "./retry";

test("retry options are clamped", () => {
  assert.deepEqual(normalizeRetryOptions(undefined), { attempts: 3, baseDelayMs: 250, maxDelayMs: 5_000, jitterMs: 100 });
  assert.equal(normalizeRetryOptions({ attempts: 40 }).attempts, 10);
  assert.deepEqual(normalizeRetryOptions({ attempts: 0, baseDelayMs: 1, maxDelayMs: 5, jitterMs: -3 }), {
    attempts: 1,
    baseDelayMs: 20,
    maxDelayMs: 100,
    jitterMs: 0,
  });
});

test("delays double up to the cap plus jitter", () => {
  const policy = normalizeRetryOptions({ baseDelayMs: 100, maxDelayMs: 500, jitterMs: 10 });

  assert.equal(retryDelayMs(policy, 1, () => 0), 100);
  assert.equal(retryDelayMs(policy, 3, () => 0), 400);
  assert.equal(retryDelayMs(policy, 4, () => 0), 500);
  assert.equal(retryDelayMs(policy, 1, () => 0.99), 110);
});

test("plugin restarts are immediate once, then back off to a cap", () => {
  assert.equal(restartDelayMs(1, undefined, () => 0), 0);
  assert.equal(restartDelayMs(2, undefined, () => 0), 100);
  assert.equal(restartDelayMs(4, undefined, () => 0), 400);
  assert.equal(restartDelayMs(9, undefined, () => 0), 5_000);
  assert.equal(restartDelayMs(2, undefined, () => 0.99), 150);
});

test("withRetry retries until the operation succeeds", async () => {
  const { logger, messages } = captureLogger();
  let calls = 0;

  const result = await withRetry(
    "flaky",
    async () => {
      calls += 1;
      if (calls < 3) throw new Error("not yet");
      return "up";
    },
    logger,
    { attempts: 3, baseDelayMs: 20, jitterMs: 0 }
  );

  assert.equal(result, "up");
  assert.equal(calls, 3);
  assert.deepEqual(messages(), [
    "backend_retry_delay",
    "backend_retry_attempt",
    "backend_retry_delay",
    "backend_retry_attempt",
  ]);
});

test("withRetry rethrows the last error once attempts run out", async () => {
  const { logger } = captureLogger();
  let calls = 0;
  await assert.rejects(
    withRetry(
      "down",
      async () => {
        calls += 1;
        throw new Error(`failure ${calls}`);
      },
      logger,
      { attempts: 2, baseDelayMs: 20, jitterMs: 0 }
    ),
    /failure 2/
  );
});

test("withDeadline rejects slow tasks", async () => {
  assert.equal(await withDeadline("fast", 1_000, async () => 7), 7);
  await assert.rejects(
    withDeadline("slow", 20, () => new Promise((resolve) => setTimeout(resolve, 500))),
    /slow timed out after 20ms/
  );
});
