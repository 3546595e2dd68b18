import test from "node:test";
import assert from "node:assert/strict";
import { createRequestContext } from "../router/context";
import { DuplicateRegistrationError, UnknownActionError } from "../router/errors";
import { LambdaRegistry } from "./lambdas";

test("lambdas are invoked by name with their arguments", async () => {
  const registry = new LambdaRegistry();
  registry.registerLambda("math:double", async (args) => (typeof args === "number" ? args * 2 : null));

  const result = await registry.invokeLambda("math:double", 21, createRequestContext({ action: "math:double" }));

  assert.equal(result, 42);
  assert.deepEqual(registry.names(), ["math:double"]);
});

test("duplicate lambda names are rejected", () => {
  const registry = new LambdaRegistry();
  registry.registerLambda("math:double", async () => null);

  assert.throws(() => registry.registerLambda("math:double", async () => null), DuplicateRegistrationError);
});

test("unknown lambdas fail with NotFound", async () => {
  const registry = new LambdaRegistry();

  await assert.rejects(
    registry.invokeLambda("math:missing", null, createRequestContext({ action: "math:missing" })),
    UnknownActionError
  );
});
