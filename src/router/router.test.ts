import test from "node:test";
import assert from "node:assert/strict";
import { createRequestContext } from "./context";
import { ActionError, DuplicateRegistrationError } from "./errors";
import { Router, type Preprocessor } from "./router";

function recordingPreprocessor(log: string[], label: string, fail = false): Preprocessor {
  return (ctx) => {
    log.push(label);
    if (fail) ctx.error = new ActionError("NotAuthenticated", `${label} refused`);
  };
}

test("preprocessors run in registration order before the handler", async () => {
  const log: string[] = [];
  const router = new Router();
  router.register(
    "demo:ordered",
    async () => {
      log.push("handler");
      return "done";
    },
    [recordingPreprocessor(log, "a"), recordingPreprocessor(log, "b"), recordingPreprocessor(log, "c")]
  );

  const outcome = await router.dispatch(createRequestContext({ action: "demo:ordered" }));

  assert.deepEqual(log, ["a", "b", "c", "handler"]);
  assert.deepEqual(outcome, { ok: true, result: "done" });
});

test("first preprocessor error stops the chain and the handler", async () => {
  const log: string[] = [];
  let handlerCalls = 0;
  const router = new Router();
  router.register(
    "demo:guarded",
    async () => {
      handlerCalls += 1;
      return null;
    },
    [recordingPreprocessor(log, "first", true), recordingPreprocessor(log, "second")]
  );

  const ctx = createRequestContext({ action: "demo:guarded" });
  const outcome = await router.dispatch(ctx);

  assert.equal(handlerCalls, 0);
  assert.deepEqual(log, ["first"]);
  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.equal(outcome.error.errorName, "NotAuthenticated");
    assert.equal(outcome.error.message, "first refused");
    assert.equal(outcome.error.status, 401);
  }
  assert.equal(ctx.error?.errorName, "NotAuthenticated");
});

test("a throwing preprocessor becomes an UnexpectedError outcome", async () => {
  const router = new Router();
  router.register("demo:boom", async () => "never", [
    () => {
      throw new Error("kaboom");
    },
  ]);

  const outcome = await router.dispatch(createRequestContext({ action: "demo:boom" }));

  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.equal(outcome.error.errorName, "UnexpectedError");
    assert.equal(outcome.error.code, 10000);
    assert.equal(outcome.error.message, "kaboom");
  }
});

test("registering an action twice is rejected and the first handler stays", async () => {
  const router = new Router();
  router.register("demo:twice", async () => "first");

  assert.throws(() => router.register("demo:twice", async () => "second"), DuplicateRegistrationError);
  const outcome = await router.dispatch(createRequestContext({ action: "demo:twice" }));
  assert.deepEqual(outcome, { ok: true, result: "first" });
});

test("unknown actions fail with NotFound", async () => {
  const router = new Router();
  const outcome = await router.dispatch(createRequestContext({ action: "nope:missing" }));

  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.equal(outcome.error.errorName, "NotFound");
    assert.equal(outcome.error.status, 404);
    assert.equal(outcome.error.message, 'Unknown action "nope:missing"');
  }
});

test("handler errors are surfaced as structured outcomes", async () => {
  const router = new Router();
  router.register("demo:fails", async () => {
    throw new ActionError("InvalidArgument", "bad input", { field: "x" });
  });

  const outcome = await router.dispatch(createRequestContext({ action: "demo:fails" }));

  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.deepEqual(outcome.error.toPayload(), {
      code: 108,
      name: "InvalidArgument",
      message: "bad input",
      info: { field: "x" },
    });
  }
});

test("path routes match anchored patterns and expose capture groups", async () => {
  const router = new Router();
  router.registerPath("GET", "files/(.+)", async (ctx) => ctx.pathParams);
  router.registerPath("PUT", "files/(.+)", async () => "upload");

  assert.deepEqual(router.matchPath("GET", "/files/a/b.png"), { route: "GET files/(.+)", params: ["a/b.png"] });
  assert.equal(router.matchPath("GET", "/prefix/files/a.png"), null);
  assert.equal(router.matchPath("POST", "/files/a.png"), null);

  const outcome = await router.dispatchPath("GET", "/files/a/b.png", createRequestContext({ action: "GET files/(.+)" }));
  assert.deepEqual(outcome, { ok: true, result: ["a/b.png"] });
});

test("sealed routers refuse new routes", () => {
  const router = new Router();
  router.register("", async () => ({ status: "OK" }));
  router.seal();

  assert.equal(router.isSealed(), true);
  assert.throws(() => router.register("late:action", async () => null), /sealed/);
  assert.deepEqual(router.actions(), [""]);
});

test("route kinds are resolved at registration", () => {
  const router = new Router();
  router.register("native:one", async () => null);
  router.register("plugin:one", { kind: "plugin", plugin: "demo", handle: async () => null });

  assert.equal(router.routeKind("native:one"), "native");
  assert.equal(router.routeKind("plugin:one"), "plugin");
  assert.equal(router.routeKind("missing"), null);
});
