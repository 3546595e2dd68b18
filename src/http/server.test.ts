import test from "node:test";
import assert from "node:assert/strict";
import { homeHandler } from "../handlers/home";
import { ActionError } from "../router/errors";
import { Router } from "../router/router";
import { captureLogger, deferred, waitFor } from "../testing/fakes";
import { actionFromRequest, startHttpServer, type ActionServer } from "./server";

function buildRouter(): Router {
  const router = new Router();
  router.register("", homeHandler);
  router.register("demo:echo", async (ctx) => ({ echoed: ctx.payload.msg ?? null, principal: ctx.principal.kind }));
  router.register("demo:refuse", async () => {
    throw new ActionError("PermissionDenied", "not for you");
  });
  router.register("demo:guarded", async () => "unreachable", [
    (ctx) => {
      ctx.error = new ActionError("NotAuthenticated", "API key is required");
    },
  ]);
  router.registerPath("GET", "files/(.+)", async (ctx) => ({ name: ctx.pathParams[0] }));
  router.seal();
  return router;
}

async function withServer(
  options: Partial<Parameters<typeof startHttpServer>[0]>,
  run: (baseUrl: string, server: ActionServer) => Promise<void>
): Promise<void> {
  const server = startHttpServer({
    host: "127.0.0.1",
    port: 0,
    logger: captureLogger().logger,
    router: buildRouter(),
    ...options,
  });
  const address = await server.listening;
  try {
    await run(`http://127.0.0.1:${address.port}`, server);
  } finally {
    await server.drain(1_000);
  }
}

function post(url: string, body: string): Promise<Response> {
  return fetch(url, { method: "POST", headers: { "content-type": "application/json" }, body });
}

test("action names come from the body or the path", () => {
  assert.equal(actionFromRequest("/", { action: "record:save" }), "record:save");
  assert.equal(actionFromRequest("/record/save/", {}), "record:save");
  assert.equal(actionFromRequest("/", {}), "");
});

test("health endpoint reports the service and provider details", async () => {
  await withServer({ health: async () => ({ plugins: [], storage: { ok: true, latencyMs: 0 } }) }, async (baseUrl) => {
    const response = await fetch(`${baseUrl}/healthz`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      ok: true,
      service: "actionbase",
      plugins: [],
      storage: { ok: true, latencyMs: 0 },
    });
  });
});

test("POST dispatches by body action and by path", async () => {
  await withServer({}, async (baseUrl) => {
    const byBody = await post(`${baseUrl}/`, JSON.stringify({ action: "demo:echo", msg: "hi" }));
    assert.equal(byBody.status, 200);
    assert.ok(byBody.headers.get("x-request-id"));
    assert.deepEqual(await byBody.json(), { result: { echoed: "hi", principal: "none" } });

    const byPath = await post(`${baseUrl}/demo/echo`, "");
    assert.deepEqual(await byPath.json(), { result: { echoed: null, principal: "none" } });

    const home = await post(`${baseUrl}/`, "{}");
    assert.deepEqual(await home.json(), { result: { status: "OK" } });
  });
});

test("action errors map to their HTTP status and payload", async () => {
  await withServer({}, async (baseUrl) => {
    const refused = await post(`${baseUrl}/demo/refuse`, "{}");
    assert.equal(refused.status, 403);
    assert.deepEqual(await refused.json(), { error: { code: 102, name: "PermissionDenied", message: "not for you" } });

    const guarded = await post(`${baseUrl}/demo/guarded`, "{}");
    assert.equal(guarded.status, 401);
    assert.deepEqual(await guarded.json(), {
      error: { code: 101, name: "NotAuthenticated", message: "API key is required" },
    });

    const unknown = await post(`${baseUrl}/`, JSON.stringify({ action: "demo:missing" }));
    assert.equal(unknown.status, 404);
    assert.deepEqual(await unknown.json(), {
      error: { code: 110, name: "NotFound", message: 'Unknown action "demo:missing"', info: { action: "demo:missing" } },
    });
  });
});

test("request and response bodies are logged at debug with credentials redacted", async () => {
  const capture = captureLogger();
  await withServer({ logger: capture.logger }, async (baseUrl) => {
    const response = await post(
      `${baseUrl}/`,
      JSON.stringify({ action: "demo:echo", msg: "hi", api_key: "test-api-key", access_token: "test-token" })
    );
    assert.equal(response.status, 200);
    await response.json();
  });

  const requestBody = capture.entries.find((entry) => entry.msg === "http_request_body");
  assert.equal(requestBody?.level, "debug");
  assert.equal(requestBody?.meta?.action, "demo:echo");
  assert.deepEqual(requestBody?.meta?.body, {
    action: "demo:echo",
    msg: "hi",
    api_key: "[redacted]",
    access_token: "[redacted]",
  });
  const responseBody = capture.entries.find((entry) => entry.msg === "http_response_body");
  assert.equal(responseBody?.meta?.statusCode, 200);
  assert.deepEqual(responseBody?.meta?.body, { result: { echoed: "hi", principal: "none" } });
});

test("malformed bodies are rejected before dispatch", async () => {
  await withServer({ maxBodyBytes: 64 }, async (baseUrl) => {
    const invalid = await post(`${baseUrl}/`, "{not json");
    assert.equal(invalid.status, 400);
    assert.deepEqual(await invalid.json(), {
      error: { code: 108, name: "InvalidArgument", message: "request body is not valid JSON" },
    });

    const array = await post(`${baseUrl}/`, "[1,2]");
    assert.equal(array.status, 400);

    const large = await post(`${baseUrl}/`, JSON.stringify({ action: "demo:echo", msg: "x".repeat(100) }));
    assert.equal(large.status, 413);
  });
});

test("path routes receive their captured groups; other methods are not found", async () => {
  await withServer({}, async (baseUrl) => {
    const file = await fetch(`${baseUrl}/files/docs/guide.pdf`);
    assert.equal(file.status, 200);
    assert.deepEqual(await file.json(), { result: { name: "docs/guide.pdf" } });

    const missing = await fetch(`${baseUrl}/nothing/here`);
    assert.equal(missing.status, 404);
    assert.deepEqual(await missing.json(), {
      error: { code: 110, name: "NotFound", message: "no route for GET /nothing/here" },
    });
  });
});

test("CORS preflight only answers allowed origins", async () => {
  await withServer({ allowedOrigins: ["https://app.example.test"] }, async (baseUrl) => {
    const allowed = await fetch(`${baseUrl}/`, { method: "OPTIONS", headers: { origin: "https://app.example.test" } });
    assert.equal(allowed.status, 204);
    assert.equal(allowed.headers.get("access-control-allow-origin"), "https://app.example.test");

    const denied = await fetch(`${baseUrl}/`, { method: "OPTIONS", headers: { origin: "https://evil.example.test" } });
    assert.equal(denied.status, 403);
    assert.equal(denied.headers.get("access-control-allow-origin"), null);
  });
});

test("drain waits for in-flight requests to finish", async () => {
  const gate = deferred<void>();
  const router = new Router();
  router.register("demo:slow", async () => {
    await gate.promise;
    return "finished";
  });
  const capture = captureLogger();
  const server = startHttpServer({ host: "127.0.0.1", port: 0, logger: capture.logger, router });
  const address = await server.listening;

  const pending = post(`http://127.0.0.1:${address.port}/demo/slow`, "{}");
  await waitFor(() => server.inFlight() === 1);
  const drained = server.drain(2_000);
  gate.resolve();

  const response = await pending;
  assert.deepEqual(await response.json(), { result: "finished" });
  assert.equal(await drained, true);
  assert.equal(server.inFlight(), 0);
  const logged = capture.entries.find((entry) => entry.msg === "http_request");
  assert.equal(logged?.meta?.action, "demo:slow");
  assert.equal(logged?.meta?.statusCode, 200);
});

test("drain gives up after its deadline", async () => {
  const gate = deferred<void>();
  const router = new Router();
  router.register("demo:stuck", async () => gate.promise);
  const capture = captureLogger();
  const server = startHttpServer({ host: "127.0.0.1", port: 0, logger: capture.logger, router });
  const address = await server.listening;

  const pending = post(`http://127.0.0.1:${address.port}/demo/stuck`, "{}").catch((error: unknown) => error);
  await waitFor(() => server.inFlight() === 1);

  assert.equal(await server.drain(50), false);
  assert.ok(capture.messages().includes("http_drain_timeout"));
  gate.resolve();
  await pending;
});
