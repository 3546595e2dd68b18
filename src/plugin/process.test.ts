import test from "node:test";
import assert from "node:assert/strict";
import { PluginCallError, PluginProtocolError, PluginTimeoutError } from "../router/errors";
import { captureLogger, manifestResponder, ScriptedTransport } from "../testing/fakes";
import { PluginProcess } from "./process";

function makeProcess(transport: ScriptedTransport): PluginProcess {
  return new PluginProcess(1, transport, {
    plugin: "demo",
    callTimeoutMs: 1_000,
    handshakeTimeoutMs: 1_000,
    logger: captureLogger().logger,
  });
}

test("handshake moves a process from starting to ready", async () => {
  const transport = new ScriptedTransport(manifestResponder(async () => null, { handlers: ["demo:echo"] }));
  const process = makeProcess(transport);

  const manifest = await process.handshake();

  assert.deepEqual(manifest.handlers, ["demo:echo"]);
  assert.equal(process.state, "ready");
  assert.deepEqual(transport.requests, [{ kind: "init", name: "init", context: null }]);
});

test("a malformed handshake kills the process", async () => {
  const transport = new ScriptedTransport(async () => ({ handlers: "demo:echo" }));
  const process = makeProcess(transport);

  await assert.rejects(process.handshake(), PluginProtocolError);
  assert.equal(process.state, "dead");
  assert.equal(transport.killed, "SIGKILL");
});

test("calls require a checkout and return the process to busy until checkin", async () => {
  const transport = new ScriptedTransport(manifestResponder(async (request) => ({ echoed: request.context })));
  const process = makeProcess(transport);
  await process.handshake();

  await assert.rejects(process.call("demo:echo", {}), /must be checked out/);
  process.checkout();
  assert.equal(process.state, "busy");
  assert.deepEqual(await process.call("demo:echo", { msg: "hi" }), { echoed: { msg: "hi" } });
  process.checkin();
  assert.equal(process.state, "ready");
});

test("error replies leave the process alive", async () => {
  const transport = new ScriptedTransport(
    manifestResponder(async () => {
      throw new PluginCallError("demo", { code: 400, message: "bad widget" });
    })
  );
  const process = makeProcess(transport);
  await process.handshake();
  process.checkout();

  await assert.rejects(process.call("demo:widget", {}), /bad widget/);
  assert.equal(process.state, "busy");
});

test("timeouts mark the process dead and notify listeners", async () => {
  const transport = new ScriptedTransport(
    manifestResponder(async () => {
      throw new PluginTimeoutError("demo", "demo:slow", 1_000);
    })
  );
  const process = makeProcess(transport);
  const deaths: string[] = [];
  process.onDeath((_dead, reason) => deaths.push(reason));
  await process.handshake();
  process.checkout();

  await assert.rejects(process.call("demo:slow", {}), PluginTimeoutError);
  assert.equal(process.state, "dead");
  assert.deepEqual(deaths, ["call demo:slow failed: plugin demo did not answer demo:slow within 1000ms"]);
  assert.throws(() => process.checkin(), /invalid transition dead -> ready/);
});

test("an exiting transport marks the process dead", async () => {
  const transport = new ScriptedTransport(manifestResponder());
  const process = makeProcess(transport);
  await process.handshake();

  transport.exit({ code: 3, signal: null });

  assert.equal(process.state, "dead");
  assert.equal(process.deathReason, "process exited (code=3, signal=null)");
});
