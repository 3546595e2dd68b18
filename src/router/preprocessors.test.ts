import test from "node:test";
import assert from "node:assert/strict";
import { MemoryTokenStore } from "../auth/tokenStore";
import { MemoryStorageConnector } from "../storage/memoryStorage";
import type { StorageConnection, StorageConnector } from "../storage/types";
import { createRequestContext, releaseRequestContext } from "./context";
import {
  API_KEY_HEADER,
  apiKeyPreprocessor,
  authenticatorPreprocessor,
  requireUserForWrite,
  storagePreprocessor,
  tokenStorePreprocessor,
} from "./preprocessors";

const keys = { apiKey: "test-api-key", masterKey: "test-master-key" };
const fixedNow = () => new Date("2026-03-01T12:00:00.000Z");

test("api key in the payload yields an api-key principal", async () => {
  const ctx = createRequestContext({ action: "record:fetch", payload: { api_key: "test-api-key" } });
  await apiKeyPreprocessor(keys)(ctx);

  assert.equal(ctx.error, null);
  assert.deepEqual(ctx.principal, { kind: "api-key" });
});

test("master key in the header yields a master principal", async () => {
  const ctx = createRequestContext({ action: "record:fetch", headers: { [API_KEY_HEADER]: "test-master-key" } });
  await apiKeyPreprocessor(keys)(ctx);

  assert.deepEqual(ctx.principal, { kind: "master" });
});

test("missing or wrong api keys are NotAuthenticated", async () => {
  const missing = createRequestContext({ action: "record:fetch" });
  await apiKeyPreprocessor(keys)(missing);
  assert.equal(missing.error?.errorName, "NotAuthenticated");
  assert.equal(missing.error?.message, "API key is required");

  const wrong = createRequestContext({ action: "record:fetch", payload: { api_key: "test-other" } });
  await apiKeyPreprocessor(keys)(wrong);
  assert.equal(wrong.error?.errorName, "NotAuthenticated");
  assert.equal(wrong.error?.message, "API key is not valid");
  assert.deepEqual(wrong.principal, { kind: "none" });
});

test("a live access token resolves to a user principal", async () => {
  const store = new MemoryTokenStore();
  await store.put({
    token: "test-token",
    userId: "user-1",
    issuedAt: "2026-03-01T00:00:00.000Z",
    expiresAt: "2026-03-02T00:00:00.000Z",
  });
  const ctx = createRequestContext({ action: "record:save", payload: { access_token: "test-token" } });
  await tokenStorePreprocessor(store)(ctx);
  await authenticatorPreprocessor(keys, fixedNow)(ctx);

  assert.equal(ctx.error, null);
  assert.deepEqual(ctx.principal, { kind: "user", userId: "user-1", accessToken: "test-token" });
});

test("expired or unknown access tokens are not accepted", async () => {
  const store = new MemoryTokenStore();
  await store.put({
    token: "test-expired",
    userId: "user-1",
    issuedAt: "2026-02-01T00:00:00.000Z",
    expiresAt: "2026-02-02T00:00:00.000Z",
  });

  for (const token of ["test-expired", "test-unknown"]) {
    const ctx = createRequestContext({ action: "record:save", payload: { access_token: token } });
    await tokenStorePreprocessor(store)(ctx);
    await authenticatorPreprocessor(keys, fixedNow)(ctx);
    assert.equal(ctx.error?.errorName, "AccessTokenNotAccepted", token);
    assert.equal(ctx.error?.code, 104, token);
  }
});

test("without an access token the authenticator falls back to the api key", async () => {
  const ctx = createRequestContext({ action: "record:fetch", payload: { api_key: "test-api-key" } });
  await authenticatorPreprocessor(keys, fixedNow)(ctx);

  assert.deepEqual(ctx.principal, { kind: "api-key" });
});

test("writes need a user or master principal", () => {
  const anonymous = createRequestContext({ action: "record:save" });
  anonymous.principal = { kind: "api-key" };
  requireUserForWrite(anonymous);
  assert.equal(anonymous.error?.errorName, "PermissionDenied");

  const master = createRequestContext({ action: "record:save" });
  master.principal = { kind: "master" };
  requireUserForWrite(master);
  assert.equal(master.error, null);
});

test("storage connections opened for a request are released afterwards", async () => {
  const connector = new MemoryStorageConnector();
  const ctx = createRequestContext({ action: "record:fetch" });
  await storagePreprocessor(connector)(ctx);

  assert.ok(ctx.storage);
  assert.equal(connector.openConnections(), 1);
  await releaseRequestContext(ctx);
  assert.equal(ctx.storage, null);
  assert.equal(connector.openConnections(), 0);
});

test("a storage outage aborts with ServiceUnavailable", async () => {
  const broken: StorageConnector = {
    impl: "broken",
    open: async (): Promise<StorageConnection> => {
      throw new Error("connection refused");
    },
    healthcheck: async () => ({ ok: false, latencyMs: 0, error: "down" }),
    close: async () => {},
  };
  const ctx = createRequestContext({ action: "record:fetch" });
  await storagePreprocessor(broken)(ctx);

  assert.equal(ctx.error?.errorName, "ServiceUnavailable");
  assert.equal(ctx.error?.status, 503);
});
