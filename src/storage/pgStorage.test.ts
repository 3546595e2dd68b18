import test from "node:test";
import assert from "node:assert/strict";
import { silentLogger } from "../config/logger";
import { assertTableName, PgStorageConnector } from "./pgStorage";

const CONFIG = {
  host: "127.0.0.1",
  port: 5432,
  database: "actionbase",
  user: "actionbase",
  password: "test-password",
  sslMode: "disable" as const,
  poolMax: 2,
  idleTimeoutMs: 1_000,
  connectionTimeoutMs: 1_000,
  queryTimeoutMs: 1_000,
  table: "records",
};

test("table names are plain lowercase identifiers", () => {
  assert.equal(assertTableName("records"), "records");
  assert.equal(assertTableName("app_records_2"), "app_records_2");
  assert.throws(() => assertTableName("records; DROP TABLE x"), /invalid record table name/);
  assert.throws(() => assertTableName("Records"), /invalid record table name/);
});

test("the connector rejects an unsafe table before creating a pool", () => {
  assert.throws(() => new PgStorageConnector({ ...CONFIG, table: "x-y" }, silentLogger), /invalid record table name "x-y"/);
});

test("the connector reports its impl and closes without having connected", async () => {
  const storage = new PgStorageConnector(CONFIG, silentLogger);
  assert.equal(storage.impl, "pg");
  await storage.close();
});
