import test from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "../router/errors";
import { readEnv } from "./env";

test("known variables are parsed and blanks ignored", () => {
  const env = readEnv({ ACTIONBASE_CONFIG: "  ", ACTIONBASE_LOG_LEVEL: "warn", ACTIONBASE_HTTP_PORT: "8080", UNRELATED: "x" });

  assert.equal(env.ACTIONBASE_CONFIG, undefined);
  assert.equal(env.ACTIONBASE_LOG_LEVEL, "warn");
  assert.equal(env.ACTIONBASE_HTTP_PORT, 8080);
  assert.equal("UNRELATED" in env, false);
});

test("malformed variables are configuration errors", () => {
  assert.throws(
    () => readEnv({ ACTIONBASE_HTTP_PORT: "eighty" }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.match(error.message, /^Invalid actionbase env: ACTIONBASE_HTTP_PORT: /);
      return true;
    }
  );
});
