import test from "node:test";
import assert from "node:assert/strict";
import { silentLogger } from "../config/logger";
import { MinioAssetStore } from "./minioAssetStore";

test("presigned URLs are computed locally when the region is configured", async () => {
  const store = new MinioAssetStore(
    {
      endpoint: "http://127.0.0.1:9000",
      accessKey: "test-access-key",
      secretKey: "test-secret",
      bucket: "assets",
      region: "us-east-1",
      timeoutMs: 2_000,
    },
    silentLogger
  );

  const signed = await store.signedGetUrl("photo.png", 60);

  assert.equal(store.impl, "minio");
  assert.match(signed.url, /^http:\/\/127\.0\.0\.1:9000\/assets\/photo\.png\?/);
  assert.match(signed.url, /X-Amz-Expires=60/);
  assert.match(signed.url, /X-Amz-Signature=[0-9a-f]{64}/);
  assert.ok(Date.parse(signed.expiresAt) > Date.now());
});
