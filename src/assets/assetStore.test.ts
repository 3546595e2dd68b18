import test from "node:test";
import assert from "node:assert/strict";
import crypto from "node:crypto";
import { isValidAssetName, LocalAssetStore, signAssetUrl } from "./assetStore";

const NOW_MS = 1_750_000_000_000;

test("asset names are relative paths without traversal", () => {
  assert.equal(isValidAssetName("avatars/user-1.png"), true);
  assert.equal(isValidAssetName("report_2026.pdf"), true);
  assert.equal(isValidAssetName("/etc/passwd"), false);
  assert.equal(isValidAssetName("avatars/../secrets"), false);
  assert.equal(isValidAssetName("with space.png"), false);
  assert.equal(isValidAssetName(""), false);
});

test("signatures are an HMAC over method, name and expiry", () => {
  const expected = crypto.createHmac("sha256", "test-secret").update("GET\nphoto.png\n1750000900").digest("hex");
  assert.equal(signAssetUrl("test-secret", "GET", "photo.png", 1_750_000_900), expected);
  assert.notEqual(signAssetUrl("test-secret", "PUT", "photo.png", 1_750_000_900), expected);
});

test("local store signs URLs under its prefix", async () => {
  const store = new LocalAssetStore("http://localhost:3000/", "test-secret", () => NOW_MS);

  const signed = await store.signedGetUrl("albums/summer-1.png");
  const signature = signAssetUrl("test-secret", "GET", "albums/summer-1.png", 1_750_000_900);
  assert.deepEqual(signed, {
    url: `http://localhost:3000/files/albums/summer-1.png?expiredAt=1750000900&signature=${signature}`,
    expiresAt: "2025-06-15T15:21:40.000Z",
  });

  const upload = await store.signedPutUrl("a.txt", 60);
  assert.equal(upload.expiresAt, "2025-06-15T15:07:40.000Z");
  assert.match(upload.url, /^http:\/\/localhost:3000\/files\/a\.txt\?expiredAt=1750000060&signature=[0-9a-f]{64}$/);
});
