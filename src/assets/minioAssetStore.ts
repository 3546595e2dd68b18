import { Client as MinioClient } from "minio";
import type { Logger } from "../config/logger";
import { withDeadline, withRetry } from "../connectivity/retry";
import { DEFAULT_URL_EXPIRY_SECONDS, type AssetStore, type SignedUrl } from "./assetStore";

export type MinioAssetStoreConfig = {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  bucket: string;
  region?: string;
  timeoutMs: number;
};

function toHostAndPort(url: string): { host: string; port: number; useSSL: boolean } {
  try {
    const parsed = new URL(url);
    return {
      host: parsed.hostname || "127.0.0.1",
      port: Number(parsed.port || (parsed.protocol === "https:" ? 443 : 80)),
      useSSL: parsed.protocol === "https:",
    };
  } catch {
    return { host: url || "127.0.0.1", port: 9000, useSSL: false };
  }
}

export class MinioAssetStore implements AssetStore {
  readonly impl = "minio";
  private readonly client: MinioClient;

  constructor(
    private readonly config: MinioAssetStoreConfig,
    private readonly logger: Logger
  ) {
    const target = toHostAndPort(config.endpoint);
    this.client = new MinioClient({
      endPoint: target.host,
      port: target.port,
      useSSL: target.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
      region: config.region,
    });
  }

  async ensureBucket(): Promise<void> {
    await withRetry(
      "asset_store_bucket",
      async () => {
        const exists = await this.client.bucketExists(this.config.bucket);
        if (!exists) {
          await this.client.makeBucket(this.config.bucket, this.config.region ?? "us-east-1");
          this.logger.info("asset_store_bucket_created", { bucket: this.config.bucket });
        }
      },
      this.logger
    );
  }

  private expiry(expirySeconds: number): string {
    return new Date(Date.now() + expirySeconds * 1000).toISOString();
  }

  async signedGetUrl(name: string, expirySeconds = DEFAULT_URL_EXPIRY_SECONDS): Promise<SignedUrl> {
    const url = await withDeadline("asset store presign get", this.config.timeoutMs, () =>
      this.client.presignedGetObject(this.config.bucket, name, expirySeconds)
    );
    return { url, expiresAt: this.expiry(expirySeconds) };
  }

  async signedPutUrl(name: string, expirySeconds = DEFAULT_URL_EXPIRY_SECONDS): Promise<SignedUrl> {
    const url = await withDeadline("asset store presign put", this.config.timeoutMs, () =>
      this.client.presignedPutObject(this.config.bucket, name, expirySeconds)
    );
    return { url, expiresAt: this.expiry(expirySeconds) };
  }
}
