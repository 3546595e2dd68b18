import crypto from "node:crypto";

export type SignedUrl = {
  url: string;
  expiresAt: string;
};

export interface AssetStore {
  readonly impl: string;
  signedGetUrl(name: string, expirySeconds?: number): Promise<SignedUrl>;
  signedPutUrl(name: string, expirySeconds?: number): Promise<SignedUrl>;
}

export const DEFAULT_URL_EXPIRY_SECONDS = 15 * 60;

const ASSET_NAME = /^[A-Za-z0-9._-][A-Za-z0-9._/-]{0,511}$/;

export function isValidAssetName(name: string): boolean {
  return ASSET_NAME.test(name) && !name.split("/").includes("..");
}

export function signAssetUrl(secret: string, method: "GET" | "PUT", name: string, expiresAtSec: number): string {
  return crypto.createHmac("sha256", secret).update(`${method}\n${name}\n${expiresAtSec}`).digest("hex");
}

/**
 * Signs URLs pointing back at this server's `files/` routes; the bytes live
 * on whatever serves `urlPrefix`.
 */
export class LocalAssetStore implements AssetStore {
  readonly impl = "local";

  constructor(
    private readonly urlPrefix: string,
    private readonly secret: string,
    private readonly now: () => number = Date.now
  ) {}

  private sign(method: "GET" | "PUT", name: string, expirySeconds: number): SignedUrl {
    const expiresAtSec = Math.floor(this.now() / 1000) + expirySeconds;
    const signature = signAssetUrl(this.secret, method, name, expiresAtSec);
    const base = this.urlPrefix.replace(/\/+$/, "");
    const encoded = name.split("/").map(encodeURIComponent).join("/");
    return {
      url: `${base}/files/${encoded}?expiredAt=${expiresAtSec}&signature=${signature}`,
      expiresAt: new Date(expiresAtSec * 1000).toISOString(),
    };
  }

  async signedGetUrl(name: string, expirySeconds = DEFAULT_URL_EXPIRY_SECONDS): Promise<SignedUrl> {
    return this.sign("GET", name, expirySeconds);
  }

  async signedPutUrl(name: string, expirySeconds = DEFAULT_URL_EXPIRY_SECONDS): Promise<SignedUrl> {
    return this.sign("PUT", name, expirySeconds);
  }
}
