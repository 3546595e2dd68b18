import type { Logger } from "../config/logger";
import { buildRedisClient, type RedisConfig, type RedisConnection } from "../connectivity/redis";
import { AccessTokenSchema, type AccessToken, type TokenStore } from "./tokenStore";

export type RedisTokenStoreConfig = RedisConfig & {
  keyPrefix: string;
};

export class RedisTokenStore implements TokenStore {
  readonly impl = "redis";
  private readonly redis: RedisConnection;

  constructor(
    private readonly config: RedisTokenStoreConfig,
    private readonly logger: Logger
  ) {
    this.redis = buildRedisClient(config, logger);
  }

  private key(token: string): string {
    return `${this.config.keyPrefix}${token}`;
  }

  async get(token: string): Promise<AccessToken | null> {
    await this.redis.connect();
    const raw = await this.redis.command("get", () => this.redis.client.get(this.key(token)));
    if (raw === null) return null;
    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      this.logger.warn("token_store_malformed_entry", { keyPrefix: this.config.keyPrefix });
      return null;
    }
    const parsed = AccessTokenSchema.safeParse(decoded);
    if (!parsed.success) {
      this.logger.warn("token_store_malformed_entry", { keyPrefix: this.config.keyPrefix });
      return null;
    }
    return parsed.data;
  }

  async put(token: AccessToken): Promise<void> {
    await this.redis.connect();
    const expiresMs = token.expiresAt ? Date.parse(token.expiresAt) - Date.now() : null;
    const value = JSON.stringify(token);
    if (expiresMs !== null && Number.isFinite(expiresMs)) {
      await this.redis.command("set", () =>
        this.redis.client.set(this.key(token.token), value, { PX: Math.max(1, Math.floor(expiresMs)) })
      );
      return;
    }
    await this.redis.command("set", () => this.redis.client.set(this.key(token.token), value));
  }

  async delete(token: string): Promise<void> {
    await this.redis.connect();
    await this.redis.command("del", () => this.redis.client.del(this.key(token)));
  }

  async close(): Promise<void> {
    await this.redis.close();
  }
}
