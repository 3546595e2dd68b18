import { createClient, type RedisClientType } from "redis";
import type { Logger } from "../config/logger";
import { withDeadline, withRetry } from "./retry";

export type RedisConfig = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  connectTimeoutMs?: number;
  commandTimeoutMs?: number;
};

export type RedisConnection = {
  client: RedisClientType;
  connect: () => Promise<void>;
  command: <T>(label: string, task: () => Promise<T>) => Promise<T>;
  close: () => Promise<void>;
};

export function buildRedisClient(config: RedisConfig, logger: Logger): RedisConnection {
  const commandTimeoutMs = Math.max(500, config.commandTimeoutMs ?? 5_000);

  const client: RedisClientType = createClient({
    socket: {
      host: config.host,
      port: config.port,
      connectTimeout: Math.max(500, config.connectTimeoutMs ?? 5_000),
      reconnectStrategy(retries) {
        return Math.min(250 * (retries + 1), 3_000);
      },
    },
    username: config.username || undefined,
    password: config.password || undefined,
  });

  client.on("error", (error: Error) => {
    logger.error("redis_client_error", { message: error.message });
  });

  const connect = async (): Promise<void> => {
    await withRetry(
      "redis_connect",
      async () => {
        if (!client.isOpen) {
          await client.connect();
        }
      },
      logger
    );
  };

  const command = <T>(label: string, task: () => Promise<T>): Promise<T> =>
    withDeadline(`redis ${label} command`, commandTimeoutMs, task);

  const close = async (): Promise<void> => {
    if (client.isOpen) {
      await command("quit", () => client.quit());
    }
  };

  return { client, connect, command, close };
}
