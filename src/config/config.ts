import fs from "node:fs";
import { z } from "zod";
import { PluginDescriptorSchema, resolveDescriptors, type PluginDescriptor } from "../plugin/descriptor";
import { ConfigurationError } from "../router/errors";
import type { ActionbaseEnv } from "./env";

const requiredString = (field: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${field} must not be empty` });

const port = z.number().int().min(0).max(65535);

const StorageSchema = z.discriminatedUnion("impl", [
  z.object({ impl: z.literal("memory") }),
  z.object({
    impl: z.literal("pg"),
    host: requiredString("storage.host").default("127.0.0.1"),
    port: port.default(5432),
    database: requiredString("storage.database"),
    user: requiredString("storage.user"),
    password: z.string().default(""),
    sslMode: z.enum(["disable", "prefer", "require"]).default("disable"),
    poolMax: z.number().int().min(1).max(50).default(10),
    idleTimeoutMs: z.number().int().min(1_000).max(300_000).default(30_000),
    connectionTimeoutMs: z.number().int().min(1_000).max(120_000).default(10_000),
    queryTimeoutMs: z.number().int().min(500).max(120_000).default(5_000),
    table: z.string().default("records"),
  }),
]);

const TokenStoreSchema = z.discriminatedUnion("impl", [
  z.object({ impl: z.literal("memory") }),
  z.object({
    impl: z.literal("redis"),
    host: requiredString("tokenStore.host").default("127.0.0.1"),
    port: port.default(6379),
    username: z.string().optional(),
    password: z.string().optional(),
    connectTimeoutMs: z.number().int().min(500).max(60_000).default(5_000),
    commandTimeoutMs: z.number().int().min(500).max(60_000).default(5_000),
    keyPrefix: z.string().default("actionbase:token:"),
  }),
]);

const AssetStoreSchema = z.discriminatedUnion("impl", [
  z.object({
    impl: z.literal("local"),
    urlPrefix: requiredString("assetStore.urlPrefix"),
    secret: requiredString("assetStore.secret"),
  }),
  z.object({
    impl: z.literal("minio"),
    endpoint: requiredString("assetStore.endpoint"),
    accessKey: requiredString("assetStore.accessKey"),
    secretKey: requiredString("assetStore.secretKey"),
    bucket: requiredString("assetStore.bucket"),
    region: z.string().optional(),
    timeoutMs: z.number().int().min(500).max(120_000).default(10_000),
  }),
]);

export const ConfigSchema = z.object({
  http: z
    .object({
      host: requiredString("http.host").default("127.0.0.1"),
      port: port.default(3000),
      allowedOrigins: z.array(z.string()).default([]),
    })
    .default({}),
  app: z.object({
    name: requiredString("app.name"),
    apiKey: requiredString("app.apiKey"),
    masterKey: requiredString("app.masterKey"),
  }),
  log: z.object({ level: z.enum(["debug", "info", "warn", "error"]).default("info") }).default({}),
  storage: StorageSchema.default({ impl: "memory" }),
  tokenStore: TokenStoreSchema.default({ impl: "memory" }),
  assetStore: AssetStoreSchema,
  plugins: z.array(PluginDescriptorSchema).default([]),
  shutdownDrainMs: z.number().int().min(0).max(600_000).default(10_000),
});

export type AppConfig = Omit<z.infer<typeof ConfigSchema>, "plugins"> & { plugins: PluginDescriptor[] };
export type StorageConfig = z.infer<typeof StorageSchema>;
export type TokenStoreConfig = z.infer<typeof TokenStoreSchema>;
export type AssetStoreConfig = z.infer<typeof AssetStoreSchema>;

export function parseConfig(input: unknown, env: ActionbaseEnv = {}): AppConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid actionbase config: ${message}`);
  }
  const config = parsed.data;
  let plugins: PluginDescriptor[];
  try {
    plugins = resolveDescriptors(config.plugins);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
  return {
    ...config,
    http: { ...config.http, port: env.ACTIONBASE_HTTP_PORT ?? config.http.port },
    log: { level: env.ACTIONBASE_LOG_LEVEL ?? config.log.level },
    plugins,
  };
}

export function loadConfigFile(path: string, env: ActionbaseEnv = {}): AppConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(decoded, env);
}

function redactStorage(storage: StorageConfig): Record<string, unknown> {
  if (storage.impl === "memory") return { impl: storage.impl };
  return {
    impl: storage.impl,
    host: storage.host,
    port: storage.port,
    database: storage.database,
    user: storage.user,
    table: storage.table,
    password: "[redacted]",
  };
}

function redactTokenStore(store: TokenStoreConfig): Record<string, unknown> {
  if (store.impl === "memory") return { impl: store.impl };
  return {
    impl: store.impl,
    host: store.host,
    port: store.port,
    keyPrefix: store.keyPrefix,
    password: store.password ? "[redacted]" : null,
  };
}

function redactAssetStore(store: AssetStoreConfig): Record<string, unknown> {
  if (store.impl === "local") return { impl: store.impl, urlPrefix: store.urlPrefix, secret: "[redacted]" };
  return {
    impl: store.impl,
    endpoint: store.endpoint,
    bucket: store.bucket,
    region: store.region ?? null,
    accessKey: store.accessKey ? "[set]" : null,
    secretKey: "[redacted]",
  };
}

export function redactConfigForLogs(config: AppConfig): Record<string, unknown> {
  return {
    http: config.http,
    app: { name: config.app.name, apiKey: "[redacted]", masterKey: "[redacted]" },
    log: config.log,
    storage: redactStorage(config.storage),
    tokenStore: redactTokenStore(config.tokenStore),
    assetStore: redactAssetStore(config.assetStore),
    plugins: config.plugins.map((plugin) => ({
      name: plugin.name,
      transport: plugin.transport,
      path: plugin.path,
      poolWidth: plugin.poolWidth,
    })),
    shutdownDrainMs: config.shutdownDrainMs,
  };
}
