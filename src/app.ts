import { LocalAssetStore, type AssetStore } from "./assets/assetStore";
import { MinioAssetStore } from "./assets/minioAssetStore";
import { RedisTokenStore } from "./auth/redisTokenStore";
import { MemoryTokenStore, type TokenStore } from "./auth/tokenStore";
import type { AppConfig } from "./config/config";
import type { Logger } from "./config/logger";
import { assetGetUrlHandler, assetUploadUrlHandler } from "./handlers/assets";
import { authLogoutHandler } from "./handlers/auth";
import { homeHandler } from "./handlers/home";
import { recordDeleteHandler, recordFetchHandler, recordSaveHandler } from "./handlers/records";
import { TimerRunner } from "./jobs/runner";
import { IntervalScheduler, type TimerScheduler } from "./jobs/scheduler";
import { Plugin, type PluginSummary } from "./plugin/plugin";
import { PluginRegistrar, type RegistrationSummary } from "./plugin/registrar";
import type { TransportFactory } from "./plugin/transport";
import { HookRegistry } from "./registry/hooks";
import { LambdaRegistry } from "./registry/lambdas";
import { TimerRegistry } from "./registry/timers";
import {
  apiKeyPreprocessor,
  assetStorePreprocessor,
  authenticatorPreprocessor,
  hookRegistryPreprocessor,
  requireUserForWrite,
  storagePreprocessor,
  tokenStorePreprocessor,
  type AppKeys,
} from "./router/preprocessors";
import { Router, type Preprocessor } from "./router/router";
import { MemoryStorageConnector } from "./storage/memoryStorage";
import { PgStorageConnector } from "./storage/pgStorage";
import type { StorageConnector } from "./storage/types";

export type AppOverrides = {
  storage?: StorageConnector;
  tokenStore?: TokenStore;
  assetStore?: AssetStore;
  transportFactory?: TransportFactory;
};

export type App = {
  readonly config: AppConfig;
  readonly router: Router;
  readonly hooks: HookRegistry;
  readonly lambdas: LambdaRegistry;
  readonly timers: TimerRegistry;
  readonly runner: TimerRunner;
  readonly scheduler: TimerScheduler;
  readonly plugins: readonly Plugin[];
  readonly registration: RegistrationSummary;
  readonly storage: StorageConnector;
  readonly tokenStore: TokenStore;
  readonly assetStore: AssetStore;
  health(): Promise<{ plugins: PluginSummary[]; storage: { impl: string; ok: boolean } }>;
  /** Stops timers, then plugins, then backing stores. */
  close(): Promise<void>;
};

export type PreprocessorChains = {
  auth: Preprocessor[];
  read: Preprocessor[];
  write: Preprocessor[];
  assetGet: Preprocessor[];
  assetPut: Preprocessor[];
  pluginAction: Preprocessor[];
  lambda: Preprocessor[];
};

export function buildPreprocessorChains(
  keys: AppKeys,
  deps: { storage: StorageConnector; tokenStore: TokenStore; assetStore: AssetStore; hooks: HookRegistry }
): PreprocessorChains {
  const tokenStore = tokenStorePreprocessor(deps.tokenStore);
  const authenticator = authenticatorPreprocessor(keys);
  const storage = storagePreprocessor(deps.storage);
  const assetStore = assetStorePreprocessor(deps.assetStore);
  return {
    auth: [tokenStore, authenticator],
    read: [tokenStore, authenticator, storage, assetStore],
    write: [hookRegistryPreprocessor(deps.hooks), tokenStore, authenticator, requireUserForWrite, storage, assetStore],
    assetGet: [apiKeyPreprocessor(keys), assetStore],
    assetPut: [tokenStore, authenticator, requireUserForWrite, assetStore],
    pluginAction: [tokenStore, authenticator, storage, assetStore],
    lambda: [tokenStore, authenticator, storage, assetStore],
  };
}

async function openStorage(config: AppConfig, logger: Logger): Promise<StorageConnector> {
  if (config.storage.impl === "memory") return new MemoryStorageConnector();
  const connector = new PgStorageConnector(config.storage, logger);
  await connector.migrate();
  return connector;
}

function openTokenStore(config: AppConfig, logger: Logger): TokenStore {
  if (config.tokenStore.impl === "memory") return new MemoryTokenStore();
  return new RedisTokenStore(config.tokenStore, logger);
}

async function openAssetStore(config: AppConfig, logger: Logger): Promise<AssetStore> {
  if (config.assetStore.impl === "local") {
    return new LocalAssetStore(config.assetStore.urlPrefix, config.assetStore.secret);
  }
  const store = new MinioAssetStore(config.assetStore, logger);
  await store.ensureBucket();
  return store;
}

export function registerNativeRoutes(router: Router, chains: PreprocessorChains): void {
  router.register("", homeHandler);
  router.register("record:fetch", recordFetchHandler, chains.read);
  router.register("record:save", recordSaveHandler, chains.write);
  router.register("record:delete", recordDeleteHandler, chains.write);
  router.register("auth:logout", authLogoutHandler, chains.auth);
  router.registerPath("GET", "files/(.+)", assetGetUrlHandler, chains.assetGet);
  router.registerPath("PUT", "files/(.+)", assetUploadUrlHandler, chains.assetPut);
}

/**
 * Wires every component of a running server except the HTTP listener. A
 * duplicate registration rejects after releasing whatever was opened.
 */
export async function buildApp(config: AppConfig, logger: Logger, overrides: AppOverrides = {}): Promise<App> {
  const storage = overrides.storage ?? (await openStorage(config, logger));
  const tokenStore = overrides.tokenStore ?? openTokenStore(config, logger);
  const assetStore = overrides.assetStore ?? (await openAssetStore(config, logger));

  const router = new Router();
  const hooks = new HookRegistry();
  const lambdas = new LambdaRegistry();
  const timers = new TimerRegistry();

  const chains = buildPreprocessorChains(
    { apiKey: config.app.apiKey, masterKey: config.app.masterKey },
    { storage, tokenStore, assetStore, hooks }
  );
  registerNativeRoutes(router, chains);

  const plugins = config.plugins.map((descriptor) => new Plugin(descriptor, logger, overrides.transportFactory));
  const registrar = new PluginRegistrar({
    router,
    hooks,
    lambdas,
    timers,
    logger,
    actionPreprocessors: chains.pluginAction,
    lambdaPreprocessors: chains.lambda,
  });

  const closeBackends = async () => {
    await Promise.all(plugins.map((plugin) => plugin.close()));
    await tokenStore.close();
    await storage.close();
  };

  let registration: RegistrationSummary;
  try {
    registration = await registrar.registerAll(plugins);
  } catch (error) {
    await closeBackends();
    throw error;
  }

  router.seal();
  hooks.seal();
  lambdas.seal();
  timers.seal();

  const runner = new TimerRunner(timers, logger);
  const scheduler = new IntervalScheduler(timers, runner, logger);

  return {
    config,
    router,
    hooks,
    lambdas,
    timers,
    runner,
    scheduler,
    plugins,
    registration,
    storage,
    tokenStore,
    assetStore,
    health: async () => {
      const check = await storage.healthcheck();
      return {
        plugins: plugins.map((plugin) => plugin.describe()),
        storage: { impl: storage.impl, ok: check.ok },
      };
    },
    close: async () => {
      scheduler.stop();
      await closeBackends();
    },
  };
}
