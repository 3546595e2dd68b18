#!/usr/bin/env node
import { buildApp } from "./app";
import { loadConfigFile, redactConfigForLogs } from "./config/config";
import { readEnv, type ActionbaseEnv } from "./config/env";
import { createLogger } from "./config/logger";
import { startHttpServer } from "./http/server";

export const USAGE = "Usage: actionbase [<config file>]";

/** The first positional argument wins over ACTIONBASE_CONFIG. */
export function resolveConfigPath(argv: readonly string[], env: ActionbaseEnv): string | null {
  const fromArgs = argv.find((arg) => arg.trim().length > 0);
  return fromArgs ?? env.ACTIONBASE_CONFIG ?? null;
}

async function main(): Promise<void> {
  const env = readEnv();
  const configPath = resolveConfigPath(process.argv.slice(2), env);
  if (!configPath) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const config = loadConfigFile(configPath, env);
  const logger = createLogger(config.log.level).child({ service: config.app.name });
  logger.info("actionbase_config_loaded", { config: redactConfigForLogs(config) });

  const app = await buildApp(config, logger);
  const http = startHttpServer({
    host: config.http.host,
    port: config.http.port,
    logger,
    router: app.router,
    health: app.health,
    allowedOrigins: config.http.allowedOrigins,
  });
  await http.listening;
  app.scheduler.start();
  logger.info("actionbase_started", {
    actions: app.router.actions().length,
    pluginsReady: app.registration.ready,
    pluginsDisabled: app.registration.disabled,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("actionbase_shutdown_start", { signal, inFlight: http.inFlight() });
    try {
      await http.drain(config.shutdownDrainMs);
      await app.close();
      logger.info("actionbase_shutdown_complete", {});
      process.exitCode = exitCode;
    } catch (error) {
      logger.error("actionbase_shutdown_failed", {
        message: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("actionbase_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    void shutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("actionbase_unhandled_rejection", {
      message: reason instanceof Error ? reason.message : String(reason),
    });
    void shutdown("unhandledRejection", 1);
  });
}

if (require.main === module) {
  void main().catch((error) => {
    process.stderr.write(`actionbase fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
    process.exit(1);
  });
}
