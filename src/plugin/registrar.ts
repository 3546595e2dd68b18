import type { Logger } from "../config/logger";
import { parseSchedule } from "../jobs/schedule";
import type { HookRegistry } from "../registry/hooks";
import type { LambdaRegistry } from "../registry/lambdas";
import type { TimerRegistry } from "../registry/timers";
import type { Preprocessor, Router } from "../router/router";
import type { Plugin } from "./plugin";
import type { PluginManifest } from "./protocol";

export type PluginRegistrarOptions = {
  router: Router;
  hooks: HookRegistry;
  lambdas: LambdaRegistry;
  timers: TimerRegistry;
  logger: Logger;
  /** Chain run before every plugin-backed action. */
  actionPreprocessors: readonly Preprocessor[];
  /** Chain run before every lambda reached through the action API. */
  lambdaPreprocessors: readonly Preprocessor[];
};

export type RegistrationSummary = {
  ready: string[];
  disabled: string[];
};

function invalidSchedules(manifest: PluginManifest): string[] {
  const problems: string[] = [];
  for (const timer of manifest.timers) {
    try {
      parseSchedule(timer.schedule);
    } catch (error) {
      problems.push(`timer ${timer.name}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return problems;
}

/**
 * Brings every configured plugin up and copies what it declared into the
 * router and registries. A plugin that fails its handshake is left disabled;
 * a name that collides with an existing registration is fatal.
 */
export class PluginRegistrar {
  constructor(private readonly options: PluginRegistrarOptions) {}

  async registerAll(plugins: readonly Plugin[]): Promise<RegistrationSummary> {
    const manifests = await Promise.all(plugins.map((plugin) => plugin.init()));
    const summary: RegistrationSummary = { ready: [], disabled: [] };

    plugins.forEach((plugin, index) => {
      const manifest = manifests[index];
      if (!manifest) {
        summary.disabled.push(plugin.name);
        return;
      }
      const problems = invalidSchedules(manifest);
      if (problems.length > 0) {
        plugin.disable(`malformed handshake: ${problems.join("; ")}`);
        summary.disabled.push(plugin.name);
        return;
      }
      this.install(plugin, manifest);
      summary.ready.push(plugin.name);
    });

    this.options.logger.info("plugins_registered", summary);
    return summary;
  }

  install(plugin: Plugin, manifest: PluginManifest): void {
    const { router, hooks, lambdas, timers, actionPreprocessors, lambdaPreprocessors } = this.options;

    for (const action of manifest.handlers) {
      router.register(
        action,
        { kind: "plugin", plugin: plugin.name, handle: (ctx) => plugin.invokeAction(ctx) },
        actionPreprocessors
      );
    }

    for (const hook of manifest.hooks) {
      hooks.registerHook(hook.type, hook.trigger, {
        name: `${plugin.name}:${hook.name}`,
        invoke: (event) => plugin.invokeHook(hook.name, hook.trigger, event),
      });
    }

    for (const lambda of manifest.lambdas) {
      lambdas.registerLambda(lambda, (args, ctx) => plugin.invokeLambda(lambda, args, ctx));
      router.register(
        lambda,
        { kind: "plugin", plugin: plugin.name, handle: (ctx) => lambdas.invokeLambda(lambda, ctx.payload.args, ctx) },
        lambdaPreprocessors
      );
    }

    for (const timer of manifest.timers) {
      timers.registerTimer(timer.name, timer.schedule, () => plugin.invokeTimer(timer.name));
    }

    this.options.logger.debug("plugin_installed", {
      plugin: plugin.name,
      handlers: manifest.handlers,
      hooks: manifest.hooks.map((hook) => `${hook.type}:${hook.trigger}:${hook.name}`),
      lambdas: manifest.lambdas,
      timers: manifest.timers.map((timer) => timer.name),
    });
  }
}
