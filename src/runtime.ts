/**
 * Runtime bootstrap
 *
 * Builds a PluginManager on a standalone host from a validated config and
 * runs it through both initialization phases:
 *
 *   1. register the hook tracer (hooks.trace) and any given built-ins
 *   2. activate dynamic plugins from plugins.paths
 *   3. initPreScript, then offer every queued input file to LoadFile
 *      until the queue is empty
 *   4. initPostScript
 *
 * Call `runtime.manager.terminate()` when done.
 */

import { LOAD_FILE_DECLINED } from './hooks/types.js';
import { createStandaloneHost } from './host/standalone.js';
import { logger } from './logging/logger.js';
import { HOOK_TRACER_NAME, HookTracer } from './plugins/builtin/hook-tracer.js';
import { PluginManager } from './plugins/manager.js';
import type { HooklineConfig } from './config/schema.js';
import type { LoadFileResult } from './hooks/types.js';
import type { StandaloneHost } from './host/standalone.js';
import type { Logger } from './logging/logger.js';
import type { ActivationFailure } from './plugins/manager.js';
import type { Plugin } from './plugins/plugin.js';

export interface LoadedFile {
  file: string;
  result: LoadFileResult;
  /** Name of the plugin that took the file */
  claimedBy?: string;
}

export interface Runtime {
  manager: PluginManager;
  host: StandaloneHost;
  failures: ActivationFailure[];
  files: LoadedFile[];
}

export interface BootstrapOptions {
  host?: StandaloneHost;
  /** Static plugins registered after the tracer, in order */
  builtins?: Plugin[];
  /** Input files queued before any plugin's scripts */
  inputFiles?: string[];
  logger?: Logger;
}

export async function bootstrap(config: HooklineConfig, options: BootstrapOptions = {}): Promise<Runtime> {
  const log = options.logger ?? logger;
  log.setLevel(config.logging.level);

  const host = options.host ?? createStandaloneHost();
  const manager = new PluginManager({
    host,
    apiVersion: config.plugins.apiVersion,
    isolateErrors: config.hooks.isolateErrors,
    logger: log.child('plugins'),
  });
  host.objects.connect(manager);

  for (const file of options.inputFiles ?? []) {
    host.scripts.queueInputFile(file);
  }

  if (config.hooks.trace) {
    manager.registerPlugin(
      new HookTracer({
        priority: config.hooks.tracePriority,
        traceFile: config.hooks.traceFile,
        output: log.child(`plugin:${HOOK_TRACER_NAME}`),
      })
    );
  }
  for (const plugin of options.builtins ?? []) {
    manager.registerPlugin(plugin);
  }

  const { failures } = await manager.activateDynamicPlugins(config.plugins.paths, {
    activate: config.plugins.activate,
  });

  manager.initPreScript();

  const files: LoadedFile[] = [];
  for (let file = host.scripts.next(); file !== undefined; file = host.scripts.next()) {
    const { result, claimedBy } = manager.hookLoadFile(file);
    files.push({ file, result, claimedBy: claimedBy?.name });
    if (result === LOAD_FILE_DECLINED) {
      log.debug(`no plugin took ${file}`);
    }
  }

  manager.initPostScript();
  host.scripts.close();

  return { manager, host, failures, files };
}
