/**
 * Plugin Manager
 *
 * Owns the hook registry and dispatcher and drives every plugin through
 * its lifecycle:
 *   - registerPlugin(plugin)        - configure, validate, attach
 *   - activateDynamicPlugins(paths) - discover, import, register
 *   - initPreScript()               - before input files are parsed
 *   - hookLoadFile(file) ...        - host-facing hook points
 *   - initPostScript()              - captures the startup hook configuration
 *   - terminate()                   - done() on every plugin
 *
 * It is also the PluginHost the attached plugins talk to: script-load,
 * event and destroy requests are routed to the host collaborators.
 *
 * Events emitted (extends EventEmitter):
 *   - "plugin:activated" (plugin: Plugin)
 *   - "plugin:error"     (name: string, error: Error)
 *   - "phase:changed"    (phase: ManagerPhase)
 */

import { EventEmitter } from 'events';
import { extname, resolve } from 'path';
import { ContractViolationError, PluginConfigurationError } from '../errors.js';
import { HookDispatcher } from '../hooks/dispatcher.js';
import { HookRegistry } from '../hooks/registry.js';
import { HOOK_TYPES, LOAD_FILE_FAILED, LOAD_FILE_LOADED, PLUGIN_API_VERSION } from '../hooks/types.js';
import { logger as rootLogger } from '../logging/logger.js';
import { DynamicPluginLoader } from './loader.js';
import type { HookOutcome } from '../hooks/dispatcher.js';
import type { FunctionResult, HookType, LoadFileResult } from '../hooks/types.js';
import type {
  CallFrame,
  EventHandler,
  HostCollaborators,
  HostObject,
  ScriptEvent,
  ScriptFunction,
  ScriptValue,
} from '../host/types.js';
import type { Logger } from '../logging/logger.js';
import type { Component, ComponentType } from './component.js';
import type { Plugin, PluginHost } from './plugin.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ManagerPhase = 'registering' | 'pre-script' | 'post-script' | 'terminated';

export interface PluginOrigin {
  dynamic: boolean;
  /** Plugin directory; empty for built-ins */
  directory?: string;
  /** Entry module; empty for built-ins */
  path?: string;
}

export interface PluginManagerOptions {
  host: HostCollaborators;
  /** API version this host provides (default PLUGIN_API_VERSION) */
  apiVersion?: number;
  /** Passed to the dispatcher (default true) */
  isolateErrors?: boolean;
  logger?: Logger;
  loader?: DynamicPluginLoader;
}

/** `'all'` or the names of the plugins to activate. */
export type ActivationSelection = 'all' | readonly string[];

export interface ActivationFailure {
  /** Manifest name, or the directory when the manifest was unreadable */
  name: string;
  error: Error;
}

export interface ActivationResult {
  activated: Plugin[];
  failures: ActivationFailure[];
}

export interface StartupHookEntry {
  hook: HookType;
  plugin: string;
  priority: number;
}

// ---------------------------------------------------------------------------
// PluginManager
// ---------------------------------------------------------------------------

export class PluginManager extends EventEmitter implements PluginHost {
  readonly registry = new HookRegistry<Plugin>();
  readonly dispatcher: HookDispatcher;

  private readonly host: HostCollaborators;
  private readonly apiVersion: number;
  private readonly log: Logger;
  private readonly loader: DynamicPluginLoader;

  /** Keyed by lower-cased name; insertion order is registration order. */
  private readonly plugins = new Map<string, Plugin>();
  private phase: ManagerPhase = 'registering';
  private startupHooks: readonly StartupHookEntry[] | null = null;
  /** Set once post-script initialization starts; the input files are consumed by then. */
  private scriptsClosed = false;

  constructor(options: PluginManagerOptions) {
    super();
    this.host = options.host;
    this.apiVersion = options.apiVersion ?? PLUGIN_API_VERSION;
    this.log = options.logger ?? rootLogger.child('plugins');
    this.loader = options.loader ?? new DynamicPluginLoader({ logger: this.log.child('loader') });
    this.dispatcher = new HookDispatcher(this.registry, {
      isolateErrors: options.isolateErrors,
      logger: this.log.child('hooks'),
    });
  }

  get currentPhase(): ManagerPhase {
    return this.phase;
  }

  // ---- Registration --------------------------------------------------------

  /**
   * Configure and activate a plugin.
   *
   * @throws PluginConfigurationError on a load-time fault; the plugin is
   *         not activated
   * @throws ContractViolationError after pre-script initialization started
   */
  registerPlugin(plugin: Plugin, origin?: PluginOrigin): Plugin {
    return this.install(plugin, origin);
  }

  /**
   * Discover dynamic plugins on `searchPaths`, import the selected ones and
   * register them. Each activated plugin's manifest scripts are queued with
   * the host's script loader. A fault in one plugin does not stop the
   * others; all of them are returned as failures.
   */
  async activateDynamicPlugins(
    searchPaths: readonly string[],
    options: { activate?: ActivationSelection } = {}
  ): Promise<ActivationResult> {
    this.requirePhase('registering', 'activateDynamicPlugins');
    const selection = options.activate ?? 'all';
    const { plugins: discovered, problems } = await this.loader.discoverPlugins(searchPaths);

    const failures: ActivationFailure[] = [];
    for (const problem of problems) {
      const error = new PluginConfigurationError(`invalid manifest in ${problem.pluginDir}: ${problem.reason}`);
      this.reportFault(problem.pluginDir, error);
      failures.push({ name: problem.pluginDir, error });
    }

    let selected = discovered;
    if (selection !== 'all') {
      const wanted = new Set(selection.map((name) => name.toLowerCase()));
      selected = discovered.filter((d) => wanted.has(d.manifest.name.toLowerCase()));
      const found = new Set(selected.map((d) => d.manifest.name.toLowerCase()));
      for (const name of selection) {
        if (!found.has(name.toLowerCase())) {
          const error = new PluginConfigurationError('plugin is not available', name);
          this.reportFault(name, error);
          failures.push({ name, error });
        }
      }
    }

    const activated: Plugin[] = [];
    for (const entry of selected) {
      const { manifest, pluginDir } = entry;

      let plugin: Plugin;
      try {
        plugin = await this.loader.loadPlugin(entry);
      } catch (err) {
        if (!(err instanceof PluginConfigurationError)) throw err;
        this.reportFault(manifest.name, err);
        failures.push({ name: manifest.name, error: err });
        continue;
      }

      try {
        this.install(plugin, undefined, manifest.name);
      } catch (err) {
        // install() has reported it already
        if (!(err instanceof PluginConfigurationError)) throw err;
        failures.push({ name: manifest.name, error: err });
        continue;
      }
      activated.push(plugin);

      for (const script of manifest.scripts) {
        const file = resolve(pluginDir, script);
        if (!this.host.scripts.queueInputFile(file)) {
          this.log.warn(`could not queue ${file} for plugin ${plugin.name}`);
        }
      }
    }

    return { activated, failures };
  }

  // ---- Phases --------------------------------------------------------------

  initPreScript(): void {
    this.requirePhase('registering', 'initPreScript');
    for (const plugin of this.plugins.values()) {
      plugin.initPreScript();
    }
    this.setPhase('pre-script');
  }

  initPostScript(): void {
    this.requirePhase('pre-script', 'initPostScript');
    this.scriptsClosed = true;
    for (const plugin of this.plugins.values()) {
      plugin.initPostScript();
    }
    this.startupHooks = this.captureHookConfiguration();
    this.setPhase('post-script');
  }

  terminate(): void {
    if (this.phase === 'terminated') {
      throw new ContractViolationError('terminate: plugin manager already terminated');
    }
    for (const plugin of this.plugins.values()) {
      plugin.done();
    }
    this.setPhase('terminated');
  }

  // ---- Host boundary -------------------------------------------------------

  /**
   * Offer an input file to the LoadFile hook. Only valid between the two
   * initialization phases.
   */
  hookLoadFile(file: string): HookOutcome<LoadFileResult> {
    this.requirePhase('pre-script', 'hookLoadFile');
    const ext = extname(file).replace(/^\./, '');
    const outcome = this.dispatcher.loadFile(file, ext);

    if (outcome.claimedBy && outcome.result === LOAD_FILE_FAILED) {
      this.log.error(`plugin ${outcome.claimedBy.name} failed to load ${file}`);
    } else if (outcome.claimedBy && outcome.result === LOAD_FILE_LOADED) {
      this.log.debug(`plugin ${outcome.claimedBy.name} loaded ${file}`);
    }
    return outcome;
  }

  hookCallFunction(func: ScriptFunction, frame: CallFrame | null, args: ScriptValue[]): HookOutcome<FunctionResult> {
    return this.dispatcher.callFunction(func, frame, args);
  }

  hookQueueEvent(event: ScriptEvent): HookOutcome<boolean> {
    return this.dispatcher.queueEvent(event);
  }

  hookDrainEvents(): void {
    this.dispatcher.drainEvents();
  }

  hookUpdateNetworkTime(networkTime: number): void {
    this.dispatcher.updateNetworkTime(networkTime);
  }

  hookObjDestroy(obj: HostObject): void {
    this.dispatcher.objDestroy(obj);
  }

  // ---- Queries -------------------------------------------------------------

  /** Case-insensitive lookup of an active plugin. */
  lookup(name: string): Plugin | undefined {
    return this.plugins.get(name.toLowerCase());
  }

  /** Active plugins in registration order. */
  activePlugins(): Plugin[] {
    return [...this.plugins.values()];
  }

  components(type?: ComponentType): Component[] {
    const all = this.activePlugins().flatMap((p) => p.components());
    return type ? all.filter((c) => c.type === type) : all;
  }

  havePluginForHook(hook: HookType): boolean {
    return this.registry.has(hook);
  }

  /**
   * Hook configuration as it stood after post-script initialization. Later
   * enable/disable calls are not reflected. Before that point the current
   * configuration is returned.
   */
  startupHookConfiguration(): readonly StartupHookEntry[] {
    return this.startupHooks ?? this.captureHookConfiguration();
  }

  /** Descriptions of all active plugins, sorted by name. */
  describe(verbose = false): string {
    return this.activePlugins()
      .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()))
      .map((p) => p.describe(verbose))
      .join('\n');
  }

  // ---- PluginHost ----------------------------------------------------------

  queueScriptLoad(plugin: Plugin, file: string): boolean {
    if (this.phase === 'post-script' || this.phase === 'terminated') {
      throw new ContractViolationError(
        `loadScriptFile: plugin "${plugin.name}" requested ${file} after post-script initialization`
      );
    }
    if (this.scriptsClosed) {
      this.log.warn(`plugin ${plugin.name} requested ${file} during post-script initialization, not loading it`);
      return false;
    }
    const queued = this.host.scripts.queueInputFile(file);
    this.log.debug(`plugin ${plugin.name} queued ${file}`, { queued });
    return queued;
  }

  requestEvent(plugin: Plugin, handler: EventHandler): void {
    this.host.events.requestAlwaysGenerate(handler);
    this.log.debug(`plugin ${plugin.name} requested event ${handler.name}`);
  }

  requestObjectDestroy(plugin: Plugin, obj: HostObject): void {
    this.host.objects.notifyOnDestroy(obj);
    this.log.debug(`plugin ${plugin.name} watches an object for destruction`);
  }

  // ---- Internal helpers ----------------------------------------------------

  private install(plugin: Plugin, origin?: PluginOrigin, expectedName?: string): Plugin {
    this.requirePhase('registering', 'registerPlugin');

    try {
      plugin.doConfigure(this.apiVersion);

      if (expectedName && plugin.name.toLowerCase() !== expectedName.toLowerCase()) {
        throw new PluginConfigurationError(`manifest declares "${expectedName}"`, plugin.name);
      }
      if (this.plugins.has(plugin.name.toLowerCase())) {
        throw new PluginConfigurationError('a plugin with this name is already active', plugin.name);
      }
    } catch (err) {
      if (err instanceof PluginConfigurationError) {
        this.reportFault(err.pluginName ?? expectedName ?? plugin.constructor.name, err);
      }
      throw err;
    }

    if (origin) {
      plugin.setDynamic(origin.dynamic);
      if (origin.directory || origin.path) {
        plugin.setPluginLocation(origin.directory ?? '', origin.path ?? '');
      }
    }

    plugin.attach(this);
    plugin.initBifItems();
    this.plugins.set(plugin.name.toLowerCase(), plugin);

    this.log.info(`activated ${plugin.describe()}`);
    this.emit('plugin:activated', plugin);
    return plugin;
  }

  private reportFault(name: string, error: Error): void {
    this.log.fatal(`cannot activate plugin ${name}`, error);
    this.emit('plugin:error', name, error);
  }

  private captureHookConfiguration(): readonly StartupHookEntry[] {
    const snapshot = this.registry.snapshot();
    const entries: StartupHookEntry[] = [];
    for (const hook of HOOK_TYPES) {
      for (const { subscriber, priority } of snapshot.get(hook) ?? []) {
        entries.push({ hook, plugin: subscriber.name, priority });
      }
    }
    return Object.freeze(entries);
  }

  private requirePhase(expected: ManagerPhase, operation: string): void {
    if (this.phase !== expected) {
      throw new ContractViolationError(`${operation} is not allowed in phase "${this.phase}"`);
    }
  }

  private setPhase(phase: ManagerPhase): void {
    this.phase = phase;
    this.log.debug(`entering phase ${phase}`);
    this.emit('phase:changed', phase);
  }
}
