/**
 * Plugin base class
 *
 * A plugin is the unit of extension. It may:
 *   - contribute components to host subsystems (addComponent),
 *   - declare script-level items it provides (addBifItem),
 *   - intercept host processing through hooks (enableHook + overriding the
 *     matching hook method).
 *
 * Lifecycle, driven by PluginManager:
 *   1. doConfigure()     - configure() is called once; API version checked
 *   2. attach()          - hooks enabled so far reach the shared registry
 *   3. initBifItems()    - declared items become readable
 *   4. initPreScript()   - before any input file is parsed
 *      hookLoadFile()    - once per input file, between the two init phases
 *   5. initPostScript()  - after parsing; no more script loads
 *   6. done()            - shutdown
 *
 * Overrides of initPreScript / initPostScript / done must call super.
 *
 * Example:
 *
 *   class Tracer extends Plugin {
 *     protected configure() {
 *       return { name: 'Demo::Tracer', description: 'Counts events' };
 *     }
 *     initPreScript() {
 *       super.initPreScript();
 *       this.enableHook('QueueEvent', 10);
 *     }
 *     hookQueueEvent(event: ScriptEvent) {
 *       this.logger.debug(`queued ${event.handler.name}`);
 *       return false;
 *     }
 *   }
 */

import { ContractViolationError, PluginConfigurationError } from '../errors.js';
import { HOOK_TYPES, LOAD_FILE_DECLINED, NOT_HANDLED, PLUGIN_API_VERSION, isHookType } from '../hooks/types.js';
import { logger as rootLogger } from '../logging/logger.js';
import { BifItem } from './bif-item.js';
import type { Logger } from '../logging/logger.js';
import type { HookArgument, HookArgumentList } from '../hooks/argument.js';
import type { HookRegistry } from '../hooks/registry.js';
import type { FunctionResult, HookRegistration, HookType, LoadFileResult } from '../hooks/types.js';
import type {
  CallFrame,
  EventHandler,
  HostObject,
  ScriptEvent,
  ScriptFunction,
  ScriptValue,
} from '../host/types.js';
import type { BifItemType } from './bif-item.js';
import type { Component } from './component.js';

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

export class VersionNumber {
  constructor(
    readonly major: number,
    readonly minor: number
  ) {}

  static unset(): VersionNumber {
    return new VersionNumber(-1, -1);
  }

  isSet(): boolean {
    return this.major >= 0 && this.minor >= 0;
  }

  toString(): string {
    return `${this.major}.${this.minor}`;
  }
}

/**
 * What a plugin reports about itself from configure().
 */
export interface PluginConfiguration {
  /** Namespaced name, e.g. `Demo::Foo`. Mandatory and unique. */
  name: string;
  description?: string;
  version?: { major: number; minor: number };
  /**
   * API version the plugin was built against. Leave unset to take the
   * PLUGIN_API_VERSION of the library the plugin is compiled with.
   */
  apiVersion?: number;
}

interface ResolvedConfiguration {
  name: string;
  description: string;
  version: VersionNumber;
  apiVersion: number;
}

// ---------------------------------------------------------------------------
// Host side of the plugin contract (implemented by PluginManager)
// ---------------------------------------------------------------------------

export interface PluginHost {
  readonly registry: HookRegistry<Plugin>;
  queueScriptLoad(plugin: Plugin, file: string): boolean;
  requestEvent(plugin: Plugin, handler: EventHandler): void;
  requestObjectDestroy(plugin: Plugin, obj: HostObject): void;
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export abstract class Plugin {
  private config: ResolvedConfiguration | null = null;
  private dynamic = false;
  private dynamicSet = false;
  private baseDir = '';
  private sharedObjectPath = '';
  private locationSet = false;

  private readonly componentList: Component[] = [];
  private readonly bifItemList: BifItem[] = [];
  private readonly bifInitializers: Array<() => void> = [];
  private bifsInitialized = false;

  private readonly hooks = new Map<HookType, number>();
  private host: PluginHost | null = null;
  private pluginLogger: Logger | null = null;

  /**
   * Report the plugin's identity. Called exactly once, by doConfigure().
   */
  protected abstract configure(): PluginConfiguration;

  // ---- Identity ------------------------------------------------------------

  get name(): string {
    return this.requireConfig().name;
  }

  get description(): string {
    return this.requireConfig().description;
  }

  get version(): VersionNumber {
    return this.requireConfig().version;
  }

  get apiVersion(): number {
    return this.requireConfig().apiVersion;
  }

  get isConfigured(): boolean {
    return this.config !== null;
  }

  get isDynamic(): boolean {
    return this.dynamic;
  }

  /** Directory a dynamic plugin was loaded from; empty for built-ins. */
  get pluginDirectory(): string {
    return this.baseDir;
  }

  /** Entry module a dynamic plugin was loaded from; empty for built-ins. */
  get pluginPath(): string {
    return this.sharedObjectPath;
  }

  components(): Component[] {
    return [...this.componentList];
  }

  /**
   * Declared script-level items.
   *
   * @throws ContractViolationError before initBifItems() has run
   */
  bifItems(): BifItem[] {
    if (!this.bifsInitialized) {
      throw new ContractViolationError(`BiF items of "${this.name}" read before initialization`);
    }
    return [...this.bifItemList];
  }

  enabledHooks(): HookRegistration[] {
    return HOOK_TYPES.flatMap((hook) => {
      const priority = this.hooks.get(hook);
      return priority === undefined ? [] : [{ hook, priority }];
    });
  }

  /**
   * One-line identity; with `verbose`, followed by one indented line per
   * component, declared item and enabled hook.
   */
  describe(verbose = false): string {
    let origin: string;
    if (!this.dynamic) {
      origin = 'built-in';
    } else if (this.version.isSet()) {
      origin = `dynamic, version ${this.version.toString()}`;
    } else {
      origin = 'dynamic, no version information';
    }

    const header = this.description
      ? `Plugin: ${this.name} - ${this.description} (${origin})`
      : `Plugin: ${this.name} (${origin})`;

    if (!verbose) return header;

    const lines = [header];
    for (const component of this.componentList) {
      lines.push(`    ${component.describe()}`);
    }
    if (this.bifsInitialized) {
      for (const item of this.bifItemList) {
        lines.push(`    ${item.describe()}`);
      }
    }
    for (const { hook, priority } of this.enabledHooks()) {
      lines.push(`    Implements ${hook} (priority ${priority})`);
    }
    return lines.join('\n');
  }

  // ---- Declarations --------------------------------------------------------

  /**
   * Record a script-level item the plugin provides. Informational only:
   * the item still has to be registered with the interpreter. Repeated
   * declarations are kept as separate entries.
   */
  addBifItem(id: string, type: BifItemType): void {
    this.bifItemList.push(new BifItem(id, type));
  }

  /**
   * Ask the host to load an additional input file, as if it had been given
   * on the command line. It may only be queued for now.
   *
   * @returns true when the file was queued; false once post-script
   *          initialization has started
   * @throws ContractViolationError after post-script initialization
   */
  loadScriptFile(file: string): boolean {
    return this.requireHost('loadScriptFile').queueScriptLoad(this, file);
  }

  // ---- Lifecycle (called by PluginManager) ---------------------------------

  /**
   * Query configure(), stamp the API version and validate both.
   *
   * @throws PluginConfigurationError on a missing name or an API mismatch
   */
  doConfigure(hostApiVersion: number = PLUGIN_API_VERSION): void {
    if (this.config) {
      throw new ContractViolationError(`plugin "${this.config.name}" is already configured`);
    }

    const reported = this.configure();
    if (!reported.name || !reported.name.trim()) {
      throw new PluginConfigurationError('name is mandatory');
    }

    const apiVersion = reported.apiVersion ?? PLUGIN_API_VERSION;
    if (apiVersion !== hostApiVersion) {
      throw new PluginConfigurationError(
        `API version mismatch (plugin built for ${apiVersion}, host provides ${hostApiVersion})`,
        reported.name
      );
    }

    this.config = {
      name: reported.name,
      description: reported.description ?? '',
      version: reported.version
        ? new VersionNumber(reported.version.major, reported.version.minor)
        : VersionNumber.unset(),
      apiVersion,
    };
  }

  /** Marks the plugin as dynamically loaded. Set once, before attach(). */
  setDynamic(dynamic: boolean): void {
    if (this.dynamicSet || this.host) {
      throw new ContractViolationError('plugin origin can only be set once, before activation');
    }
    this.dynamic = dynamic;
    this.dynamicSet = true;
  }

  /** Where a dynamic plugin came from. Set once, before attach(). */
  setPluginLocation(dir: string, path: string): void {
    if (this.locationSet || this.host) {
      throw new ContractViolationError('plugin location can only be set once, before activation');
    }
    this.baseDir = dir;
    this.sharedObjectPath = path;
    this.locationSet = true;
  }

  /**
   * Connect the plugin to its manager. Hooks enabled in the constructor are
   * applied to the registry now.
   */
  attach(host: PluginHost): void {
    if (this.host) {
      throw new ContractViolationError(`plugin "${this.name}" is already attached`);
    }
    this.host = host;
    for (const { hook, priority } of this.enabledHooks()) {
      host.registry.enable(hook, this, priority);
    }
  }

  /** Run BiF initializers; afterwards bifItems() may be read. */
  initBifItems(): void {
    if (this.bifsInitialized) {
      throw new ContractViolationError(`BiF items of "${this.name}" already initialized`);
    }
    for (const init of this.bifInitializers) {
      init();
    }
    this.bifsInitialized = true;
  }

  /** Before scripts are parsed. The usual place to enable hooks. */
  initPreScript(): void {
    this.logger.debug('pre-script initialization');
  }

  /** After scripts are parsed. */
  initPostScript(): void {
    this.logger.debug('post-script initialization');
  }

  /** Shutdown. Release anything not owned through components. */
  done(): void {
    this.logger.debug('done');
  }

  // ---- Registration surface for subclasses ---------------------------------

  protected get logger(): Logger {
    if (!this.pluginLogger) {
      this.pluginLogger = rootLogger.child(`plugin:${this.name}`);
    }
    return this.pluginLogger;
  }

  /** The plugin takes ownership of `component`. */
  protected addComponent(component: Component): void {
    this.componentList.push(component);
  }

  /**
   * Declared items are usually produced by generated initializers; they
   * run during initBifItems().
   */
  protected registerBifInitializer(init: () => void): void {
    if (this.bifsInitialized) {
      throw new ContractViolationError('BiF initializers must be registered before initialization');
    }
    this.bifInitializers.push(init);
  }

  /**
   * Start receiving `hook`. Plugins enabling the same hook run from highest
   * to lowest priority. Hooks can change at any time, but the configuration
   * printed at startup is not updated afterwards.
   */
  protected enableHook(hook: HookType, priority = 0): void {
    if (!isHookType(hook)) {
      throw new ContractViolationError(`unknown hook type "${String(hook)}"`);
    }
    if (!Number.isInteger(priority)) {
      throw new ContractViolationError(`hook priority must be an integer, got ${priority}`);
    }
    this.hooks.delete(hook);
    this.hooks.set(hook, priority);
    this.host?.registry.enable(hook, this, priority);
  }

  protected disableHook(hook: HookType): void {
    this.hooks.delete(hook);
    this.host?.registry.disable(hook, this);
  }

  /**
   * Have the host raise `handler`'s event even when no script handles it,
   * so it reaches hookQueueEvent().
   */
  protected requestEvent(handler: EventHandler): void {
    this.requireHost('requestEvent').requestEvent(this, handler);
  }

  /** Get hookObjDestroy() for `obj` when the runtime destroys it. */
  protected requestObjectDestroy(obj: HostObject): void {
    this.requireHost('requestObjectDestroy').requestObjectDestroy(this, obj);
  }

  // ---- Hooks ---------------------------------------------------------------

  /**
   * Offered each input file the host is about to load.
   *
   * @param ext - Extension without the dot.
   * @returns 1 took the file and loaded it, 0 took it but failed (the host
   *          aborts; report the problem first), -1 not interested.
   */
  hookLoadFile(_file: string, _ext: string): LoadFileResult {
    return LOAD_FILE_DECLINED;
  }

  /**
   * Offered every script-level call before the interpreter runs it. Return
   * `{ handled: true, value }` to replace the call; the value then belongs
   * to the interpreter. `args` may be changed in place if types still match.
   */
  hookCallFunction(_func: ScriptFunction, _frame: CallFrame | null, _args: ScriptValue[]): FunctionResult {
    return NOT_HANDLED;
  }

  /**
   * Offered every event about to be queued. Returning true takes the event
   * over; the host then does nothing further with it.
   */
  hookQueueEvent(_event: ScriptEvent): boolean {
    return false;
  }

  hookDrainEvents(): void {}

  hookUpdateNetworkTime(_networkTime: number): void {}

  /**
   * `obj` has already been destroyed: compare it, never use it. May also
   * fire for objects this plugin did not ask about.
   */
  hookObjDestroy(_obj: HostObject): void {}

  /** Before any hook point is evaluated, implemented or not. */
  metaHookPre(_hook: HookType, _args: HookArgumentList): void {}

  /**
   * After a hook point. `result` is the default when nothing handled the
   * hook, and `void` for hooks without a result.
   */
  metaHookPost(_hook: HookType, _args: HookArgumentList, _result: HookArgument): void {}

  // ---- Private helpers -----------------------------------------------------

  private requireConfig(): ResolvedConfiguration {
    if (!this.config) {
      throw new ContractViolationError('plugin identity read before configuration');
    }
    return this.config;
  }

  private requireHost(operation: string): PluginHost {
    if (!this.host) {
      const name = this.config?.name ?? '<unconfigured>';
      throw new ContractViolationError(`${operation}: plugin "${name}" is not activated`);
    }
    return this.host;
  }
}
