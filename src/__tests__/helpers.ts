/**
 * Test doubles shared by the hook and plugin suites.
 */

import { HOOK_TYPES, LOAD_FILE_DECLINED, NOT_HANDLED } from '../hooks/types.js';
import { Logger } from '../logging/logger.js';
import { Plugin } from '../plugins/plugin.js';
import type { HookArgument, HookArgumentList } from '../hooks/argument.js';
import type { HookRegistry } from '../hooks/registry.js';
import type { FunctionResult, HookType, LoadFileResult } from '../hooks/types.js';
import type { CallFrame, EventHandler, HostObject, ScriptEvent, ScriptFunction, ScriptValue } from '../host/types.js';
import type { LogEntry, LogLevel, Transport } from '../logging/logger.js';
import type { BifItemType } from '../plugins/bif-item.js';
import type { Component } from '../plugins/component.js';
import type { PluginConfiguration, PluginHost } from '../plugins/plugin.js';

// ── Host values ───────────────────────────────────────────────────────────

export class TestValue implements ScriptValue {
  constructor(readonly text: string) {}

  describe(): string {
    return this.text;
  }
}

export function makeEvent(name: string, ...args: string[]): ScriptEvent {
  return { handler: { name, generateAlways: false }, args: args.map((a) => new TestValue(a)) };
}

export function makeFunc(name: string): ScriptFunction {
  return { name };
}

// ── Logging ───────────────────────────────────────────────────────────────

export class CaptureTransport implements Transport {
  entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; capture: CaptureTransport } {
  const capture = new CaptureTransport();
  return { logger: new Logger({ level, transports: [capture] }), capture };
}

// ── Plugins ───────────────────────────────────────────────────────────────

export interface PluginBehaviour {
  loadFile?: (file: string, ext: string) => LoadFileResult;
  callFunction?: (func: ScriptFunction, frame: CallFrame | null, args: ScriptValue[]) => FunctionResult;
  queueEvent?: (event: ScriptEvent) => boolean;
  drainEvents?: () => void;
  updateNetworkTime?: (networkTime: number) => void;
  objDestroy?: (obj: HostObject) => void;
  metaPre?: (hook: HookType, args: HookArgumentList) => void;
  metaPost?: (hook: HookType, args: HookArgumentList, result: HookArgument) => void;
  onInitPreScript?: (plugin: TestPlugin) => void;
  onInitPostScript?: (plugin: TestPlugin) => void;
}

export interface TestPluginOptions extends PluginConfiguration, PluginBehaviour {
  /** Hooks enabled from the constructor */
  hooks?: Partial<Record<HookType, number>>;
  /** Shared call log; entries look like `A:LoadFile` or `M:pre:DrainEvents` */
  trace?: string[];
}

/**
 * A plugin whose identity, hooks and hook results come from its options.
 * Protected registration methods are exposed publicly.
 */
export class TestPlugin extends Plugin {
  readonly trace: string[];

  constructor(private readonly options: TestPluginOptions) {
    super();
    this.trace = options.trace ?? [];
    for (const hook of HOOK_TYPES) {
      const priority = options.hooks?.[hook];
      if (priority !== undefined) this.enableHook(hook, priority);
    }
  }

  protected configure(): PluginConfiguration {
    const { name, description, version, apiVersion } = this.options;
    return { name, description, version, apiVersion };
  }

  enable(hook: HookType, priority = 0): void {
    this.enableHook(hook, priority);
  }

  disable(hook: HookType): void {
    this.disableHook(hook);
  }

  addTestComponent(component: Component): void {
    this.addComponent(component);
  }

  declareItems(items: Array<[string, BifItemType]>): void {
    this.registerBifInitializer(() => {
      for (const [id, type] of items) this.addBifItem(id, type);
    });
  }

  wantEvent(handler: EventHandler): void {
    this.requestEvent(handler);
  }

  watch(obj: HostObject): void {
    this.requestObjectDestroy(obj);
  }

  initPreScript(): void {
    super.initPreScript();
    this.record('initPreScript');
    this.options.onInitPreScript?.(this);
  }

  initPostScript(): void {
    super.initPostScript();
    this.record('initPostScript');
    this.options.onInitPostScript?.(this);
  }

  done(): void {
    super.done();
    this.record('done');
  }

  hookLoadFile(file: string, ext: string): LoadFileResult {
    this.record('LoadFile');
    return this.options.loadFile?.(file, ext) ?? LOAD_FILE_DECLINED;
  }

  hookCallFunction(func: ScriptFunction, frame: CallFrame | null, args: ScriptValue[]): FunctionResult {
    this.record('CallFunction');
    return this.options.callFunction?.(func, frame, args) ?? NOT_HANDLED;
  }

  hookQueueEvent(event: ScriptEvent): boolean {
    this.record('QueueEvent');
    return this.options.queueEvent?.(event) ?? false;
  }

  hookDrainEvents(): void {
    this.record('DrainEvents');
    this.options.drainEvents?.();
  }

  hookUpdateNetworkTime(networkTime: number): void {
    this.record('UpdateNetworkTime');
    this.options.updateNetworkTime?.(networkTime);
  }

  hookObjDestroy(obj: HostObject): void {
    this.record('ObjDestroy');
    this.options.objDestroy?.(obj);
  }

  metaHookPre(hook: HookType, args: HookArgumentList): void {
    this.record(`pre:${hook}`);
    this.options.metaPre?.(hook, args);
  }

  metaHookPost(hook: HookType, args: HookArgumentList, result: HookArgument): void {
    this.record(`post:${hook}`);
    this.options.metaPost?.(hook, args, result);
  }

  private record(what: string): void {
    this.trace.push(`${this.options.name}:${what}`);
  }
}

/**
 * Minimal PluginHost over `registry`, for exercising plugins and the
 * dispatcher without a PluginManager.
 */
export function stubHost(registry: HookRegistry<Plugin>): PluginHost & { scripts: string[] } {
  const scripts: string[] = [];
  return {
    registry,
    scripts,
    queueScriptLoad: (_plugin, file) => {
      scripts.push(file);
      return true;
    },
    requestEvent: () => {},
    requestObjectDestroy: () => {},
  };
}

/** Configure and attach each plugin to `host`. */
export function activate(host: PluginHost, ...plugins: Plugin[]): void {
  for (const plugin of plugins) {
    plugin.doConfigure();
    plugin.attach(host);
    plugin.initBifItems();
  }
}
