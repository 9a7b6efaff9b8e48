/**
 * Hook Dispatcher
 *
 * Applies one protocol to every hook point the host reaches:
 *
 *   1. snapshot the hook's subscribers (descending priority)
 *   2. metaHookPre on every MetaHookPre subscriber
 *   3. run the hook
 *        · first responder (LoadFile, CallFunction, QueueEvent) - stop at
 *          the first plugin returning a claiming result
 *        · broadcast (DrainEvents, UpdateNetworkTime, ObjDestroy) - every
 *          subscriber runs
 *   4. metaHookPost on every MetaHookPost subscriber with the effective
 *      result (the default when nothing claimed, `void` for broadcasts)
 *
 * Meta-hooks fire even when no plugin enabled the hook itself. Argument
 * lists are only built when somebody subscribed to a meta-hook.
 *
 * Error isolation: with `isolateErrors` (the default) an ordinary error
 * thrown by a hook method is logged and that plugin counts as not having
 * handled the hook. ContractViolationErrors always propagate.
 */

import { ContractViolationError } from '../errors.js';
import { logger as rootLogger } from '../logging/logger.js';
import { HookArgument } from './argument.js';
import { HOOK_TYPES, LOAD_FILE_DECLINED, NOT_HANDLED } from './types.js';
import type { Logger } from '../logging/logger.js';
import type { Plugin } from '../plugins/plugin.js';
import type { HookArgumentList } from './argument.js';
import type { HookRegistry } from './registry.js';
import type { FunctionResult, HookType, LoadFileResult } from './types.js';
import type {
  CallFrame,
  HostObject,
  ScriptEvent,
  ScriptFunction,
  ScriptValue,
} from '../host/types.js';

export interface DispatcherOptions {
  /** If false, an error from any hook method propagates (default true). */
  isolateErrors?: boolean;
  logger?: Logger;
}

/** Result of a first-responder hook plus the plugin that claimed it. */
export interface HookOutcome<R> {
  result: R;
  claimedBy?: Plugin;
}

interface FirstResponderSpec<R> {
  hook: HookType;
  args: () => HookArgument[];
  fallback: R;
  invoke: (plugin: Plugin) => R;
  claims: (result: R) => boolean;
  toArgument: (result: R) => HookArgument;
}

export class HookDispatcher {
  private readonly isolate: boolean;
  private readonly log: Logger;
  private readonly counts = new Map<HookType, number>();

  constructor(
    private readonly registry: HookRegistry<Plugin>,
    options: DispatcherOptions = {}
  ) {
    this.isolate = options.isolateErrors !== false;
    this.log = options.logger ?? rootLogger.child('hooks');
  }

  // ---- First responder -----------------------------------------------------

  loadFile(file: string, ext: string): HookOutcome<LoadFileResult> {
    return this.firstResponder({
      hook: 'LoadFile',
      args: () => [HookArgument.string(file), HookArgument.string(ext)],
      fallback: LOAD_FILE_DECLINED,
      invoke: (p) => p.hookLoadFile(file, ext),
      claims: (rc) => rc !== LOAD_FILE_DECLINED,
      toArgument: (rc) => HookArgument.int(rc),
    });
  }

  callFunction(func: ScriptFunction, frame: CallFrame | null, args: ScriptValue[]): HookOutcome<FunctionResult> {
    return this.firstResponder({
      hook: 'CallFunction',
      args: () => [HookArgument.func(func), HookArgument.frame(frame), HookArgument.valList(args)],
      fallback: NOT_HANDLED,
      invoke: (p) => p.hookCallFunction(func, frame, args),
      claims: (r) => r.handled,
      toArgument: (r) => HookArgument.funcResult(r),
    });
  }

  queueEvent(event: ScriptEvent): HookOutcome<boolean> {
    return this.firstResponder({
      hook: 'QueueEvent',
      args: () => [HookArgument.event(event)],
      fallback: false,
      invoke: (p) => p.hookQueueEvent(event),
      claims: (taken) => taken,
      toArgument: (taken) => HookArgument.bool(taken),
    });
  }

  // ---- Broadcast -----------------------------------------------------------

  drainEvents(): void {
    this.broadcast('DrainEvents', () => [], (p) => p.hookDrainEvents());
  }

  updateNetworkTime(networkTime: number): void {
    this.broadcast(
      'UpdateNetworkTime',
      () => [HookArgument.double(networkTime)],
      (p) => p.hookUpdateNetworkTime(networkTime)
    );
  }

  objDestroy(obj: HostObject): void {
    this.broadcast('ObjDestroy', () => [HookArgument.voidPtr(obj)], (p) => p.hookObjDestroy(obj));
  }

  // ---- Instrumentation -----------------------------------------------------

  /** Occurrences dispatched so far, per hook type. */
  stats(): ReadonlyMap<HookType, number> {
    return new Map(HOOK_TYPES.map((hook): [HookType, number] => [hook, this.counts.get(hook) ?? 0]));
  }

  // ---- Internal helpers ----------------------------------------------------

  private firstResponder<R>(spec: FirstResponderSpec<R>): HookOutcome<R> {
    const plugins = this.registry.subscribers(spec.hook);
    const args = this.metaPre(spec.hook, spec.args);

    let outcome: HookOutcome<R> = { result: spec.fallback };
    for (const plugin of plugins) {
      const result = this.guard(spec.hook, plugin, () => spec.invoke(plugin), spec.fallback);
      if (spec.claims(result)) {
        outcome = { result, claimedBy: plugin };
        break;
      }
    }

    this.metaPost(spec.hook, args, () => spec.toArgument(outcome.result));
    return outcome;
  }

  private broadcast(hook: HookType, buildArgs: () => HookArgument[], invoke: (plugin: Plugin) => void): void {
    const plugins = this.registry.subscribers(hook);
    const args = this.metaPre(hook, buildArgs);

    for (const plugin of plugins) {
      this.guard(hook, plugin, () => invoke(plugin), undefined);
    }

    this.metaPost(hook, args, () => HookArgument.void());
  }

  /**
   * Counts the occurrence and runs MetaHookPre subscribers. Returns the
   * argument list when any meta-hook subscriber will need it.
   */
  private metaPre(hook: HookType, buildArgs: () => HookArgument[]): HookArgumentList | null {
    this.counts.set(hook, (this.counts.get(hook) ?? 0) + 1);

    const pre = this.registry.subscribers('MetaHookPre');
    if (pre.length === 0 && !this.registry.has('MetaHookPost')) return null;

    const args: HookArgumentList = Object.freeze(buildArgs());
    for (const plugin of pre) {
      this.guard('MetaHookPre', plugin, () => plugin.metaHookPre(hook, args), undefined);
    }
    return args;
  }

  private metaPost(hook: HookType, args: HookArgumentList | null, result: () => HookArgument): void {
    const post = this.registry.subscribers('MetaHookPost');
    if (post.length === 0 || !args) return;

    const resultArg = result();
    for (const plugin of post) {
      this.guard('MetaHookPost', plugin, () => plugin.metaHookPost(hook, args, resultArg), undefined);
    }
  }

  private guard<R>(hook: HookType, plugin: Plugin, fn: () => R, fallback: R): R {
    if (!this.isolate) return fn();
    try {
      return fn();
    } catch (err) {
      if (err instanceof ContractViolationError) throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error(`${hook} hook of plugin "${plugin.name}" failed`, error);
      return fallback;
    }
  }
}
