/**
 * Hook Registry
 *
 * One priority list per hook type. Subscribers run in descending priority
 * order (higher = runs first). A subscriber holds at most one entry per
 * hook; enabling again replaces the priority.
 *
 * Equal priorities fall back to registration sequence, earlier first.
 * Re-enabling a hook re-sequences the entry, so it moves behind the other
 * subscribers sharing its priority.
 *
 * Usage:
 *   const registry = new HookRegistry<Plugin>();
 *   registry.enable('LoadFile', plugin, 10);
 *   for (const p of registry.subscribers('LoadFile')) { ... }
 *   registry.disable('LoadFile', plugin);
 */

import { ContractViolationError } from '../errors.js';
import { HOOK_TYPES } from './types.js';
import type { HookType } from './types.js';

export interface HookEntry<T> {
  subscriber: T;
  priority: number;
}

interface SequencedEntry<T> extends HookEntry<T> {
  sequence: number;
}

export class HookRegistry<T extends object> {
  private readonly lists = new Map<HookType, SequencedEntry<T>[]>();
  private nextSequence = 0;

  constructor() {
    for (const hook of HOOK_TYPES) {
      this.lists.set(hook, []);
    }
  }

  /**
   * Subscribe `subscriber` to `hook`, replacing any earlier priority.
   */
  enable(hook: HookType, subscriber: T, priority = 0): void {
    const list = this.listFor(hook);
    const remaining = list.filter((e) => e.subscriber !== subscriber);
    remaining.push({ subscriber, priority, sequence: this.nextSequence++ });
    remaining.sort((a, b) => b.priority - a.priority || a.sequence - b.sequence);
    this.lists.set(hook, remaining);
  }

  /**
   * @returns true if the subscriber had the hook enabled.
   */
  disable(hook: HookType, subscriber: T): boolean {
    const list = this.listFor(hook);
    const remaining = list.filter((e) => e.subscriber !== subscriber);
    this.lists.set(hook, remaining);
    return remaining.length !== list.length;
  }

  /** Remove a subscriber from every hook. */
  disableAll(subscriber: T): void {
    for (const hook of HOOK_TYPES) {
      this.disable(hook, subscriber);
    }
  }

  /**
   * Subscribers for `hook` in dispatch order. The array is a fresh copy, so
   * a dispatch pass iterating it is unaffected by enable/disable calls made
   * while it runs.
   */
  subscribers(hook: HookType): T[] {
    return this.listFor(hook).map((e) => e.subscriber);
  }

  entries(hook: HookType): HookEntry<T>[] {
    return this.listFor(hook).map(({ subscriber, priority }) => ({ subscriber, priority }));
  }

  priorityOf(hook: HookType, subscriber: T): number | undefined {
    return this.listFor(hook).find((e) => e.subscriber === subscriber)?.priority;
  }

  has(hook: HookType): boolean {
    return this.listFor(hook).length > 0;
  }

  /**
   * Frozen view of every hook's entries, in dispatch order.
   */
  snapshot(): ReadonlyMap<HookType, readonly HookEntry<T>[]> {
    const view = new Map<HookType, readonly HookEntry<T>[]>();
    for (const hook of HOOK_TYPES) {
      view.set(hook, Object.freeze(this.entries(hook)));
    }
    return view;
  }

  /** Total number of (hook, subscriber) entries. */
  get size(): number {
    let total = 0;
    for (const list of this.lists.values()) {
      total += list.length;
    }
    return total;
  }

  clear(): void {
    for (const hook of HOOK_TYPES) {
      this.lists.set(hook, []);
    }
  }

  private listFor(hook: HookType): SequencedEntry<T>[] {
    const list = this.lists.get(hook);
    if (!list) {
      throw new ContractViolationError(`Unknown hook type: "${hook}". Valid types: ${HOOK_TYPES.join(', ')}`);
    }
    return list;
  }
}
