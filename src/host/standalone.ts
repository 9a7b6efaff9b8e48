/**
 * Standalone host
 *
 * In-process collaborators for running the plugin core without an
 * interpreter: the CLI uses them, and so do the tests.
 *
 *   InputFileQueue   - input files waiting to be offered to LoadFile
 *   EventHandlerTable - named handlers and their "always generate" flag
 *   ObjectTracker    - objects flagged for destruction notification
 */

import type {
  EventHandler,
  EventManager,
  HostCollaborators,
  HostObject,
  ObjectRuntime,
  ScriptLoader,
} from './types.js';

// ── InputFileQueue ────────────────────────────────────────────────────────

export class InputFileQueue implements ScriptLoader {
  private readonly queue: string[] = [];
  private readonly seen = new Set<string>();
  private closed = false;

  /**
   * Files already queued once are accepted again without a second entry.
   * Rejects everything after close().
   */
  queueInputFile(file: string): boolean {
    if (this.closed || !file) return false;
    if (!this.seen.has(file)) {
      this.seen.add(file);
      this.queue.push(file);
    }
    return true;
  }

  pending(): string[] {
    return [...this.queue];
  }

  /** Remove and return the next queued file. */
  next(): string | undefined {
    return this.queue.shift();
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

// ── EventHandlerTable ─────────────────────────────────────────────────────

export class EventHandlerTable implements EventManager {
  private readonly handlers = new Map<string, EventHandler>();

  /** Handler for `name`, created on first use. */
  lookup(name: string): EventHandler {
    let handler = this.handlers.get(name);
    if (!handler) {
      handler = { name, generateAlways: false };
      this.handlers.set(name, handler);
    }
    return handler;
  }

  requestAlwaysGenerate(handler: EventHandler): void {
    handler.generateAlways = true;
    this.handlers.set(handler.name, handler);
  }

  /** Names of handlers raised even without a script handler, sorted. */
  alwaysGenerated(): string[] {
    return [...this.handlers.values()]
      .filter((h) => h.generateAlways)
      .map((h) => h.name)
      .sort();
  }
}

// ── ObjectTracker ─────────────────────────────────────────────────────────

export interface DestroyListener {
  hookObjDestroy(obj: HostObject): void;
}

export class ObjectTracker implements ObjectRuntime {
  private readonly watched = new WeakSet<HostObject>();
  private listener: DestroyListener | null = null;

  notifyOnDestroy(obj: HostObject): void {
    this.watched.add(obj);
  }

  isWatched(obj: HostObject): boolean {
    return this.watched.has(obj);
  }

  /** Route destruction of flagged objects to `listener` (usually the manager). */
  connect(listener: DestroyListener): void {
    this.listener = listener;
  }

  /**
   * The runtime is done with `obj`. Fires ObjDestroy when the object was
   * flagged; returns whether it was.
   */
  destroy(obj: HostObject): boolean {
    if (!this.watched.has(obj)) return false;
    this.watched.delete(obj);
    this.listener?.hookObjDestroy(obj);
    return true;
  }
}

// ── Factory ───────────────────────────────────────────────────────────────

export interface StandaloneHost extends HostCollaborators {
  scripts: InputFileQueue;
  events: EventHandlerTable;
  objects: ObjectTracker;
}

export function createStandaloneHost(): StandaloneHost {
  return {
    scripts: new InputFileQueue(),
    events: new EventHandlerTable(),
    objects: new ObjectTracker(),
  };
}
