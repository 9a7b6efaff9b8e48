/**
 * Host collaborator contracts
 *
 * The interpreter, event manager and object runtime live outside this
 * package. These are the shapes the dispatch core sees of them.
 */

/** A script-level value. Only its rendering matters to the core. */
export interface ScriptValue {
  describe(): string;
}

export interface ScriptFunction {
  readonly name: string;
}

/** Interpreter call frame; opaque apart from the function it belongs to. */
export interface CallFrame {
  readonly func?: ScriptFunction;
}

export interface EventHandler {
  readonly name: string;
  /** Raise the event even when no script handler exists for it. */
  generateAlways: boolean;
}

export interface ScriptEvent {
  readonly handler: EventHandler;
  readonly args: ScriptValue[];
}

/**
 * Any runtime object a plugin may watch for destruction. After destruction
 * it is only good for identity comparison.
 */
export type HostObject = object;

// ── Collaborators ─────────────────────────────────────────────────────────

export interface ScriptLoader {
  /** Queue an input file; true means queued, not that the file is valid. */
  queueInputFile(file: string): boolean;
}

export interface EventManager {
  requestAlwaysGenerate(handler: EventHandler): void;
}

export interface ObjectRuntime {
  notifyOnDestroy(obj: HostObject): void;
}

export interface HostCollaborators {
  scripts: ScriptLoader;
  events: EventManager;
  objects: ObjectRuntime;
}
