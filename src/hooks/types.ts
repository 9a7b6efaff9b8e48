/**
 * Hook System - Type Definitions
 *
 * The hook set is closed and versioned together with PLUGIN_API_VERSION:
 * adding, removing or reshaping a hook means bumping the version.
 */

import type { ScriptValue } from '../host/types.js';

/**
 * Plugin API version. A plugin built against a different version is
 * refused at load time.
 */
export const PLUGIN_API_VERSION = 3;

/**
 * Extension points a plugin may enable. Each maps to the Plugin method of
 * the same name with a `hook` prefix (`LoadFile` → `hookLoadFile`); the
 * two meta kinds map to `metaHookPre` / `metaHookPost`.
 */
export type HookType =
  | 'LoadFile'
  | 'CallFunction'
  | 'QueueEvent'
  | 'DrainEvents'
  | 'UpdateNetworkTime'
  | 'ObjDestroy'
  | 'MetaHookPre'
  | 'MetaHookPost';

export const HOOK_TYPES: readonly HookType[] = [
  'LoadFile',
  'CallFunction',
  'QueueEvent',
  'DrainEvents',
  'UpdateNetworkTime',
  'ObjDestroy',
  'MetaHookPre',
  'MetaHookPost',
];

/** Stop at the first plugin returning a claiming result. */
export const FIRST_RESPONDER_HOOKS: readonly HookType[] = ['LoadFile', 'CallFunction', 'QueueEvent'];

/** Every enabled plugin runs; no result. */
export const BROADCAST_HOOKS: readonly HookType[] = ['DrainEvents', 'UpdateNetworkTime', 'ObjDestroy'];

export const META_HOOKS: readonly HookType[] = ['MetaHookPre', 'MetaHookPost'];

export function isHookType(value: string): value is HookType {
  return (HOOK_TYPES as readonly string[]).includes(value);
}

/** A plugin's subscription to one hook. */
export interface HookRegistration {
  hook: HookType;
  priority: number;
}

// ── Hook results ──────────────────────────────────────────────────────────

/** The plugin took the file and loaded it. */
export const LOAD_FILE_LOADED = 1;
/** The plugin took the file but failed; the host aborts that file. */
export const LOAD_FILE_FAILED = 0;
/** Not interested; offer the file to the next plugin. */
export const LOAD_FILE_DECLINED = -1;

export type LoadFileResult = typeof LOAD_FILE_LOADED | typeof LOAD_FILE_FAILED | typeof LOAD_FILE_DECLINED;

/**
 * Result of hookCallFunction. A handled value replaces the call's result and
 * belongs to the receiver from that point on; it must match the function's
 * declared return type.
 */
export type FunctionResult =
  | { handled: false }
  | { handled: true; value: ScriptValue | null };

export const NOT_HANDLED: FunctionResult = Object.freeze({ handled: false });
