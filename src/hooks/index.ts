/**
 * Hook System
 *
 * Exports:
 *   - HookArgument   - tagged hook arguments for meta-hooks
 *   - HookRegistry   - per-hook priority lists
 *   - HookDispatcher - first-responder / broadcast dispatch with meta-hooks
 *   - All types      - HookType, LoadFileResult, FunctionResult, etc.
 */

export * from './types.js';
export * from './argument.js';
export * from './registry.js';
export * from './dispatcher.js';
