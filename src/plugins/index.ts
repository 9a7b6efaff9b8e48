/**
 * Plugins module exports
 *
 *   - plugin    - Plugin base class, VersionNumber, PluginHost
 *   - component - Component and its types
 *   - bif-item  - declared script-level items
 *   - manifest  - Zod schema for plugin.json
 *   - loader    - DynamicPluginLoader for filesystem discovery
 *   - manager   - PluginManager for lifecycle orchestration
 *   - builtin   - HookTracer
 */

export * from './plugin.js';
export * from './component.js';
export * from './bif-item.js';
export * from './manifest.js';
export * from './loader.js';
export * from './manager.js';
export * from './builtin/hook-tracer.js';
