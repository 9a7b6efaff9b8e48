/**
 * hookline - plugin hook dispatch core
 *
 *   import { Plugin, PluginManager, createStandaloneHost } from 'hookline';
 */

export * from './errors.js';
export * from './hooks/index.js';
export * from './plugins/index.js';
export * from './host/types.js';
export * from './host/standalone.js';
export * from './logging/logger.js';
export * from './config/schema.js';
export * from './config/loader.js';
export * from './runtime.js';
