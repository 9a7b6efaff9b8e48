/**
 * Configuration loader - reads and parses config files
 *
 * Resolution order for every setting:
 *   1. environment overrides (HOOKLINE_PLUGIN_PATH, HOOKLINE_PLUGIN_ACTIVATE, LOG_LEVEL)
 *   2. the JSON5 config file (`${VAR}` references substituted)
 *   3. schema defaults
 *
 * HOOKLINE_PLUGIN_PATH entries are searched after the configured paths.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import JSON5 from 'json5';
import { ConfigurationError } from '../errors.js';
import { isLogLevel } from '../logging/logger.js';
import { PLUGIN_PATH_ENV, parseSearchPath } from '../plugins/loader.js';
import { validateConfig } from './schema.js';
import type { HooklineConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'hookline.json5';
export const PLUGIN_ACTIVATE_ENV = 'HOOKLINE_PLUGIN_ACTIVATE';

type Env = Record<string, string | undefined>;

export function substituteEnvVars(value: string, env: Env = process.env): string {
  return value.replace(/\$\{(\w+)\}/g, (_, key: string) => env[key] ?? '');
}

function substituteDeep(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteDeep(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = substituteDeep(val, env);
    }
    return result;
  }
  return obj;
}

export function getConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, DEFAULT_CONFIG_FILE);
}

export function parseConfigContent(content: string): unknown {
  return JSON5.parse(content);
}

/**
 * Apply environment overrides to a validated config.
 */
export function applyEnvOverrides(config: HooklineConfig, env: Env = process.env): HooklineConfig {
  const extraPaths = parseSearchPath(env[PLUGIN_PATH_ENV]);

  let activate = config.plugins.activate;
  const rawActivate = env[PLUGIN_ACTIVATE_ENV]?.trim();
  if (rawActivate) {
    activate =
      rawActivate === 'all'
        ? 'all'
        : rawActivate
            .split(',')
            .map((name) => name.trim())
            .filter((name) => name.length > 0);
  }

  const rawLevel = env['LOG_LEVEL'];
  const level = rawLevel && isLogLevel(rawLevel) ? rawLevel : config.logging.level;

  return {
    ...config,
    plugins: { ...config.plugins, paths: [...config.plugins.paths, ...extraPaths], activate },
    logging: { ...config.logging, level },
  };
}

/**
 * Load, validate and apply environment overrides. A missing default
 * file yields the defaults; an explicit `path` must exist.
 *
 * @throws ConfigurationError when the file cannot be parsed or validated
 */
export function loadConfig(options: { path?: string; cwd?: string; env?: Env } = {}): HooklineConfig {
  const configPath = options.path ?? getConfigPath(options.cwd);
  const env = options.env ?? process.env;

  let raw: unknown = {};
  if (existsSync(configPath)) {
    try {
      raw = parseConfigContent(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(err instanceof Error ? err.message : String(err), configPath);
    }
  } else if (options.path) {
    throw new ConfigurationError('config file not found', configPath);
  }

  const result = validateConfig(substituteDeep(raw, env));
  if (!result.success) {
    throw new ConfigurationError(`invalid config: ${result.error}`, configPath);
  }

  return applyEnvOverrides(result.data, env);
}
