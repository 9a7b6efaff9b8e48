/**
 * Dynamic Plugin Loader
 *
 * Finds plugin directories on a search path and imports them.
 *
 * A plugin directory is any directory holding a `plugin.json` manifest.
 * Each search path entry is either such a directory itself or a directory
 * whose immediate children are checked.
 *
 * Loading flow per plugin directory:
 *   1. Read and validate plugin.json
 *   2. Resolve `entry` and verify it stays inside the plugin directory
 *   3. Dynamic import(entry)
 *   4. Take the default export: a Plugin instance, a Plugin subclass
 *      (instantiated without arguments) or a factory returning a Plugin.
 *      Other classes are rejected, never called as factories
 *   5. Mark the plugin dynamic and record its location
 *
 * The manager configures and activates what comes back.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { delimiter, join, resolve } from 'path';
import { PluginConfigurationError } from '../errors.js';
import { logger as rootLogger } from '../logging/logger.js';
import { MANIFEST_FILE, safeParseManifest } from './manifest.js';
import { Plugin } from './plugin.js';
import type { Logger } from '../logging/logger.js';
import type { PluginManifest } from './manifest.js';

/** Environment variable holding extra plugin search directories. */
export const PLUGIN_PATH_ENV = 'HOOKLINE_PLUGIN_PATH';

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

/**
 * Returns true when `target` is inside (or exactly equal to) `base`.
 * Both paths are resolved to absolute before comparison.
 */
export function isContainedPath(base: string, target: string): boolean {
  const resolvedBase = resolve(base);
  const resolvedTarget = resolve(target);
  return resolvedTarget === resolvedBase || resolvedTarget.startsWith(resolvedBase + '/');
}

/**
 * Split a search path value (`a:b:c`) into its non-empty entries.
 */
export function parseSearchPath(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface DiscoveredPlugin {
  manifest: PluginManifest;
  /** Absolute path to the plugin directory */
  pluginDir: string;
}

export interface DiscoveryProblem {
  pluginDir: string;
  reason: string;
}

export interface DiscoveryResult {
  plugins: DiscoveredPlugin[];
  problems: DiscoveryProblem[];
}

// ---------------------------------------------------------------------------
// DynamicPluginLoader
// ---------------------------------------------------------------------------

export interface DynamicPluginLoaderOptions {
  logger?: Logger;
}

export class DynamicPluginLoader {
  private readonly log: Logger;

  constructor(options: DynamicPluginLoaderOptions = {}) {
    this.log = options.logger ?? rootLogger.child('loader');
  }

  // ---- Public API ----------------------------------------------------------

  /**
   * Scan `searchPaths` in order. Missing entries are skipped. When two
   * directories declare the same name (case-insensitive), the first wins.
   * Directories with a broken manifest are reported, not returned.
   */
  async discoverPlugins(searchPaths: readonly string[]): Promise<DiscoveryResult> {
    const byName = new Map<string, DiscoveredPlugin>();
    const problems: DiscoveryProblem[] = [];

    for (const searchPath of searchPaths) {
      const root = resolve(searchPath);
      if (!(await isDirectory(root))) {
        this.log.debug(`plugin search path ${root} does not exist, skipping`);
        continue;
      }

      for (const pluginDir of await this.candidateDirectories(root)) {
        const manifest = await this.readManifest(pluginDir, problems);
        if (!manifest) continue;

        const key = manifest.name.toLowerCase();
        const existing = byName.get(key);
        if (existing) {
          this.log.warn(
            `plugin ${manifest.name} in ${pluginDir} conflicts with ${existing.manifest.name} in ${existing.pluginDir}, ignoring`
          );
          continue;
        }
        byName.set(key, { manifest, pluginDir });
      }
    }

    for (const problem of problems) {
      this.log.error(`invalid plugin in ${problem.pluginDir}: ${problem.reason}`);
    }

    return { plugins: [...byName.values()], problems };
  }

  /**
   * Import a discovered plugin and return its (unconfigured) instance.
   *
   * @throws PluginConfigurationError if the entry escapes the plugin
   *         directory, fails to import or does not yield a Plugin
   */
  async loadPlugin(discovered: DiscoveredPlugin): Promise<Plugin> {
    const { manifest, pluginDir } = discovered;
    const entryPath = resolve(pluginDir, manifest.entry);

    if (!isContainedPath(pluginDir, entryPath)) {
      throw new PluginConfigurationError(`entry "${manifest.entry}" resolves outside ${pluginDir}`, manifest.name);
    }

    let mod: unknown;
    try {
      mod = await import(entryPath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PluginConfigurationError(`cannot import ${entryPath}: ${reason}`, manifest.name);
    }

    const exported = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined;
    let plugin: Plugin | null;
    try {
      plugin = instantiate(exported);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PluginConfigurationError(`cannot instantiate plugin from ${entryPath}: ${reason}`, manifest.name);
    }
    if (!plugin) {
      throw new PluginConfigurationError(`${entryPath} does not export a plugin as default`, manifest.name);
    }

    plugin.setDynamic(true);
    plugin.setPluginLocation(pluginDir, entryPath);
    this.log.debug(`loaded ${manifest.name} from ${entryPath}`);
    return plugin;
  }

  // ---- Internal helpers ----------------------------------------------------

  private async candidateDirectories(root: string): Promise<string[]> {
    if (await this.hasManifest(root)) return [root];

    const names = (await readdir(root)).sort();
    const dirs: string[] = [];
    for (const name of names) {
      const dir = join(root, name);
      if ((await isDirectory(dir)) && (await this.hasManifest(dir))) {
        dirs.push(dir);
      }
    }
    return dirs;
  }

  private async hasManifest(dir: string): Promise<boolean> {
    try {
      return (await stat(join(dir, MANIFEST_FILE))).isFile();
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return false;
      throw err;
    }
  }

  private async readManifest(pluginDir: string, problems: DiscoveryProblem[]): Promise<PluginManifest | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(join(pluginDir, MANIFEST_FILE), 'utf-8'));
    } catch (err) {
      problems.push({ pluginDir, reason: err instanceof Error ? err.message : String(err) });
      return null;
    }

    const result = safeParseManifest(raw);
    if (!result.success) {
      problems.push({ pluginDir, reason: result.error });
      return null;
    }
    return result.data;
  }
}

// ---------------------------------------------------------------------------
// Default export handling
// ---------------------------------------------------------------------------

function isPluginClass(value: unknown): value is new () => Plugin {
  return typeof value === 'function' && value.prototype instanceof Plugin;
}

function isClass(value: unknown): boolean {
  return typeof value === 'function' && /^class\b/.test(Function.prototype.toString.call(value));
}

function isFactory(value: unknown): value is () => unknown {
  return typeof value === 'function' && !isClass(value);
}

function instantiate(exported: unknown): Plugin | null {
  if (exported instanceof Plugin) return exported;
  if (isPluginClass(exported)) return new exported();
  if (isFactory(exported)) {
    const produced = exported();
    return produced instanceof Plugin ? produced : null;
  }
  return null;
}
