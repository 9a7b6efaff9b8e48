/**
 * Helpers shared by the CLI commands.
 */

import type { Command } from 'commander';
import { loadConfig } from '../config/loader.js';
import { bootstrap } from '../runtime.js';
import type { BootstrapOptions, Runtime } from '../runtime.js';

export interface GlobalOptions {
  config?: string;
}

/** Load the config named by `--config` and bootstrap a runtime from it. */
export async function startRuntime(program: Command, options: BootstrapOptions = {}): Promise<Runtime> {
  const { config: path } = program.opts<GlobalOptions>();
  return bootstrap(loadConfig({ path }), options);
}

/** Report activation failures on stderr; sets a failing exit code. */
export function reportFailures(runtime: Runtime, write: (line: string) => void = console.error): void {
  for (const { name, error } of runtime.failures) {
    write(`error: ${name}: ${error.message}`);
  }
  if (runtime.failures.length > 0) {
    process.exitCode = 1;
  }
}
