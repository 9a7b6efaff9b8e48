/**
 * Plugins Command
 * Lists every active plugin: built-ins first registered, then dynamic
 * plugins found on the search path, sorted by name.
 *
 *   hookline plugins        - one line per plugin
 *   hookline plugins -v     - plus components, declared items and hooks
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { reportFailures, startRuntime } from './shared.js';

export function registerPluginsCommand(program: Command): void {
  program
    .command('plugins')
    .description('List active plugins')
    .option('-v, --verbose', 'Show components, declared items and hooks')
    .action(async (opts: { verbose?: boolean }) => {
      const runtime = await startRuntime(program);
      try {
        const text = runtime.manager.describe(opts.verbose ?? false);
        console.log(text || chalk.dim('No plugins active.'));
        reportFailures(runtime);
      } finally {
        runtime.manager.terminate();
      }
    });
}
