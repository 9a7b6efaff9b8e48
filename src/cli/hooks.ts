/**
 * Hooks Command
 * Prints the hook configuration captured after post-script initialization.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { HOOK_TYPES } from '../hooks/types.js';
import { reportFailures, startRuntime } from './shared.js';
import type { StartupHookEntry } from '../plugins/manager.js';

/**
 * One line per hook with subscribers, in dispatch order:
 * `LoadFile: Demo::Foo (10), Demo::Bar (0)`.
 */
export function renderHookConfiguration(entries: readonly StartupHookEntry[]): string[] {
  return HOOK_TYPES.flatMap((hook) => {
    const subscribers = entries.filter((e) => e.hook === hook);
    if (subscribers.length === 0) return [];
    return [`${hook}: ${subscribers.map((e) => `${e.plugin} (${e.priority})`).join(', ')}`];
  });
}

export function registerHooksCommand(program: Command): void {
  program
    .command('hooks')
    .description('Show which plugins implement which hooks')
    .action(async () => {
      const runtime = await startRuntime(program);
      try {
        const lines = renderHookConfiguration(runtime.manager.startupHookConfiguration());
        console.log(lines.length > 0 ? lines.join('\n') : chalk.dim('No hooks enabled.'));
        reportFailures(runtime);
      } finally {
        runtime.manager.terminate();
      }
    });
}
