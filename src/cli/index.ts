/**
 * hookline command-line interface
 */

import { Command } from 'commander';
import { registerHooksCommand } from './hooks.js';
import { registerPluginsCommand } from './plugins.js';
import { registerRunCommand } from './run.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('hookline')
    .description('Plugin hook dispatch core')
    .version(VERSION)
    .option('-c, --config <path>', 'Config file (default ./hookline.json5)');

  registerPluginsCommand(program);
  registerHooksCommand(program);
  registerRunCommand(program);
  return program;
}
