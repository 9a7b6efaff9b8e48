/**
 * Run Command
 * Offers input files to the active plugins' LoadFile hooks and reports
 * who took each one. Files queued by plugins are offered as well.
 *
 *   hookline run site.zeek extra.sig
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { LOAD_FILE_FAILED, LOAD_FILE_LOADED } from '../hooks/types.js';
import { reportFailures, startRuntime } from './shared.js';
import type { LoadedFile } from '../runtime.js';

export function formatLoadedFile({ file, result, claimedBy }: LoadedFile): string {
  if (result === LOAD_FILE_LOADED) return `${file}: loaded by ${claimedBy ?? 'unknown'}`;
  if (result === LOAD_FILE_FAILED) return `${file}: failed in ${claimedBy ?? 'unknown'}`;
  return `${file}: not claimed`;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Offer input files to the LoadFile hook')
    .argument('[files...]', 'Input files')
    .action(async (files: string[]) => {
      const runtime = await startRuntime(program, { inputFiles: files });
      try {
        for (const loaded of runtime.files) {
          const line = formatLoadedFile(loaded);
          console.log(loaded.result === LOAD_FILE_FAILED ? chalk.red(line) : line);
        }
        if (runtime.files.some((f) => f.result === LOAD_FILE_FAILED)) {
          process.exitCode = 1;
        }
        reportFailures(runtime);
      } finally {
        runtime.manager.terminate();
      }
    });
}
