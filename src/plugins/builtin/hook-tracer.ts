/**
 * Hook tracer
 *
 * Built-in plugin that logs every hook point through the meta-hooks:
 *
 *   MetaHookPre LoadFile(site.zeek, zeek)
 *   MetaHookPost LoadFile(site.zeek, zeek) -> -1
 *
 * Lines go to the plugin's logger at `info`, or to `output` when given.
 * With `traceFile` each line is also appended to a JSON-lines file.
 */

import { describeArguments } from '../../hooks/argument.js';
import { JsonTransport, Logger } from '../../logging/logger.js';
import { Plugin } from '../plugin.js';
import type { HookArgument, HookArgumentList } from '../../hooks/argument.js';
import type { HookType } from '../../hooks/types.js';
import type { PluginConfiguration } from '../plugin.js';

export const HOOK_TRACER_NAME = 'Hookline::HookTracer';

export interface HookTracerOptions {
  /** Meta-hook priority (default 0) */
  priority?: number;
  /** JSON-lines file receiving a copy of every trace line */
  traceFile?: string;
  /** Logger receiving the trace lines instead of the plugin's own */
  output?: Logger;
}

export class HookTracer extends Plugin {
  private readonly output?: Logger;
  private readonly traceLog?: Logger;

  constructor(options: HookTracerOptions = {}) {
    super();
    this.output = options.output;
    if (options.traceFile) {
      this.traceLog = new Logger({
        level: 'debug',
        transports: [new JsonTransport(options.traceFile)],
        component: 'hook-trace',
      });
    }
    this.enableHook('MetaHookPre', options.priority ?? 0);
    this.enableHook('MetaHookPost', options.priority ?? 0);
  }

  protected configure(): PluginConfiguration {
    return { name: HOOK_TRACER_NAME, description: 'Logs every hook invocation' };
  }

  metaHookPre(hook: HookType, args: HookArgumentList): void {
    this.trace(hook, `MetaHookPre ${hook}(${describeArguments(args)})`);
  }

  metaHookPost(hook: HookType, args: HookArgumentList, result: HookArgument): void {
    this.trace(hook, `MetaHookPost ${hook}(${describeArguments(args)}) -> ${result.describe()}`);
  }

  private trace(hook: HookType, line: string): void {
    (this.output ?? this.logger).info(line);
    this.traceLog?.info(line, { hook });
  }
}
