/**
 * Hook arguments
 *
 * A closed tagged value able to carry any single parameter or result of any
 * hook, so meta-hooks can receive one uniform list. References (events,
 * frames, functions, values) are borrowed from the host: the argument never
 * owns them and must not outlive them. A `func_result` carries whatever the
 * hook returned, including the ownership that comes with a handled value.
 */

import { HookArgumentTypeError } from '../errors.js';
import type { FunctionResult } from './types.js';
import type {
  CallFrame,
  HostObject,
  ScriptEvent,
  ScriptFunction,
  ScriptValue,
} from '../host/types.js';

export type HookArgumentValue =
  | { type: 'bool'; value: boolean }
  | { type: 'double'; value: number }
  | { type: 'event'; value: ScriptEvent | null }
  | { type: 'frame'; value: CallFrame | null }
  | { type: 'func'; value: ScriptFunction | null }
  | { type: 'func_result'; value: FunctionResult }
  | { type: 'int'; value: number }
  | { type: 'string'; value: string }
  | { type: 'val'; value: ScriptValue | null }
  | { type: 'val_list'; value: readonly ScriptValue[] | null }
  | { type: 'void' }
  | { type: 'voidp'; value: HostObject | null };

export type HookArgumentType = HookArgumentValue['type'];

function describeValues(values: readonly ScriptValue[]): string {
  return values.map((v) => v.describe()).join(', ');
}

export class HookArgument {
  private constructor(readonly value: HookArgumentValue) {}

  // ── Constructors ─────────────────────────────────────────────────────────

  static bool(value: boolean): HookArgument {
    return new HookArgument({ type: 'bool', value });
  }

  static double(value: number): HookArgument {
    return new HookArgument({ type: 'double', value });
  }

  static event(value: ScriptEvent | null): HookArgument {
    return new HookArgument({ type: 'event', value });
  }

  static frame(value: CallFrame | null): HookArgument {
    return new HookArgument({ type: 'frame', value });
  }

  static func(value: ScriptFunction | null): HookArgument {
    return new HookArgument({ type: 'func', value });
  }

  static funcResult(value: FunctionResult): HookArgument {
    return new HookArgument({ type: 'func_result', value });
  }

  /** @throws RangeError if `value` is not an integer */
  static int(value: number): HookArgument {
    if (!Number.isInteger(value)) {
      throw new RangeError(`int hook argument must be an integer, got ${value}`);
    }
    return new HookArgument({ type: 'int', value });
  }

  static string(value: string): HookArgument {
    return new HookArgument({ type: 'string', value });
  }

  static val(value: ScriptValue | null): HookArgument {
    return new HookArgument({ type: 'val', value });
  }

  static valList(value: readonly ScriptValue[] | null): HookArgument {
    return new HookArgument({ type: 'val_list', value });
  }

  static void(): HookArgument {
    return new HookArgument({ type: 'void' });
  }

  static voidPtr(value: HostObject | null): HookArgument {
    return new HookArgument({ type: 'voidp', value });
  }

  get type(): HookArgumentType {
    return this.value.type;
  }

  // ── Accessors ────────────────────────────────────────────────────────────

  asBool(): boolean {
    const arg = this.value;
    if (arg.type === 'bool') return arg.value;
    throw new HookArgumentTypeError('bool', arg.type);
  }

  asDouble(): number {
    const arg = this.value;
    if (arg.type === 'double') return arg.value;
    throw new HookArgumentTypeError('double', arg.type);
  }

  asEvent(): ScriptEvent | null {
    const arg = this.value;
    if (arg.type === 'event') return arg.value;
    throw new HookArgumentTypeError('event', arg.type);
  }

  asFrame(): CallFrame | null {
    const arg = this.value;
    if (arg.type === 'frame') return arg.value;
    throw new HookArgumentTypeError('frame', arg.type);
  }

  asFunc(): ScriptFunction | null {
    const arg = this.value;
    if (arg.type === 'func') return arg.value;
    throw new HookArgumentTypeError('func', arg.type);
  }

  asFuncResult(): FunctionResult {
    const arg = this.value;
    if (arg.type === 'func_result') return arg.value;
    throw new HookArgumentTypeError('func_result', arg.type);
  }

  asInt(): number {
    const arg = this.value;
    if (arg.type === 'int') return arg.value;
    throw new HookArgumentTypeError('int', arg.type);
  }

  asString(): string {
    const arg = this.value;
    if (arg.type === 'string') return arg.value;
    throw new HookArgumentTypeError('string', arg.type);
  }

  asVal(): ScriptValue | null {
    const arg = this.value;
    if (arg.type === 'val') return arg.value;
    throw new HookArgumentTypeError('val', arg.type);
  }

  asValList(): readonly ScriptValue[] | null {
    const arg = this.value;
    if (arg.type === 'val_list') return arg.value;
    throw new HookArgumentTypeError('val_list', arg.type);
  }

  asVoidPtr(): HostObject | null {
    const arg = this.value;
    if (arg.type === 'voidp') return arg.value;
    throw new HookArgumentTypeError('voidp', arg.type);
  }

  /**
   * Diagnostic rendering. Deterministic, but not meant to be parsed back.
   */
  describe(): string {
    const arg = this.value;
    switch (arg.type) {
      case 'bool':
        return arg.value ? 'true' : 'false';
      case 'double':
      case 'int':
        return String(arg.value);
      case 'event':
        if (!arg.value) return '<null>';
        return `${arg.value.handler.name}(${describeValues(arg.value.args)})`;
      case 'frame':
        return arg.value ? '<frame>' : '<null>';
      case 'func':
        return arg.value ? arg.value.name : '<null>';
      case 'func_result':
        if (!arg.value.handled) return '<no result>';
        return arg.value.value ? arg.value.value.describe() : '<null>';
      case 'string':
        return arg.value;
      case 'val':
        return arg.value ? arg.value.describe() : '<null>';
      case 'val_list':
        return arg.value ? `(${describeValues(arg.value)})` : '<null>';
      case 'void':
        return '<void>';
      case 'voidp':
        return '<void ptr>';
      default: {
        const unreachable: never = arg;
        return unreachable;
      }
    }
  }
}

export type HookArgumentList = readonly HookArgument[];

/** Render a whole argument list, e.g. for `LoadFile(foo.zeek, zeek)`. */
export function describeArguments(args: HookArgumentList): string {
  return args.map((a) => a.describe()).join(', ');
}
