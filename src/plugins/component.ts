/**
 * Components - capabilities a plugin contributes to one host subsystem
 * (a protocol analyzer, a log writer, a packet source, ...).
 *
 * A plugin owns the components it adds. Subsystems look them up through
 * PluginManager.components(type).
 */

export type ComponentType =
  | 'Analyzer'
  | 'FileAnalyzer'
  | 'IOSource'
  | 'PktSrc'
  | 'PktDumper'
  | 'Reader'
  | 'Writer';

const COMPONENT_LABEL: Record<ComponentType, string> = {
  Analyzer: 'Analyzer',
  FileAnalyzer: 'File Analyzer',
  IOSource: 'I/O Source',
  PktSrc: 'Packet Source',
  PktDumper: 'Packet Dumper',
  Reader: 'Reader',
  Writer: 'Writer',
};

/**
 * Upper-case form used as a lookup key: `Foo::HTTP-2` → `FOO__HTTP_2`.
 */
export function canonifyName(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

export class Component {
  readonly canonicalName: string;

  constructor(
    readonly type: ComponentType,
    readonly name: string
  ) {
    if (!name) {
      throw new Error('Component name is required');
    }
    this.canonicalName = canonifyName(name);
  }

  /** e.g. `[Analyzer] HTTP (ANALYZER_HTTP, enabled)` */
  describe(): string {
    const details = this.details();
    const line = `[${COMPONENT_LABEL[this.type]}] ${this.name}`;
    return details ? `${line} (${details})` : line;
  }

  /** Extra text subclasses want in parentheses after the name. */
  protected details(): string | undefined {
    return undefined;
  }
}
