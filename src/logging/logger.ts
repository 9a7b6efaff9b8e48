/**
 * Structured logging.
 *
 *  - One global Logger (`logger`); subsystems take `logger.child('hooks')`,
 *    plugins get `plugin:<name>` children.
 *  - Entries carry level, message, ISO 8601 timestamp, optional component,
 *    structured data and error info.
 *  - Transports: ConsoleTransport (chalk-coloured) and JsonTransport
 *    (JSON lines appended to a file, used for hook traces).
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** e.g. 'plugins', 'hooks', 'plugin:Demo::Foo' */
  component?: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface Transport {
  write(entry: LogEntry): void;
}

// ── ConsoleTransport ──────────────────────────────────────────────────────

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  fatal: chalk.bgRed.white,
};

export class ConsoleTransport implements Transport {
  write(entry: LogEntry): void {
    const label = LEVEL_COLOR[entry.level](entry.level.toUpperCase().padStart(5));
    const comp = entry.component ? chalk.blue(` [${entry.component}]`) : '';
    let line = `${chalk.dim(entry.timestamp)} ${label}${comp} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      line += ' ' + chalk.dim(JSON.stringify(entry.data));
    }
    if (entry.error) {
      line += chalk.red(` | ${entry.error.name}: ${entry.error.message}`);
    }

    const stream = LEVEL_ORDER[entry.level] >= LEVEL_ORDER.error ? process.stderr : process.stdout;
    stream.write(line + '\n');
  }
}

// ── JsonTransport ─────────────────────────────────────────────────────────

export class JsonTransport implements Transport {
  constructor(private readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  write(entry: LogEntry): void {
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }
}

// ── Logger ────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: LogLevel;
  transports?: Transport[];
  component?: string;
}

export class Logger {
  private level: LogLevel;
  private transports: Transport[];
  private readonly component?: string;
  private readonly parent?: Logger;

  constructor(options: LoggerOptions = {}, parent?: Logger) {
    this.level = options.level ?? 'info';
    this.transports = parent ? [] : options.transports ?? [new ConsoleTransport()];
    this.component = options.component;
    this.parent = parent;
  }

  /** Level and transports are shared by a logger and all its children. */
  setLevel(level: LogLevel): void {
    this.root().level = level;
  }

  getLevel(): LogLevel {
    return this.root().level;
  }

  addTransport(transport: Transport): void {
    this.root().transports.push(transport);
  }

  removeTransport(transport: Transport): void {
    const transports = this.root().transports;
    const idx = transports.indexOf(transport);
    if (idx >= 0) transports.splice(idx, 1);
  }

  /**
   * A logger stamping every entry with `component`. It shares level and
   * transports with this logger's root.
   */
  child(component: string): Logger {
    return new Logger({ component }, this.root());
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, err?: Error, data?: Record<string, unknown>): void {
    this.log('error', message, data, err);
  }

  fatal(message: string, err?: Error, data?: Record<string, unknown>): void {
    this.log('fatal', message, data, err);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.getLevel()];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>, err?: Error): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
      data,
      error: err ? { name: err.name, message: err.message, stack: err.stack } : undefined,
    };

    for (const transport of this.root().transports) {
      transport.write(entry);
    }
  }

  private root(): Logger {
    return this.parent ? this.parent.root() : this;
  }
}

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL'];
  return raw && isLogLevel(raw) ? raw : 'info';
}

/**
 * Global logger. Subsystems should log through `logger.child('name')`.
 */
export const logger = new Logger({ level: levelFromEnv() });
