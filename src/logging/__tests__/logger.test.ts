/**
 * Tests for the structured Logger - log levels, transports, child loggers
 * and error logging.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Logger, ConsoleTransport, JsonTransport, isLogLevel, logger } from '../logger.js';
import type { LogEntry, Transport, LogLevel } from '../logger.js';

// ── Capture transport for testing ─────────────────────────────────────────

class CaptureTransport implements Transport {
  entries: LogEntry[] = [];
  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

// ── Log levels ────────────────────────────────────────────────────────────

describe('Logger - level filtering', () => {
  const cases: Array<[LogLevel, string[]]> = [
    ['debug', ['d', 'i', 'w', 'e', 'f']],
    ['info', ['i', 'w', 'e', 'f']],
    ['warn', ['w', 'e', 'f']],
    ['error', ['e', 'f']],
    ['fatal', ['f']],
  ];

  for (const [minLevel, expected] of cases) {
    it(`level=${minLevel} suppresses lower-level messages`, () => {
      const cap = new CaptureTransport();
      const log = new Logger({ level: minLevel, transports: [cap] });

      log.debug('d');
      log.info('i');
      log.warn('w');
      log.error('e');
      log.fatal('f');

      expect(cap.entries.map((e) => e.message)).toEqual(expected);
    });
  }

  it('defaults to info', () => {
    expect(new Logger({ transports: [] }).getLevel()).toBe('info');
  });

  it('setLevel changes the minimum level', () => {
    const cap = new CaptureTransport();
    const log = new Logger({ level: 'error', transports: [cap] });
    log.info('suppressed');
    expect(cap.entries).toHaveLength(0);
    log.setLevel('debug');
    log.info('now visible');
    expect(cap.entries).toHaveLength(1);
    expect(log.isEnabled('debug')).toBe(true);
  });

  it('recognises level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});

// ── Log entry shape ───────────────────────────────────────────────────────

describe('Logger - entry shape', () => {
  let cap: CaptureTransport;
  let log: Logger;

  beforeEach(() => {
    cap = new CaptureTransport();
    log = new Logger({ level: 'debug', transports: [cap] });
  });

  it('includes level, message, ISO timestamp', () => {
    log.info('test message');
    const entry = cap.entries[0];
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('test message');
    expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
  });

  it('includes data when provided', () => {
    log.info('with data', { plugin: 'Demo::Foo', count: 3 });
    expect(cap.entries[0].data).toEqual({ plugin: 'Demo::Foo', count: 3 });
  });

  it('error() with an Error populates entry.error', () => {
    log.error('caught error', new TypeError('something broke'), { hook: 'LoadFile' });
    const entry = cap.entries[0];
    expect(entry.error).toMatchObject({ name: 'TypeError', message: 'something broke' });
    expect(entry.error?.stack).toBeDefined();
    expect(entry.data).toEqual({ hook: 'LoadFile' });
  });

  it('error() without an Error leaves entry.error unset', () => {
    log.error('plain');
    expect(cap.entries[0].error).toBeUndefined();
  });
});

// ── Child loggers ─────────────────────────────────────────────────────────

describe('Logger - child loggers', () => {
  it('child shares the parent level', () => {
    const cap = new CaptureTransport();
    const parent = new Logger({ level: 'warn', transports: [cap] });
    const child = parent.child('hooks');
    child.info('suppressed by level');
    expect(cap.entries).toHaveLength(0);

    child.setLevel('info');
    expect(parent.getLevel()).toBe('info');
    child.info('passes');
    expect(cap.entries).toHaveLength(1);
  });

  it('child stamps component on every entry', () => {
    const cap = new CaptureTransport();
    const parent = new Logger({ level: 'debug', transports: [cap] });
    parent.child('plugin:Demo::Foo').info('ran');
    parent.info('parent log');
    expect(cap.entries.map((e) => e.component)).toEqual(['plugin:Demo::Foo', undefined]);
  });

  it('grandchildren carry their own component', () => {
    const cap = new CaptureTransport();
    const root = new Logger({ level: 'debug', transports: [cap] });
    root.child('plugins').child('loader').debug('scan');
    expect(cap.entries[0].component).toBe('loader');
  });

  it('child shares transports with its root', () => {
    const cap = new CaptureTransport();
    const parent = new Logger({ level: 'debug', transports: [cap] });
    const child = parent.child('sub');
    const extra = new CaptureTransport();
    child.addTransport(extra);
    parent.info('shared transport test');
    expect(cap.entries).toHaveLength(1);
    expect(extra.entries).toHaveLength(1);

    parent.removeTransport(extra);
    child.info('again');
    expect(extra.entries).toHaveLength(1);
  });
});

// ── ConsoleTransport ──────────────────────────────────────────────────────

describe('ConsoleTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes debug/info/warn to stdout', () => {
    const spy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const transport = new ConsoleTransport();

    transport.write({ level: 'info', message: 'inf', timestamp: '2026-01-01T00:00:00.000Z', component: 'hooks' });

    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0][0]);
    expect(line).toContain('inf');
    expect(line).toContain('[hooks]');
    expect(line.endsWith('\n')).toBe(true);
  });

  it('writes error/fatal to stderr', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const transport = new ConsoleTransport();

    transport.write({ level: 'error', message: 'err', timestamp: new Date().toISOString() });
    transport.write({ level: 'fatal', message: 'ftl', timestamp: new Date().toISOString() });

    expect(spy).toHaveBeenCalledTimes(2);
  });
});

// ── JsonTransport ─────────────────────────────────────────────────────────

describe('JsonTransport', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookline-log-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing directories and writes JSON lines', () => {
    const file = path.join(dir, 'nested', 'out.jsonl');
    const transport = new JsonTransport(file);
    transport.write({ level: 'info', message: 'one', timestamp: '2026-02-19T00:00:00.000Z' });
    transport.write({ level: 'warn', message: 'two', timestamp: '2026-02-19T00:00:01.000Z', data: { k: 'v' } });

    const lines = fs.readFileSync(file, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual({ level: 'info', message: 'one', timestamp: '2026-02-19T00:00:00.000Z' });
    expect(JSON.parse(lines[1])).toMatchObject({ message: 'two', data: { k: 'v' } });
  });
});

// ── Global singleton ──────────────────────────────────────────────────────

describe('logger singleton', () => {
  it('is a Logger whose children are Loggers', () => {
    expect(logger).toBeInstanceOf(Logger);
    expect(logger.child('test-component')).toBeInstanceOf(Logger);
  });
});
