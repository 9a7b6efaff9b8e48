/**
 * HookDispatcher - first-responder and broadcast protocols, meta-hooks,
 * error isolation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { HookDispatcher } from '../dispatcher.js';
import { HookRegistry } from '../registry.js';
import { describeArguments } from '../argument.js';
import { LOAD_FILE_DECLINED, LOAD_FILE_FAILED, LOAD_FILE_LOADED } from '../types.js';
import { ContractViolationError } from '../../errors.js';
import {
  TestPlugin,
  TestValue,
  activate,
  captureLogger,
  makeEvent,
  makeFunc,
  stubHost,
} from '../../__tests__/helpers.js';
import type { HookArgument, HookArgumentList } from '../argument.js';
import type { HookType } from '../types.js';
import type { Plugin, PluginHost } from '../../plugins/plugin.js';
import type { CaptureTransport } from '../../__tests__/helpers.js';

interface MetaCall {
  hook: HookType;
  args: HookArgumentList;
  result?: HookArgument;
}

describe('HookDispatcher', () => {
  let registry: HookRegistry<Plugin>;
  let host: PluginHost;
  let dispatcher: HookDispatcher;
  let capture: CaptureTransport;
  let trace: string[];
  let pre: MetaCall[];
  let post: MetaCall[];

  /** Subscribes to both meta-hooks and records what it sees. */
  const metaObserver = (): TestPlugin =>
    new TestPlugin({
      name: 'M',
      hooks: { MetaHookPre: 0, MetaHookPost: 0 },
      trace,
      metaPre: (hook, args) => pre.push({ hook, args }),
      metaPost: (hook, args, result) => post.push({ hook, args, result }),
    });

  beforeEach(() => {
    registry = new HookRegistry<Plugin>();
    host = stubHost(registry);
    const captured = captureLogger();
    capture = captured.capture;
    dispatcher = new HookDispatcher(registry, { logger: captured.logger });
    trace = [];
    pre = [];
    post = [];
  });

  describe('first responder', () => {
    it('asks plugins in priority order until one handles the call', () => {
      const v = new TestValue('v');
      const a = new TestPlugin({ name: 'A', hooks: { CallFunction: 5 }, trace });
      const b = new TestPlugin({
        name: 'B',
        hooks: { CallFunction: 1 },
        trace,
        callFunction: () => ({ handled: true, value: v }),
      });
      const m = new TestPlugin({
        name: 'M',
        hooks: { MetaHookPost: 0 },
        trace,
        metaPost: (hook, args, result) => post.push({ hook, args, result }),
      });
      activate(host, a, b, m);

      const outcome = dispatcher.callFunction(makeFunc('f'), null, []);

      expect(outcome.result).toEqual({ handled: true, value: v });
      expect(outcome.claimedBy).toBe(b);
      expect(trace).toEqual(['A:CallFunction', 'B:CallFunction', 'M:post:CallFunction']);
      expect(post).toHaveLength(1);
      expect(post[0].result?.asFuncResult()).toEqual({ handled: true, value: v });
      expect(describeArguments(post[0].args)).toBe('f, <null>, ()');
    });

    it('returns the first claiming LoadFile result and its plugin', () => {
      const a = new TestPlugin({ name: 'A', hooks: { LoadFile: 10 }, loadFile: () => LOAD_FILE_DECLINED });
      const b = new TestPlugin({ name: 'B', hooks: { LoadFile: 0 }, loadFile: () => LOAD_FILE_LOADED });
      activate(host, a, b);

      expect(dispatcher.loadFile('foo.zeek', 'zeek')).toEqual({ result: LOAD_FILE_LOADED, claimedBy: b });
    });

    it('treats a LoadFile failure as a claim and stops there', () => {
      const a = new TestPlugin({ name: 'A', hooks: { LoadFile: 10 }, trace, loadFile: () => LOAD_FILE_FAILED });
      const b = new TestPlugin({ name: 'B', hooks: { LoadFile: 5 }, trace, loadFile: () => LOAD_FILE_LOADED });
      activate(host, a, b, metaObserver());

      const outcome = dispatcher.loadFile('broken.zeek', 'zeek');

      expect(outcome).toEqual({ result: LOAD_FILE_FAILED, claimedBy: a });
      expect(trace).toEqual(['M:pre:LoadFile', 'A:LoadFile', 'M:post:LoadFile']);
      expect(post).toHaveLength(1);
      expect(post[0].result?.asInt()).toBe(0);
    });

    it('never reaches plugins after the one that claimed', () => {
      const p1 = new TestPlugin({ name: 'P1', hooks: { QueueEvent: 10 }, trace, queueEvent: () => true });
      const p2 = new TestPlugin({ name: 'P2', hooks: { QueueEvent: 1 }, trace, queueEvent: () => true });
      activate(host, p2, p1);

      const outcome = dispatcher.queueEvent(makeEvent('new_connection', 'c1'));

      expect(outcome).toEqual({ result: true, claimedBy: p1 });
      expect(trace).toEqual(['P1:QueueEvent']);
    });

    it('passes the file and its extension to LoadFile', () => {
      const seen: string[] = [];
      const a = new TestPlugin({
        name: 'A',
        hooks: { LoadFile: 0 },
        loadFile: (file, ext) => {
          seen.push(`${file}|${ext}`);
          return LOAD_FILE_DECLINED;
        },
      });
      activate(host, a);
      dispatcher.loadFile('x.sig', 'sig');
      expect(seen).toEqual(['x.sig|sig']);
    });
  });

  describe('meta-hooks', () => {
    it('fire with the default result when no plugin implements the hook', () => {
      activate(host, metaObserver());

      const outcome = dispatcher.loadFile('foo.zeek', 'zeek');

      expect(outcome).toEqual({ result: LOAD_FILE_DECLINED });
      expect(trace).toEqual(['M:pre:LoadFile', 'M:post:LoadFile']);
      expect(describeArguments(pre[0].args)).toBe('foo.zeek, zeek');
      expect(post[0].result?.asInt()).toBe(-1);
    });

    it('see NOT_HANDLED when nobody handles a call', () => {
      activate(host, metaObserver());
      dispatcher.callFunction(makeFunc('g'), null, [new TestValue('1')]);
      expect(post[0].result?.describe()).toBe('<no result>');
      expect(describeArguments(post[0].args)).toBe('g, <null>, (1)');
    });

    it('receive the same frozen argument list before and after', () => {
      activate(host, metaObserver());
      dispatcher.queueEvent(makeEvent('zeek_init'));
      expect(pre[0].args).toBe(post[0].args);
      expect(Object.isFrozen(pre[0].args)).toBe(true);
      expect(post[0].result?.asBool()).toBe(false);
    });

    it('run in their own priority order', () => {
      const low = new TestPlugin({ name: 'Low', hooks: { MetaHookPre: 1 }, trace });
      const high = new TestPlugin({ name: 'High', hooks: { MetaHookPre: 9 }, trace });
      activate(host, low, high);
      dispatcher.drainEvents();
      expect(trace).toEqual(['High:pre:DrainEvents', 'Low:pre:DrainEvents']);
    });
  });

  describe('broadcast', () => {
    it('runs every subscriber and reports a void result', () => {
      const a = new TestPlugin({ name: 'A', hooks: { DrainEvents: 2 }, trace });
      const b = new TestPlugin({ name: 'B', hooks: { DrainEvents: 1 }, trace });
      activate(host, b, a, metaObserver());

      dispatcher.drainEvents();

      expect(trace).toEqual(['M:pre:DrainEvents', 'A:DrainEvents', 'B:DrainEvents', 'M:post:DrainEvents']);
      expect(post[0].result?.type).toBe('void');
      expect(post[0].args).toEqual([]);
    });

    it('passes the network time', () => {
      const times: number[] = [];
      const a = new TestPlugin({
        name: 'A',
        hooks: { UpdateNetworkTime: 0 },
        updateNetworkTime: (t) => times.push(t),
      });
      activate(host, a, metaObserver());

      dispatcher.updateNetworkTime(1424.5);

      expect(times).toEqual([1424.5]);
      expect(describeArguments(pre[0].args)).toBe('1424.5');
    });

    it('passes the destroyed object by identity', () => {
      const destroyed: object[] = [];
      const a = new TestPlugin({ name: 'A', hooks: { ObjDestroy: 0 }, objDestroy: (o) => destroyed.push(o) });
      activate(host, a);
      const obj = {};

      dispatcher.objDestroy(obj);

      expect(destroyed).toHaveLength(1);
      expect(destroyed[0]).toBe(obj);
    });

    it('uses a snapshot for the pass while hooks change underneath', () => {
      const b = new TestPlugin({ name: 'B', hooks: { DrainEvents: 1 }, trace });
      const a = new TestPlugin({
        name: 'A',
        hooks: { DrainEvents: 10 },
        trace,
        drainEvents: () => b.disable('DrainEvents'),
      });
      activate(host, a, b);

      dispatcher.drainEvents();
      expect(trace).toEqual(['A:DrainEvents', 'B:DrainEvents']);

      trace.length = 0;
      dispatcher.drainEvents();
      expect(trace).toEqual(['A:DrainEvents']);
    });
  });

  describe('error isolation', () => {
    it('logs a failing plugin and moves on to the next one', () => {
      const a = new TestPlugin({
        name: 'A',
        hooks: { LoadFile: 10 },
        loadFile: () => {
          throw new Error('boom');
        },
      });
      const b = new TestPlugin({ name: 'B', hooks: { LoadFile: 0 }, loadFile: () => LOAD_FILE_LOADED });
      activate(host, a, b);

      expect(dispatcher.loadFile('foo.zeek', 'zeek')).toEqual({ result: LOAD_FILE_LOADED, claimedBy: b });

      const errors = capture.entries.filter((e) => e.level === 'error');
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('LoadFile hook of plugin "A" failed');
      expect(errors[0].error?.message).toBe('boom');
    });

    it('keeps broadcasting after a failure', () => {
      const a = new TestPlugin({
        name: 'A',
        hooks: { DrainEvents: 10 },
        trace,
        drainEvents: () => {
          throw new Error('drain failed');
        },
      });
      const b = new TestPlugin({ name: 'B', hooks: { DrainEvents: 0 }, trace });
      activate(host, a, b);

      dispatcher.drainEvents();

      expect(trace).toEqual(['A:DrainEvents', 'B:DrainEvents']);
    });

    it('always propagates contract violations', () => {
      const a = new TestPlugin({
        name: 'A',
        hooks: { LoadFile: 0 },
        loadFile: () => {
          throw new ContractViolationError('misuse');
        },
      });
      activate(host, a);
      expect(() => dispatcher.loadFile('foo.zeek', 'zeek')).toThrow(ContractViolationError);
    });

    it('propagates everything when isolation is off', () => {
      const strict = new HookDispatcher(registry, { isolateErrors: false, logger: captureLogger().logger });
      const a = new TestPlugin({
        name: 'A',
        hooks: { QueueEvent: 0 },
        queueEvent: () => {
          throw new Error('boom');
        },
      });
      activate(host, a);
      expect(() => strict.queueEvent(makeEvent('e'))).toThrow('boom');
    });
  });

  describe('stats', () => {
    it('counts dispatched occurrences per hook', () => {
      dispatcher.loadFile('a.zeek', 'zeek');
      dispatcher.loadFile('b.zeek', 'zeek');
      dispatcher.drainEvents();

      const stats = dispatcher.stats();
      expect(stats.get('LoadFile')).toBe(2);
      expect(stats.get('DrainEvents')).toBe(1);
      expect(stats.get('CallFunction')).toBe(0);
    });
  });
});
