import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionContext } from './SessionContext';

describe('SessionContext', () => {
  let output: string;
  let context: SessionContext;

  beforeEach(() => {
    output = '';
    context = new SessionContext(text => {
      output += text;
    });
  });

  afterEach(() => {
    context.cleanup();
  });

  describe('running code', () => {
    it('should return the completion value of a script', () => {
      expect(context.runScript('1 + 2', 'sum.js')).toBe(3);
    });

    it('should expose bound values as globals', () => {
      context.bind('answer', 42);
      expect(context.evaluate('answer * 2')).toBe(84);
    });

    it('should keep class declarations between scripts', () => {
      context.runScript('class Unit1 { _f() { return 7; } }', 'Unit1.js');
      const ctor = context.evaluate('Unit1');
      expect(typeof ctor).toBe('function');
      expect(context.evaluate('new Unit1()._f()')).toBe(7);
    });

    it('should route console output to the writer', () => {
      context.runScript('console.log("total: %d", 3); console.error("oops")', 'log.js');
      expect(output).toBe('total: 3\noops\n');
    });

    it('should load modules relative to the base path', () => {
      expect(context.evaluate('require("path").join("a", "b")')).toBe('a/b');
    });
  });

  describe('globals', () => {
    it('should tell injected names from built-ins', () => {
      context.bind('V', {});
      expect(context.isHostGlobal('V')).toBe(true);
      expect(context.isHostGlobal('process')).toBe(true);
      expect(context.isHostGlobal('Map')).toBe(false);
      expect(context.isGlobal('Map')).toBe(true);
      expect(context.isGlobal('nothingHere')).toBe(false);
    });

    it('should see built-ins of its own realm through the global scope', () => {
      const scope = context.globalScope();
      const contextMap = context.evaluate('Map');
      expect(Reflect.get(scope, 'Map')).toBe(contextMap);
      expect(contextMap).not.toBe(Map);
    });
  });

  describe('deferred callbacks', () => {
    const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

    it('should report what a timer callback throws', async () => {
      context.runScript('setTimeout(() => { throw new Error("late"); }, 0);', 'late.js');
      await sleep(20);

      expect(output).toBe('Error was thrown: late\n');
      expect(context.pendingTimers).toBe(0);
    });

    it('should keep an interval running after its callback throws', async () => {
      context.bind('ticks', { count: 0 });
      context.runScript(
        'setInterval(() => { ticks.count++; throw new RangeError("tick " + ticks.count); }, 5);',
        'tick.js'
      );
      await sleep(60);

      expect(output.startsWith('RangeError was thrown: tick 1\nRangeError was thrown: tick 2\n')).toBe(true);
      expect(context.pendingTimers).toBe(1);
    });

    it('should report what a microtask or immediate throws', async () => {
      context.runScript('queueMicrotask(() => { throw new TypeError("soon"); });', 'micro.js');
      context.runScript('setImmediate(() => { throw "plain"; });', 'immediate.js');
      await sleep(10);

      expect(output).toBe('TypeError was thrown: soon\nstring was thrown: plain\n');
    });

    it('should pass arguments through to the callback', async () => {
      context.runScript('setTimeout((a, b) => console.log(a + b), 0, 2, 3);', 'args.js');
      await sleep(20);

      expect(output).toBe('5\n');
    });

    it('should cancel a cleared timer', async () => {
      context.runScript('const id = setTimeout(() => console.log("never"), 5); clearTimeout(id);', 'clear.js');
      expect(context.pendingTimers).toBe(0);
      await sleep(20);

      expect(output).toBe('');
    });
  });

  describe('cleanup', () => {
    it('should clear pending timers', () => {
      context.runScript('setTimeout(() => {}, 1000); setInterval(() => {}, 1000);', 'timers.js');
      expect(context.pendingTimers).toBe(2);

      context.cleanup();
      expect(context.pendingTimers).toBe(0);
    });

    it('should stop timers from firing after cleanup', async () => {
      context.bind('hits', { count: 0 });
      context.runScript('setTimeout(() => { hits.count++; }, 10);', 'timer.js');
      const hits = context.evaluate('hits');

      context.cleanup();
      await new Promise(resolve => setTimeout(resolve, 30));

      expect(hits).toEqual({ count: 0 });
    });

    it('should refuse to run code after cleanup', () => {
      context.cleanup();
      expect(() => context.evaluate('1')).toThrow('Session context has been cleaned up');
    });
  });
});
