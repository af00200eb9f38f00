import * as vm from 'vm';
import * as path from 'path';
import { createRequire } from 'module';
import { format } from 'util';
import { ExecutionError } from '@core/errors/ExecutionError';
import { sessionLogger as logger } from '@core/utils/logger';

type DeferredCallback = (...args: unknown[]) => void;

export type OutputWriter = (text: string) => void;

/**
 * The vm context session code runs in.
 *
 * Host objects (console shim, require, process, timers) are injected once; the
 * session adds `V`, its utilities and namespace members through `bind`.
 * Callbacks scheduled by session code run after the fragment has returned, so
 * what they throw is written to the session instead of reaching the process.
 */
export class SessionContext {
  private context: vm.Context;
  private sandbox: Record<string, unknown>;
  private scope?: object;
  private readonly injected = new Set<string>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private cleanedUp = false;
  private readonly load: NodeRequire;
  readonly basePath: string;

  constructor(private readonly write: OutputWriter, basePath: string = process.cwd()) {
    this.basePath = basePath;
    this.load = createRequire(path.join(basePath, 'session.js'));
    this.sandbox = {};
    this.context = vm.createContext(this.sandbox);

    const hostGlobals: Record<string, unknown> = {
      console: this.createConsole(),
      require: this.load,
      process,
      Buffer,
      setTimeout: (callback: DeferredCallback, delay?: number, ...args: unknown[]) =>
        this.schedule(false, callback, delay, args),
      setInterval: (callback: DeferredCallback, delay?: number, ...args: unknown[]) =>
        this.schedule(true, callback, delay, args),
      clearTimeout: (id?: NodeJS.Timeout) => this.cancel(id),
      clearInterval: (id?: NodeJS.Timeout) => this.cancel(id),
      setImmediate: (callback: DeferredCallback, ...args: unknown[]) => setImmediate(this.guard(callback), ...args),
      clearImmediate,
      queueMicrotask: (callback: () => void) => queueMicrotask(this.guard(callback)),
      URL,
      URLSearchParams,
      TextEncoder,
      TextDecoder
    };
    for (const [name, value] of Object.entries(hostGlobals)) {
      this.bind(name, value);
    }
  }

  /** Writes what deferred session code threw, the way a fragment's failure reads */
  reportFailure(thrown: unknown): void {
    const error = new ExecutionError(thrown);
    logger.debug('Deferred session code threw', { kind: error.kind });
    this.write(`${error.message}\n`);
  }

  /**
   * Runs a script and returns its completion value.
   */
  runScript(code: string, filename: string): unknown {
    if (this.cleanedUp) {
      throw new Error('Session context has been cleaned up');
    }
    const script = new vm.Script(code, { filename });
    return script.runInContext(this.context);
  }

  /** Evaluates an expression against the context's global scope */
  evaluate(expression: string): unknown {
    return this.runScript(expression, 'evaluate.js');
  }

  bind(name: string, value: unknown): void {
    this.sandbox[name] = value;
    this.injected.add(name);
  }

  /** Names injected by the host rather than defined by the language */
  isHostGlobal(name: string): boolean {
    return this.injected.has(name);
  }

  /** Whether `name` already reads as a global inside the context */
  isGlobal(name: string): boolean {
    return Reflect.has(this.globalScope(), name);
  }

  /**
   * The context's global object: built-ins of the context's own realm plus
   * everything bound into it.
   */
  globalScope(): object {
    if (!this.scope) {
      const scope: unknown = vm.runInContext('globalThis', this.context);
      this.scope = typeof scope === 'object' && scope !== null ? scope : this.sandbox;
    }
    return this.scope;
  }

  /** Loads a module the way `require` inside the session would */
  requireModule(specifier: string): unknown {
    return this.load(specifier);
  }

  /**
   * Clears pending timers and drops the context. The context cannot run code
   * afterwards.
   */
  cleanup(): void {
    this.cleanedUp = true;

    // clearTimeout cancels intervals as well
    for (const id of this.timers) {
      clearTimeout(id);
    }
    this.timers.clear();

    this.injected.clear();
    this.scope = undefined;
    this.sandbox = {};
    this.context = vm.createContext(this.sandbox);
    logger.debug('Session context cleaned up');
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  private schedule(
    repeat: boolean,
    callback: DeferredCallback,
    delay: number | undefined,
    args: unknown[]
  ): NodeJS.Timeout {
    const run = this.guard(callback);
    const id: NodeJS.Timeout = repeat
      ? setInterval(run, delay, ...args)
      : setTimeout(() => {
          this.timers.delete(id);
          run(...args);
        }, delay);
    this.timers.add(id);
    return id;
  }

  private cancel(id: NodeJS.Timeout | undefined): void {
    if (id === undefined) {
      return;
    }
    this.timers.delete(id);
    clearTimeout(id);
  }

  private guard<A extends unknown[]>(callback: (...args: A) => void): (...args: A) => void {
    return (...args: A) => {
      try {
        callback(...args);
      } catch (thrown) {
        this.reportFailure(thrown);
      }
    };
  }

  private createConsole(): Record<string, (...args: unknown[]) => void> {
    const print = (...args: unknown[]) => this.write(format(...args) + '\n');
    return {
      log: print,
      info: print,
      debug: print,
      warn: print,
      error: print,
      dir: (value: unknown) => this.write(format('%O', value) + '\n')
    };
  }
}
