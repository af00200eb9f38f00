/**
 * Ambient declarations every fragment compiles against. They describe what
 * the session context binds at run time.
 */
export const PRELUDE_FILE = 'session.d.ts';

export const PRELUDE = `interface SessionSlots {
  [name: string]: any;
  get _(): any;
  set _(value: {} | null | undefined);
}

declare const V: SessionSlots;

declare function print(...values: unknown[]): void;
declare function printl(values: Iterable<unknown>): void;
declare function dumpl(values: Iterable<unknown>): void;
declare function meta(subject?: unknown, pattern?: string): void;
declare function minfo(subject?: unknown, member?: string): void;
declare function include(file: string): boolean;

declare var console: {
  log(...values: unknown[]): void;
  info(...values: unknown[]): void;
  debug(...values: unknown[]): void;
  warn(...values: unknown[]): void;
  error(...values: unknown[]): void;
  dir(value: unknown): void;
};
declare var require: (id: string) => any;
declare var process: any;
declare var Buffer: any;
declare var URL: any;
declare var URLSearchParams: any;
declare var TextEncoder: any;
declare var TextDecoder: any;

declare function setTimeout(callback: (...args: any[]) => void, delay?: number, ...args: any[]): any;
declare function setInterval(callback: (...args: any[]) => void, delay?: number, ...args: any[]): any;
declare function clearTimeout(id: any): void;
declare function clearInterval(id: any): void;
declare function setImmediate(callback: (...args: any[]) => void, ...args: any[]): any;
declare function clearImmediate(id: any): void;
declare function queueMicrotask(callback: () => void): void;
`;
