import { inspect } from 'util';
import type { ConsoleHost } from '@core/types/console';
import type { TypeNamer } from '@interpreter/types/TypeNamer';

export const ELISION = '.....';
export const NULL_ITEM = '<null>';

type ConsoleBounds = Pick<ConsoleHost, 'getLineWidth' | 'getMaxLineCount'>;

/**
 * Renders values the way the session prints them.
 */
export class ValueFormatter {
  constructor(
    private readonly namer: TypeNamer,
    private readonly bounds: ConsoleBounds
  ) {}

  /**
   * The text shown after a fragment produces a value: a type label, then the
   * value inline, or on following lines for sequences.
   */
  display(value: unknown): string {
    if (value === null) {
      return 'null\n';
    }
    if (value === undefined) {
      return 'undefined\n';
    }

    const label = `(${this.label(value)})`;
    if (typeof value === 'string') {
      return `${label} '${value}'\n`;
    }
    if (isIterable(value)) {
      return `${label}\n${this.dumpl(value)}`;
    }
    return `${label} ${this.inline(value)}\n`;
  }

  label(value: unknown): string {
    return this.namer.castName(value) ?? this.namer.displayName(value);
  }

  /**
   * `{a,b,c}` wrapped at the console width. After the console's line limit
   * the rest is elided.
   */
  dumpl(values: Iterable<unknown>): string {
    const width = this.bounds.getLineWidth();
    const maxLines = this.bounds.getMaxLineCount() - 1;
    let out = '{';
    let line = '';
    let lines = 0;
    let first = true;

    for (const item of values) {
      if (first) {
        first = false;
      } else {
        line += ',';
      }
      const text = this.item(item);
      if (line.length + text.length >= width) {
        if (line.length > 0) {
          out += line + '\n';
          line = '';
        }
        if (++lines > maxLines) {
          line += ELISION;
          break;
        }
      }
      line += text;
    }

    return out + line + '}\n';
  }

  /** Every item followed by a space, then a line break */
  printl(values: Iterable<unknown>): string {
    let out = '';
    for (const item of values) {
      out += (item === null || item === undefined ? NULL_ITEM : this.inline(item)) + ' ';
    }
    return out + '\n';
  }

  /**
   * Single-line rendering. Objects with their own `toString` use it; others
   * are inspected one level deep.
   */
  inline(value: unknown): string {
    if (typeof value === 'string') {
      return value;
    }
    if (typeof value === 'function') {
      return inspect(value);
    }
    if (typeof value === 'object' && value !== null && !hasCustomToString(value)) {
      return inspect(value, { depth: 0, breakLength: Infinity });
    }
    return String(value);
  }

  private item(item: unknown): string {
    if (item === null || item === undefined) {
      return NULL_ITEM;
    }
    if (typeof item === 'string') {
      return `"${item}"`;
    }
    return this.inline(item);
  }
}

export function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return typeof Reflect.get(value, Symbol.iterator) === 'function';
}

// The root prototype's toString, from whichever realm, does not count
function hasCustomToString(value: object): boolean {
  let owner: unknown = value;
  while (typeof owner === 'object' && owner !== null) {
    if (Object.prototype.hasOwnProperty.call(owner, 'toString')) {
      return Object.getPrototypeOf(owner) !== null;
    }
    owner = Object.getPrototypeOf(owner);
  }
  return false;
}
