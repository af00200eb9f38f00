import { describe, it, expect, beforeEach } from 'vitest';
import { ValueFormatter, isIterable } from './ValueFormatter';
import { TypeNamer } from '@interpreter/types/TypeNamer';
import { TypeResolver } from '@interpreter/types/TypeResolver';
import type { ReflectionHost } from '@core/types/reflection';

class Point {
  toString() {
    return 'P(1,2)';
  }
}

describe('ValueFormatter', () => {
  let width: number;
  let lines: number;
  let formatter: ValueFormatter;

  beforeEach(() => {
    width = 80;
    lines = 20;
    const host: ReflectionHost = { globalScope: () => globalThis, loadedUnits: () => [] };
    const resolver = new TypeResolver(host);
    formatter = new ValueFormatter(new TypeNamer(resolver), {
      getLineWidth: () => width,
      getMaxLineCount: () => lines
    });
  });

  describe('display', () => {
    it('should label numbers and strings', () => {
      expect(formatter.display(4)).toBe('(number) 4\n');
      expect(formatter.display('hi')).toBe("(string) 'hi'\n");
      expect(formatter.display(true)).toBe('(boolean) true\n');
    });

    it('should show absent values bare', () => {
      expect(formatter.display(null)).toBe('null\n');
      expect(formatter.display(undefined)).toBe('undefined\n');
    });

    it('should dump sequences on the next line', () => {
      expect(formatter.display([1, 2, 3])).toBe('(any[])\n{1,2,3}\n');
      expect(formatter.display(new Map([['a', 1]]))).toBe('(Map<any, any>)\n{a,1}\n');
    });

    it('should inspect plain objects and use custom toString', () => {
      expect(formatter.display({ a: 1 })).toBe('(Object) { a: 1 }\n');
      expect(formatter.display(new Point())).toBe('(Point) P(1,2)\n');
    });
  });

  describe('dumpl', () => {
    it('should quote strings and mark absent items', () => {
      expect(formatter.dumpl(['a', null, 2])).toBe('{"a",<null>,2}\n');
    });

    it('should wrap at the line width and elide after the line limit', () => {
      width = 10;
      lines = 3;
      expect(formatter.dumpl(['aaaa', 'bbbb', 'cccc', 'dddd', 'eeee'])).toBe(
        '{"aaaa",\n"bbbb",\n"cccc",\n.....}\n'
      );
    });

    it('should render an empty sequence', () => {
      expect(formatter.dumpl([])).toBe('{}\n');
    });
  });

  describe('printl', () => {
    it('should follow every item with a space', () => {
      expect(formatter.printl([1, null, 'x'])).toBe('1 <null> x \n');
    });
  });

  describe('inline', () => {
    it('should name functions', () => {
      function area() {
        return 0;
      }
      expect(formatter.inline(area)).toBe('[Function: area]');
    });

    it('should stringify primitives', () => {
      expect(formatter.inline(10n)).toBe('10');
      expect(formatter.inline('text')).toBe('text');
    });
  });

  it('should recognise iterables but not strings', () => {
    expect(isIterable(new Set())).toBe(true);
    expect(isIterable('abc')).toBe(false);
    expect(isIterable({})).toBe(false);
  });
});
