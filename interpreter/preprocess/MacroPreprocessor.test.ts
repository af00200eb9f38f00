import { describe, it, expect, beforeEach } from 'vitest';
import { MacroPreprocessor, parseDefinition, splitArguments } from './MacroPreprocessor';
import { MacroTable } from './MacroTable';
import { MalformedMacroCallError, MacroExpansionLimitError, BADLY_FORMED_MACRO_CALL } from '@core/errors';

describe('MacroPreprocessor', () => {
  let preprocessor: MacroPreprocessor;

  const define = (line: string) => {
    const result = preprocessor.processLine(line);
    expect(result.kind).toBe('defined');
  };

  beforeEach(() => {
    preprocessor = new MacroPreprocessor(new MacroTable());
  });

  describe('definitions', () => {
    it('should register a parameterized macro and yield nothing to compile', () => {
      const result = preprocessor.processLine('#def SQ(a) ((a)*(a))');

      expect(result).toEqual({
        kind: 'defined',
        entry: { name: 'SQ', template: '((a)*(a))', params: ['a'] }
      });
      expect(preprocessor.macros.lookup('SQ')?.params).toEqual(['a']);
    });

    it('should register an unparameterized macro', () => {
      define('#def PI 3.14159');
      expect(preprocessor.macros.lookup('PI')).toEqual({ name: 'PI', template: '3.14159', params: null });
    });

    it('should accept an empty parameter list', () => {
      expect(parseDefinition('#def NOW() Date.now()')).toEqual({
        name: 'NOW',
        template: 'Date.now()',
        params: []
      });
    });

    it('should overwrite an earlier definition', () => {
      define('#def N 1');
      define('#def N 2');
      expect(preprocessor.expand('N')).toBe('2');
    });

    it('should treat a definition without a template as code', () => {
      expect(parseDefinition('#def X')).toBeUndefined();
      expect(parseDefinition('#def F(a)')).toBeUndefined();
      expect(preprocessor.processLine('#def X')).toEqual({ kind: 'code', text: '#def X' });
    });
  });

  describe('expansion', () => {
    it('should expand a parameterized macro', () => {
      define('#def SQ(a) ((a)*(a))');
      expect(preprocessor.processLine('SQ(3+1)')).toEqual({ kind: 'code', text: '((3+1)*(3+1))' });
    });

    it('should expand unparameterized macros only as whole identifiers', () => {
      define('#def PI 3.14');
      expect(preprocessor.expand('PI*2 + xPI + PI2')).toBe('3.14*2 + xPI + PI2');
    });

    it('should leave a parameterized macro without an argument list alone', () => {
      define('#def SQ(a) ((a)*(a))');
      expect(preprocessor.expand('SQ + 1')).toBe('SQ + 1');
    });

    it('should allow whitespace between the name and the argument list', () => {
      define('#def SQ(a) ((a)*(a))');
      expect(preprocessor.expand('SQ (2)')).toBe('((2)*(2))');
    });

    it('should not split on commas nested in brackets or braces', () => {
      define('#def FIRST(a, b) a');
      expect(preprocessor.expand('FIRST([1,2], {x:1,y:2})')).toBe('[1,2]');
    });

    it('should rescan inserted text so macros may produce macros', () => {
      define('#def A B + B');
      define('#def B 7');
      expect(preprocessor.expand('A')).toBe('7 + 7');
    });

    it('should expand nested calls in the arguments', () => {
      define('#def SQ(a) ((a)*(a))');
      expect(preprocessor.expand('SQ(SQ(2))')).toBe('((((2)*(2)))*(((2)*(2))))');
    });

    it('should substitute missing actuals with empty text', () => {
      define('#def PAIR(a, b) [a, b]');
      expect(preprocessor.expand('PAIR(1)')).toBe('[1, ]');
    });

    it('should substitute parameters that follow a sigil', () => {
      define('#def INC(v) $v = $v + 1');
      expect(preprocessor.expand('INC(count)')).toBe('$count = $count + 1');
    });

    it('should leave text without macro names unchanged', () => {
      define('#def SQ(a) ((a)*(a))');
      const text = 'foo(bar, [1,2]) + { a: "b" }';
      expect(preprocessor.expand(text)).toBe(text);
      expect(preprocessor.expand(preprocessor.expand(text))).toBe(text);
    });
  });

  describe('markers', () => {
    it('should stringize an argument with a single marker', () => {
      define('#def STR(x) #x');
      expect(preprocessor.expand('STR(f(1, 2) + [3])')).toBe('"f(1, 2) + [3]"');
    });

    it('should paste tokens with a doubled marker', () => {
      define('#def CAT(a,b) a##b');
      expect(preprocessor.expand('CAT(foo,bar)')).toBe('foobar');
    });

    it('should strip every marker from the template', () => {
      define('#def SHOW(x) print(#x, x)');
      expect(preprocessor.expand('SHOW(1+1)')).toBe('print("1+1", 1+1)');
    });
  });

  describe('errors', () => {
    it('should reject an argument list that never closes', () => {
      define('#def SQ(a) ((a)*(a))');
      expect(() => preprocessor.expand('SQ(1')).toThrow(MalformedMacroCallError);
      expect(() => preprocessor.expand('SQ(1')).toThrow(BADLY_FORMED_MACRO_CALL);
    });

    it('should stop a self-referential macro', () => {
      define('#def X X');
      expect(() => preprocessor.expand('X')).toThrow(MacroExpansionLimitError);
    });
  });
});

describe('splitArguments', () => {
  it('should report where the group ends', () => {
    expect(splitArguments('f(a, (b, c)) + 1', 1)).toEqual({ actuals: ['a', ' (b, c)'], end: 12 });
  });

  it('should return undefined for an open group', () => {
    expect(splitArguments('f(a, [b)', 1)).toBeUndefined();
  });
});
