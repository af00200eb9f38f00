import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mock } from 'vitest-mock-extended';
import { MetaService } from './MetaService';
import { completeFrom, longestCommonPrefix } from './completion';
import { TypeResolver } from '@interpreter/types/TypeResolver';
import { TypeNamer } from '@interpreter/types/TypeNamer';
import { SessionContext } from '@interpreter/env/SessionContext';
import { SessionReflection } from '@services/reflection/SessionReflection';
import { TypeResolutionError } from '@core/errors';
import type { MemberInfo, MemberReflector } from '@core/types/reflection';

class Gauge {
  static zero = 0;
  static of(level: number) {
    return new Gauge(level);
  }
  reading = 0;
  constructor(public level: number) {}
  get Label() {
    return 'g';
  }
  reset() {
    this.level = 0;
  }
  read(unit: string, precision = 2) {
    return `${this.level.toFixed(precision)}${unit}`;
  }
  __internal() {}
}

describe('MetaService', () => {
  let context: SessionContext;
  let reflection: SessionReflection;
  let resolver: TypeResolver;
  let meta: MetaService;

  beforeEach(() => {
    context = new SessionContext(() => undefined);
    reflection = new SessionReflection(context);
    reflection.addUnit({ name: 'Unit1', kind: 'function', exports: { Gauge } });
    resolver = new TypeResolver(reflection);
    meta = new MetaService(resolver, reflection, new TypeNamer(resolver));
  });

  afterEach(() => {
    context.cleanup();
  });

  describe('listMembers', () => {
    it('should list instance members of a value without internals', () => {
      const names = meta.listMembers(new Gauge(1), '^(l|r)');
      expect(names).toEqual(['Label', 'level', 'read', 'reading', 'reset']);
    });

    it('should list static members of a constructor', () => {
      expect(meta.listMembers(Gauge)).toEqual(['of', 'zero']);
    });

    it('should remember the queried type for the next call', () => {
      meta.listMembers(new Gauge(1));
      expect(meta.lastQueriedType).toBe(Gauge);
      expect(meta.listMembers()).toEqual(['of', 'zero']);
    });

    it('should give nothing before any type was queried', () => {
      expect(meta.listMembers()).toBeUndefined();
    });

    it('should give nothing when the pattern matches no member', () => {
      expect(meta.listMembers(Gauge, 'xyz')).toBeUndefined();
    });

    it('should match the pattern against raw accessor names', () => {
      expect(meta.listMembers(new Gauge(1), '^get ')).toEqual(['Label']);
    });
  });

  describe('ordering', () => {
    const member = (name: string, rawName = name): MemberInfo => ({
      kind: 'field',
      name,
      rawName,
      isStatic: false,
      value: 0
    });

    it('should sort case-insensitively, keep case variants and drop exact duplicates', () => {
      const reflector = mock<MemberReflector>();
      reflector.members.mockReturnValue([
        member('beta'),
        member('Alpha'),
        member('alpha'),
        member('size', 'get size'),
        member('size', 'set size'),
        member('Alpha')
      ]);
      const service = new MetaService(resolver, reflector, new TypeNamer(resolver));

      expect(service.listMembers({})).toEqual(['Alpha', 'alpha', 'Alpha', 'beta', 'size']);
    });
  });

  describe('describeMember', () => {
    it('should render method signatures with their qualifiers', () => {
      expect(meta.describeMember(new Gauge(1), 'read')).toEqual(['virtual read(unit, precision)']);
      expect(meta.describeMember(Gauge, 'of')).toEqual(['static of(level)']);
    });

    it('should render accessors and fields', () => {
      expect(meta.describeMember(new Gauge(1), 'Label')).toEqual(['get Label()']);
      expect(meta.describeMember(new Gauge(1), 'level')).toEqual(['level: number']);
      expect(meta.describeMember(Gauge, 'zero')).toEqual(['static zero: number']);
    });

    it('should resolve a type name', () => {
      expect(meta.describeMember('Gauge', 'reset')).toEqual(['virtual reset()']);
      expect(meta.lastQueriedType).toBe(Gauge);
    });

    it('should throw for a name that is not a type', () => {
      expect(() => meta.describeMember('NoSuchType', 'x')).toThrow(TypeResolutionError);
      expect(() => meta.describeMember('NoSuchType', 'x')).toThrow("'NoSuchType' is not a type");
    });
  });

  describe('listMethods', () => {
    it('should put five method names on a line', () => {
      const lines = meta.listMethods('Gauge');
      const names = lines.join(' ').split(' ');

      expect(lines[0].startsWith('reset read ')).toBe(true);
      expect(lines.every(line => line.split(' ').length <= 5)).toBe(true);
      expect(names).toContain('toString');
      expect(names).toContain('of');
      expect(names).not.toContain('constructor');
      expect(names).not.toContain('__internal');
      expect(names).not.toContain('Label');
    });

    it('should give nothing without a subject or a previous query', () => {
      expect(meta.listMethods()).toEqual([]);
    });
  });

  describe('complete', () => {
    it('should complete a unique member', () => {
      expect(meta.complete('$g.res', new Gauge(1)).text).toBe('$g.reset');
    });

    it('should extend to the common prefix of several members', () => {
      const completion = meta.complete('$g.rea', new Gauge(1));
      expect(completion.matches).toEqual(['read', 'reading']);
      expect(completion.text).toBe('$g.read');
    });

    it('should not change the last queried type', () => {
      meta.complete('x', new Gauge(1));
      expect(meta.lastQueriedType).toBeUndefined();
    });
  });
});

describe('completion helpers', () => {
  it('should find the longest common prefix', () => {
    expect(longestCommonPrefix(['toFixed', 'toString', 'toLocaleString'])).toBe('to');
    expect(longestCommonPrefix([])).toBe('');
  });

  it('should leave the input alone without matches', () => {
    expect(completeFrom('abc.zz', ['a', 'b'])).toEqual({ prefix: 'zz', matches: [], text: 'abc.zz' });
  });
});
