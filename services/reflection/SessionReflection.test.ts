import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionReflection } from './SessionReflection';
import { parameterNames } from './parameters';
import { SessionContext } from '@interpreter/env/SessionContext';

class Shape {
  static unit = 'cm';
  static create(kind: string, size = 1) {
    return `${kind}:${size}`;
  }
  get area() {
    return 0;
  }
  set area(_value: number) {}
  scale(factor: number) {
    return factor;
  }
}

class Square extends Shape {
  side = 2;
  scale(factor: number) {
    return factor * this.side;
  }
}

describe('SessionReflection', () => {
  let context: SessionContext;
  let reflection: SessionReflection;

  beforeEach(() => {
    context = new SessionContext(() => undefined);
    reflection = new SessionReflection(context);
  });

  afterEach(() => {
    context.cleanup();
  });

  describe('units', () => {
    it('should keep units in load order', () => {
      reflection.addUnit({ name: 'os', kind: 'reference', exports: {} });
      reflection.addUnit({ name: 'Unit1', kind: 'function', exports: {} });

      expect(reflection.loadedUnits().map(unit => unit.name)).toEqual(['os', 'Unit1']);
      expect(reflection.findUnit('Unit1')?.kind).toBe('function');
    });

    it('should expose the context global scope', () => {
      expect(Reflect.get(reflection.globalScope(), 'Map')).toBe(context.evaluate('Map'));
    });
  });

  describe('isCastable', () => {
    it('should accept built-ins and refuse host globals', () => {
      expect(reflection.isCastable({ name: 'Map', ctor: Map, origin: 'global' })).toBe(true);
      expect(reflection.isCastable({ name: 'URL', ctor: URL, origin: 'global' })).toBe(false);
    });

    it('should accept only function units', () => {
      reflection.addUnit({ name: 'events', kind: 'reference', exports: {} });
      reflection.addUnit({ name: 'Unit1', kind: 'function', exports: {} });

      expect(reflection.isCastable({ name: 'EventEmitter', ctor: Shape, origin: 'unit', unit: 'events' })).toBe(false);
      expect(reflection.isCastable({ name: 'Unit1', ctor: Shape, origin: 'unit', unit: 'Unit1' })).toBe(true);
    });
  });

  describe('members', () => {
    it('should list own fields before inherited methods', () => {
      const members = reflection.members(new Square(), 'instance');
      const names = members.map(member => member.rawName);

      expect(names.slice(0, 3)).toEqual(['side', 'constructor', 'scale']);
      expect(names).toContain('get area');
      expect(names).toContain('set area');
      expect(names).toContain('hasOwnProperty');
    });

    it('should mark prototype methods as virtual and own fields as not', () => {
      const members = reflection.members(new Square(), 'instance');
      const side = members.find(member => member.name === 'side');
      const scale = members.find(member => member.name === 'scale');

      expect(side).toEqual({ kind: 'field', name: 'side', rawName: 'side', isStatic: false, value: 2 });
      expect(scale).toEqual({
        kind: 'method',
        name: 'scale',
        rawName: 'scale',
        isStatic: false,
        isVirtual: true,
        params: ['factor']
      });
    });

    it('should list inherited statics without function internals', () => {
      const names = reflection.members(Square, 'static').map(member => member.name);
      expect([...names].sort()).toEqual(['create', 'unit']);
    });

    it('should walk the prototype of primitives', () => {
      const names = reflection.members(5, 'instance').map(member => member.name);
      expect(names).toContain('toFixed');
    });

    it('should give nothing for null', () => {
      expect(reflection.members(null, 'instance')).toEqual([]);
      expect(reflection.members({}, 'static')).toEqual([]);
    });
  });
});

describe('parameterNames', () => {
  it('should read names and drop defaults', () => {
    expect(parameterNames(Shape.create)).toEqual(['kind', 'size']);
  });

  it('should read arrow functions', () => {
    expect(parameterNames((a: number, b: number) => a + b)).toEqual(['a', 'b']);
  });

  it('should keep rest and destructured parameters', () => {
    function sample({ a, b }: { a: number; b: number }, ...rest: number[]) {
      return a + b + rest.length;
    }
    expect(parameterNames(sample)).toEqual(['{ a, b }', '...rest']);
  });

  it('should fall back to arity for native functions', () => {
    expect(parameterNames(Math.max)).toEqual(['arg0', 'arg1']);
  });
});
