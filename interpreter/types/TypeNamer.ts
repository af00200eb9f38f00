import { isConstructor, type RuntimeConstructor, type TypeDescriptor } from '@core/types/reflection';
import type { TypeResolver } from './TypeResolver';

/** Built-ins whose type parameters must be spelled out in a cast */
const GENERIC_ARITY: Readonly<Record<string, number>> = {
  Map: 2,
  WeakMap: 2,
  Set: 1,
  WeakSet: 1,
  Promise: 1,
  WeakRef: 1
};

// Accepted by name when the value comes from another realm
const INTRINSICS = new Set([
  'Map', 'Set', 'WeakMap', 'WeakSet', 'WeakRef', 'Promise', 'Date', 'RegExp',
  'Error', 'TypeError', 'RangeError', 'SyntaxError', 'ReferenceError',
  'ArrayBuffer', 'DataView', 'Uint8Array', 'Int32Array', 'Float64Array'
]);

export type CastFilter = (descriptor: TypeDescriptor) => boolean;

/**
 * Names runtime values the way fragments see them: `castName` gives the type a
 * slot lookup is cast to (or nothing), `displayName` the label printed beside a
 * result.
 */
export class TypeNamer {
  constructor(
    private readonly resolver: TypeResolver,
    private readonly isCastable: CastFilter = () => true
  ) {}

  castName(value: unknown): string | undefined {
    switch (typeof value) {
      case 'number':
      case 'string':
      case 'boolean':
      case 'bigint':
      case 'symbol':
        return typeof value;
      case 'object':
        if (value === null) return undefined;
        if (Array.isArray(value)) return 'any[]';
        return this.publicTypeName(value);
      default:
        return undefined;
    }
  }

  displayName(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value === 'function') return 'Function';
    if (typeof value !== 'object') return typeof value;
    return constructorOf(value)?.name || 'Object';
  }

  /**
   * Walks the prototype chain for the nearest constructor the resolver maps
   * back to the same constructor. Plain objects never get a cast.
   */
  private publicTypeName(value: object): string | undefined {
    let prototype: unknown = Object.getPrototypeOf(value);

    while (typeof prototype === 'object' && prototype !== null) {
      const ctor = ownConstructor(prototype);
      if (!ctor || ctor.name === 'Object') {
        return undefined;
      }
      const descriptor = ctor.name ? this.resolver.resolve(ctor.name) : undefined;
      if (descriptor && this.matches(descriptor, ctor) && this.isCastable(descriptor)) {
        return withTypeArguments(descriptor.name, ctor.name);
      }
      prototype = Object.getPrototypeOf(prototype);
    }

    return undefined;
  }

  private matches(descriptor: TypeDescriptor, ctor: RuntimeConstructor): boolean {
    if (descriptor.ctor === ctor) {
      return true;
    }
    return descriptor.origin === 'global' && INTRINSICS.has(ctor.name) && descriptor.name === ctor.name;
  }
}

function ownConstructor(prototype: object): RuntimeConstructor | undefined {
  const ctor: unknown = Object.getOwnPropertyDescriptor(prototype, 'constructor')?.value;
  return isConstructor(ctor) ? ctor : undefined;
}

/** Nearest constructor on the prototype chain; primitives use their wrapper's */
export function constructorOf(value: unknown): RuntimeConstructor | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  let prototype: unknown = Object.getPrototypeOf(value);
  while (typeof prototype === 'object' && prototype !== null) {
    const ctor = ownConstructor(prototype);
    if (ctor) return ctor;
    prototype = Object.getPrototypeOf(prototype);
  }
  return undefined;
}

function withTypeArguments(qualified: string, simpleName: string): string {
  const arity = GENERIC_ARITY[simpleName];
  if (!arity) {
    return qualified;
  }
  return `${qualified}<${Array(arity).fill('any').join(', ')}>`;
}
