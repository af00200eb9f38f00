/**
 * Runtime view of types and loaded code, as seen by the type resolver and the
 * introspection service.
 */

export type RuntimeConstructor = abstract new (...args: never[]) => unknown;

/**
 * A resolved type. `name` is the fully qualified name it was found under;
 * `unit` names the loaded unit that supplied it, when it was not found in the
 * global scope.
 */
export type TypeDescriptor =
  | { name: string; ctor: RuntimeConstructor; origin: 'global' }
  | { name: string; ctor: RuntimeConstructor; origin: 'unit'; unit: string };

/**
 * A module added by reference, or a persisted function unit.
 * `exports` is whatever the module evaluated to.
 */
export interface LoadedUnit {
  name: string;
  kind: 'reference' | 'function';
  exports: unknown;
}

export interface ReflectionHost {
  /** The global object session code runs against */
  globalScope(): object;
  /** Loaded units in load order */
  loadedUnits(): readonly LoadedUnit[];
}

export function isConstructor(value: unknown): value is RuntimeConstructor {
  if (typeof value !== 'function') {
    return false;
  }
  const prototype: unknown = Reflect.get(value, 'prototype');
  return typeof prototype === 'object' && prototype !== null;
}

export type MemberScope = 'instance' | 'static';

export type MemberInfo =
  | {
      kind: 'method';
      name: string;
      rawName: string;
      isStatic: boolean;
      /** Found on a prototype rather than on the object itself */
      isVirtual: boolean;
      params: readonly string[];
    }
  | {
      kind: 'accessor';
      name: string;
      /** `get name` or `set name` */
      rawName: string;
      isStatic: boolean;
      accessor: 'get' | 'set';
    }
  | {
      kind: 'field';
      name: string;
      rawName: string;
      isStatic: boolean;
      value: unknown;
    };

/**
 * Enumerates the public members of a value (instance scope) or of a
 * constructor (static scope).
 */
export interface MemberReflector {
  members(subject: unknown, scope: MemberScope): MemberInfo[];
}
