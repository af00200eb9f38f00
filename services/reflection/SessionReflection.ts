import {
  isConstructor,
  type LoadedUnit,
  type MemberInfo,
  type MemberReflector,
  type MemberScope,
  type ReflectionHost,
  type TypeDescriptor
} from '@core/types/reflection';
import type { SessionContext } from '@interpreter/env/SessionContext';
import { parameterNames } from './parameters';

/** Own properties every function has; never listed as statics */
const FUNCTION_INTERNALS = new Set(['prototype', 'length', 'name', 'arguments', 'caller']);

/**
 * Reflection over a session: its context's global scope, the units loaded so
 * far, and the members of any value.
 */
export class SessionReflection implements ReflectionHost, MemberReflector {
  private readonly units: LoadedUnit[] = [];

  constructor(private readonly context: SessionContext) {}

  globalScope(): object {
    return this.context.globalScope();
  }

  loadedUnits(): readonly LoadedUnit[] {
    return this.units;
  }

  addUnit(unit: LoadedUnit): void {
    this.units.push(unit);
  }

  findUnit(name: string): LoadedUnit | undefined {
    return this.units.find(unit => unit.name === name);
  }

  /**
   * Whether the compiler can see a resolved type by its name. Host-injected
   * globals are typed loosely and referenced modules are opaque to it; only
   * built-ins and persisted function units qualify.
   */
  isCastable = (descriptor: TypeDescriptor): boolean => {
    if (descriptor.origin === 'unit') {
      return this.findUnit(descriptor.unit)?.kind === 'function';
    }
    const root = descriptor.name.split('.')[0];
    return !this.context.isHostGlobal(root);
  };

  members(subject: unknown, scope: MemberScope): MemberInfo[] {
    return scope === 'static' ? staticMembers(subject) : instanceMembers(subject);
  }
}

function staticMembers(subject: unknown): MemberInfo[] {
  const members: MemberInfo[] = [];
  let current: unknown = subject;
  while (isConstructor(current)) {
    collectOwn(current, true, false, members);
    current = Object.getPrototypeOf(current);
  }
  return members;
}

function instanceMembers(subject: unknown): MemberInfo[] {
  if (subject === null || subject === undefined) {
    return [];
  }
  const members: MemberInfo[] = [];
  if (typeof subject === 'object' || typeof subject === 'function') {
    collectOwn(subject, false, isPrototypeObject(subject), members);
  }
  let prototype: unknown = Object.getPrototypeOf(subject);
  while (typeof prototype === 'object' && prototype !== null) {
    collectOwn(prototype, false, true, members);
    prototype = Object.getPrototypeOf(prototype);
  }
  return members;
}

// A class's prototype: its own methods dispatch like inherited ones
function isPrototypeObject(subject: object): boolean {
  const ctor: unknown = Object.getOwnPropertyDescriptor(subject, 'constructor')?.value;
  return isConstructor(ctor) && Reflect.get(ctor, 'prototype') === subject;
}

function collectOwn(target: object, isStatic: boolean, isVirtual: boolean, into: MemberInfo[]): void {
  for (const name of Object.getOwnPropertyNames(target)) {
    if (isStatic && FUNCTION_INTERNALS.has(name)) {
      continue;
    }
    const descriptor = Object.getOwnPropertyDescriptor(target, name);
    if (!descriptor) {
      continue;
    }

    if (descriptor.get || descriptor.set) {
      if (descriptor.get) {
        into.push({ kind: 'accessor', name, rawName: `get ${name}`, isStatic, accessor: 'get' });
      }
      if (descriptor.set) {
        into.push({ kind: 'accessor', name, rawName: `set ${name}`, isStatic, accessor: 'set' });
      }
      continue;
    }

    const value: unknown = descriptor.value;
    if (typeof value === 'function') {
      into.push({ kind: 'method', name, rawName: name, isStatic, isVirtual, params: parameterNames(value) });
    } else {
      into.push({ kind: 'field', name, rawName: name, isStatic, value });
    }
  }
}
