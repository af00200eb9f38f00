import { TypeResolutionError } from '@core/errors';
import { metaLogger as logger } from '@core/utils/logger';
import {
  isConstructor,
  type MemberInfo,
  type MemberReflector,
  type MemberScope,
  type RuntimeConstructor
} from '@core/types/reflection';
import type { TypeResolver } from '@interpreter/types/TypeResolver';
import { constructorOf, type TypeNamer } from '@interpreter/types/TypeNamer';
import { completeFrom, type Completion } from './completion';

const METHODS_PER_LINE = 5;

interface ListingTarget {
  subject: unknown;
  scope: MemberScope;
  type?: RuntimeConstructor;
}

interface TypeTarget {
  instance: unknown;
  type?: RuntimeConstructor;
}

/**
 * Member listings and signatures for values and types. The type queried last
 * is the default subject of the next query that names none.
 */
export class MetaService {
  private lastType?: RuntimeConstructor;

  constructor(
    private readonly resolver: TypeResolver,
    private readonly reflector: MemberReflector,
    private readonly namer: TypeNamer
  ) {}

  get lastQueriedType(): RuntimeConstructor | undefined {
    return this.lastType;
  }

  /**
   * Instance members of a value, or static members of a constructor, sorted
   * case-insensitively with exact duplicates dropped. `pattern` is a
   * case-insensitive regular expression tested against the plain and the raw
   * member name.
   */
  listMembers(subject?: unknown, pattern?: string): string[] | undefined {
    const target = this.listingTarget(subject);
    if (!target) {
      return undefined;
    }

    const members = this.visibleMembers(target.subject, target.scope);
    if (members.length === 0) {
      return undefined;
    }
    if (target.type) {
      this.lastType = target.type;
    }

    const names = sortedNames(members, pattern);
    logger.debug('Listed members', { type: target.type?.name, scope: target.scope, count: names.length });
    return names.length > 0 ? names : undefined;
  }

  /**
   * One signature line per member called `name`, instance members first. A
   * string subject names a type.
   */
  describeMember(subject: unknown, name: string): string[] {
    const target = this.typeTarget(subject);
    if (!target) {
      return [];
    }

    return this.typeMembers(target)
      .filter(member => member.name === name)
      .map(member => this.signature(member));
  }

  /** Method names, five to a line */
  listMethods(subject?: unknown): string[] {
    const target = this.typeTarget(subject);
    if (!target) {
      return [];
    }

    const names = new Set<string>();
    for (const member of this.typeMembers(target)) {
      if (member.kind === 'method') {
        names.add(member.name);
      }
    }

    const all = Array.from(names);
    const lines: string[] = [];
    for (let i = 0; i < all.length; i += METHODS_PER_LINE) {
      lines.push(all.slice(i, i + METHODS_PER_LINE).join(' '));
    }
    return lines;
  }

  /**
   * Completes the trailing identifier of `input` from the members of
   * `subject`. Does not change the last queried type.
   */
  complete(input: string, subject: unknown): Completion {
    if (subject === null || subject === undefined) {
      return completeFrom(input, []);
    }
    const scope: MemberScope = isConstructor(subject) ? 'static' : 'instance';
    return completeFrom(input, sortedNames(this.visibleMembers(subject, scope)));
  }

  private listingTarget(subject: unknown): ListingTarget | undefined {
    if (subject === null || subject === undefined) {
      return this.lastType ? { subject: this.lastType, scope: 'static', type: this.lastType } : undefined;
    }
    if (isConstructor(subject)) {
      return { subject, scope: 'static', type: subject };
    }
    return { subject, scope: 'instance', type: constructorOf(subject) };
  }

  private typeTarget(subject: unknown): TypeTarget | undefined {
    let target: TypeTarget;
    if (subject === null || subject === undefined) {
      if (!this.lastType) {
        return undefined;
      }
      target = { instance: prototypeOf(this.lastType), type: this.lastType };
    } else if (typeof subject === 'string') {
      const descriptor = this.resolver.resolve(subject);
      if (!descriptor) {
        throw new TypeResolutionError(subject);
      }
      target = { instance: prototypeOf(descriptor.ctor), type: descriptor.ctor };
    } else if (isConstructor(subject)) {
      target = { instance: prototypeOf(subject), type: subject };
    } else {
      target = { instance: subject, type: constructorOf(subject) };
    }

    if (target.type) {
      this.lastType = target.type;
    }
    return target;
  }

  private typeMembers(target: TypeTarget): MemberInfo[] {
    const instance = this.visibleMembers(target.instance, 'instance');
    const statics = target.type ? this.visibleMembers(target.type, 'static') : [];
    return [...instance, ...statics];
  }

  private visibleMembers(subject: unknown, scope: MemberScope): MemberInfo[] {
    return this.reflector
      .members(subject, scope)
      .filter(member => !member.name.startsWith('__') && member.name !== 'constructor');
  }

  private signature(member: MemberInfo): string {
    const qualifier = member.isStatic ? 'static ' : '';
    switch (member.kind) {
      case 'method':
        return `${qualifier}${member.isVirtual ? 'virtual ' : ''}${member.name}(${member.params.join(', ')})`;
      case 'accessor':
        return member.accessor === 'get'
          ? `${qualifier}get ${member.name}()`
          : `${qualifier}set ${member.name}(value)`;
      case 'field':
        return `${qualifier}${member.name}: ${this.namer.displayName(member.value)}`;
    }
  }
}

function prototypeOf(ctor: RuntimeConstructor): unknown {
  return Reflect.get(ctor, 'prototype');
}

// Stable sort, so equal names keep their reflection order before deduplication
function sortedNames(members: readonly MemberInfo[], pattern?: string): string[] {
  const filter = pattern ? new RegExp(pattern, 'i') : undefined;
  const sorted = [...members].sort((a, b) => compareIgnoringCase(a.name, b.name));

  const names: string[] = [];
  let previous: string | undefined;
  for (const member of sorted) {
    if (member.name === previous) {
      continue;
    }
    if (filter && !filter.test(member.name) && !filter.test(member.rawName)) {
      continue;
    }
    previous = member.name;
    names.push(member.name);
  }
  return names;
}

function compareIgnoringCase(a: string, b: string): number {
  const left = a.toUpperCase();
  const right = b.toUpperCase();
  return left < right ? -1 : left > right ? 1 : 0;
}
