import { resolverLogger as logger } from '@core/utils/logger';
import { readPath } from '@core/utils/objectPath';
import {
  isConstructor,
  type LoadedUnit,
  type ReflectionHost,
  type TypeDescriptor
} from '@core/types/reflection';

/** Registered namespaces, in registration order */
export type NamespaceSource = () => readonly string[];

type SearchStep = () => TypeDescriptor | undefined;

const yieldTurn = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Resolves type names against the session's global scope and loaded units,
 * remembering every answer (found or not) under the exact name asked for.
 *
 * Lookups and commits are synchronous sections, so they never interleave on
 * the event loop. Background searches yield between units and commit with the
 * rule that a found result is never replaced by a not-found one.
 */
export class TypeResolver {
  private readonly cache = new Map<string, TypeDescriptor | null>();
  private readonly inflight = new Map<string, Promise<TypeDescriptor | undefined>>();
  private searches = 0;

  constructor(
    private readonly reflection: ReflectionHost,
    private readonly namespaces: NamespaceSource = () => []
  ) {}

  resolve(name: string): TypeDescriptor | undefined {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached ?? undefined;
    }

    this.searches++;
    let found: TypeDescriptor | undefined;
    for (const step of this.searchSteps(name)) {
      found = step();
      if (found) break;
    }
    return this.commit(name, found);
  }

  /**
   * Same search as `resolve`, yielding to the event loop between steps.
   * Concurrent requests for one name share a single search.
   */
  resolveInBackground(name: string): Promise<TypeDescriptor | undefined> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return Promise.resolve(cached ?? undefined);
    }

    const running = this.inflight.get(name);
    if (running) {
      return running;
    }

    const search = (async () => {
      this.searches++;
      let found: TypeDescriptor | undefined;
      for (const step of this.searchSteps(name)) {
        await yieldTurn();
        found = step();
        if (found) break;
      }
      return this.commit(name, found);
    })().finally(() => this.inflight.delete(name));

    this.inflight.set(name, search);
    return search;
  }

  isCached(name: string): boolean {
    return this.cache.has(name);
  }

  /** Number of searches performed; cache hits do not count */
  get searchCount(): number {
    return this.searches;
  }

  clear(): void {
    this.cache.clear();
  }

  private commit(name: string, found: TypeDescriptor | undefined): TypeDescriptor | undefined {
    const existing = this.cache.get(name);
    if (existing) {
      return existing;
    }
    this.cache.set(name, found ?? null);
    logger.debug('Type cached', { name, found: found?.name ?? null });
    return found;
  }

  private searchSteps(name: string): SearchStep[] {
    const units = [...this.reflection.loadedUnits()];
    const steps: SearchStep[] = [() => this.fromGlobal(name)];

    for (const unit of units) {
      steps.push(() => this.fromUnit(unit, name));
    }

    for (const namespace of this.namespaces()) {
      const qualified = `${namespace}.${name}`;
      steps.push(() => this.fromGlobal(qualified));
      for (const unit of units) {
        steps.push(() => this.fromUnit(unit, qualified));
      }
    }

    return steps;
  }

  private fromGlobal(name: string): TypeDescriptor | undefined {
    const value = readPath(this.reflection.globalScope(), name);
    return isConstructor(value) ? { name, ctor: value, origin: 'global' } : undefined;
  }

  private fromUnit(unit: LoadedUnit, name: string): TypeDescriptor | undefined {
    const value = readPath(unit.exports, name);
    return isConstructor(value) ? { name, ctor: value, origin: 'unit', unit: unit.name } : undefined;
  }
}
