import { RESULT_SLOT, SESSION_SLOT } from '@core/types/session';

/**
 * Consulted only when a name is definitely absent. Returning undefined means
 * the name stays unknown.
 */
export type MissingSlotResolver = (name: string) => unknown;

export interface IVariableEnvironment {
  get(name: string): unknown;
  set(name: string, value: unknown): void;
  has(name: string): boolean;
  remove(name: string): boolean;
  isKnown(name: string): boolean;
  names(): string[];
  entries(): Array<[string, unknown]>;
  asSlots(): Record<string, unknown>;
}

/**
 * Session variables, keyed by case-sensitive name.
 *
 * Generated code reaches the same table through `asSlots()`, which is bound
 * as the global `V` in the session context.
 */
export class VariableEnvironment implements IVariableEnvironment {
  private readonly values = new Map<string, unknown>();
  private slots?: Record<string, unknown>;

  constructor(private missingResolver?: MissingSlotResolver) {}

  setMissingResolver(resolver: MissingSlotResolver | undefined): void {
    this.missingResolver = resolver;
  }

  get(name: string): unknown {
    if (this.values.has(name)) {
      return this.values.get(name);
    }
    return this.missingResolver?.(name);
  }

  set(name: string, value: unknown): void {
    this.values.set(name, value);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  remove(name: string): boolean {
    return this.values.delete(name);
  }

  /** Present, or supplied by the missing-slot resolver */
  isKnown(name: string): boolean {
    return this.values.has(name) || this.missingResolver?.(name) !== undefined;
  }

  names(): string[] {
    return Array.from(this.values.keys());
  }

  entries(): Array<[string, unknown]> {
    return Array.from(this.values.entries());
  }

  get result(): unknown {
    return this.values.get(RESULT_SLOT);
  }

  bindSession(session: unknown): void {
    this.values.set(SESSION_SLOT, session);
    this.values.set(RESULT_SLOT, session);
  }

  asSlots(): Record<string, unknown> {
    if (this.slots) {
      return this.slots;
    }

    this.slots = new Proxy<Record<string, unknown>>({}, {
      get: (_target, key) => (typeof key === 'string' ? this.get(key) : undefined),
      set: (_target, key, value: unknown) => {
        if (typeof key !== 'string') {
          return false;
        }
        this.set(key, value);
        return true;
      },
      has: (_target, key) => typeof key === 'string' && this.has(key),
      deleteProperty: (_target, key) => {
        if (typeof key === 'string') {
          this.remove(key);
        }
        return true;
      },
      ownKeys: () => this.names(),
      getOwnPropertyDescriptor: (_target, key) => {
        if (typeof key !== 'string' || !this.has(key)) {
          return undefined;
        }
        return { value: this.get(key), writable: true, enumerable: true, configurable: true };
      }
    });
    return this.slots;
  }
}
