export interface MacroEntry {
  name: string;
  template: string;
  /** Formal parameter names, or null for a macro used without an argument list */
  params: readonly string[] | null;
}

/**
 * Name → macro. Later definitions overwrite earlier ones.
 */
export class MacroTable {
  private readonly entries = new Map<string, MacroEntry>();

  define(name: string, template: string, params: readonly string[] | null = null): MacroEntry {
    const entry: MacroEntry = { name, template, params };
    this.entries.set(name, entry);
    return entry;
  }

  lookup(name: string): MacroEntry | undefined {
    return this.entries.get(name);
  }

  remove(name: string): boolean {
    return this.entries.delete(name);
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}
