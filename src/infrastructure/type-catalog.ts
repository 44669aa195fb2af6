import type { Constructor } from '../domain/types.js';

export type TypeEntry = { kind: 'concrete'; ctor: Constructor } | { kind: 'abstract' };

/**
 * Maps type names to constructors for `create()`.
 * Abstract entries name an interface or base type that has no constructor of its own.
 */
export class TypeCatalog {
  private readonly entries = new Map<string, TypeEntry>();

  define(ctor: Constructor, name: string = ctor.name): void {
    this.entries.set(name, { kind: 'concrete', ctor });
  }

  declare(name: string): void {
    this.entries.set(name, { kind: 'abstract' });
  }

  lookup(name: string): TypeEntry | undefined {
    return this.entries.get(name);
  }
}
