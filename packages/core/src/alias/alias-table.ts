/**
 * Type alias lookup
 */

import type { TypeExpr } from "../type-expr/types.js";

/**
 * Source of alias definitions consulted during expansion
 */
export type TypeAliasProvider = {
  /**
   * The type an alias name stands for, or undefined when the name is not an
   * alias
   */
  resolveAlias(name: string): TypeExpr | undefined;
};

/**
 * Read-only alias table backed by a map.
 * Later entries replace earlier ones with the same name.
 */
export class TypeAliasTable implements TypeAliasProvider {
  private readonly aliases: ReadonlyMap<string, TypeExpr>;

  constructor(entries: Iterable<readonly [string, TypeExpr]> = []) {
    this.aliases = new Map(entries);
  }

  static fromRecord(record: Readonly<Record<string, TypeExpr>>): TypeAliasTable {
    return new TypeAliasTable(Object.entries(record));
  }

  /**
   * Combine tables; definitions in later tables win
   */
  static combine(tables: readonly TypeAliasTable[]): TypeAliasTable {
    return new TypeAliasTable(tables.flatMap((table) => [...table.entries()]));
  }

  resolveAlias(name: string): TypeExpr | undefined {
    return this.aliases.get(name);
  }

  has(name: string): boolean {
    return this.aliases.has(name);
  }

  get size(): number {
    return this.aliases.size;
  }

  names(): readonly string[] {
    return [...this.aliases.keys()];
  }

  entries(): IterableIterator<[string, TypeExpr]> {
    return this.aliases.entries();
  }
}

export const emptyAliasTable = new TypeAliasTable();
