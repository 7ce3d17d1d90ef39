import type { ArgsRecord, Binding, IdentifierGroup, SymbolName } from "../types/node.js";
import type { Literal } from "../types/value.js";

/**
 * Deduplicating key -> ordinal table.
 *
 * Ordinals are dense and assigned in first-seen order. Interning a key that is
 * already present returns its ordinal and leaves the stored payload alone.
 */
export class InternTable<K, P = K> {
  private readonly ordinals = new Map<K, number>();
  private readonly payloads: P[] = [];

  /**
   * Returns the ordinal of `key`, assigning the next one if it is new.
   */
  intern(key: K, payload: P): number {
    const existing = this.ordinals.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const ordinal = this.payloads.length;
    this.ordinals.set(key, ordinal);
    this.payloads.push(payload);
    return ordinal;
  }

  ordinalOf(key: K): number | undefined {
    return this.ordinals.get(key);
  }

  has(key: K): boolean {
    return this.ordinals.has(key);
  }

  /**
   * Payloads indexed by ordinal.
   */
  payloadsInOrder(): readonly P[] {
    return this.payloads;
  }

  get size(): number {
    return this.payloads.length;
  }
}

/**
 * Key and payload types of each interning category.
 *
 * Symbols are keyed by name; every other category by object identity.
 */
export interface CategoryTypes {
  value: { key: Literal; payload: Literal };
  symbol: { key: SymbolName; payload: SymbolName };
  identifierGroup: { key: IdentifierGroup; payload: IdentifierGroup };
  argsRecord: { key: ArgsRecord; payload: ArgsRecord };
  binding: { key: Binding; payload: Binding };
}

export type Category = keyof CategoryTypes;

export type CategoryKey<C extends Category> = CategoryTypes[C]["key"];
export type CategoryPayload<C extends Category> = CategoryTypes[C]["payload"];

type CategoryTables = {
  [C in Category]: InternTable<CategoryKey<C>, CategoryPayload<C>>;
};

/**
 * The five interning tables filled by one walk.
 */
export class InternTables {
  private readonly tables: CategoryTables = {
    value: new InternTable(),
    symbol: new InternTable(),
    identifierGroup: new InternTable(),
    argsRecord: new InternTable(),
    binding: new InternTable(),
  };

  intern<C extends Category>(category: C, key: CategoryKey<C>, payload: CategoryPayload<C>): number {
    return this.table(category).intern(key, payload);
  }

  ordinalOf<C extends Category>(category: C, key: CategoryKey<C>): number | undefined {
    return this.table(category).ordinalOf(key);
  }

  payloadsInOrder<C extends Category>(category: C): readonly CategoryPayload<C>[] {
    return this.table(category).payloadsInOrder();
  }

  size(category: Category): number {
    return this.tables[category].size;
  }

  table<C extends Category>(category: C): InternTable<CategoryKey<C>, CategoryPayload<C>> {
    return this.tables[category];
  }
}
