import type { Brew, Steep, Tea, Teapot } from '../../shared/types';

export interface EntityMap {
  teapots: Teapot;
  teas: Tea;
  brews: Brew;
  steeps: Steep;
}

export type EntityKind = keyof EntityMap;

export const ENTITY_KINDS: readonly EntityKind[] = ['teapots', 'teas', 'brews', 'steeps'];

export interface Page<T> {
  items: T[];
  /** Matching items before pagination. */
  total: number;
}

type Collections = { [K in EntityKind]: Map<string, EntityMap[K]> };

const matches = <T extends object>(item: T, filters: Partial<T>): boolean => {
  const fields = new Map<string, unknown>(Object.entries(item));
  return Object.entries(filters).every(
    ([field, expected]) => expected === undefined || fields.get(field) === expected
  );
};

/**
 * In-memory store for every resource, keyed by id.
 *
 * Each method is synchronous, so a call runs to completion without another
 * request interleaving; that is the only critical section. A route that
 * checks for an id and then updates it makes two calls, and two writers
 * racing on the same id end up last-write-wins.
 *
 * Nothing is checked across collections: a brew may point at a teapot or tea
 * that doesn't exist.
 */
export class MemoryStore {
  private readonly collections: Collections = {
    teapots: new Map(),
    teas: new Map(),
    brews: new Map(),
    steeps: new Map()
  };

  private collection<K extends EntityKind>(kind: K): Map<string, EntityMap[K]> {
    return this.collections[kind];
  }

  /** Filters by exact match on each defined field, then slices out one page in insertion order. */
  list<K extends EntityKind>(
    kind: K,
    filters: Partial<EntityMap[K]>,
    page: number,
    limit: number
  ): Page<EntityMap[K]> {
    const matching = [...this.collection(kind).values()].filter((item) => matches(item, filters));
    const offset = (page - 1) * limit;
    return { items: matching.slice(offset, offset + limit), total: matching.length };
  }

  get<K extends EntityKind>(kind: K, id: string): EntityMap[K] | undefined {
    return this.collection(kind).get(id);
  }

  create<K extends EntityKind>(kind: K, record: EntityMap[K]): void {
    this.collection(kind).set(record.id, record);
  }

  // No existence check: routes look the id up first to answer 404.
  update<K extends EntityKind>(kind: K, record: EntityMap[K]): void {
    this.collection(kind).set(record.id, record);
  }

  delete<K extends EntityKind>(kind: K, id: string): boolean {
    const existed = this.collection(kind).delete(id);
    if (existed && kind === 'brews') {
      for (const [steepId, steep] of this.collections.steeps) {
        if (steep.brew_id === id) {
          this.collections.steeps.delete(steepId);
        }
      }
    }
    return existed;
  }

  nextSteepNumber(brewId: string): number {
    let highest = 0;
    for (const steep of this.collections.steeps.values()) {
      if (steep.brew_id === brewId && steep.steep_number > highest) {
        highest = steep.steep_number;
      }
    }
    return highest + 1;
  }

  count(kind: EntityKind): number {
    return this.collection(kind).size;
  }

  clear(): void {
    Object.values(this.collections).forEach((collection) => collection.clear());
  }
}
