import type { CollectionName, Collections } from "./types";
import type { ListOptions, NumericField, Store, Where } from "./store";

type Tables = { [K in CollectionName]?: Map<string, Collections[K]> };

function comparable(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function compare(a: string | number | boolean, b: string | number | boolean): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function matches<T>(doc: T, [field, op, value]: Where<T>): boolean {
  const actual: unknown = doc[field];
  switch (op) {
    case "==":
      return actual === value;
    case "!=":
      return actual !== undefined && actual !== value;
    case "in":
      return Array.isArray(value) && value.includes(actual);
    case "array-contains":
      return Array.isArray(actual) && actual.includes(value);
    default: {
      if (!comparable(actual) || !comparable(value) || typeof actual !== typeof value) return false;
      const c = compare(actual, value);
      if (op === "<") return c < 0;
      if (op === "<=") return c <= 0;
      if (op === ">") return c > 0;
      return c >= 0;
    }
  }
}

// Mirrors ignoreUndefinedProperties on the Firestore client.
function defined<T extends {}>(patch: T): Partial<T> {
  const out: Partial<T> = { ...patch };
  for (const key in out) {
    if (out[key] === undefined) delete out[key];
  }
  return out;
}

/**
 * Process-local Store. Backs FORCE_FIRESTORE_MOCK and the test suite; every read
 * returns a copy so callers cannot mutate stored state by accident.
 */
export class MemoryStore implements Store {
  private tables: Tables = {};
  private sequences = new Map<string, number>();

  private table<K extends CollectionName>(name: K): Map<string, Collections[K]> {
    const existing = this.tables[name];
    if (existing) return existing;
    const created = new Map<string, Collections[K]>();
    this.tables[name] = created;
    return created;
  }

  private select<K extends CollectionName>(name: K, where: ReadonlyArray<Where<Collections[K]>> = []): Collections[K][] {
    return [...this.table(name).values()].filter((doc) => where.every((w) => matches(doc, w)));
  }

  async get<K extends CollectionName>(collection: K, id: string): Promise<Collections[K] | null> {
    const doc = this.table(collection).get(id);
    return doc ? structuredClone(doc) : null;
  }

  async create<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<Collections[K]> {
    this.table(collection).set(doc.id, structuredClone(doc));
    return structuredClone(doc);
  }

  async update<K extends CollectionName>(collection: K, id: string, patch: Partial<Collections[K]>): Promise<boolean> {
    const table = this.table(collection);
    const doc = table.get(id);
    if (!doc) return false;
    table.set(id, { ...doc, ...structuredClone(defined(patch)) });
    return true;
  }

  async updateIf<K extends CollectionName>(
    collection: K,
    id: string,
    field: keyof Collections[K] & string,
    expected: unknown,
    patch: Partial<Collections[K]>
  ): Promise<boolean> {
    const doc = this.table(collection).get(id);
    if (!doc || doc[field] !== expected) return false;
    return this.update(collection, id, patch);
  }

  async createIfAbsent<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<boolean> {
    const table = this.table(collection);
    if (table.has(doc.id)) return false;
    table.set(doc.id, structuredClone(doc));
    return true;
  }

  async increment<K extends CollectionName>(
    collection: K,
    id: string,
    field: NumericField<Collections[K]>,
    by: number
  ): Promise<void> {
    const doc = this.table(collection).get(id);
    if (!doc) return;
    const current: unknown = doc[field];
    Object.assign(doc, { [field]: (typeof current === "number" ? current : 0) + by });
  }

  async delete<K extends CollectionName>(collection: K, id: string): Promise<boolean> {
    return this.table(collection).delete(id);
  }

  async list<K extends CollectionName>(collection: K, options: ListOptions<Collections[K]> = {}): Promise<Collections[K][]> {
    let docs = this.select(collection, options.where);
    const order = options.orderBy;
    if (order) {
      const sign = order.direction === "desc" ? -1 : 1;
      docs = docs
        .filter((d) => comparable(d[order.field]))
        .sort((a, b) => {
          const av: unknown = a[order.field];
          const bv: unknown = b[order.field];
          return comparable(av) && comparable(bv) ? sign * compare(av, bv) : 0;
        });
    }
    const start = options.offset ?? 0;
    const end = options.limit === undefined ? undefined : start + options.limit;
    return docs.slice(start, end).map((d) => structuredClone(d));
  }

  async count<K extends CollectionName>(collection: K, where?: ReadonlyArray<Where<Collections[K]>>): Promise<number> {
    return this.select(collection, where).length;
  }

  async updateWhere<K extends CollectionName>(
    collection: K,
    where: ReadonlyArray<Where<Collections[K]>>,
    patch: Partial<Collections[K]>
  ): Promise<number> {
    const hits = this.select(collection, where);
    for (const doc of hits) await this.update(collection, doc.id, patch);
    return hits.length;
  }

  async deleteWhere<K extends CollectionName>(collection: K, where: ReadonlyArray<Where<Collections[K]>>): Promise<number> {
    const hits = this.select(collection, where);
    const table = this.table(collection);
    for (const doc of hits) table.delete(doc.id);
    return hits.length;
  }

  async nextSequence(name: string): Promise<number> {
    const next = (this.sequences.get(name) ?? 0) + 1;
    this.sequences.set(name, next);
    return next;
  }
}
