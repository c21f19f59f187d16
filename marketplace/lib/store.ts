import type { CollectionName, Collections } from "./types";
import { config } from "./config";
import { FirestoreStore, getFirestore } from "./firestore";
import { MemoryStore } from "./memoryStore";

export type WhereOp = "==" | "!=" | "<" | "<=" | ">" | ">=" | "in" | "array-contains";

export type Where<T> = readonly [field: keyof T & string, op: WhereOp, value: unknown];

export type ListOptions<T> = {
  where?: ReadonlyArray<Where<T>>;
  orderBy?: { field: keyof T & string; direction?: "asc" | "desc" };
  offset?: number;
  limit?: number;
};

export type NumericField<T> = {
  [P in keyof T]: T[P] extends number ? P : never;
}[keyof T] &
  string;

/**
 * Document persistence used by every route. Documents are addressed by
 * collection name and their `id` field; the id doubles as the document key.
 */
export interface Store {
  get<K extends CollectionName>(collection: K, id: string): Promise<Collections[K] | null>;
  /** Writes the document under `doc.id`, replacing any previous one. */
  create<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<Collections[K]>;
  /** Shallow merge. Resolves false when the document does not exist. */
  update<K extends CollectionName>(collection: K, id: string, patch: Partial<Collections[K]>): Promise<boolean>;
  increment<K extends CollectionName>(
    collection: K,
    id: string,
    field: NumericField<Collections[K]>,
    by: number
  ): Promise<void>;
  /**
   * Applies the patch only while `field` still holds `expected`, atomically.
   * Resolves false when the document is missing or the field has moved on.
   */
  updateIf<K extends CollectionName>(
    collection: K,
    id: string,
    field: keyof Collections[K] & string,
    expected: unknown,
    patch: Partial<Collections[K]>
  ): Promise<boolean>;
  /** Writes the document unless one with its id exists. Resolves whether it was written. */
  createIfAbsent<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<boolean>;
  delete<K extends CollectionName>(collection: K, id: string): Promise<boolean>;
  list<K extends CollectionName>(collection: K, options?: ListOptions<Collections[K]>): Promise<Collections[K][]>;
  count<K extends CollectionName>(collection: K, where?: ReadonlyArray<Where<Collections[K]>>): Promise<number>;
  updateWhere<K extends CollectionName>(
    collection: K,
    where: ReadonlyArray<Where<Collections[K]>>,
    patch: Partial<Collections[K]>
  ): Promise<number>;
  deleteWhere<K extends CollectionName>(collection: K, where: ReadonlyArray<Where<Collections[K]>>): Promise<number>;
  /** Atomically increments the named counter and returns the new value (first call returns 1). */
  nextSequence(name: string): Promise<number>;
}

let storeInstance: Store | null = null;

export function getStore(): Store {
  if (storeInstance) return storeInstance;

  if (config.firestore.forceMock) {
    // eslint-disable-next-line no-console
    console.warn("[store] Using in-memory store (FORCE_FIRESTORE_MOCK=1)");
    storeInstance = new MemoryStore();
    return storeInstance;
  }

  storeInstance = new FirestoreStore(getFirestore());
  return storeInstance;
}

export function setStore(store: Store | null): void {
  storeInstance = store;
}

/** Looks up each distinct id once; missing documents are left out of the map. */
export async function getMany<K extends CollectionName>(
  store: Store,
  collection: K,
  ids: Iterable<string>
): Promise<Map<string, Collections[K]>> {
  const out = new Map<string, Collections[K]>();
  for (const id of new Set(ids)) {
    const doc = await store.get(collection, id);
    if (doc) out.set(id, doc);
  }
  return out;
}
