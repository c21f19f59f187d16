import {
  FieldValue,
  Firestore,
  type CollectionReference,
  type DocumentData,
  type FirestoreDataConverter,
  type Query,
  type QueryDocumentSnapshot
} from "@google-cloud/firestore";
import { config, parseServiceAccount } from "./config";
import type { CollectionName, Collections } from "./types";
import type { ListOptions, NumericField, Store, Where } from "./store";

let firestoreInstance: Firestore | null = null;

export function getFirestore(): Firestore {
  if (firestoreInstance) return firestoreInstance;

  const { projectId, databaseId, keyFilename, serviceAccountJson } = config.firestore;
  const base = { projectId, databaseId, ignoreUndefinedProperties: true };

  if (serviceAccountJson) {
    firestoreInstance = new Firestore({ ...base, credentials: parseServiceAccount(serviceAccountJson) });
    // eslint-disable-next-line no-console
    console.log("[firestore] Initialized with explicit service account JSON");
  } else if (keyFilename) {
    firestoreInstance = new Firestore({ ...base, keyFilename });
    // eslint-disable-next-line no-console
    console.log("[firestore] Initialized with key file from GOOGLE_APPLICATION_CREDENTIALS");
  } else {
    firestoreInstance = new Firestore(base);
    // eslint-disable-next-line no-console
    console.log("[firestore] Initialized with Application Default Credentials (ADC)");
  }
  return firestoreInstance;
}

function converter<T extends DocumentData>(): FirestoreDataConverter<T> {
  return {
    toFirestore: (doc: T) => doc,
    fromFirestore: (snap: QueryDocumentSnapshot) => snap.data() as T
  };
}

// Firestore caps a write batch at 500 operations.
const BATCH_LIMIT = 500;

export class FirestoreStore implements Store {
  constructor(private readonly db: Firestore) {}

  private col<K extends CollectionName>(name: K): CollectionReference<Collections[K]> {
    return this.db.collection(name).withConverter(converter<Collections[K]>());
  }

  private query<K extends CollectionName>(
    name: K,
    where: ReadonlyArray<Where<Collections[K]>> = []
  ): Query<Collections[K]> {
    let q: Query<Collections[K]> = this.col(name);
    for (const [field, op, value] of where) q = q.where(field, op, value);
    return q;
  }

  async get<K extends CollectionName>(collection: K, id: string): Promise<Collections[K] | null> {
    const snap = await this.col(collection).doc(id).get();
    return snap.exists ? snap.data() ?? null : null;
  }

  async create<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<Collections[K]> {
    await this.col(collection).doc(doc.id).set(doc);
    return doc;
  }

  async update<K extends CollectionName>(collection: K, id: string, patch: Partial<Collections[K]>): Promise<boolean> {
    const ref = this.db.collection(collection).doc(id);
    const snap = await ref.get();
    if (!snap.exists) return false;
    await ref.set(patch, { merge: true });
    return true;
  }

  async updateIf<K extends CollectionName>(
    collection: K,
    id: string,
    field: keyof Collections[K] & string,
    expected: unknown,
    patch: Partial<Collections[K]>
  ): Promise<boolean> {
    const ref = this.db.collection(collection).doc(id);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      if (!snap.exists || snap.get(field) !== expected) return false;
      tx.set(ref, patch, { merge: true });
      return true;
    });
  }

  async createIfAbsent<K extends CollectionName>(collection: K, doc: Collections[K]): Promise<boolean> {
    try {
      await this.col(collection).doc(doc.id).create(doc);
      return true;
    } catch (e) {
      // ALREADY_EXISTS
      if (typeof e === "object" && e !== null && "code" in e && e.code === 6) return false;
      throw e;
    }
  }

  async increment<K extends CollectionName>(
    collection: K,
    id: string,
    field: NumericField<Collections[K]>,
    by: number
  ): Promise<void> {
    try {
      await this.db.collection(collection).doc(id).update({ [field]: FieldValue.increment(by) });
    } catch (e) {
      // NOT_FOUND: incrementing a deleted document is a no-op, like the in-memory store.
      if (typeof e === "object" && e !== null && "code" in e && e.code === 5) return;
      throw e;
    }
  }

  async delete<K extends CollectionName>(collection: K, id: string): Promise<boolean> {
    const ref = this.db.collection(collection).doc(id);
    const snap = await ref.get();
    if (!snap.exists) return false;
    await ref.delete();
    return true;
  }

  async list<K extends CollectionName>(collection: K, options: ListOptions<Collections[K]> = {}): Promise<Collections[K][]> {
    let q = this.query(collection, options.where);
    if (options.orderBy) q = q.orderBy(options.orderBy.field, options.orderBy.direction ?? "asc");
    if (options.offset) q = q.offset(options.offset);
    if (options.limit !== undefined) q = q.limit(options.limit);
    const snap = await q.get();
    return snap.docs.map((d) => d.data());
  }

  async count<K extends CollectionName>(collection: K, where?: ReadonlyArray<Where<Collections[K]>>): Promise<number> {
    const snap = await this.query(collection, where).count().get();
    return snap.data().count;
  }

  async updateWhere<K extends CollectionName>(
    collection: K,
    where: ReadonlyArray<Where<Collections[K]>>,
    patch: Partial<Collections[K]>
  ): Promise<number> {
    const snap = await this.query(collection, where).get();
    for (let i = 0; i < snap.docs.length; i += BATCH_LIMIT) {
      const batch = this.db.batch();
      for (const d of snap.docs.slice(i, i + BATCH_LIMIT)) batch.set(d.ref, patch, { merge: true });
      await batch.commit();
    }
    return snap.size;
  }

  async deleteWhere<K extends CollectionName>(collection: K, where: ReadonlyArray<Where<Collections[K]>>): Promise<number> {
    const snap = await this.query(collection, where).get();
    for (let i = 0; i < snap.docs.length; i += BATCH_LIMIT) {
      const batch = this.db.batch();
      for (const d of snap.docs.slice(i, i + BATCH_LIMIT)) batch.delete(d.ref);
      await batch.commit();
    }
    return snap.size;
  }

  async nextSequence(name: string): Promise<number> {
    const ref = this.db.collection("counters").doc(name);
    return this.db.runTransaction(async (tx) => {
      const snap = await tx.get(ref);
      const current = snap.exists ? Number(snap.get("value") || 0) : 0;
      const next = current + 1;
      tx.set(ref, { id: name, value: next });
      return next;
    });
  }
}
