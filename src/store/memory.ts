import { DocumentNotFoundError } from '../xp/errors';
import { assertFilters, splitPath } from './paths';
import {
  ChangeListener,
  DOCUMENT_ID,
  DocumentFields,
  DocumentStore,
  ErrorListener,
  QueryFilter,
  QueryOptions,
  StoredDocument,
  SubscriptionHandle,
} from './types';

interface Listener {
  onChange: ChangeListener;
  onError?: ErrorListener;
  active: boolean;
}

const compareValues = (a: unknown, b: unknown): number | null => {
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return null;
};

const valueOf = (doc: StoredDocument, field: string): unknown =>
  field === DOCUMENT_ID ? doc.id : doc.fields[field];

const matches = (doc: StoredDocument, filter: QueryFilter): boolean => {
  const actual = valueOf(doc, filter.field);
  if (filter.op === 'in') {
    const values: unknown[] = Array.isArray(filter.value) ? filter.value : [];
    return values.some((value) => compareValues(actual, value) === 0);
  }
  const diff = compareValues(actual, filter.value);
  if (diff === null) return false;
  switch (filter.op) {
    case '==':
      return diff === 0;
    case '<':
      return diff < 0;
    case '<=':
      return diff <= 0;
    case '>':
      return diff > 0;
    case '>=':
      return diff >= 0;
  }
};

/**
 * Process-local document store. Every read hands out a deep copy, and change
 * notifications are delivered on the microtask queue in write order.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private documents = new Map<string, StoredDocument>();
  private listeners = new Map<string, Set<Listener>>();

  async get(path: string): Promise<StoredDocument | null> {
    splitPath(path);
    const doc = this.documents.get(path);
    return doc ? structuredClone(doc) : null;
  }

  async set(path: string, fields: DocumentFields): Promise<void> {
    this.write(path, structuredClone(fields));
  }

  async updateFields(path: string, fields: DocumentFields): Promise<void> {
    const existing = this.documents.get(path);
    if (!existing) throw new DocumentNotFoundError(path);
    this.write(path, { ...existing.fields, ...structuredClone(fields) });
  }

  async updateIfVersion(path: string, fields: DocumentFields, expectedVersion: number): Promise<boolean> {
    const existing = this.documents.get(path);
    const currentVersion = existing ? existing.version : 0;
    if (currentVersion !== expectedVersion) return false;
    this.write(path, { ...(existing ? existing.fields : {}), ...structuredClone(fields) });
    return true;
  }

  async appendToArrayField(path: string, field: string, value: unknown): Promise<void> {
    const existing = this.documents.get(path);
    if (!existing) throw new DocumentNotFoundError(path);
    const current = existing.fields[field];
    const list: unknown[] = Array.isArray(current) ? [...current] : [];
    const serialized = JSON.stringify(value);
    if (list.some((item) => JSON.stringify(item) === serialized)) return;
    list.push(structuredClone(value));
    this.write(path, { ...existing.fields, [field]: list });
  }

  async query(collection: string, filters: QueryFilter[], options: QueryOptions = {}): Promise<StoredDocument[]> {
    assertFilters(filters);
    let results = [...this.documents.values()].filter(
      (doc) => splitPath(doc.path).collection === collection && filters.every((filter) => matches(doc, filter)),
    );

    const { orderBy = [], limit } = options;
    if (orderBy.length > 0) {
      results = results.sort((a, b) => {
        for (const { field, direction } of orderBy) {
          const diff = compareValues(valueOf(a, field), valueOf(b, field)) ?? 0;
          if (diff !== 0) return direction === 'desc' ? -diff : diff;
        }
        return 0;
      });
    }
    if (limit !== undefined) results = results.slice(0, limit);

    return results.map((doc) => structuredClone(doc));
  }

  subscribe(path: string, onChange: ChangeListener, onError?: ErrorListener): SubscriptionHandle {
    splitPath(path);
    const listener: Listener = { onChange, onError, active: true };
    let set = this.listeners.get(path);
    if (!set) {
      set = new Set();
      this.listeners.set(path, set);
    }
    set.add(listener);
    this.deliver(listener, this.documents.get(path) ?? null);

    return {
      unsubscribe: () => {
        listener.active = false;
        this.listeners.get(path)?.delete(listener);
      },
    };
  }

  async close(): Promise<void> {
    for (const set of this.listeners.values()) {
      for (const listener of set) listener.active = false;
    }
    this.listeners.clear();
  }

  listenerCount(path: string): number {
    return this.listeners.get(path)?.size ?? 0;
  }

  private write(path: string, fields: DocumentFields) {
    const { id } = splitPath(path);
    const previous = this.documents.get(path);
    const doc: StoredDocument = {
      id,
      path,
      version: (previous ? previous.version : 0) + 1,
      fields,
    };
    this.documents.set(path, doc);
    for (const listener of this.listeners.get(path) ?? []) {
      this.deliver(listener, doc);
    }
  }

  private deliver(listener: Listener, doc: StoredDocument | null) {
    const copy = doc ? structuredClone(doc) : null;
    queueMicrotask(() => {
      if (!listener.active) return;
      try {
        listener.onChange(copy);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        if (listener.onError) listener.onError(failure);
        else console.error('❌ Listener failed:', failure.message);
      }
    });
  }
}
