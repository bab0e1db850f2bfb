export type DocumentFields = Record<string, unknown>;

export interface StoredDocument {
  id: string;
  path: string;
  /** Bumped by the store on every write; 0 is never a stored version. */
  version: number;
  fields: DocumentFields;
}

/** Filter on the document id rather than a field. */
export const DOCUMENT_ID = '__id__';

/** Largest value list an `in` filter may carry. */
export const MAX_IN_VALUES = 10;

export type FilterOp = '==' | 'in' | '<' | '<=' | '>' | '>=';

export interface QueryFilter {
  field: string;
  op: FilterOp;
  value: unknown;
}

export interface OrderBy {
  field: string;
  direction: 'asc' | 'desc';
}

export interface QueryOptions {
  /** Sort keys in priority order; later keys only break ties of earlier ones. */
  orderBy?: readonly OrderBy[];
  limit?: number;
}

export type ChangeListener = (doc: StoredDocument | null) => void;
export type ErrorListener = (error: Error) => void;

export interface SubscriptionHandle {
  unsubscribe(): void;
}

export interface DocumentStore {
  get(path: string): Promise<StoredDocument | null>;
  set(path: string, fields: DocumentFields): Promise<void>;
  updateFields(path: string, fields: DocumentFields): Promise<void>;
  /**
   * Merges `fields` only if the stored version still equals `expectedVersion`.
   * `expectedVersion = 0` creates the document and fails if it already exists.
   */
  updateIfVersion(path: string, fields: DocumentFields, expectedVersion: number): Promise<boolean>;
  appendToArrayField(path: string, field: string, value: unknown): Promise<void>;
  query(collection: string, filters: QueryFilter[], options?: QueryOptions): Promise<StoredDocument[]>;
  /** The listener receives the current document first, then one call per write. */
  subscribe(path: string, onChange: ChangeListener, onError?: ErrorListener): SubscriptionHandle;
  close(): Promise<void>;
}
