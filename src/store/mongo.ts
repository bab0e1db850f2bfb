import mongoose from 'mongoose';
import User from '../models/User';
import Leaderboard from '../models/Leaderboard';
import { StoredRecord } from '../models/StoredRecord';
import { ConflictError, DocumentNotFoundError, StoreQueryError, TransientStoreError, describeError } from '../xp/errors';
import { LEADERBOARD, USERS, assertFilters, splitPath } from './paths';
import {
  ChangeListener,
  DOCUMENT_ID,
  DocumentFields,
  DocumentStore,
  ErrorListener,
  OrderBy,
  QueryFilter,
  QueryOptions,
  StoredDocument,
  SubscriptionHandle,
} from './types';

type StoredModel = mongoose.Model<StoredRecord>;
type ChangeStream = mongoose.mongo.ChangeStream<StoredRecord, mongoose.mongo.ChangeStreamDocument<StoredRecord>>;

const OVERWRITE_ATTEMPTS = 5;

const OPERATORS = {
  '<': '$lt',
  '<=': '$lte',
  '>': '$gt',
  '>=': '$gte',
} as const;

export const toMongoFilter = (filters: QueryFilter[]): mongoose.FilterQuery<StoredRecord> => {
  assertFilters(filters);
  const query: mongoose.FilterQuery<StoredRecord> = {};
  for (const { field, op, value } of filters) {
    const key = field === DOCUMENT_ID ? '_id' : field;
    const previous: unknown = query[key];
    const conditions: Record<string, unknown> =
      typeof previous === 'object' && previous !== null && !(previous instanceof Date) ? { ...previous } : {};
    if (op === '==') conditions.$eq = value;
    else if (op === 'in') conditions.$in = value;
    else conditions[OPERATORS[op]] = value;
    query[key] = conditions;
  }
  return query;
};

export const toMongoSort = (orderBy: readonly OrderBy[]): Record<string, 1 | -1> => {
  const sort: Record<string, 1 | -1> = {};
  for (const { field, direction } of orderBy) {
    sort[field === DOCUMENT_ID ? '_id' : field] = direction === 'desc' ? -1 : 1;
  }
  return sort;
};

const toStored = (collection: string, raw: object): StoredDocument => {
  let id = '';
  let version = 0;
  const fields: DocumentFields = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === '_id') id = String(value);
    else if (key === '_version') version = typeof value === 'number' ? value : 0;
    else fields[key] = value;
  }
  return { id, path: `${collection}/${id}`, version, fields };
};

const isDuplicateKey = (error: unknown) => error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

const isTransient = (error: unknown) =>
  error instanceof mongoose.mongo.MongoNetworkError || error instanceof mongoose.mongo.MongoServerSelectionError;

const guard = async <T>(operation: () => Promise<T>): Promise<T> => {
  try {
    return await operation();
  } catch (error) {
    if (isTransient(error)) {
      throw new TransientStoreError(`MongoDB unreachable: ${describeError(error)}`, error);
    }
    throw error;
  }
};

/**
 * Document store over mongoose models. Subscriptions use change streams and
 * therefore need a replica set (a single-node one is enough).
 */
export class MongoDocumentStore implements DocumentStore {
  private streams = new Set<ChangeStream>();

  constructor(
    private readonly models: Record<string, StoredModel> = { [USERS]: User, [LEADERBOARD]: Leaderboard },
  ) {}

  async get(path: string): Promise<StoredDocument | null> {
    const { collection, id } = splitPath(path);
    const raw = await guard(() => this.model(collection).findById(id).lean().exec());
    return raw ? toStored(collection, raw) : null;
  }

  async set(path: string, fields: DocumentFields): Promise<void> {
    const { collection, id } = splitPath(path);
    const model = this.model(collection);

    for (let attempt = 0; attempt < OVERWRITE_ATTEMPTS; attempt++) {
      const current = await this.get(path);
      if (!current) {
        const created = await this.create(model, id, fields);
        if (created) return;
        continue;
      }
      const result = await guard(() =>
        model.replaceOne({ _id: id, _version: current.version }, { ...fields, _id: id, _version: current.version + 1 }).exec(),
      );
      if (result.matchedCount === 1) return;
    }
    throw new ConflictError(path, OVERWRITE_ATTEMPTS);
  }

  async updateFields(path: string, fields: DocumentFields): Promise<void> {
    const { collection, id } = splitPath(path);
    const result = await guard(() =>
      this.model(collection).updateOne({ _id: id }, { $set: fields, $inc: { _version: 1 } }).exec(),
    );
    if (result.matchedCount === 0) throw new DocumentNotFoundError(path);
  }

  async updateIfVersion(path: string, fields: DocumentFields, expectedVersion: number): Promise<boolean> {
    const { collection, id } = splitPath(path);
    const model = this.model(collection);
    if (expectedVersion === 0) return this.create(model, id, fields);

    const result = await guard(() =>
      model.updateOne({ _id: id, _version: expectedVersion }, { $set: fields, $inc: { _version: 1 } }).exec(),
    );
    return result.matchedCount === 1;
  }

  async appendToArrayField(path: string, field: string, value: unknown): Promise<void> {
    const { collection, id } = splitPath(path);
    const result = await guard(() =>
      this.model(collection).updateOne({ _id: id }, { $addToSet: { [field]: value }, $inc: { _version: 1 } }).exec(),
    );
    if (result.matchedCount === 0) throw new DocumentNotFoundError(path);
  }

  async query(collection: string, filters: QueryFilter[], options: QueryOptions = {}): Promise<StoredDocument[]> {
    const model = this.model(collection);
    const filter = toMongoFilter(filters);
    const rows = await guard(() => {
      let query = model.find(filter);
      if (options.orderBy && options.orderBy.length > 0) query = query.sort(toMongoSort(options.orderBy));
      if (options.limit !== undefined) query = query.limit(options.limit);
      return query.lean().exec();
    });
    return rows.map((row) => toStored(collection, row));
  }

  subscribe(path: string, onChange: ChangeListener, onError?: ErrorListener): SubscriptionHandle {
    const { collection, id } = splitPath(path);
    const stream: ChangeStream = this.model(collection).watch<StoredRecord, mongoose.mongo.ChangeStreamDocument<StoredRecord>>(
      [{ $match: { 'documentKey._id': id } }],
      { fullDocument: 'updateLookup' },
    );
    this.streams.add(stream);

    let active = true;
    let lastVersion = -1;

    const report = (error: unknown) => {
      if (!active) return;
      const failure = isTransient(error)
        ? new TransientStoreError(`Change stream for ${path} lost: ${describeError(error)}`, error)
        : error instanceof Error ? error : new Error(String(error));
      if (onError) onError(failure);
      else console.error(`❌ Subscription ${path}:`, failure.message);
    };

    // the initial read and the stream race; never hand out an older version than already delivered
    const emit = (doc: StoredDocument | null) => {
      if (!active) return;
      if (doc && doc.version <= lastVersion) return;
      if (doc) lastVersion = doc.version;
      onChange(doc);
    };

    stream.on('change', (change) => {
      if ('fullDocument' in change && change.fullDocument) emit(toStored(collection, change.fullDocument));
      else if (change.operationType === 'delete') emit(null);
    });
    stream.on('error', report);

    this.get(path).then(emit, report);

    return {
      unsubscribe: () => {
        if (!active) return;
        active = false;
        this.streams.delete(stream);
        stream.close().catch((error: unknown) => console.error(`❌ Closing stream ${path}:`, describeError(error)));
      },
    };
  }

  async close(): Promise<void> {
    const streams = [...this.streams];
    this.streams.clear();
    await Promise.all(streams.map((stream) => stream.close()));
  }

  private model(collection: string): StoredModel {
    const model = this.models[collection];
    if (!model) throw new StoreQueryError(`Unknown collection "${collection}"`);
    return model;
  }

  private async create(model: StoredModel, id: string, fields: DocumentFields): Promise<boolean> {
    try {
      await guard(() => model.create({ ...fields, _id: id, _version: 1 }));
      return true;
    } catch (error) {
      if (isDuplicateKey(error)) return false;
      throw error;
    }
  }
}
