/**
 * Repository implements the Data Mapper pattern for entity persistence.
 *
 * Every call runs as one transaction on the shared connection, wrapped by the
 * retry policy: a transient failure rolls the whole call back and re-runs it.
 * Writes work on a copy of the caller's entity, and the committed version and
 * timestamps are copied back only once the transaction has committed.
 */

import type { SqliteAdapter } from './adapter';
import type { AuditRecord, AuditTrail } from './audit';
import { formatKey, keyOf } from './command-builder';
import { ConfigurationError, OperationCancelledError, UnsupportedExpressionError } from './errors';
import type { EntryLists } from './lists';
import type { Logger } from './logger';
import type { Predicate } from './predicate';
import type { RetryPolicy } from './retry-policy';
import { EntitySession } from './session';
import type {
  BatchOptions,
  BulkImportOptions,
  BulkImportResult,
  DeleteOptions,
  EntityClass,
  EntityKey,
  GetOptions,
  IRepository,
  MappingDescriptor,
  OperationOptions,
  PageOptions,
  PagedResult,
  PurgeOptions,
  PurgeResult,
  SelectOptions,
  UpdateOptions,
} from './types';

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_IMPORT_BATCH_SIZE = 500;

/** Shared services a repository runs on. */
export interface RepositoryContext {
  adapter: SqliteAdapter;
  retry: RetryPolicy;
  logger: Logger;
  audit?: AuditTrail;
  lists?: EntryLists;
  /** Busy timeout for each attempt */
  commandTimeoutMs?: number;
  clock?: () => Date;
}

function chunk<V>(items: readonly V[], size: number): V[][] {
  if (!Number.isSafeInteger(size) || size < 1) {
    throw new ConfigurationError(`batchSize must be a positive integer, got ${size}.`);
  }
  const chunks: V[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, { cause: signal.reason });
  }
}

export class Repository<T extends object> implements IRepository<T> {
  private readonly session: EntitySession<T>;
  private readonly logger: Logger;

  constructor(
    readonly target: EntityClass<T>,
    private readonly context: RepositoryContext,
  ) {
    this.session = new EntitySession(target, context.adapter, {
      audit: context.audit,
      lists: context.lists,
      clock: context.clock,
    });
    this.logger = context.logger.child(`Repository:${this.session.descriptor.tableName}`);
  }

  get descriptor(): MappingDescriptor {
    return this.session.descriptor;
  }

  /**
   * Insert a new entity. On success the entity carries version 1 and its
   * timestamps (and its generated key, for auto-increment keys).
   *
   * @example
   * ```typescript
   * const item = new Item();
   * item.id = 'item-1';
   * item.name = 'John Doe';
   * await items.create(item); // item.version === 1
   * ```
   */
  async create(entity: T, options: OperationOptions = {}): Promise<T> {
    const saved = await this.execute('create', options, (session) =>
      session.create(this.workingCopy(entity), options.caller),
    );
    Object.assign(entity, saved);
    this.logger.debug(`Created ${this.describe(saved)}`);
    return entity;
  }

  async get(key: EntityKey, options: GetOptions & OperationOptions = {}): Promise<T | undefined> {
    return this.execute('get', options, (session) => session.get(key, options));
  }

  async exists(key: EntityKey, options: GetOptions & OperationOptions = {}): Promise<boolean> {
    return this.execute('exists', options, (session) => session.exists(key, options));
  }

  /**
   * Version-checked update.
   *
   * @throws ConcurrencyConflictError when the stored version moved on
   * @throws EntityNotFoundError when the row no longer exists
   */
  async update(entity: T, options: UpdateOptions = {}): Promise<T> {
    const saved = await this.execute('update', options, (session) =>
      session.update(this.workingCopy(entity), options.expectedVersion, options.caller),
    );
    Object.assign(entity, saved);
    this.logger.debug(`Updated ${this.describe(saved)}`);
    return entity;
  }

  async delete(key: EntityKey, options: DeleteOptions = {}): Promise<void> {
    await this.execute('delete', options, (session) =>
      session.delete(key, options.expectedVersion, options.caller),
    );
    this.logger.debug(`Deleted ${formatKey(this.descriptor, key)}`);
  }

  async query(predicate?: Predicate, options: SelectOptions<T> & OperationOptions = {}): Promise<T[]> {
    return this.execute('query', options, (session) => session.query(predicate, options));
  }

  /**
   * One page of results plus the total number of matching rows, read in the
   * same transaction.
   */
  async queryPaged(predicate: Predicate | undefined, options: PageOptions<T>): Promise<PagedResult<T>> {
    const { page, pageSize } = options;
    if (!Number.isSafeInteger(page) || page < 1) {
      throw new UnsupportedExpressionError('page', `must be a positive integer, got ${page}`);
    }
    if (!Number.isSafeInteger(pageSize) || pageSize < 1) {
      throw new UnsupportedExpressionError('pageSize', `must be a positive integer, got ${pageSize}`);
    }

    const filters = { includeDeleted: options.includeDeleted, includeExpired: options.includeExpired };
    return this.execute('queryPaged', options, (session) => ({
      items: session.query(predicate, {
        ...filters,
        orderBy: options.orderBy,
        limit: pageSize,
        offset: (page - 1) * pageSize,
      }),
      totalCount: session.count(predicate, filters),
      page,
      pageSize,
    }));
  }

  async count(predicate?: Predicate, options: GetOptions & OperationOptions = {}): Promise<number> {
    return this.execute('count', options, (session) => session.count(predicate, options));
  }

  /**
   * Inserts all entities in one transaction; nothing is written if any fails.
   */
  async createMany(entities: readonly T[], options: BatchOptions = {}): Promise<T[]> {
    const saved = await this.execute('createMany', options, (session) => {
      const copies = entities.map((entity) => this.workingCopy(entity));
      for (const batch of chunk(copies, options.batchSize ?? DEFAULT_BATCH_SIZE)) {
        throwIfAborted(options.signal, 'createMany');
        batch.forEach((copy) => session.create(copy, options.caller));
      }
      return copies;
    });
    return this.copyBack(entities, saved);
  }

  /**
   * Version-checks and updates all entities in one transaction; the first
   * conflict rolls back every update.
   */
  async updateMany(entities: readonly T[], options: BatchOptions = {}): Promise<T[]> {
    const saved = await this.execute('updateMany', options, (session) => {
      const copies = entities.map((entity) => this.workingCopy(entity));
      for (const batch of chunk(copies, options.batchSize ?? DEFAULT_BATCH_SIZE)) {
        throwIfAborted(options.signal, 'updateMany');
        batch.forEach((copy) => session.update(copy, undefined, options.caller));
      }
      return copies;
    });
    return this.copyBack(entities, saved);
  }

  /** Deletes every key in one transaction and returns how many were deleted. */
  async deleteMany(keys: readonly EntityKey[], options: BatchOptions = {}): Promise<number> {
    return this.execute('deleteMany', options, (session) => {
      for (const batch of chunk(keys, options.batchSize ?? DEFAULT_BATCH_SIZE)) {
        throwIfAborted(options.signal, 'deleteMany');
        batch.forEach((key) => session.delete(key, undefined, options.caller));
      }
      return keys.length;
    });
  }

  /**
   * Imports entities batch by batch, each batch in its own transaction. Existing
   * live rows are skipped, overwritten or fail the batch according to `onConflict`.
   * Batches committed before a failure stay committed.
   */
  async bulkImport(entities: readonly T[], options: BulkImportOptions = {}): Promise<BulkImportResult> {
    const mode = options.onConflict ?? 'skip';
    const result: BulkImportResult = { inserted: 0, updated: 0, skipped: 0, batches: 0 };
    const batches = chunk(entities, options.batchSize ?? DEFAULT_IMPORT_BATCH_SIZE);

    for (const batch of batches) {
      const outcome = await this.execute('bulkImport', options, (session) => {
        const copies = batch.map((entity) => this.workingCopy(entity));
        const outcomes = copies.map((copy) => session.importOne(copy, mode, options.caller));
        return { copies, outcomes };
      });

      this.copyBack(batch, outcome.copies);
      for (const kind of outcome.outcomes) {
        result[kind] += 1;
      }
      result.batches += 1;
    }

    this.logger.info(
      `Imported ${entities.length} record(s) in ${result.batches} batch(es): ` +
        `${result.inserted} inserted, ${result.updated} updated, ${result.skipped} skipped`,
    );
    return result;
  }

  /** Plain objects keyed by property name, e.g. for JSON export. */
  async exportRecords(
    predicate?: Predicate,
    options: SelectOptions<T> & OperationOptions = {},
  ): Promise<Record<string, unknown>[]> {
    const entities = await this.query(predicate, options);
    return entities.map((entity) =>
      Object.fromEntries(
        this.descriptor.columns.map((column) => [column.property, Reflect.get(entity, column.property)]),
      ),
    );
  }

  /**
   * Physically removes expired and soft-deleted rows, optionally only those
   * matching `where` or last written before a cutoff.
   *
   * @example
   * ```typescript
   * const p = predicateBuilder<Note>();
   * await notes.purge({ where: p.eq('title', 'Draft'), olderThanMs: 30 * 24 * 60 * 60 * 1000 });
   * ```
   */
  async purge(options: PurgeOptions = {}): Promise<PurgeResult> {
    const result = await this.execute('purge', options, (session) => session.purge(options));
    this.logger.info(
      `Purged ${result.expired} expired, ${result.deleted} deleted and ${result.live} live row(s)`,
    );
    return result;
  }

  /**
   * Creates the entities and groups them, in order, under `listKey`; all in
   * one transaction.
   *
   * @throws ListAlreadyExistsError when the list already exists
   */
  async createList(listKey: string, entities: readonly T[], options: OperationOptions = {}): Promise<T[]> {
    const saved = await this.execute('createList', options, (session) =>
      session.createList(
        listKey,
        entities.map((entity) => this.workingCopy(entity)),
        options.caller,
      ),
    );
    this.logger.debug(`Created list '${listKey}' with ${saved.length} entr(ies)`);
    return this.copyBack(entities, saved);
  }

  async getList(listKey: string, options: OperationOptions = {}): Promise<T[]> {
    return this.execute('getList', options, (session) => session.getList(listKey));
  }

  /** Replaces the list's entries, updating entities that exist and creating the rest. */
  async updateList(listKey: string, entities: readonly T[], options: OperationOptions = {}): Promise<T[]> {
    const saved = await this.execute('updateList', options, (session) =>
      session.updateList(
        listKey,
        entities.map((entity) => this.workingCopy(entity)),
        options.caller,
      ),
    );
    this.logger.debug(`Updated list '${listKey}' to ${saved.length} entr(ies)`);
    return this.copyBack(entities, saved);
  }

  /** Deletes the list and its member entities; returns how many entities were deleted. */
  async deleteList(listKey: string, options: OperationOptions = {}): Promise<number> {
    const deleted = await this.execute('deleteList', options, (session) =>
      session.deleteList(listKey, options.caller),
    );
    this.logger.debug(`Deleted list '${listKey}' and ${deleted} entit(ies)`);
    return deleted;
  }

  /** Audit records of one entity, oldest first; empty when auditing is off. */
  async getAuditTrail(key: EntityKey, options: OperationOptions = {}): Promise<AuditRecord[]> {
    const audit = this.context.audit;
    if (!audit || !this.descriptor.auditTrail) {
      return [];
    }
    const entityId = formatKey(this.descriptor, key);
    return this.execute('getAuditTrail', options, () => audit.history(this.descriptor.entityName, entityId));
  }

  private execute<R>(
    operation: string,
    options: OperationOptions,
    work: (session: EntitySession<T>) => R,
  ): Promise<R> {
    const { adapter, retry, commandTimeoutMs } = this.context;
    return retry.execute(
      () => adapter.withBusyTimeout(commandTimeoutMs, () => adapter.transaction(() => work(this.session))),
      { operation: `${this.descriptor.entityName}.${operation}`, signal: options.signal },
    );
  }

  private workingCopy(entity: T): T {
    return Object.assign(new this.target(), entity);
  }

  private copyBack(originals: readonly T[], saved: readonly T[]): T[] {
    originals.forEach((original, i) => Object.assign(original, saved[i]));
    return [...originals];
  }

  private describe(entity: T): string {
    return `${this.descriptor.entityName} ${formatKey(this.descriptor, keyOf(this.descriptor, entity))}`;
  }
}
