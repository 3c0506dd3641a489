/**
 * Synchronous persistence operations for one entity type over one connection.
 *
 * Every method runs in a transaction of its own, which becomes a savepoint when a
 * surrounding unit of work already holds one. Version re-checks, revives and audit
 * records therefore always see and commit together with the write they belong to.
 */

import type { SqliteAdapter } from './adapter';
import type { AuditTrail } from './audit';
import {
  WriteCommand,
  applyChanges,
  forCount,
  forDelete,
  forInsert,
  forOverwrite,
  forPurge,
  forSelect,
  forSelectByKey,
  forUpdate,
  forVersionProbe,
  formatKey,
  keyOf,
  readStoredVersion,
  type CommandContext,
  type PurgeFilter,
  type PurgeKind,
  type RunOutcome,
  type StoredVersion,
} from './command-builder';
import {
  ConfigurationError,
  EntityAlreadyExistsError,
  EntityNotFoundError,
  InvalidKeyError,
  ListAlreadyExistsError,
  PersistenceError,
} from './errors';
import type { EntryLists } from './lists';
import { buildMapping } from './mapper';
import type { Predicate } from './predicate';
import { fromStorage, toStorage } from './sqlite-dialect';
import { createRowGuard } from './type-guards';
import type {
  CallerInfo,
  EntityClass,
  EntityKey,
  GetOptions,
  ImportConflictMode,
  MappingDescriptor,
  PurgeOptions,
  PurgeResult,
  Row,
  SelectOptions,
} from './types';

export type ImportOutcome = 'inserted' | 'updated' | 'skipped';

/** Told about each entity a write is about to change. */
export interface WriteTracker {
  track(entity: object): void;
}

export interface SessionServices {
  audit?: AuditTrail;
  lists?: EntryLists;
  clock?: () => Date;
  tracker?: WriteTracker;
}

function hasCode(error: unknown, prefix: string): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith(prefix)
  );
}

export class EntitySession<T extends object> {
  readonly descriptor: MappingDescriptor;
  private readonly isRow: (data: unknown) => data is Row;
  private readonly audit?: AuditTrail;
  private readonly lists?: EntryLists;
  private readonly clock: () => Date;
  private readonly tracker?: WriteTracker;

  constructor(
    readonly entity: EntityClass<T>,
    private readonly adapter: SqliteAdapter,
    services: SessionServices = {},
  ) {
    this.descriptor = buildMapping(entity);
    this.isRow = createRowGuard(this.descriptor);
    this.audit = services.audit;
    this.lists = services.lists;
    this.clock = services.clock ?? (() => new Date());
    this.tracker = services.tracker;
  }

  /**
   * Inserts the entity at version 1. A soft-deleted row with the same key is
   * revived at its next version instead.
   *
   * @throws EntityAlreadyExistsError when a live row has the same key
   */
  create(entity: T, caller?: CallerInfo): T {
    this.tracker?.track(entity);
    return this.adapter.transaction(() => {
      const stored = this.hasAutoIncrementKey(entity) ? undefined : this.probe(keyOf(this.descriptor, entity));
      if (stored && !stored.deleted) {
        throw new EntityAlreadyExistsError(formatKey(this.descriptor, keyOf(this.descriptor, entity)));
      }
      if (stored) {
        this.revive(entity, stored, caller);
      } else {
        this.insert(entity, caller);
      }
      return entity;
    });
  }

  /**
   * Reads one entity by key. Soft-deleted and expired rows are hidden unless
   * requested.
   */
  get(key: EntityKey, options: GetOptions = {}): T | undefined {
    const context = forSelectByKey(this.descriptor, key, options);
    const row = this.adapter.get(context.sql, context.parameters);
    return row ? this.hydrate(row) : undefined;
  }

  exists(key: EntityKey, options: GetOptions = {}): boolean {
    return this.get(key, options) !== undefined;
  }

  /**
   * Writes the entity if its stored version still equals `expectedVersion`
   * (default: the entity's own version property), then bumps the version.
   *
   * @throws ConcurrencyConflictError when another writer got there first
   * @throws EntityNotFoundError when the row is missing or soft-deleted
   */
  update(entity: T, expectedVersion?: number, caller?: CallerInfo): T {
    this.tracker?.track(entity);
    const context = forUpdate(this.descriptor, entity, expectedVersion, this.clock());
    if (this.descriptor.versionColumn && context.expectedVersion === undefined) {
      throw new InvalidKeyError(
        `${this.descriptor.entityName}: update needs the version the entity was read at.`,
      );
    }

    return this.adapter.transaction(() => {
      new WriteCommand(context).execute(this.adapter);
      applyChanges(entity, context);
      this.record(context, 'UPDATE', context.expectedVersion, caller);
      return entity;
    });
  }

  /**
   * Deletes by key, or flags the row deleted for soft-delete entities. Without
   * `expectedVersion` the stored version is read in the same transaction.
   */
  delete(key: EntityKey, expectedVersion?: number, caller?: CallerInfo): void {
    this.adapter.transaction(() => {
      let expected = expectedVersion;
      if (expected === undefined && this.descriptor.versionColumn) {
        const stored = this.probe(key);
        if (!stored || stored.deleted) {
          throw new EntityNotFoundError(formatKey(this.descriptor, key));
        }
        expected = stored.version;
      }

      const context = forDelete(this.descriptor, key, expected, this.clock());
      new WriteCommand(context).execute(this.adapter);
      this.record(context, 'DELETE', context.expectedVersion, caller);
    });
  }

  query(predicate?: Predicate, options: SelectOptions<T> = {}): T[] {
    const context = forSelect(this.descriptor, predicate, options);
    return this.adapter.all(context.sql, context.parameters).map((row) => this.hydrate(row));
  }

  count(predicate?: Predicate, options: GetOptions = {}): number {
    const context = forCount(this.descriptor, predicate, options);
    const row = this.adapter.get(context.sql, context.parameters);
    const value = row?.count;
    return typeof value === 'bigint' ? Number(value) : typeof value === 'number' ? value : 0;
  }

  /**
   * Imports one entity, resolving an existing live row by `mode`.
   */
  importOne(entity: T, mode: ImportConflictMode, caller?: CallerInfo): ImportOutcome {
    this.tracker?.track(entity);
    return this.adapter.transaction((): ImportOutcome => {
      const stored = this.hasAutoIncrementKey(entity) ? undefined : this.probe(keyOf(this.descriptor, entity));
      if (!stored) {
        this.insert(entity, caller);
        return 'inserted';
      }
      if (stored.deleted) {
        this.revive(entity, stored, caller);
        return 'inserted';
      }

      switch (mode) {
        case 'skip':
          return 'skipped';
        case 'fail':
          throw new EntityAlreadyExistsError(formatKey(this.descriptor, keyOf(this.descriptor, entity)));
        case 'overwrite': {
          const context = forOverwrite(this.descriptor, entity, stored.version, this.clock());
          new WriteCommand(context).execute(this.adapter);
          applyChanges(entity, context);
          this.record(context, 'UPDATE', stored.version, caller);
          return 'updated';
        }
      }
    });
  }

  /**
   * Physically removes expired rows and soft-deleted rows. Both kinds are purged
   * unless one is switched off; `where` and an age limit narrow every kind, and
   * live rows go only when asked for together with one of them.
   *
   * @throws ConfigurationError for an invalid age limit or an unfiltered live purge
   */
  purge(options: Omit<PurgeOptions, 'signal' | 'caller'> = {}): PurgeResult {
    const filter: PurgeFilter = { where: options.where, cutoff: this.purgeCutoff(options) };
    const filtered = (filter.where !== undefined && filter.where !== null) || filter.cutoff !== undefined;
    if (options.live === true && !filtered) {
      throw new ConfigurationError(
        `${this.descriptor.entityName}: purging live rows needs a where predicate or an age limit.`,
      );
    }

    const run = (kind: PurgeKind, enabled: boolean): number => {
      const context = enabled ? forPurge(this.descriptor, kind, filter) : undefined;
      return context ? this.adapter.run(context.sql, context.parameters).changes : 0;
    };
    return this.adapter.transaction(() => ({
      expired: run('expired', options.expired !== false),
      deleted: run('deleted', options.deleted !== false),
      live: run('live', options.live === true),
    }));
  }

  /**
   * Creates the entities (reviving soft-deleted ones) and records them, in order,
   * as the list `listKey`.
   *
   * @throws ListAlreadyExistsError when the list already has entries
   * @throws EntityAlreadyExistsError when one of the entities already exists
   */
  createList(listKey: string, entities: readonly T[], caller?: CallerInfo): T[] {
    const lists = this.requireLists(listKey);
    return this.adapter.transaction(() => {
      if (lists.has(this.descriptor.entityName, listKey)) {
        throw new ListAlreadyExistsError(listKey);
      }
      entities.forEach((entity) => this.create(entity, caller));
      lists.append(this.descriptor.entityName, listKey, entities.map((entity) => this.entryKey(entity)), caller);
      return [...entities];
    });
  }

  /** Live members of the list in list order; empty for an unknown list. */
  getList(listKey: string): T[] {
    const lists = this.requireLists(listKey);
    return lists
      .entryKeys(this.descriptor.entityName, listKey)
      .map((entryKey) => this.get(this.keyFromEntry(entryKey)))
      .filter((entity): entity is T => entity !== undefined);
  }

  /**
   * Replaces the list's entries. Entities that exist are updated under their
   * version check, the others are created.
   */
  updateList(listKey: string, entities: readonly T[], caller?: CallerInfo): T[] {
    const lists = this.requireLists(listKey);
    return this.adapter.transaction(() => {
      lists.clear(this.descriptor.entityName, listKey);
      for (const entity of entities) {
        if (this.exists(keyOf(this.descriptor, entity), { includeExpired: true })) {
          this.update(entity, undefined, caller);
        } else {
          this.create(entity, caller);
        }
      }
      lists.append(this.descriptor.entityName, listKey, entities.map((entity) => this.entryKey(entity)), caller);
      return [...entities];
    });
  }

  /**
   * Deletes every member of the list that is still present, then the list itself.
   * Returns how many entities were deleted; 0 for an unknown list.
   */
  deleteList(listKey: string, caller?: CallerInfo): number {
    const lists = this.requireLists(listKey);
    return this.adapter.transaction(() => {
      let deleted = 0;
      for (const entryKey of lists.entryKeys(this.descriptor.entityName, listKey)) {
        const key = this.keyFromEntry(entryKey);
        if (this.exists(key, { includeExpired: true })) {
          this.delete(key, undefined, caller);
          deleted += 1;
        }
      }
      lists.clear(this.descriptor.entityName, listKey);
      return deleted;
    });
  }

  /** Builds an entity instance from a raw row. */
  hydrate(row: Row): T {
    if (!this.isRow(row)) {
      throw new PersistenceError(
        `${this.descriptor.entityName}: row does not match the mapped columns (${this.descriptor.columns
          .map((c) => c.name)
          .join(', ')}).`,
      );
    }
    const instance = new this.entity();
    for (const column of this.descriptor.columns) {
      Reflect.set(instance, column.property, fromStorage(column, row[column.name]));
    }
    return instance;
  }

  private purgeCutoff(options: Pick<PurgeOptions, 'olderThanMs' | 'cutoff'>): Date | undefined {
    const { olderThanMs, cutoff } = options;
    if (olderThanMs !== undefined && cutoff !== undefined) {
      throw new ConfigurationError('Pass either olderThanMs or cutoff to purge, not both.');
    }
    if (olderThanMs !== undefined) {
      if (!Number.isFinite(olderThanMs) || olderThanMs < 0) {
        throw new ConfigurationError(`olderThanMs must be a non-negative number, got ${olderThanMs}.`);
      }
      return new Date(this.clock().getTime() - olderThanMs);
    }
    if (cutoff !== undefined && Number.isNaN(cutoff.getTime())) {
      throw new ConfigurationError('cutoff must be a valid date.');
    }
    return cutoff;
  }

  private requireLists(listKey: string): EntryLists {
    if (!this.descriptor.lists || !this.lists) {
      throw new ConfigurationError(`${this.descriptor.entityName} does not enable lists.`);
    }
    if (listKey.trim() === '') {
      throw new InvalidKeyError('List key must be a non-empty string.');
    }
    return this.lists;
  }

  /** The single key column in its stored form, as text. */
  private entryKey(entity: T): string {
    const [column] = this.descriptor.primaryKey;
    return String(toStorage(column, keyOf(this.descriptor, entity)));
  }

  private keyFromEntry(entryKey: string): EntityKey {
    const [column] = this.descriptor.primaryKey;
    return column.type === 'integer' ? Number(entryKey) : entryKey;
  }

  private hasAutoIncrementKey(entity: T): boolean {
    const [first] = this.descriptor.primaryKey;
    if (!first.autoIncrement) return false;
    const value: unknown = Reflect.get(entity, first.property);
    return value === undefined || value === null;
  }

  private probe(key: EntityKey): StoredVersion | undefined {
    const context = forVersionProbe(this.descriptor, key);
    const row = this.adapter.get(context.sql, context.parameters);
    return row ? readStoredVersion(this.descriptor, row) : undefined;
  }

  private insert(entity: T, caller: CallerInfo | undefined): void {
    const context = forInsert(this.descriptor, entity, this.clock());
    let outcome: RunOutcome;
    try {
      outcome = new WriteCommand(context).execute(this.adapter);
    } catch (error) {
      // another connection inserted the same key after the probe
      if (context.entityKey !== undefined && hasCode(error, 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
        throw new EntityAlreadyExistsError(context.entityKey);
      }
      throw error;
    }
    applyChanges(entity, context);

    const [first] = this.descriptor.primaryKey;
    if (first.autoIncrement && context.entityKey === undefined) {
      const rowid = outcome.lastInsertRowid;
      Reflect.set(entity, first.property, typeof rowid === 'bigint' ? Number(rowid) : rowid);
    }
    this.record(
      { ...context, entityKey: formatKey(this.descriptor, keyOf(this.descriptor, entity)) },
      'CREATE',
      undefined,
      caller,
    );
  }

  private revive(entity: T, stored: StoredVersion, caller: CallerInfo | undefined): void {
    const now = this.clock();
    const { expirationColumn, expiresAfterMs } = this.descriptor;
    if (expirationColumn && expiresAfterMs !== undefined) {
      const current: unknown = Reflect.get(entity, expirationColumn.property);
      if (current === undefined || current === null) {
        Reflect.set(entity, expirationColumn.property, new Date(now.getTime() + expiresAfterMs));
      }
    }

    const context = forOverwrite(this.descriptor, entity, stored.version, now);
    new WriteCommand(context).execute(this.adapter);
    applyChanges(entity, context);

    // the revived row keeps its original creation time
    const created = this.descriptor.createdTimeColumn;
    if (created) {
      const current = this.get(keyOf(this.descriptor, entity), { includeExpired: true });
      if (current) {
        Reflect.set(entity, created.property, Reflect.get(current, created.property));
      }
    }
    this.record(context, 'CREATE', stored.version, caller);
  }

  private record(
    context: CommandContext,
    operation: 'CREATE' | 'UPDATE' | 'DELETE',
    oldVersion: number | undefined,
    caller: CallerInfo | undefined,
  ): void {
    if (!this.audit || !this.descriptor.auditTrail || context.entityKey === undefined) {
      return;
    }
    const versionColumn = this.descriptor.versionColumn;
    const changed = versionColumn ? context.changes?.[versionColumn.property] : undefined;
    const version =
      typeof changed === 'number'
        ? changed
        : operation === 'DELETE' && oldVersion !== undefined
          ? oldVersion + (this.descriptor.softDelete ? 1 : 0)
          : 0;

    this.audit.record({
      entityType: this.descriptor.entityName,
      entityId: context.entityKey,
      operation,
      version,
      oldVersion,
      caller,
    });
  }
}
