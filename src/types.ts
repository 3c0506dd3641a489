/**
 * Core type definitions for the mapper.
 * This module defines metadata keys, descriptor shapes, configuration options and
 * the repository / entity manager contracts.
 */

import type { AuditRecord } from './audit';
import type { Logger } from './logger';
import type { Predicate } from './predicate';
import type { RetryConfig } from './retry-policy';
import type { EntitySession } from './session';
import type { RetryObserver } from './telemetry';

/**
 * Metadata keys for storing entity and column information.
 * Using Symbols prevents naming collisions in the metadata registry.
 */
export const TABLE_KEY = Symbol('table');
export const COLUMN_KEY = Symbol('column');
export const INDEX_KEY = Symbol('index');
export const FOREIGN_KEY = Symbol('foreignKey');
export const NOT_MAPPED_KEY = Symbol('notMapped');

/**
 * An entity class. Entities are hydrated through their no-argument constructor.
 */
export type EntityClass<T extends object = object> = new () => T;

/** Values SQLite can bind. */
export type BindValue = string | number | bigint | Buffer | null;

/** Values accepted in predicates and entity keys. */
export type ScalarValue = string | number | bigint | boolean | Date | Buffer | null;

/** A raw row as returned by the driver. */
export type Row = Record<string, unknown>;

/** Named parameters, keyed by placeholder including its `@` prefix. */
export type Parameters = Record<string, BindValue>;

/**
 * Entity key: the scalar value of a single-column primary key, or an object keyed
 * by property name for composite keys.
 */
export type EntityKey = ScalarValue | Readonly<Record<string, ScalarValue>>;

/**
 * Logical column types. Each maps to one SQLite storage class.
 */
export type LogicalType =
  | 'text'
  | 'integer'
  | 'real'
  | 'boolean'
  | 'datetime'
  | 'json'
  | 'blob';

/**
 * Maps logical types to SQLite column types.
 * Used during schema synchronization.
 */
export const TYPE_MAP: Record<LogicalType, string> = {
  text: 'TEXT',
  integer: 'INTEGER',
  real: 'REAL',
  boolean: 'INTEGER',
  datetime: 'TEXT',
  json: 'TEXT',
  blob: 'BLOB',
};

export type ColumnRole =
  | 'data'
  | 'version'
  | 'createdTime'
  | 'lastWriteTime'
  | 'softDelete'
  | 'expiration';

/** Raw SQL default, emitted verbatim inside parentheses. */
export interface SqlExpression {
  sql: string;
}

export type DefaultValue = string | number | boolean | null | SqlExpression;

export type ForeignKeyAction =
  | 'noAction'
  | 'restrict'
  | 'cascade'
  | 'setNull'
  | 'setDefault';

export interface EntityOptions {
  /** Deletes set `IsDeleted = 1` instead of removing the row. */
  softDelete?: boolean;
  /** Rows carry an `AbsoluteExpiration`; `afterMs` defaults it from `CreatedTime`. */
  expiry?: boolean | { afterMs: number };
  /** Writes are recorded in the `Audit` table. */
  auditTrail?: boolean;
  /** Entities can be grouped into named lists kept in `EntryListMapping`. */
  lists?: boolean;
}

export interface ColumnOptions {
  name?: string;
  type?: LogicalType;
  nullable?: boolean;
  unique?: boolean;
  size?: number;
  precision?: number;
  scale?: number;
  default?: DefaultValue;
}

export interface PrimaryColumnOptions extends ColumnOptions {
  /** Position within a composite key, 1-based. */
  order?: number;
  autoIncrement?: boolean;
}

export interface IndexOptions {
  order?: number;
  unique?: boolean;
  descending?: boolean;
  /** Partial-index predicate, emitted verbatim. */
  where?: string;
}

export interface ForeignKeyOptions {
  name?: string;
  /** Property on the target entity; defaults to its single primary-key column. */
  referencedProperty?: string;
  onDelete?: ForeignKeyAction;
  onUpdate?: ForeignKeyAction;
}

/**
 * Metadata recorded by the column decorators.
 */
export interface ColumnMetadata {
  /** TypeScript property name */
  property: string;
  options: PrimaryColumnOptions;
  /** Runtime type emitted by emitDecoratorMetadata */
  designType?: unknown;
  primary: boolean;
  role: ColumnRole;
}

export interface IndexMetadata {
  property: string;
  name: string;
  options: IndexOptions;
}

export interface ForeignKeyMetadata {
  property: string;
  target: () => Function;
  options: ForeignKeyOptions;
}

export interface TableMetadata {
  name: string;
  options: EntityOptions;
}

export interface ColumnDescriptor {
  readonly property: string;
  readonly name: string;
  readonly type: LogicalType;
  readonly sqlType: string;
  readonly nullable: boolean;
  readonly unique: boolean;
  readonly size?: number;
  readonly precision?: number;
  readonly scale?: number;
  readonly defaultValue?: DefaultValue;
  readonly autoIncrement: boolean;
  /** 1-based position in the primary key, absent for non-key columns. */
  readonly primaryKeyOrder?: number;
  readonly role: ColumnRole;
}

export interface IndexColumnDescriptor {
  readonly name: string;
  readonly descending: boolean;
}

export interface IndexDescriptor {
  readonly name: string;
  readonly unique: boolean;
  readonly columns: readonly IndexColumnDescriptor[];
  readonly where?: string;
}

export interface ForeignKeyDescriptor {
  readonly name?: string;
  readonly columns: readonly string[];
  readonly referencedTable: string;
  readonly referencedColumns: readonly string[];
  readonly referencedEntity: Function;
  readonly onDelete: ForeignKeyAction;
  readonly onUpdate: ForeignKeyAction;
}

/**
 * Everything the compiler, translator and sessions need to know about one entity.
 * Built once per class and frozen.
 */
export interface MappingDescriptor {
  readonly entity: Function;
  readonly entityName: string;
  readonly tableName: string;
  readonly columns: readonly ColumnDescriptor[];
  readonly primaryKey: readonly ColumnDescriptor[];
  readonly versionColumn?: ColumnDescriptor;
  readonly createdTimeColumn?: ColumnDescriptor;
  readonly lastWriteTimeColumn?: ColumnDescriptor;
  readonly softDeleteColumn?: ColumnDescriptor;
  readonly expirationColumn?: ColumnDescriptor;
  readonly softDelete: boolean;
  readonly expiry: boolean;
  readonly expiresAfterMs?: number;
  readonly auditTrail: boolean;
  readonly lists: boolean;
  readonly indexes: readonly IndexDescriptor[];
  readonly foreignKeys: readonly ForeignKeyDescriptor[];
}

/**
 * Configuration options for DataSource initialization.
 */
export interface DataSourceOptions {
  /** Path to the SQLite database file, or ':memory:' */
  dbPath: string;
  /** Array of entity classes to register */
  entities: EntityClass[];
  /** If true, creates tables and indexes from entity metadata */
  synchronize?: boolean;
  /** Logs connection, schema and retry activity to the console */
  logging?: boolean;
  /** Retry settings, merged field by field over the defaults */
  retry?: Partial<RetryConfig>;
  /** Busy timeout applied to every command attempt, in milliseconds */
  commandTimeoutMs?: number;
  /** Receives retry and exhaustion events; defaults to OpenTelemetry counters */
  retryObserver?: RetryObserver;
  /** Overrides the console logger */
  logger?: Logger;
}

/** Who performed an operation, recorded in the audit trail. */
export interface CallerInfo {
  userId?: string;
  member?: string;
}

export interface OperationOptions {
  signal?: AbortSignal;
  caller?: CallerInfo;
}

export interface OrderKey<T> {
  field: Extract<keyof T, string>;
  direction: 'ASC' | 'DESC';
}

export interface OrderSpec<T> {
  readonly keys: readonly OrderKey<T>[];
}

export interface SelectOptions<T> {
  orderBy?: OrderSpec<T>;
  limit?: number;
  offset?: number;
  includeDeleted?: boolean;
  includeExpired?: boolean;
}

export interface GetOptions {
  includeDeleted?: boolean;
  includeExpired?: boolean;
}

export interface PagedResult<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
}

export type ImportConflictMode = 'skip' | 'overwrite' | 'fail';

export interface BulkImportOptions extends OperationOptions {
  onConflict?: ImportConflictMode;
  batchSize?: number;
}

export interface BulkImportResult {
  inserted: number;
  updated: number;
  skipped: number;
  batches: number;
}

export interface PurgeOptions extends OperationOptions {
  expired?: boolean;
  deleted?: boolean;
  /** Also removes live rows; only together with `where`, `olderThanMs` or `cutoff`. */
  live?: boolean;
  /** Only rows matching the predicate are purged. */
  where?: Predicate | null;
  /** Only rows last written more than this many milliseconds ago. */
  olderThanMs?: number;
  /** Only rows last written before this instant. */
  cutoff?: Date;
}

export interface PurgeResult {
  expired: number;
  deleted: number;
  live: number;
}

export interface UpdateOptions extends OperationOptions {
  /** Defaults to the entity's own version property. */
  expectedVersion?: number;
}

export interface DeleteOptions extends OperationOptions {
  /** When omitted, the stored version is read in the same transaction. */
  expectedVersion?: number;
}

export interface BatchOptions extends OperationOptions {
  /** Entities written per statement group; all groups share one transaction. */
  batchSize?: number;
}

export interface PageOptions<T> extends OperationOptions, GetOptions {
  /** 1-based */
  page: number;
  pageSize: number;
  orderBy?: OrderSpec<T>;
}

/**
 * Repository interface defining the contract for all data access operations.
 * Every call is one transaction, retried as a whole on transient failures.
 */
export interface IRepository<T extends object> {
  create(entity: T, options?: OperationOptions): Promise<T>;
  get(key: EntityKey, options?: GetOptions & OperationOptions): Promise<T | undefined>;
  update(entity: T, options?: UpdateOptions): Promise<T>;
  delete(key: EntityKey, options?: DeleteOptions): Promise<void>;
  query(predicate?: Predicate, options?: SelectOptions<T> & OperationOptions): Promise<T[]>;
  queryPaged(predicate: Predicate | undefined, options: PageOptions<T>): Promise<PagedResult<T>>;
  count(predicate?: Predicate, options?: GetOptions & OperationOptions): Promise<number>;
  exists(key: EntityKey, options?: GetOptions & OperationOptions): Promise<boolean>;
  createMany(entities: readonly T[], options?: BatchOptions): Promise<T[]>;
  updateMany(entities: readonly T[], options?: BatchOptions): Promise<T[]>;
  deleteMany(keys: readonly EntityKey[], options?: BatchOptions): Promise<number>;
  bulkImport(entities: readonly T[], options?: BulkImportOptions): Promise<BulkImportResult>;
  exportRecords(
    predicate?: Predicate,
    options?: SelectOptions<T> & OperationOptions,
  ): Promise<Record<string, unknown>[]>;
  purge(options?: PurgeOptions): Promise<PurgeResult>;
  getAuditTrail(key: EntityKey, options?: OperationOptions): Promise<AuditRecord[]>;
  createList(listKey: string, entities: readonly T[], options?: OperationOptions): Promise<T[]>;
  getList(listKey: string, options?: OperationOptions): Promise<T[]>;
  updateList(listKey: string, entities: readonly T[], options?: OperationOptions): Promise<T[]>;
  deleteList(listKey: string, options?: OperationOptions): Promise<number>;
}

/** Synchronous sessions that share the unit of work's transaction. */
export interface TransactionScope {
  session<T extends object>(entity: EntityClass<T>): EntitySession<T>;
  readonly caller?: CallerInfo;
}

export type TransactionCallback<R> = (scope: TransactionScope) => R;

/**
 * Entity manager interface for transaction management.
 */
export interface IEntityManager {
  getRepository<T extends object>(entity: EntityClass<T>): IRepository<T>;
  transaction<R>(work: TransactionCallback<R>, options?: OperationOptions): Promise<R>;
}
