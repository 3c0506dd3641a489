/**
 * versioned-sqlite-orm: a decorator-driven Data Mapper for better-sqlite3
 *
 * Entities stay plain classes; decorators describe their tables, and the mapper
 * turns that metadata into DDL, parameterized DML and typed predicates.
 *
 * Core concepts:
 * - Decorators: @Entity, @Column, @PrimaryColumn, @VersionColumn, ... for metadata
 * - Repository: version-checked CRUD, paging, bulk import, lists and purge
 * - EntityManager: Unit of Work for multi-entity transactions
 * - RetryPolicy: exponential backoff over transient SQLite failures
 * - DataSource: Orchestrator for connection and schema management
 *
 * @example
 * ```typescript
 * import { BaseEntity, Column, DataSource, Entity, PrimaryColumn, predicateBuilder } from 'versioned-sqlite-orm'
 *
 * // 1. Define entities
 * @Entity('Items', { softDelete: true })
 * class Item extends BaseEntity {
 *   @PrimaryColumn('Id')
 *   id!: string
 *
 *   @Column('Name', { size: 100 })
 *   name!: string
 * }
 *
 * // 2. Initialize DataSource
 * const dataSource = new DataSource({
 *   dbPath: 'app.db',
 *   entities: [Item],
 *   synchronize: true,
 * })
 *
 * await dataSource.initialize()
 *
 * // 3. Use Repository
 * const items = dataSource.getRepository(Item)
 * const item = new Item()
 * item.id = 'item-1'
 * item.name = 'John Doe'
 * await items.create(item) // item.version === 1
 *
 * const p = predicateBuilder<Item>()
 * const found = await items.query(p.contains('name', 'Doe'))
 * ```
 */

import 'reflect-metadata';

// Decorators: Define entity metadata
export {
  Entity,
  Column,
  PrimaryColumn,
  VersionColumn,
  CreatedTimeColumn,
  LastWriteTimeColumn,
  Index,
  ForeignKey,
  NotMapped,
  getTableName,
  getTableMetadata,
} from './decorators';
export { BaseEntity } from './base-entity';

// Mapping and SQL generation
export { buildMapping, SOFT_DELETE_COLUMN, EXPIRATION_COLUMN } from './mapper';
export { SqliteCompiler, sqliteCompiler, escapeIdentifier } from './sqlite-dialect';
export type { DmlTemplates } from './sqlite-dialect';

// Predicates and ordering
export { predicateBuilder, orderBy, orderByDescending, OrderByBuilder, field, literal } from './predicate';
export type { Predicate, PredicateBuilder, ComparisonOperator, StringMatchMode } from './predicate';
export { translatePredicate, translateOrderBy, translateSelect, translateCount } from './expression-translator';
export type { TranslatedSql } from './expression-translator';

// Commands
export { WriteCommand } from './command-builder';
export type { CommandContext, WriteState } from './command-builder';

// Core: Repositories and managers for data access
export { Repository } from './repository';
export type { RepositoryContext } from './repository';
export { EntityManager } from './entity-manager';
export { EntitySession } from './session';
export type { SessionServices, WriteTracker } from './session';
export { AuditRecord } from './audit';
export { ListEntry } from './lists';
export type { AuditOperation } from './audit';

// DataSource: Primary orchestrator
export { DataSource } from './data-source';

// Resilience
export { RetryPolicy, RetryPresets, DEFAULT_RETRY_CONFIG, resolveRetryConfig } from './retry-policy';
export type { RetryConfig, RetryPolicyOptions } from './retry-policy';
export { classifyError, isTransientError } from './transient-error-detector';
export { OpenTelemetryRetryObserver } from './telemetry';
export type { RetryObserver, RetryEvent, RetryExhaustedEvent } from './telemetry';

// Config: Type-safe configuration and environment helpers
export { defineConfig, env, retryConfigFromEnv } from './config';
export { createLogger } from './logger';
export type { Logger } from './logger';

// Errors
export {
  PersistenceError,
  MappingError,
  UnsupportedExpressionError,
  ConcurrencyConflictError,
  EntityNotFoundError,
  EntityAlreadyExistsError,
  ListAlreadyExistsError,
  InvalidKeyError,
  ConfigurationError,
  OperationCancelledError,
} from './errors';

// Adapter: Optional, for advanced use (e.g., testing)
export { SqliteAdapter } from './adapter';
export type { SqliteAdapterOptions } from './adapter';

// Types: Re-export commonly used types
export type {
  DataSourceOptions,
  EntityClass,
  EntityKey,
  EntityOptions,
  ColumnOptions,
  PrimaryColumnOptions,
  IndexOptions,
  ForeignKeyOptions,
  MappingDescriptor,
  ColumnDescriptor,
  CallerInfo,
  OperationOptions,
  SelectOptions,
  GetOptions,
  PageOptions,
  PagedResult,
  UpdateOptions,
  DeleteOptions,
  BatchOptions,
  BulkImportOptions,
  BulkImportResult,
  ImportConflictMode,
  PurgeOptions,
  PurgeResult,
  IRepository,
  IEntityManager,
  TransactionScope,
  TransactionCallback,
} from './types';
