/**
 * DataSource is the primary orchestrator for the ORM.
 *
 * Responsibilities:
 * 1. Manages the better-sqlite3 database connection
 * 2. Provides lazy initialization (connection only on .initialize())
 * 3. Optional schema synchronization (tables in foreign-key order, then indexes)
 * 4. Dispenses the EntityManager and Repositories
 *
 * Retry settings are validated when the DataSource is constructed, so a bad
 * configuration fails at startup rather than on the first call.
 */

import { SqliteAdapter } from './adapter';
import { AuditRecord, AuditTrail } from './audit';
import { EntityManager } from './entity-manager';
import { PersistenceError } from './errors';
import { EntryLists } from './lists';
import { createLogger, type Logger } from './logger';
import { buildMapping } from './mapper';
import type { Repository } from './repository';
import { RetryPolicy, resolveRetryConfig, type RetryConfig } from './retry-policy';
import { sqliteCompiler } from './sqlite-dialect';
import { OpenTelemetryRetryObserver } from './telemetry';
import type { DataSourceOptions, EntityClass, MappingDescriptor } from './types';

/**
 * Orders descriptors so that every table is created after the tables its foreign
 * keys reference. Self references and references to unregistered entities impose
 * no order; cycles fall back to registration order.
 */
export function orderByDependencies(descriptors: readonly MappingDescriptor[]): MappingDescriptor[] {
  const registered = new Set(descriptors.map((d) => d.entity));
  const ordered: MappingDescriptor[] = [];
  const placed = new Set<Function>();
  const visiting = new Set<Function>();
  const byEntity = new Map(descriptors.map((d) => [d.entity, d]));

  const visit = (descriptor: MappingDescriptor): void => {
    if (placed.has(descriptor.entity) || visiting.has(descriptor.entity)) return;
    visiting.add(descriptor.entity);
    for (const fk of descriptor.foreignKeys) {
      const target = byEntity.get(fk.referencedEntity);
      if (target && target !== descriptor && registered.has(fk.referencedEntity)) {
        visit(target);
      }
    }
    visiting.delete(descriptor.entity);
    placed.add(descriptor.entity);
    ordered.push(descriptor);
  };

  descriptors.forEach(visit);
  return ordered;
}

export class DataSource {
  private adapter: SqliteAdapter | null = null;
  private entityManager: EntityManager | null = null;
  private readonly options: DataSourceOptions;
  private readonly logger: Logger;
  readonly retryConfig: Readonly<RetryConfig>;

  constructor(options: DataSourceOptions) {
    this.options = {
      synchronize: false,
      logging: false,
      ...options,
    };
    this.logger = options.logger ?? createLogger('DataSource', this.options.logging === true);
    this.retryConfig = Object.freeze(resolveRetryConfig(options.retry));
  }

  /**
   * Initialize the data source.
   * Opens the database connection, builds every entity mapping and optionally
   * creates tables and indexes.
   *
   * Must be called before using any repositories or queries.
   * Safe to call multiple times (idempotent).
   *
   * @returns this (for chaining)
   *
   * @example
   * ```typescript
   * const dataSource = new DataSource({
   *   dbPath: "app.db",
   *   entities: [Item, Tag],
   *   synchronize: true,
   * });
   *
   * await dataSource.initialize();
   * const items = dataSource.getRepository(Item);
   * ```
   */
  async initialize(): Promise<this> {
    if (this.adapter) {
      return this;
    }

    // mapping errors surface before a connection is opened
    const descriptors = this.options.entities.map((entity) => buildMapping(entity));

    let adapter: SqliteAdapter;
    try {
      adapter = new SqliteAdapter({
        filename: this.options.dbPath,
        busyTimeoutMs: this.options.commandTimeoutMs,
        logger: this.logger,
      });
    } catch (error) {
      throw new PersistenceError(
        `Failed to initialize DataSource: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
    this.logger.info(`Connected to ${this.options.dbPath}`);

    const audited = descriptors.some((d) => d.auditTrail);
    const audit = audited ? new AuditTrail(adapter) : undefined;
    const lists = descriptors.some((d) => d.lists) ? new EntryLists(adapter) : undefined;
    const internal = [audit?.descriptor, lists?.descriptor].filter(
      (d): d is MappingDescriptor => d !== undefined,
    );

    try {
      if (this.options.synchronize) {
        this.synchronizeSchema(adapter, [...descriptors, ...internal]);
        this.logger.info(`Schema synchronized`);
      }
    } catch (error) {
      adapter.close();
      throw error;
    }

    const retry = new RetryPolicy(this.retryConfig, {
      observer: this.options.retryObserver ?? new OpenTelemetryRetryObserver(),
      logger: this.logger.child('RetryPolicy'),
    });

    this.adapter = adapter;
    this.entityManager = new EntityManager({
      adapter,
      retry,
      audit,
      lists,
      logger: this.logger,
      commandTimeoutMs: this.options.commandTimeoutMs,
    });
    return this;
  }

  get isInitialized(): boolean {
    return this.adapter !== null;
  }

  /**
   * The unit-of-work entry point.
   *
   * @throws PersistenceError if the data source is not initialized
   */
  get manager(): EntityManager {
    if (!this.entityManager) {
      throw new PersistenceError('DataSource not initialized. Call .initialize() first.');
    }
    return this.entityManager;
  }

  /**
   * Get a Repository for an entity type.
   * Delegates to the EntityManager which caches repositories.
   *
   * @example
   * ```typescript
   * const items = dataSource.getRepository(Item);
   * const page = await items.queryPaged(undefined, { page: 1, pageSize: 20 });
   * ```
   */
  getRepository<T extends object>(entity: EntityClass<T>): Repository<T> {
    if (!this.options.entities.includes(entity) && entity !== AuditRecord) {
      throw new PersistenceError(`Entity ${entity.name} is not registered with this DataSource.`);
    }
    return this.manager.getRepository(entity);
  }

  /**
   * Destroy the connection gracefully.
   * Closes the database connection and resets state.
   *
   * @example
   * ```typescript
   * process.on('SIGTERM', async () => {
   *   await dataSource.destroy();
   *   process.exit(0);
   * });
   * ```
   */
  async destroy(): Promise<void> {
    if (this.adapter) {
      this.adapter.close();
      this.adapter = null;
      this.entityManager = null;
      this.logger.info(`Connection closed`);
    }
  }

  /**
   * Creates missing tables and indexes. Existing tables are left as they are;
   * there are no migrations.
   */
  private synchronizeSchema(adapter: SqliteAdapter, descriptors: readonly MappingDescriptor[]): void {
    adapter.transaction(() => {
      for (const descriptor of orderByDependencies(descriptors)) {
        const existed = adapter.tableExists(descriptor.tableName);
        adapter.exec(sqliteCompiler.generateCreateTableSql(descriptor));
        for (const statement of sqliteCompiler.generateCreateIndexSql(descriptor)) {
          adapter.exec(statement);
        }
        if (!existed) {
          this.logger.info(`Created table: ${descriptor.tableName}`);
        }
      }
    });
  }
}
