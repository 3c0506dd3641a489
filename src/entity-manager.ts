/**
 * EntityManager implements the Unit of Work pattern.
 *
 * The Unit of Work pattern ensures that multiple operations succeed or fail
 * as a single atomic unit. In SQLite (via better-sqlite3), this is achieved
 * using the .transaction() method which handles BEGIN, COMMIT, and ROLLBACK.
 * The whole unit is retried on transient failures, so the callback must be
 * synchronous and free of side effects outside the database. Entities written
 * through the unit's sessions are put back as they were when an attempt rolls back.
 */

import { Repository, type RepositoryContext } from './repository';
import { EntitySession, type WriteTracker } from './session';
import type {
  EntityClass,
  IEntityManager,
  OperationOptions,
  TransactionCallback,
  TransactionScope,
} from './types';

/** Own-property snapshots of the entities one attempt writes. */
class EntitySnapshots implements WriteTracker {
  private readonly snapshots = new Map<object, Record<string, unknown>>();

  track(entity: object): void {
    if (!this.snapshots.has(entity)) {
      this.snapshots.set(entity, { ...entity });
    }
  }

  restore(): void {
    for (const [entity, snapshot] of this.snapshots) {
      for (const property of Object.keys(entity)) {
        if (!Object.hasOwn(snapshot, property)) {
          Reflect.deleteProperty(entity, property);
        }
      }
      Object.assign(entity, snapshot);
    }
    this.snapshots.clear();
  }
}

export class EntityManager implements IEntityManager {
  private readonly repositoryCache = new Map<Function, unknown>();
  private readonly sessionCache = new Map<Function, unknown>();

  constructor(private readonly context: RepositoryContext) {}

  /**
   * Execute multiple operations within a single transaction.
   * If any operation throws an error, all changes are rolled back.
   *
   * @example
   * ```typescript
   * await manager.transaction(({ session }) => {
   *   const orders = session(Order);
   *   const lines = session(OrderLine);
   *   orders.create(order);
   *   lines.create(line);
   * });
   * ```
   */
  transaction<R>(work: TransactionCallback<R>, options: OperationOptions = {}): Promise<R> {
    const { adapter, retry, commandTimeoutMs } = this.context;
    return retry.execute(
      () => {
        const snapshots = new EntitySnapshots();
        const sessions = new Map<Function, unknown>();
        const scope: TransactionScope = {
          session: (entity) => this.cachedSession(sessions, entity, snapshots),
          caller: options.caller,
        };
        try {
          return adapter.withBusyTimeout(commandTimeoutMs, () => adapter.transaction(() => work(scope)));
        } catch (error) {
          snapshots.restore();
          throw error;
        }
      },
      { operation: 'transaction', signal: options.signal },
    );
  }

  /**
   * Get or create a Repository for an entity type.
   * Caches repositories to avoid re-instantiation.
   *
   * @example
   * ```typescript
   * const items = manager.getRepository(Item);
   * const found = await items.get('item-1');
   * ```
   */
  getRepository<T extends object>(entity: EntityClass<T>): Repository<T> {
    const cached = this.repositoryCache.get(entity);
    if (cached instanceof Repository && cached.target === entity) {
      return cached;
    }
    const repository = new Repository(entity, this.context);
    this.repositoryCache.set(entity, repository);
    return repository;
  }

  /**
   * A synchronous session of its own. Inside `transaction`, use the scope's
   * `session` so that a rolled-back attempt restores the entities it wrote.
   */
  session<T extends object>(entity: EntityClass<T>): EntitySession<T> {
    return this.cachedSession(this.sessionCache, entity);
  }

  private cachedSession<T extends object>(
    cache: Map<Function, unknown>,
    entity: EntityClass<T>,
    tracker?: WriteTracker,
  ): EntitySession<T> {
    const cached = cache.get(entity);
    if (cached instanceof EntitySession && cached.entity === entity) {
      return cached;
    }
    const { adapter, audit, lists, clock } = this.context;
    const session = new EntitySession(entity, adapter, { audit, lists, clock, tracker });
    cache.set(entity, session);
    return session;
  }
}
