/**
 * SqliteAdapter: Thin abstraction over better-sqlite3
 *
 * Internal code talks to the adapter, not to better-sqlite3 directly. The adapter
 * binds named parameters, runs units of work in transactions and applies the
 * per-attempt busy timeout.
 */

import Database from 'better-sqlite3';
import type { CommandExecutor, RunOutcome } from './command-builder';
import { ConfigurationError } from './errors';
import { silentLogger, type Logger } from './logger';
import type { BindValue, Parameters, Row } from './types';

type Bindings = Record<string, BindValue>;

/**
 * Configuration options for the SQLite adapter.
 */
export interface SqliteAdapterOptions {
  /** Path to the SQLite database file, or ':memory:' */
  filename: string;
  /** Busy timeout in milliseconds while waiting for a lock */
  busyTimeoutMs?: number;
  /** Log every statement at debug level */
  verbose?: boolean;
  logger?: Logger;
}

/** Placeholders are written `@Name`; better-sqlite3 expects the bare `Name` keys. */
export function toDriverBindings(parameters: Parameters): Bindings {
  const bindings: Bindings = {};
  for (const [name, value] of Object.entries(parameters)) {
    bindings[name.startsWith('@') ? name.slice(1) : name] = value;
  }
  return bindings;
}

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * SqliteAdapter: Wraps better-sqlite3 and provides a clean interface.
 */
export class SqliteAdapter implements CommandExecutor {
  private readonly db: Database.Database;
  private readonly busyTimeoutMs: number;

  constructor(options: SqliteAdapterOptions) {
    const logger = options.logger ?? silentLogger;
    this.busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    assertTimeout(this.busyTimeoutMs);

    this.db = new Database(options.filename, {
      timeout: this.busyTimeoutMs,
      verbose: options.verbose ? (message?: unknown) => logger.debug(String(message)) : undefined,
    });
    this.db.pragma('foreign_keys = ON');
    if (options.filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
  }

  run(sql: string, parameters?: Parameters): RunOutcome {
    const result =
      parameters && Object.keys(parameters).length > 0
        ? this.db.prepare<[Bindings]>(sql).run(toDriverBindings(parameters))
        : this.db.prepare<[]>(sql).run();
    return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
  }

  get(sql: string, parameters?: Parameters): Row | undefined {
    return parameters && Object.keys(parameters).length > 0
      ? this.db.prepare<[Bindings], Row>(sql).get(toDriverBindings(parameters))
      : this.db.prepare<[], Row>(sql).get();
  }

  all(sql: string, parameters?: Parameters): Row[] {
    return parameters && Object.keys(parameters).length > 0
      ? this.db.prepare<[Bindings], Row>(sql).all(toDriverBindings(parameters))
      : this.db.prepare<[], Row>(sql).all();
  }

  /** Runs one or more statements without parameters, e.g. DDL. */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  /**
   * Execute a function within a transaction.
   *
   * If the function throws, the transaction is rolled back.
   * If it succeeds, changes are committed. Nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  /**
   * Runs `fn` with a different busy timeout, restoring the connection default
   * afterwards. `undefined` keeps the default.
   */
  withBusyTimeout<T>(timeoutMs: number | undefined, fn: () => T): T {
    if (timeoutMs === undefined || timeoutMs === this.busyTimeoutMs) {
      return fn();
    }
    assertTimeout(timeoutMs);
    this.db.pragma(`busy_timeout = ${timeoutMs}`);
    try {
      return fn();
    } finally {
      this.db.pragma(`busy_timeout = ${this.busyTimeoutMs}`);
    }
  }

  /**
   * Check if a table exists in the database.
   */
  tableExists(tableName: string): boolean {
    const result = this.get(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = @name`, {
      '@name': tableName,
    });
    return result !== undefined;
  }

  get open(): boolean {
    return this.db.open;
  }

  /**
   * Close the database connection.
   * After calling this, no further operations are possible.
   */
  close(): void {
    this.db.close();
  }
}

function assertTimeout(ms: number): void {
  if (!Number.isSafeInteger(ms) || ms < 0) {
    throw new ConfigurationError(`Command timeout must be a non-negative integer of milliseconds, got ${ms}.`);
  }
}
