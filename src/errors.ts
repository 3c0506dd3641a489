/**
 * Error taxonomy for the mapper.
 *
 * Mapping and expression errors are programming errors and are never retried.
 * Concurrency, not-found and already-exists errors are key-level outcomes of a
 * write. Storage errors raised by better-sqlite3 are not wrapped: after the
 * retry policy gives up they reach the caller unchanged.
 */

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or contradictory entity metadata. */
export class MappingError extends PersistenceError {}

/** A predicate, ordering or paging value the translator cannot express in SQL. */
export class UnsupportedExpressionError extends PersistenceError {
  constructor(
    readonly nodeKind: string,
    detail?: string,
  ) {
    super(
      detail
        ? `Unsupported expression node '${nodeKind}': ${detail}`
        : `Unsupported expression node '${nodeKind}'`,
    );
  }
}

/** The stored version differs from the version the caller read. */
export class ConcurrencyConflictError extends PersistenceError {
  constructor(
    readonly entityKey: string,
    readonly currentVersion: number,
    readonly expectedVersion: number,
  ) {
    super(
      `Entity '${entityKey}' was modified concurrently: expected version ${expectedVersion}, found ${currentVersion}.`,
    );
  }
}

export class EntityNotFoundError extends PersistenceError {
  constructor(readonly entityKey: string) {
    super(`Entity '${entityKey}' was not found.`);
  }
}

export class EntityAlreadyExistsError extends PersistenceError {
  constructor(readonly entityKey: string) {
    super(
      `Entity '${entityKey}' already exists. Use update() to modify existing entities.`,
    );
  }
}

export class ListAlreadyExistsError extends PersistenceError {
  constructor(readonly listKey: string) {
    super(`List '${listKey}' already exists. Use updateList() to replace its entries.`);
  }
}

/** A key value that does not match the entity's primary key shape. */
export class InvalidKeyError extends PersistenceError {}

/** Invalid options, detected when the configuration is built. */
export class ConfigurationError extends PersistenceError {}

/** The caller's AbortSignal fired before or between attempts. */
export class OperationCancelledError extends PersistenceError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Operation '${operation}' was cancelled.`, options);
  }
}
